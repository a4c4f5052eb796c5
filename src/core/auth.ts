import type { TApiVersion, TAuthScheme } from './types.ts'

export const CIRCLE_TOKEN_HEADER = 'circle-token'
export const REDACTED = '[REDACTED]'

const CREDENTIAL_HEADERS = new Set(['authorization', CIRCLE_TOKEN_HEADER])

function resolveScheme(scheme: TAuthScheme, apiVersion: TApiVersion): 'basic' | 'circle-token' {
  if (scheme !== 'auto') return scheme
  return apiVersion === 'v1.1' ? 'basic' : 'circle-token'
}

/**
 * Returns the header that carries the token for the given API version.
 * Basic auth uses the token as username with an empty password.
 */
export function buildAuthHeaders(
  token: string,
  apiVersion: TApiVersion,
  scheme: TAuthScheme,
): Record<string, string> {
  if (resolveScheme(scheme, apiVersion) === 'basic') {
    return { authorization: `Basic ${Buffer.from(`${token}:`).toString('base64')}` }
  }
  return { [CIRCLE_TOKEN_HEADER]: token }
}

/** Copies headers with credential values replaced, keeping the auth scheme word visible. */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers)) {
    const lowerName = name.toLowerCase()
    if (!CREDENTIAL_HEADERS.has(lowerName)) {
      redacted[lowerName] = value
      continue
    }
    const schemeWord = value.match(/^(Basic|Bearer)\s/)?.[1]
    redacted[lowerName] = schemeWord ? `${schemeWord} ${REDACTED}` : REDACTED
  }
  return redacted
}
