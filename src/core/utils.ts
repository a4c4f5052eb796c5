import { ConfigurationError } from './errors.ts'
import type { TApiVersion, TQueryParams } from './types.ts'

const API_VERSION_ALIASES: Record<string, TApiVersion> = {
  'v1.1': 'v1.1',
  v1: 'v1.1',
  '1.1': 'v1.1',
  '1': 'v1.1',
  '1.0': 'v1.1',
  v2: 'v2',
  '2': 'v2',
  '2.0': 'v2',
}

/** Normalizes loose version inputs ("1", "v2", "2.0"...). An omitted version means v1.1. */
export function normalizeApiVersion(apiVersion?: string | number): TApiVersion {
  if (apiVersion === undefined) return 'v1.1'
  const normalized = API_VERSION_ALIASES[String(apiVersion).toLowerCase()]
  if (!normalized) {
    throw new ConfigurationError(
      `Invalid CircleCI API version: ${apiVersion}. Valid values are: v1.1, v2`,
    )
  }
  return normalized
}

export function normalizeBaseUrl(url: string): string {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new ConfigurationError(`baseUrl is not a valid URL: ${url}`)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`baseUrl must use http or https: ${url}`)
  }
  return url.replace(/\/+$/, '')
}

/**
 * Joins base URL, version prefix and endpoint path, then appends the defined query values.
 * The path is expected to be encoded already; `new URL` leaves existing escapes untouched.
 */
export function buildUrl(
  baseUrl: string,
  apiVersion: TApiVersion,
  path: string,
  queryString?: TQueryParams,
): URL {
  const url = new URL(`${baseUrl}/${apiVersion}/${path.replace(/^\/+/, '')}`)
  if (queryString) {
    for (const [queryKey, queryValue] of Object.entries(queryString)) {
      if (queryValue !== undefined) url.searchParams.set(queryKey, String(queryValue))
    }
  }
  return url
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved = override ?? (globalThis as unknown as { fetch?: typeof fetch }).fetch
  if (!resolved) {
    throw new ConfigurationError(
      'No fetch implementation available. ' +
        'Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {}
  headers.forEach((value, key) => {
    record[key] = value
  })
  return record
}

export function createTimeoutSignal(
  timeoutMs: number,
  outerSignal?: AbortSignal,
): { signal: AbortSignal; timeoutSignal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  timeoutId.unref()
  const signal = outerSignal ? AbortSignal.any([controller.signal, outerSignal]) : controller.signal
  return { signal, timeoutSignal: controller.signal, cleanup: () => clearTimeout(timeoutId) }
}

export function validateRequiredStrings<T extends Record<string, unknown>>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    if (!options[key] || typeof options[key] !== 'string') {
      throw new ConfigurationError(`${key} must be a non-empty string`)
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function assertOneOf<T extends string>(
  value: string,
  allowed: readonly T[],
  label: string,
): asserts value is T {
  if (!allowed.some((entry) => entry === value)) {
    throw new ConfigurationError(
      `Invalid ${label}: ${value}. Valid values are: ${allowed.join(', ')}`,
    )
  }
}
