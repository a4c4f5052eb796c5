import { ConfigurationError } from './errors.ts'
import { resolveRetryPolicy } from './retry.ts'
import type { TAuthScheme, TClientConfig, TRetryPolicy } from './types.ts'
import { normalizeBaseUrl, validateRequiredStrings } from './utils.ts'

export const CIRCLE_API_URL = 'https://circleci.com/api'
export const DEFAULT_TIMEOUT_IN_MILLISECONDS = 30_000

const AUTH_SCHEMES: readonly TAuthScheme[] = ['auto', 'basic', 'circle-token']

export type TClientConfigOptions = {
  /** API token. Defaults to the CIRCLE_TOKEN environment variable */
  token?: string
  /**
   * API root. Defaults to CIRCLE_API_URL, then https://circleci.com/api.
   * Self-hosted servers expose it under `/api` of the installation URL.
   */
  baseUrl?: string
  /** Per-attempt timeout */
  timeoutInMilliseconds?: number
  /** Set to false to accept self-signed certificates on self-hosted servers */
  verifySsl?: boolean
  authScheme?: TAuthScheme
  retryPolicy?: Partial<TRetryPolicy>
}

/**
 * Resolves options and environment into the frozen configuration
 * a client keeps for its lifetime.
 */
export function resolveClientConfig(
  options: TClientConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): TClientConfig {
  const token = options.token ?? env.CIRCLE_TOKEN
  const baseUrl = options.baseUrl ?? env.CIRCLE_API_URL ?? CIRCLE_API_URL

  validateRequiredStrings({ token, baseUrl }, ['token', 'baseUrl'])
  if (token === undefined || token.trim() === '') {
    throw new ConfigurationError('token must be a non-empty string')
  }

  const timeoutInMilliseconds = options.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS
  if (!Number.isFinite(timeoutInMilliseconds) || timeoutInMilliseconds <= 0) {
    throw new ConfigurationError('timeoutInMilliseconds must be a positive number')
  }

  const authScheme = options.authScheme ?? 'auto'
  if (!AUTH_SCHEMES.includes(authScheme)) {
    throw new ConfigurationError(
      `Invalid authScheme: ${authScheme}. Valid values are: ${AUTH_SCHEMES.join(', ')}`,
    )
  }

  return Object.freeze({
    token,
    baseUrl: normalizeBaseUrl(baseUrl),
    timeoutInMilliseconds,
    verifySsl: options.verifySsl ?? true,
    authScheme,
    retryPolicy: resolveRetryPolicy(options.retryPolicy),
  })
}
