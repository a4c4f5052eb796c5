import { AbortOperationError, ConfigurationError } from './errors.ts'
import type { TRetryPolicy } from './types.ts'

export const DEFAULT_RETRYABLE_STATUSES: readonly number[] = Object.freeze([
  408, 429, 500, 502, 503, 504, 520, 521, 522, 523, 524,
])

export const DEFAULT_RETRY_POLICY: Readonly<TRetryPolicy> = Object.freeze({
  retries: 3,
  backoffFactorInMilliseconds: 300,
  maximumDelayInMilliseconds: 10_000,
  retryableStatuses: DEFAULT_RETRYABLE_STATUSES,
})

/** Merges a partial policy onto the defaults and freezes the result. */
export function resolveRetryPolicy(overrides?: Partial<TRetryPolicy>): Readonly<TRetryPolicy> {
  const policy: TRetryPolicy = {
    retries: overrides?.retries ?? DEFAULT_RETRY_POLICY.retries,
    backoffFactorInMilliseconds:
      overrides?.backoffFactorInMilliseconds ?? DEFAULT_RETRY_POLICY.backoffFactorInMilliseconds,
    maximumDelayInMilliseconds:
      overrides?.maximumDelayInMilliseconds ?? DEFAULT_RETRY_POLICY.maximumDelayInMilliseconds,
    retryableStatuses: Object.freeze([
      ...(overrides?.retryableStatuses ?? DEFAULT_RETRY_POLICY.retryableStatuses),
    ]),
  }

  if (!Number.isInteger(policy.retries) || policy.retries < 0) {
    throw new ConfigurationError('retryPolicy.retries must be a non-negative integer')
  }
  if (policy.backoffFactorInMilliseconds < 0 || policy.maximumDelayInMilliseconds < 0) {
    throw new ConfigurationError('retryPolicy delays must not be negative')
  }

  return Object.freeze(policy)
}

export function isRetryableStatus(policy: Readonly<TRetryPolicy>, status: number): boolean {
  return policy.retryableStatuses.includes(status)
}

export function calculateBackoff(
  attemptIndex: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attemptIndex))
  const jitter = Math.random() * 0.25 * exponential
  return exponential + jitter
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortOperationError())
      return
    }

    let onAbort: (() => void) | undefined

    const timeoutId = setTimeout(() => {
      if (onAbort) signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    timeoutId.unref()

    if (signal) {
      onAbort = () => {
        clearTimeout(timeoutId)
        reject(new AbortOperationError())
      }
      signal.addEventListener('abort', onAbort, { once: true })
    }
  })
}
