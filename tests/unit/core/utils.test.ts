import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  assertOneOf,
  buildUrl,
  createTimeoutSignal,
  headersToRecord,
  normalizeApiVersion,
  normalizeBaseUrl,
  validateRequiredStrings,
} from '../../../src/core/utils.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'

describe('normalizeApiVersion', () => {
  it('defaults to v1.1', () => {
    expect(normalizeApiVersion()).toBe('v1.1')
  })

  it.each([
    ['v1.1', 'v1.1'],
    ['1', 'v1.1'],
    ['1.0', 'v1.1'],
    ['V1', 'v1.1'],
    ['2', 'v2'],
    ['v2', 'v2'],
    ['2.0', 'v2'],
  ])('accepts %s as %s', (input, expected) => {
    expect(normalizeApiVersion(input)).toBe(expected)
  })

  it('accepts numbers', () => {
    expect(normalizeApiVersion(2)).toBe('v2')
    expect(normalizeApiVersion(1.1)).toBe('v1.1')
  })

  it('rejects unknown versions', () => {
    expect(() => normalizeApiVersion('v3')).toThrow(
      'Invalid CircleCI API version: v3. Valid values are: v1.1, v2',
    )
  })
})

describe('normalizeBaseUrl', () => {
  it('strips trailing slashes', () => {
    expect(normalizeBaseUrl('https://ci.acme.test/api//')).toBe('https://ci.acme.test/api')
  })

  it('rejects values that are not URLs', () => {
    expect(() => normalizeBaseUrl('not a url')).toThrow('baseUrl is not a valid URL: not a url')
  })

  it('rejects schemes other than http and https', () => {
    expect(() => normalizeBaseUrl('ftp://ci.acme.test')).toThrow(
      'baseUrl must use http or https: ftp://ci.acme.test',
    )
  })
})

describe('buildUrl', () => {
  it('joins base URL, version and path', () => {
    const url = buildUrl('https://circleci.test/api', 'v2', '/project/gh/acme/api')
    expect(url.toString()).toBe('https://circleci.test/api/v2/project/gh/acme/api')
  })

  it('skips undefined query values and stringifies the rest', () => {
    const url = buildUrl('https://circleci.test/api', 'v1.1', 'recent-builds', {
      limit: 30,
      shallow: true,
      filter: undefined,
    })
    expect(url.toString()).toBe(
      'https://circleci.test/api/v1.1/recent-builds?limit=30&shallow=true',
    )
  })

  it('keeps existing percent escapes in the path', () => {
    const url = buildUrl('https://circleci.test/api', 'v2', 'project/gh/acme/my%20repo')
    expect(url.pathname).toBe('/api/v2/project/gh/acme/my%20repo')
  })
})

describe('headersToRecord', () => {
  it('copies headers into a plain object', () => {
    const headers = new Headers({ 'X-Request-Id': 'abc' })
    expect(headersToRecord(headers)).toEqual({ 'x-request-id': 'abc' })
  })
})

describe('createTimeoutSignal', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('aborts after the timeout', () => {
    vi.useFakeTimers()
    const { signal, timeoutSignal } = createTimeoutSignal(100)
    vi.advanceTimersByTime(100)
    expect(signal.aborted).toBe(true)
    expect(timeoutSignal.aborted).toBe(true)
  })

  it('follows the outer signal without marking a timeout', () => {
    const outer = new AbortController()
    const { signal, timeoutSignal, cleanup } = createTimeoutSignal(1000, outer.signal)
    outer.abort()
    cleanup()
    expect(signal.aborted).toBe(true)
    expect(timeoutSignal.aborted).toBe(false)
  })
})

describe('validateRequiredStrings', () => {
  it('passes when all required strings are present', () => {
    expect(() => validateRequiredStrings({ token: 'abc' }, ['token'])).not.toThrow()
  })

  it('throws ConfigurationError for empty strings', () => {
    expect(() => validateRequiredStrings({ token: '' }, ['token'])).toThrow(ConfigurationError)
    expect(() => validateRequiredStrings({ token: '' }, ['token'])).toThrow(
      'token must be a non-empty string',
    )
  })

  it('throws ConfigurationError for missing values', () => {
    expect(() => validateRequiredStrings({ token: undefined }, ['token'])).toThrow(
      ConfigurationError,
    )
  })
})

describe('assertOneOf', () => {
  it('accepts allowed values', () => {
    expect(() =>
      assertOneOf('deploy-key', ['deploy-key', 'github-user-key'], 'key type'),
    ).not.toThrow()
  })

  it('lists the valid values when rejecting', () => {
    expect(() => assertOneOf('ssh', ['deploy-key', 'github-user-key'], 'key type')).toThrow(
      'Invalid key type: ssh. Valid values are: deploy-key, github-user-key',
    )
  })
})
