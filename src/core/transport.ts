import { Agent, fetch as undiciFetch } from 'undici'
import { buildAuthHeaders, CIRCLE_TOKEN_HEADER, redactHeaders } from './auth.ts'
import {
  AbortOperationError,
  APIError,
  ConfigurationError,
  ParseError,
  TimeoutError,
  TransportError,
} from './errors.ts'
import { logger } from './logger.ts'
import { calculateBackoff, isRetryableStatus, sleep } from './retry.ts'
import { USER_AGENT } from './sdk-info.ts'
import type {
  TApiVersion,
  TClientConfig,
  TExchange,
  THttpMethod,
  TItemsRequestOptions,
  TQueryParams,
  TRequestOptions,
  TRequestRecord,
  TResponseRecord,
} from './types.ts'
import { buildUrl, createTimeoutSignal, headersToRecord, isRecord, resolveFetch } from './utils.ts'

const MAXIMUM_V1_PAGE_SIZE = 100
const EMPTY_BODY_STATUSES: readonly number[] = [204, 205]

export type TTransportOptions = {
  config: TClientConfig
  fetchImplementation?: typeof fetch | undefined
}

type TSendOptions<TBody> = {
  headers: Record<string, string>
  body?: unknown
  signal?: AbortSignal
  timeoutInMilliseconds?: number
  readBody: (response: Response) => Promise<TBody>
  recordBody: (body: TBody) => unknown
}

type TAttemptOutcome<TBody> =
  | { kind: 'success'; response: Response; body: TBody }
  | { kind: 'status'; response: Response; text: string }
  | { kind: 'failure'; error: TransportError }

type TPage<TItem> = { items: TItem[]; nextPageToken?: string }

function parseLenient(text: string): unknown {
  if (text.trim() === '') return undefined
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

function describeFailure(caughtError: unknown): string {
  return caughtError instanceof Error ? caughtError.message : String(caughtError)
}

/**
 * Request dispatcher shared by every domain API.
 * Builds versioned URLs, decorates auth, retries transient failures, parses JSON
 * and keeps the last request/response pair for introspection.
 */
export class Transport {
  private readonly config: TClientConfig
  private readonly fetchImplementation: typeof fetch
  private readonly dispatcher?: Agent
  private readonly userAgent: string = USER_AGENT
  private lastExchange?: TExchange

  constructor(options: TTransportOptions) {
    this.config = options.config
    if (!options.config.verifySsl) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } })
    }
    // An undici Agent is only paired with the fetch of the same undici release.
    this.fetchImplementation =
      options.fetchImplementation ??
      (this.dispatcher ? (undiciFetch as unknown as typeof fetch) : resolveFetch())
  }

  get baseUrl(): string {
    return this.config.baseUrl
  }

  /** Request of the final attempt of the most recent call. */
  get lastRequest(): TRequestRecord | undefined {
    return this.lastExchange?.request
  }

  /** Response of the final attempt of the most recent call; undefined when it never arrived. */
  get lastResponse(): TResponseRecord | undefined {
    return this.lastExchange?.response
  }

  get exchange(): TExchange | undefined {
    return this.lastExchange
  }

  /** Releases the connection pool opened for `verifySsl: false`. */
  async close(): Promise<void> {
    await this.dispatcher?.close()
  }

  async request<TResponse>(
    httpMethod: THttpMethod,
    path: string,
    requestOptions: TRequestOptions = {},
  ): Promise<TResponse> {
    const apiVersion: TApiVersion = requestOptions.apiVersion ?? 'v1.1'
    const url: URL = buildUrl(this.config.baseUrl, apiVersion, path, requestOptions.queryString)
    const hasBody = requestOptions.body !== undefined

    const { status, text } = await this.send(httpMethod, url, {
      headers: {
        accept: 'application/json',
        'user-agent': this.userAgent,
        ...buildAuthHeaders(this.config.token, apiVersion, this.config.authScheme),
        ...(hasBody ? { 'content-type': 'application/json' } : {}),
        ...(requestOptions.headers ?? {}),
      },
      body: requestOptions.body,
      signal: requestOptions.signal,
      timeoutInMilliseconds: requestOptions.timeoutInMilliseconds,
      readBody: async (response) => ({ status: response.status, text: await response.text() }),
      recordBody: (body) => parseLenient(body.text),
    })

    if (text.trim() === '') {
      if (requestOptions.allowEmptyBody || EMPTY_BODY_STATUSES.includes(status)) {
        return undefined as unknown as TResponse
      }
      throw new ParseError(`Empty response body for ${httpMethod} ${url.toString()}`, {
        body: text,
      })
    }
    try {
      return JSON.parse(text) as TResponse
    } catch (caughtError) {
      throw new ParseError(`Invalid JSON in response to ${httpMethod} ${url.toString()}`, {
        body: text,
        cause: caughtError,
      })
    }
  }

  /**
   * GETs a list endpoint and concatenates its pages into one array.
   * v2 pages are `{ items, next_page_token }` and are followed through `page-token`;
   * v1.1 pages are bare arrays followed through `page` until one comes back empty.
   */
  async requestItems<TItem>(path: string, options: TItemsRequestOptions = {}): Promise<TItem[]> {
    const apiVersion: TApiVersion = options.apiVersion ?? 'v2'
    const paginate = options.paginate ?? true
    const limit = options.limit
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new ConfigurationError('limit must be a positive integer')
    }

    const queryString: TQueryParams = { ...options.queryString }
    if (apiVersion === 'v1.1') {
      queryString['per-page'] =
        limit !== undefined && limit < MAXIMUM_V1_PAGE_SIZE ? limit : MAXIMUM_V1_PAGE_SIZE
    }

    const results: TItem[] = []
    let pageNumber = 1
    for (;;) {
      const body = await this.request<unknown>('GET', path, {
        apiVersion,
        queryString,
        signal: options.signal,
      })
      const page = this.readPage<TItem>(body, path)
      results.push(...page.items)

      if (!paginate) break
      if (apiVersion === 'v1.1' && page.items.length === 0) break
      if (limit !== undefined && results.length >= limit) break

      if (apiVersion === 'v2') {
        if (!page.nextPageToken) break
        queryString['page-token'] = page.nextPageToken
      } else {
        pageNumber += 1
        queryString.page = pageNumber
      }
    }

    return limit === undefined ? results : results.slice(0, limit)
  }

  /**
   * Fetches an absolute URL (artifact downloads) with the Circle-Token header
   * and returns the bytes.
   */
  async download(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    let target: URL
    try {
      target = new URL(url)
    } catch {
      throw new ConfigurationError(`Invalid artifact URL: ${url}`)
    }

    return await this.send('GET', target, {
      headers: {
        'user-agent': this.userAgent,
        [CIRCLE_TOKEN_HEADER]: this.config.token,
      },
      signal,
      readBody: async (response) => new Uint8Array(await response.arrayBuffer()),
      recordBody: () => undefined,
    })
  }

  private readPage<TItem>(body: unknown, path: string): TPage<TItem> {
    if (Array.isArray(body)) return { items: body as TItem[] }
    if (isRecord(body) && Array.isArray(body.items)) {
      const token = body.next_page_token
      return {
        items: body.items as TItem[],
        nextPageToken: typeof token === 'string' && token !== '' ? token : undefined,
      }
    }
    throw new ParseError(`Expected a list of items from ${path}`, {
      body: JSON.stringify(body) ?? '',
    })
  }

  private async send<TBody>(
    httpMethod: THttpMethod,
    url: URL,
    options: TSendOptions<TBody>,
  ): Promise<TBody> {
    const { retries } = this.config.retryPolicy
    const requestRecord: TRequestRecord = {
      method: httpMethod,
      url: url.toString(),
      headers: redactHeaders(options.headers),
      ...(options.body !== undefined ? { body: options.body } : {}),
    }

    for (let attemptIndex = 0; ; attemptIndex++) {
      if (options.signal?.aborted) throw new AbortOperationError()
      this.lastExchange = { request: requestRecord }

      const outcome = await this.attempt(httpMethod, url, options)
      const hasRetriesLeft = attemptIndex < retries

      if (outcome.kind === 'failure') {
        if (!hasRetriesLeft) throw outcome.error
        await this.backoff(httpMethod, url, outcome.error.message, attemptIndex, options.signal)
        continue
      }

      const { response } = outcome
      const responseRecord: TResponseRecord = {
        status: response.status,
        statusText: response.statusText,
        headers: headersToRecord(response.headers),
      }
      this.lastExchange = { request: requestRecord, response: responseRecord }

      if (outcome.kind === 'success') {
        const recordedBody = options.recordBody(outcome.body)
        if (recordedBody !== undefined) responseRecord.body = recordedBody
        return outcome.body
      }

      const errorBody = parseLenient(outcome.text)
      if (errorBody !== undefined) responseRecord.body = errorBody

      if (hasRetriesLeft && isRetryableStatus(this.config.retryPolicy, response.status)) {
        await this.backoff(httpMethod, url, `HTTP ${response.status}`, attemptIndex, options.signal)
        continue
      }

      throw new APIError(`HTTP ${response.status} for ${httpMethod} ${url.toString()}`, {
        status: response.status,
        statusText: response.statusText,
        method: httpMethod,
        url: url.toString(),
        body: errorBody,
      })
    }
  }

  private async attempt<TBody>(
    httpMethod: THttpMethod,
    url: URL,
    options: TSendOptions<TBody>,
  ): Promise<TAttemptOutcome<TBody>> {
    const timeoutInMilliseconds =
      options.timeoutInMilliseconds ?? this.config.timeoutInMilliseconds
    const { signal, timeoutSignal, cleanup } = createTimeoutSignal(
      timeoutInMilliseconds,
      options.signal,
    )

    try {
      const response: Response = await this.fetchImplementation(url.toString(), {
        method: httpMethod,
        headers: options.headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      } as RequestInit)

      if (response.ok) {
        return { kind: 'success', response, body: await options.readBody(response) }
      }
      return { kind: 'status', response, text: await response.text() }
    } catch (caughtError) {
      if (options.signal?.aborted) throw new AbortOperationError()
      const details = { method: httpMethod, url: url.toString(), cause: caughtError }
      if (timeoutSignal.aborted) {
        return {
          kind: 'failure',
          error: new TimeoutError(
            `${httpMethod} ${url.toString()} timed out after ${timeoutInMilliseconds}ms`,
            details,
          ),
        }
      }
      return {
        kind: 'failure',
        error: new TransportError(
          `${httpMethod} ${url.toString()} failed: ${describeFailure(caughtError)}`,
          details,
        ),
      }
    } finally {
      cleanup()
    }
  }

  private async backoff(
    httpMethod: THttpMethod,
    url: URL,
    reason: string,
    attemptIndex: number,
    signal?: AbortSignal,
  ): Promise<void> {
    const { retries, backoffFactorInMilliseconds, maximumDelayInMilliseconds } =
      this.config.retryPolicy
    const delay = calculateBackoff(
      attemptIndex,
      backoffFactorInMilliseconds,
      maximumDelayInMilliseconds,
    )
    const attempt = `retry ${attemptIndex + 1}/${retries}`
    const wait = `${Math.round(delay)}ms`
    logger.warn(`Retrying ${httpMethod} ${url.toString()} after ${reason} (${attempt}) in ${wait}`)
    await sleep(delay, signal)
  }
}
