export type TApiVersion = 'v1.1' | 'v2'

export type THttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

/**
 * How the token is attached to outgoing requests.
 * - `auto`: HTTP Basic (token as username, empty password) on v1.1, `Circle-Token` header on v2
 * - `basic` / `circle-token`: force one scheme for both API versions
 */
export type TAuthScheme = 'auto' | 'basic' | 'circle-token'

export type TVcsType = 'github' | 'bitbucket' | 'gh' | 'bb' | 'circleci'

export type TQueryValue = string | number | boolean | undefined

export type TQueryParams = Record<string, TQueryValue>

export type TRequestOptions = {
  apiVersion?: TApiVersion
  queryString?: TQueryParams
  body?: unknown
  signal?: AbortSignal
  timeoutInMilliseconds?: number
  headers?: Record<string, string>
  /** Resolve to undefined on an empty 2xx body instead of raising ParseError */
  allowEmptyBody?: boolean
}

export type TItemsRequestOptions = {
  /** Defaults to v2 */
  apiVersion?: TApiVersion
  queryString?: TQueryParams
  /** Follow continuation tokens (v2) or page numbers (v1.1) until exhausted. Defaults to true. */
  paginate?: boolean
  /** Maximum number of items to return across all pages */
  limit?: number
  signal?: AbortSignal
}

/** Options accepted by every list method that depaginates. */
export type TPageOptions = Pick<TItemsRequestOptions, 'paginate' | 'limit' | 'signal'>

export type TRetryPolicy = {
  /** Retries after the first attempt; 0 disables retrying */
  retries: number
  /** Delay before retry n (0-based) is `backoffFactor * 2^n`, capped by the maximum, plus jitter */
  backoffFactorInMilliseconds: number
  maximumDelayInMilliseconds: number
  retryableStatuses: readonly number[]
}

export type TClientConfig = {
  readonly token: string
  readonly baseUrl: string
  readonly timeoutInMilliseconds: number
  readonly verifySsl: boolean
  readonly authScheme: TAuthScheme
  readonly retryPolicy: Readonly<TRetryPolicy>
}

export type TRequestRecord = {
  method: THttpMethod
  url: string
  /** Credentials are replaced with `[REDACTED]` */
  headers: Record<string, string>
  body?: unknown
}

export type TResponseRecord = {
  status: number
  statusText: string
  headers: Record<string, string>
  /** Parsed JSON when the body parses, raw text otherwise, undefined when empty or binary */
  body?: unknown
}

export type TExchange = {
  request: TRequestRecord
  response?: TResponseRecord
}

/** Options shared by every method addressing a project by org and repo name. */
export type TProjectOptions = {
  /** Defaults to `github` */
  vcsType?: TVcsType
  signal?: AbortSignal
}
