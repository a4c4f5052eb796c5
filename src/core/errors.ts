import type { THttpMethod } from './types.ts'

/** Base class for every error raised by the client. */
export class CircleCIError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CircleCIError'
  }
}

/** Indicates a configuration problem detected at construction time or during method validation. */
export class ConfigurationError extends CircleCIError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** Indicates the request never produced a response (connection refused, DNS, reset...). */
export class TransportError extends CircleCIError {
  readonly method: THttpMethod
  readonly url: string

  constructor(message: string, details: { method: THttpMethod; url: string; cause?: unknown }) {
    super(message, { cause: details.cause })
    this.name = 'TransportError'
    this.method = details.method
    this.url = details.url
  }
}

/** Indicates a single attempt exceeded the configured timeout. */
export class TimeoutError extends TransportError {
  constructor(message: string, details: { method: THttpMethod; url: string; cause?: unknown }) {
    super(message, details)
    this.name = 'TimeoutError'
  }
}

export type TAPIErrorDetails = {
  status: number
  statusText: string
  method: THttpMethod
  url: string
  body?: unknown
}

/** Indicates a non-successful HTTP response from the CircleCI API. */
export class APIError extends CircleCIError {
  readonly status: number
  readonly statusText: string
  readonly method: THttpMethod
  readonly url: string
  readonly body: unknown

  constructor(message: string, details: TAPIErrorDetails) {
    super(message)
    this.name = 'APIError'
    this.status = details.status
    this.statusText = details.statusText
    this.method = details.method
    this.url = details.url
    this.body = details.body
  }
}

/** Indicates a successful response whose body is not the JSON the endpoint promises. */
export class ParseError extends CircleCIError {
  readonly body: string

  constructor(message: string, details: { body: string; cause?: unknown }) {
    super(message, { cause: details.cause })
    this.name = 'ParseError'
    this.body = details.body
  }
}

/** Indicates an operation was aborted via AbortSignal. */
export class AbortOperationError extends CircleCIError {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}
