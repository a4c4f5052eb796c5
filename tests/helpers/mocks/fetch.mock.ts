import { vi } from 'vitest'

type FetchArgs = Parameters<typeof fetch>
type FetchInput = FetchArgs[0]
type FetchInit = FetchArgs[1]

export type FetchMockItem =
  | Response
  | Error
  | { body?: unknown; status?: number; headers?: Record<string, string> }
  | ((input: FetchInput, init?: FetchInit) => Response | Promise<Response>)

export type TRecordedCall = {
  url: string
  method: string
  headers: Headers
  body: unknown
  signal?: AbortSignal | null
}

const toUrlString = (input: FetchInput): string => {
  if (typeof input === 'string') return input
  if (input instanceof URL) return input.toString()
  return input.url
}

const NULL_BODY_STATUSES = new Set([204, 205, 304])

export const jsonResponse = (
  body?: unknown,
  init?: { status?: number; headers?: Record<string, string> },
): Response => {
  const status = init?.status ?? 200
  const payload =
    body === undefined || NULL_BODY_STATUSES.has(status) ? null : JSON.stringify(body)
  return new Response(payload, {
    status,
    headers: { 'content-type': 'application/json', ...(init?.headers ?? {}) },
  })
}

/**
 * In-process stand-in for fetch. Responses are served from a FIFO queue;
 * every call is recorded with its parsed JSON body.
 */
export function createFetchMock() {
  const calls: TRecordedCall[] = []
  const queue: FetchMockItem[] = []

  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    const url = toUrlString(input)
    calls.push({
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
      signal: init?.signal,
    })
    const next = queue.shift()
    if (!next) throw new Error(`No mock queued for fetch: ${url}`)
    if (next instanceof Error) throw next
    if (typeof next === 'function') return await Promise.resolve(next(input, init))
    if (next instanceof Response) return next
    return jsonResponse(next.body, { status: next.status, headers: next.headers })
  })

  return {
    fetch: fetchMock,
    calls,
    queue,
    push: (...items: FetchMockItem[]) => queue.push(...items),
    pushJson: (body: unknown, init?: { status?: number; headers?: Record<string, string> }) =>
      queue.push({ body, ...init }),
    pushStatus: (status: number, body?: unknown) => queue.push({ status, body }),
    lastCall: (): TRecordedCall => {
      const call = calls.at(-1)
      if (!call) throw new Error('fetch was not called')
      return call
    },
  }
}

export type TFetchMock = ReturnType<typeof createFetchMock>
