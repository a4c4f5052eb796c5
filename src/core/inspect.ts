import { REDACTED } from './auth.ts'
import type { TExchange } from './types.ts'

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2) ?? String(data)
}

function formatBody(body: unknown): string[] {
  if (body === undefined) return []
  const text = typeof body === 'string' ? body : formatJson(body)
  return ['', ...text.split('\n')]
}

function scrub(text: string, secrets: readonly string[]): string {
  let scrubbed = text
  for (const secret of secrets) {
    if (secret) scrubbed = scrubbed.split(secret).join(REDACTED)
  }
  return scrubbed
}

/**
 * Renders a request/response pair the way an HTTP dump reads: request lines prefixed
 * with `< `, response lines with `> `. Every occurrence of a secret is replaced.
 */
export function formatExchange(
  exchange: TExchange,
  options?: { secrets?: readonly string[] },
): string {
  const { request, response } = exchange
  const lines: string[] = [`< ${request.method} ${request.url}`]
  for (const [name, value] of Object.entries(request.headers)) {
    lines.push(`< ${name}: ${value}`)
  }
  for (const line of formatBody(request.body)) lines.push(`< ${line}`.trimEnd())

  lines.push('')
  if (response) {
    lines.push(`> HTTP ${response.status} ${response.statusText}`.trimEnd())
    for (const [name, value] of Object.entries(response.headers)) {
      lines.push(`> ${name}: ${value}`)
    }
    for (const line of formatBody(response.body)) lines.push(`> ${line}`.trimEnd())
  } else {
    lines.push('> (no response)')
  }

  return scrub(lines.join('\n'), options?.secrets ?? [])
}
