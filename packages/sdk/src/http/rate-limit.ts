/**
 * Rate-limit header parsing
 *
 * The API sends `RateLimit: "default";r=42;t=3`, optionally with several
 * comma-separated policies. Values are always read from the first policy that
 * carries the key.
 */

import { HEADERS } from '../core/constants'

const INTEGER = /^[+-]?\d+$/

/**
 * Read one integer parameter from a structured rate-limit header.
 * Returns undefined when the header is missing or the value is malformed.
 */
export function extractRateLimitParameter(header: string | undefined, key: string): number | undefined {
  if (!header) {
    return undefined
  }

  const marker = `;${key}=`
  const start = header.indexOf(marker)
  if (start === -1) {
    return undefined
  }

  const rest = header.slice(start + marker.length)
  const end = rest.search(/[;,]/)
  const raw = (end === -1 ? rest : rest.slice(0, end)).trim()

  return INTEGER.test(raw) ? Number.parseInt(raw, 10) : undefined
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase()
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value
    }
  }
  return undefined
}

/**
 * Seconds to wait before retrying: the `t` parameter of RateLimit, then a
 * plain integer Retry-After.
 */
export function parseRetryAfter(headers: Record<string, string>): number | undefined {
  const fromPolicy = extractRateLimitParameter(getHeader(headers, HEADERS.RATE_LIMIT), 't')
  if (fromPolicy !== undefined) {
    return fromPolicy
  }

  const retryAfter = getHeader(headers, HEADERS.RETRY_AFTER)?.trim()
  if (retryAfter && INTEGER.test(retryAfter)) {
    return Number.parseInt(retryAfter, 10)
  }
  return undefined
}

/**
 * Requests left in the current window, from the `r` parameter only
 */
export function parseRemaining(headers: Record<string, string>): number | undefined {
  return extractRateLimitParameter(getHeader(headers, HEADERS.RATE_LIMIT), 'r')
}
