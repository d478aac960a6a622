import type { ZodType, ZodTypeDef } from 'zod'
import { ResponseParseError } from '../utils/error'
import type { TransportResponse } from './types'

/**
 * Parse a response body as JSON. An empty body parses to null.
 */
export function parseJsonBody(response: TransportResponse): unknown {
  if (response.body.trim() === '') {
    return null
  }
  try {
    return JSON.parse(response.body)
  } catch (error) {
    throw new ResponseParseError(`Response from server is not valid JSON (HTTP ${response.status})`, response.body, error)
  }
}

/**
 * Parse and validate a response body against a schema
 */
export function parseResponse<T>(schema: ZodType<T, ZodTypeDef, unknown>, response: TransportResponse): T {
  const result = schema.safeParse(parseJsonBody(response))
  if (!result.success) {
    const first = result.error.issues[0]
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : ''
    throw new ResponseParseError(
      `Unexpected response shape${where}: ${first?.message ?? 'invalid value'}`,
      response.body,
      result.error
    )
  }
  return result.data
}
