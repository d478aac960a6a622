/**
 * Maps an HTTP response to a success or a typed fault
 */

import type { Logger } from '@chronicle-api/shared/logger'
import { DEFAULT_CONFIG, HTTP_STATUS } from '../core/constants'
import {
  APIError,
  type APIErrorOptions,
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  isRecord,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
} from '../utils/error'
import { parseRemaining, parseRetryAfter } from './rate-limit'
import type { TransportResponse } from './types'

export type Outcome =
  | { kind: 'success'; response: TransportResponse }
  | { kind: 'fault'; error: APIError }

export interface ClassifyContext {
  method: string
  path: string
  traceId?: string
  attempt?: number
}

type APIErrorClass = new (
  message: string,
  status: number,
  responseData?: Record<string, unknown>,
  options?: APIErrorOptions
) => APIError

const STATUS_ERRORS: Record<number, APIErrorClass> = {
  [HTTP_STATUS.BAD_REQUEST]: ValidationError,
  [HTTP_STATUS.UNAUTHORIZED]: AuthenticationError,
  [HTTP_STATUS.FORBIDDEN]: AuthorizationError,
  [HTTP_STATUS.NOT_FOUND]: NotFoundError,
  [HTTP_STATUS.CONFLICT]: ConflictError,
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300
}

function parseErrorBody(status: number, body: string): { message: string; data: Record<string, unknown> } {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return { message: body || `HTTP ${status}`, data: {} }
  }

  if (!isRecord(parsed)) {
    return { message: body || `HTTP ${status}`, data: {} }
  }
  const detail = parsed.detail
  if (detail === undefined || detail === null) {
    return { message: body, data: parsed }
  }
  return { message: typeof detail === 'string' ? detail : JSON.stringify(detail), data: parsed }
}

/**
 * Classify one response. Success for 2xx, otherwise a fault whose status
 * is the response status. The method plays no part in the mapping.
 */
export function classifyResponse(response: TransportResponse, context: ClassifyContext, logger?: Logger): Outcome {
  const { status } = response
  if (isSuccessStatus(status)) {
    return { kind: 'success', response }
  }

  const { message, data } = parseErrorBody(status, response.body)
  const options: APIErrorOptions = {
    rawBody: response.body,
    traceId: context.traceId,
    details: { method: context.method, path: context.path, status, attempt: context.attempt },
  }
  const logContext = { method: context.method, path: context.path, status, detail: message }

  if (status === HTTP_STATUS.TOO_MANY_REQUESTS) {
    const retryAfter = parseRetryAfter(response.headers)
    const remaining = parseRemaining(response.headers)
    return {
      kind: 'fault',
      error: new RateLimitError(message, status, data, { ...options, retryAfter, remaining }),
    }
  }

  const ErrorClass = STATUS_ERRORS[status]
  if (ErrorClass) {
    const error = new ErrorClass(message, status, data, options)
    if (status === HTTP_STATUS.UNAUTHORIZED || status === HTTP_STATUS.FORBIDDEN) {
      logger?.error('Request rejected', error, logContext)
    } else if (status === HTTP_STATUS.NOT_FOUND) {
      logger?.debug('Resource not found', logContext)
    } else {
      logger?.warn('Request refused', logContext)
    }
    return { kind: 'fault', error }
  }

  const { LOWER, UPPER } = DEFAULT_CONFIG.SERVER_ERROR_RANGE
  if (status >= LOWER && status < UPPER) {
    return { kind: 'fault', error: new ServerError(message, status, data, options) }
  }

  return { kind: 'fault', error: new APIError(message, status, data, options) }
}
