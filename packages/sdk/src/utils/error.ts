/**
 * Error classes for the Chronicle SDK
 *
 * Every error extends ChronicleError from the shared package. Errors built from
 * an HTTP response keep the original status, parsed body and raw body.
 */

import {
  ChronicleError,
  ErrorCode,
  errorCodeForStatus,
  type FieldProblem,
  type RequestErrorContext,
} from '@chronicle-api/shared/errors'
import type { ZodError } from 'zod'

export interface APIErrorOptions {
  rawBody?: string
  traceId?: string
  details?: RequestErrorContext
}

/**
 * An error response from the API. Also the catch-all for statuses without a
 * dedicated subclass.
 */
export class APIError extends ChronicleError {
  public readonly status: number
  public readonly responseData: Record<string, unknown>
  public readonly rawBody: string

  constructor(
    message: string,
    status: number,
    responseData: Record<string, unknown> = {},
    options: APIErrorOptions = {}
  ) {
    super(message, errorCodeForStatus(status), {
      traceId: options.traceId,
      details: options.details,
    })
    this.name = 'APIError'
    this.status = status
    this.responseData = responseData
    this.rawBody = options.rawBody ?? ''
  }

  get title(): string | undefined {
    return stringField(this.responseData, 'title')
  }

  get detail(): string | undefined {
    return stringField(this.responseData, 'detail')
  }

  get instance(): string | undefined {
    return stringField(this.responseData, 'instance')
  }

  override toString(): string {
    const parts: string[] = []

    let header = `[${this.status}]`
    if (this.title) {
      header = `${header} ${this.title}`
    } else if (this.message) {
      header = `${header} ${this.message}`
    }
    parts.push(header)

    if (this.detail && this.detail !== this.message && this.detail !== this.title) {
      parts.push(`Detail: ${this.detail}`)
    }
    if (this.instance) {
      parts.push(`Instance: ${this.instance}`)
    }

    return parts.join(' | ')
  }
}

export class AuthenticationError extends APIError {
  constructor(message: string, status: number, responseData?: Record<string, unknown>, options?: APIErrorOptions) {
    super(message, status, responseData, options)
    this.name = 'AuthenticationError'
  }
}

export class AuthorizationError extends APIError {
  constructor(message: string, status: number, responseData?: Record<string, unknown>, options?: APIErrorOptions) {
    super(message, status, responseData, options)
    this.name = 'AuthorizationError'
  }
}

export class NotFoundError extends APIError {
  constructor(message: string, status: number, responseData?: Record<string, unknown>, options?: APIErrorOptions) {
    super(message, status, responseData, options)
    this.name = 'NotFoundError'
  }
}

export class ConflictError extends APIError {
  constructor(message: string, status: number, responseData?: Record<string, unknown>, options?: APIErrorOptions) {
    super(message, status, responseData, options)
    this.name = 'ConflictError'
  }
}

/**
 * The server rejected the request body. `invalidParameters` lists the
 * per-field problems the server reported, if any.
 */
export class ValidationError extends APIError {
  constructor(message: string, status: number, responseData?: Record<string, unknown>, options?: APIErrorOptions) {
    super(message, status, responseData, options)
    this.name = 'ValidationError'
  }

  get invalidParameters(): FieldProblem[] {
    const raw = this.responseData.invalid_parameters
    if (!Array.isArray(raw)) {
      return []
    }
    const problems: FieldProblem[] = []
    for (const entry of raw) {
      if (isRecord(entry) && typeof entry.field === 'string') {
        problems.push({
          field: entry.field,
          message: typeof entry.message === 'string' ? entry.message : '',
        })
      }
    }
    return problems
  }

  override toString(): string {
    const base = super.toString()
    const problems = this.invalidParameters
    if (problems.length === 0) {
      return base
    }
    const fields = problems.map(p => `${p.field}: ${p.message}`).join('; ')
    return `${base} | Fields: ${fields}`
  }
}

/**
 * HTTP 429. `retryAfter` is in seconds; both fields are undefined when the
 * response headers did not carry them.
 */
export class RateLimitError extends APIError {
  public readonly retryAfter?: number
  public readonly remaining?: number

  constructor(
    message: string,
    status: number,
    responseData?: Record<string, unknown>,
    options: APIErrorOptions & { retryAfter?: number; remaining?: number } = {}
  ) {
    super(message, status, responseData, options)
    this.name = 'RateLimitError'
    this.retryAfter = options.retryAfter
    this.remaining = options.remaining
  }

  override toString(): string {
    const base = super.toString()
    const extras: string[] = []
    if (this.retryAfter !== undefined) {
      extras.push(`retry_after=${this.retryAfter}s`)
    }
    if (this.remaining !== undefined) {
      extras.push(`remaining=${this.remaining}`)
    }
    return extras.length > 0 ? `${base} | ${extras.join(', ')}` : base
  }
}

export class ServerError extends APIError {
  constructor(message: string, status: number, responseData?: Record<string, unknown>, options?: APIErrorOptions) {
    super(message, status, responseData, options)
    this.name = 'ServerError'
  }
}

/**
 * The transport could not complete the exchange. Only subclasses are thrown.
 */
export class NetworkError extends ChronicleError {
  constructor(message: string, code: ErrorCode, cause?: unknown) {
    super(message, code, { cause })
    this.name = 'NetworkError'
  }
}

export class ConnectionError extends NetworkError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.CONNECTION_FAILED, cause)
    this.name = 'ConnectionError'
  }
}

export class TimeoutError extends NetworkError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.CONNECTION_TIMEOUT, cause)
    this.name = 'TimeoutError'
  }
}

/**
 * The caller's signal fired or the client was closed. Never retried.
 */
export class RequestAbortedError extends ChronicleError {
  constructor(message = 'Request was aborted', cause?: unknown) {
    super(message, ErrorCode.REQUEST_ABORTED, { cause })
    this.name = 'RequestAbortedError'
  }
}

/**
 * A request body failed client-side validation and was not sent.
 */
export class RequestValidationError extends ChronicleError {
  public readonly issues: FieldProblem[]

  constructor(zodError: ZodError) {
    const issues = zodIssuesToProblems(zodError)
    const summary = issues.map(i => (i.field ? `${i.field}: ${i.message}` : i.message)).join('; ')
    super(`Request validation failed: ${summary}`, ErrorCode.INVALID_REQUEST, {
      details: { problems: issues },
      cause: zodError,
    })
    this.name = 'RequestValidationError'
    this.issues = issues
  }
}

/**
 * A successful response whose body is not the expected record.
 */
export class ResponseParseError extends ChronicleError {
  public readonly rawBody: string

  constructor(message: string, rawBody: string, cause?: unknown) {
    super(message, ErrorCode.INVALID_RESPONSE, { cause })
    this.name = 'ResponseParseError'
    this.rawBody = rawBody
  }
}

export class ConfigurationError extends ChronicleError {
  constructor(message: string, option: string, cause?: unknown) {
    super(message, ErrorCode.INVALID_CONFIG, { details: { option }, cause })
    this.name = 'ConfigurationError'
  }
}

export function zodIssuesToProblems(error: ZodError): FieldProblem[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }))
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key]
  return typeof value === 'string' ? value : undefined
}
