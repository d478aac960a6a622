import { ErrorCode } from './codes'
import type { ErrorContext } from './context'

/**
 * Serialised error structure
 */
export interface ErrorPayload {
  name: string
  message: string
  code: ErrorCode
  details?: ErrorContext
  suggestion?: string
  traceId?: string
}

/**
 * Error suggestions for common error codes
 */
const ERROR_SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.AUTHENTICATION_FAILED]: 'Check that the API key is valid and has not been regenerated',
  [ErrorCode.PERMISSION_DENIED]: 'Ask a company owner to grant your developer account access',
  [ErrorCode.RATE_LIMITED]: 'Reduce request volume or enable autoRetryRateLimit',
  [ErrorCode.CONNECTION_TIMEOUT]: 'Check network connectivity or increase the timeout option',
  [ErrorCode.INVALID_CONFIG]: 'Pass baseUrl and apiKey, or set CHRONICLE_API_URL and CHRONICLE_API_KEY',
}

/**
 * Base class for every error raised by the Chronicle SDK
 */
export class ChronicleError extends Error {
  public readonly code: ErrorCode
  public readonly details?: ErrorContext
  public readonly suggestion?: string
  public readonly traceId?: string

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      details?: ErrorContext
      suggestion?: string
      traceId?: string
      cause?: unknown
    }
  ) {
    super(message)
    this.name = 'ChronicleError'
    this.code = code
    this.details = options?.details
    this.suggestion = options?.suggestion ?? ERROR_SUGGESTIONS[code]
    this.traceId = options?.traceId

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }

    // Set the cause if provided (for error chaining)
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorPayload {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      suggestion: this.suggestion,
      traceId: this.traceId,
    }
  }
}

/**
 * Check if an error is a ChronicleError
 */
export function isChronicleError(error: unknown): error is ChronicleError {
  return error instanceof ChronicleError
}

/**
 * Convert unknown error to ChronicleError
 */
export function toChronicleError(error: unknown, traceId?: string): ChronicleError {
  if (isChronicleError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new ChronicleError(error.message, ErrorCode.INTERNAL_ERROR, {
      traceId,
      cause: error,
    })
  }

  return new ChronicleError(String(error), ErrorCode.UNKNOWN_ERROR, { traceId })
}
