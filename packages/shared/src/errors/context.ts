/**
 * Error context interfaces providing detailed information about errors
 */

/**
 * HTTP request error context
 */
export interface RequestErrorContext {
  method: string
  path: string
  status?: number
  attempt?: number
  maxAttempts?: number
}

/**
 * Rate limit error context
 */
export interface RateLimitErrorContext extends RequestErrorContext {
  retryAfter?: number
  remaining?: number
}

/**
 * A single field problem, either reported by the server or found locally
 */
export interface FieldProblem {
  field: string
  message: string
}

/**
 * Validation error context
 */
export interface ValidationErrorContext {
  problems: FieldProblem[]
}

/**
 * Configuration error context
 */
export interface ConfigErrorContext {
  option: string
  reason?: string
}

/**
 * Union type of all error contexts
 */
export type ErrorContext =
  | RequestErrorContext
  | RateLimitErrorContext
  | ValidationErrorContext
  | ConfigErrorContext
