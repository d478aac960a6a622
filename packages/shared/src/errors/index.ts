/**
 * Shared error system for the Chronicle SDK
 *
 * This module provides:
 * - Standardized error codes
 * - Error context for detailed information
 * - Suggestions for error resolution
 * - TraceID support for correlating an error with its request logs
 */

export { ErrorCode, errorCodeForStatus } from './codes'
export type {
  RequestErrorContext,
  RateLimitErrorContext,
  FieldProblem,
  ValidationErrorContext,
  ConfigErrorContext,
  ErrorContext,
} from './context'
export {
  type ErrorPayload,
  ChronicleError,
  isChronicleError,
  toChronicleError,
} from './response'
