/**
 * Error codes for Chronicle SDK operations
 * Organized by where the failure originates
 */
export enum ErrorCode {
  // ============================================
  // Remote API responses (4xx, 5xx)
  // ============================================
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFLICT = 'CONFLICT',
  RATE_LIMITED = 'RATE_LIMITED',
  SERVER_ERROR = 'SERVER_ERROR',
  API_ERROR = 'API_ERROR',

  // ============================================
  // Connection & Network
  // ============================================
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  CONNECTION_TIMEOUT = 'CONNECTION_TIMEOUT',
  REQUEST_ABORTED = 'REQUEST_ABORTED',

  // ============================================
  // Client side (never reaches the network)
  // ============================================
  INVALID_REQUEST = 'INVALID_REQUEST',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // ============================================
  // General Errors
  // ============================================
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

const STATUS_ERROR_CODES: Readonly<Record<number, ErrorCode>> = {
  400: ErrorCode.VALIDATION_ERROR,
  401: ErrorCode.AUTHENTICATION_FAILED,
  403: ErrorCode.PERMISSION_DENIED,
  404: ErrorCode.NOT_FOUND,
  409: ErrorCode.CONFLICT,
  429: ErrorCode.RATE_LIMITED,
}

/**
 * Map an HTTP status to the error code of the response that produced it
 */
export function errorCodeForStatus(status: number): ErrorCode {
  const mapped = STATUS_ERROR_CODES[status]
  if (mapped) {
    return mapped
  }
  if (status >= 500 && status < 600) {
    return ErrorCode.SERVER_ERROR
  }
  return ErrorCode.API_ERROR
}
