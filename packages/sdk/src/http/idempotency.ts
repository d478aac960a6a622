/**
 * Idempotency guard
 */

import { randomUUID } from 'node:crypto'
import type { HttpMethod } from '@chronicle-api/shared/types'
import { HEADERS, IDEMPOTENT_METHODS } from '../core/constants'
import { getHeader } from './rate-limit'

/**
 * Whether a failed call may be sent again. GET, PUT and DELETE always may;
 * other methods only when they carry an Idempotency-Key.
 */
export function canRetry(method: HttpMethod, headers: Record<string, string>): boolean {
  if (IDEMPOTENT_METHODS.has(method)) {
    return true
  }
  return getHeader(headers, HEADERS.IDEMPOTENCY_KEY) !== undefined
}

export function generateIdempotencyKey(): string {
  return randomUUID()
}
