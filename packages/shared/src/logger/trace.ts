/**
 * Request and attempt ids for correlating the log lines of one call
 */

import { randomUUID } from 'node:crypto'

export interface TraceContext {
  /** Shared by every line of one logical call */
  traceId: string
  /** `<traceId>.<attempt>`, set on the lines of a single attempt */
  spanId?: string
}

export function generateTraceId(): string {
  return `req_${randomUUID().replace(/-/g, '').slice(0, 16)}`
}

export function createTraceContext(traceId: string = generateTraceId()): TraceContext {
  return { traceId }
}

/**
 * Trace context for one attempt of a call. Attempts are numbered from 1.
 */
export function attemptSpan(trace: TraceContext, attempt: number): TraceContext {
  return { traceId: trace.traceId, spanId: `${trace.traceId}.${attempt}` }
}
