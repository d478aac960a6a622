/**
 * HTTP type definitions
 */

import type { HttpMethod } from '@chronicle-api/shared/types'

export type QueryValue = string | number | boolean | null | undefined
export type QueryParams = Record<string, QueryValue | QueryValue[]>

/**
 * File content for a multipart upload
 */
export interface FilePayload {
  filename: string
  content: Uint8Array | Blob | string
  contentType?: string
}

/**
 * Fully built description of one HTTP exchange
 */
export interface TransportRequest {
  method: HttpMethod
  url: string
  query?: QueryParams
  json?: unknown
  form?: Record<string, string>
  headers: Record<string, string>
  file?: FilePayload
  /** Milliseconds */
  timeout: number
  signal?: AbortSignal
}

/**
 * Raw response; header names are lower-cased
 */
export interface TransportResponse {
  status: number
  headers: Record<string, string>
  body: string
}

/**
 * Sends a request and resolves with whatever the server answered, whatever the
 * status. Rejects with ConnectionError, TimeoutError or RequestAbortedError
 * when no response arrives.
 */
export type Transport = (request: TransportRequest) => Promise<TransportResponse>

/**
 * Per-call options accepted by the executor
 */
export interface RequestOptions {
  params?: QueryParams
  json?: unknown
  form?: Record<string, string>
  file?: FilePayload
  headers?: Record<string, string>
  idempotencyKey?: string
  signal?: AbortSignal
}
