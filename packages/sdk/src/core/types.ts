/**
 * Core type definitions for the Chronicle SDK
 */

import type { Logger } from '@chronicle-api/shared/logger'
import type { Transport } from '../http/types'

export interface ChronicleClientConfig {
  /** Base URL of the API, e.g. https://api.example.com */
  baseUrl: string
  /** Developer API key, sent as X-API-KEY */
  apiKey: string
  /** Request timeout in milliseconds */
  timeout?: number
  /** Retries after the first attempt, at most 10 */
  maxRetries?: number
  /** Base backoff delay in milliseconds */
  retryDelay?: number
  /** Retry rate-limited and transient failures. When false every call is tried once */
  autoRetryRateLimit?: boolean
  /** Generate an Idempotency-Key for POST, PUT and PATCH calls */
  autoIdempotencyKeys?: boolean
  /** Server statuses worth retrying */
  retryStatuses?: number[]
  /** Company used when a scoped service is created without one */
  defaultCompanyId?: string
  /** Extra headers sent with every request */
  headers?: Record<string, string>
  logger?: Logger
  /** Replaces the fetch transport, mostly for tests */
  transport?: Transport
}

/**
 * Configuration after validation and defaults. Frozen.
 */
export interface ResolvedConfig {
  readonly baseUrl: string
  readonly apiKey: string
  readonly timeout: number
  readonly maxRetries: number
  readonly retryDelay: number
  readonly autoRetryRateLimit: boolean
  readonly autoIdempotencyKeys: boolean
  readonly retryStatuses: ReadonlySet<number>
  readonly defaultCompanyId?: string
  readonly headers: Readonly<Record<string, string>>
}
