/**
 * Request executor
 *
 * Runs one logical API call: send, classify, then retry rate limits and
 * transient failures with exponential backoff until the attempt budget is
 * spent. Attempts within one call are strictly sequential.
 */

import { ChronicleError, ErrorCode } from '@chronicle-api/shared/errors'
import { attemptSpan, createTraceContext, type Logger } from '@chronicle-api/shared/logger'
import type { HttpMethod } from '@chronicle-api/shared/types'
import { HEADERS } from '../core/constants'
import type { ResolvedConfig } from '../core/types'
import {
  type APIError,
  NetworkError,
  RateLimitError,
  RequestAbortedError,
  ServerError,
} from '../utils/error'
import { calculateBackoffDelay, combineSignals, sleep as defaultSleep, type SleepFn } from '../utils/retry'
import { classifyResponse } from './classifier'
import { canRetry, generateIdempotencyKey } from './idempotency'
import type { FilePayload, RequestOptions, Transport, TransportResponse } from './types'

export interface RequestExecutorOptions {
  config: ResolvedConfig
  transport: Transport
  logger: Logger
  /** Waits between attempts */
  sleep?: SleepFn
  /** Jitter source */
  random?: () => number
  /** Aborts every call when fired, see ChronicleClient.close() */
  signal?: AbortSignal
}

export class RequestExecutor {
  private readonly config: ResolvedConfig
  private readonly transport: Transport
  private readonly logger: Logger
  private readonly sleep: SleepFn
  private readonly random: () => number
  private readonly closeSignal?: AbortSignal

  constructor(options: RequestExecutorOptions) {
    this.config = options.config
    this.transport = options.transport
    this.logger = options.logger
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
    this.closeSignal = options.signal
  }

  /**
   * Total attempts allowed for one call
   */
  get maxAttempts(): number {
    return this.config.autoRetryRateLimit ? this.config.maxRetries + 1 : 1
  }

  async get(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('GET', path, options)
  }

  async post(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('POST', path, this.withIdempotencyKey(options))
  }

  async put(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('PUT', path, this.withIdempotencyKey(options))
  }

  async patch(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('PATCH', path, this.withIdempotencyKey(options))
  }

  async delete(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('DELETE', path, options)
  }

  /**
   * Multipart upload. Only retried when an idempotencyKey is passed.
   */
  async postFile(path: string, file: FilePayload, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('POST', path, { ...options, file })
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    const trace = createTraceContext()
    const headers = this.buildHeaders(options)
    const retryable = canRetry(method, headers)
    const maxAttempts = this.maxAttempts
    const url = `${this.config.baseUrl}${path}`

    const { signal, cleanup } = combineSignals(options.signal, this.closeSignal)
    const log = this.logger.child({ method, path }, trace)
    let lastError: APIError | undefined

    try {
      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const isLastAttempt = attempt === maxAttempts - 1
        const attemptLog = log.child({ attempt: attempt + 1 }, attemptSpan(trace, attempt + 1))

        if (signal.aborted) {
          throw new RequestAbortedError(
            this.closeSignal?.aborted ? 'Client is closed' : 'Request was aborted',
            signal.reason
          )
        }

        attemptLog.debug('Send request', { traceId: trace.traceId })
        const startTime = Date.now()

        let response: TransportResponse
        try {
          response = await this.transport({
            method,
            url,
            query: options.params,
            json: options.json,
            form: options.form,
            headers,
            file: options.file,
            timeout: this.config.timeout,
            signal,
          })
        } catch (error) {
          if (!(error instanceof NetworkError) || !retryable || isLastAttempt) {
            throw error
          }
          const delayMs = this.backoff(attempt)
          attemptLog.warn('Retry after network error', {
            maxAttempts,
            delayMs,
            error: error.message,
          })
          await this.sleep(delayMs, signal)
          continue
        }

        attemptLog.debug('Receive response', {
          status: response.status,
          elapsedMs: Date.now() - startTime,
          attempt: attempt + 1,
        })

        const outcome = classifyResponse(
          response,
          { method, path, traceId: trace.traceId, attempt: attempt + 1 },
          attemptLog
        )
        if (outcome.kind === 'success') {
          return response
        }

        const { error } = outcome
        if (error instanceof RateLimitError) {
          lastError = error
          if (isLastAttempt) {
            break
          }
          const delayMs = this.backoff(attempt, error.retryAfter)
          attemptLog.warn('Retry after rate limit', {
            maxAttempts,
            delayMs,
            retryAfter: error.retryAfter,
            remaining: error.remaining,
          })
          await this.sleep(delayMs, signal)
          continue
        }

        if (error instanceof ServerError) {
          if (!this.config.retryStatuses.has(error.status) || !retryable) {
            throw error
          }
          lastError = error
          if (isLastAttempt) {
            break
          }
          const delayMs = this.backoff(attempt)
          attemptLog.warn('Retry after server error', { status: error.status, maxAttempts, delayMs })
          await this.sleep(delayMs, signal)
          continue
        }

        throw error
      }
    } finally {
      cleanup()
    }

    if (lastError) {
      log.error('Exhaust retries', lastError, { attempts: maxAttempts, status: lastError.status })
      throw lastError
    }
    throw new ChronicleError(`${method} ${path} ended without a response`, ErrorCode.INTERNAL_ERROR, {
      traceId: trace.traceId,
    })
  }

  private backoff(attempt: number, retryAfterSeconds?: number): number {
    return calculateBackoffDelay(attempt, retryAfterSeconds, this.config.retryDelay, this.random)
  }

  private buildHeaders(options: RequestOptions): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      [HEADERS.API_KEY]: this.config.apiKey,
      ...this.config.headers,
      ...options.headers,
    }
    if (options.idempotencyKey) {
      headers[HEADERS.IDEMPOTENCY_KEY] = options.idempotencyKey
    }
    return headers
  }

  private withIdempotencyKey(options: RequestOptions): RequestOptions {
    if (options.idempotencyKey || !this.config.autoIdempotencyKeys) {
      return options
    }
    return { ...options, idempotencyKey: generateIdempotencyKey() }
  }
}
