/**
 * Common plumbing for resource services
 */

import type { ZodType, ZodTypeDef } from 'zod'
import type { ChronicleClient } from '../core/chronicle-client'
import type { RequestExecutor } from '../http/executor'
import { parseResponse } from '../http/response'
import type { QueryParams, TransportResponse } from '../http/types'
import type { Paginator } from '../pagination/paginator'
import { ConfigurationError, RequestValidationError } from '../utils/error'

/**
 * Per-call options accepted by every service method
 */
export interface CallOptions {
  signal?: AbortSignal
}

export interface WriteOptions extends CallOptions {
  /** Makes a POST or PATCH safe to retry */
  idempotencyKey?: string
}

export interface PageOptions extends CallOptions {
  limit?: number
  offset?: number
}

export interface IterOptions extends CallOptions {
  /** Items requested per page while iterating */
  pageSize?: number
}

export abstract class BaseService {
  constructor(protected readonly client: ChronicleClient) {}

  protected get executor(): RequestExecutor {
    return this.client.executor
  }

  protected get paginator(): Paginator {
    return this.client.paginator
  }

  /**
   * Build a request body, failing before anything is sent
   *
   * @throws {RequestValidationError}
   */
  protected validateRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input)
    if (!result.success) {
      throw new RequestValidationError(result.error)
    }
    return result.data
  }

  protected parseRecord<T>(schema: ZodType<T, ZodTypeDef, unknown>, response: TransportResponse): T {
    return parseResponse(schema, response)
  }

  /**
   * Company id for a scoped service, falling back to the client default
   */
  protected static resolveCompanyId(client: ChronicleClient, companyId?: string): string {
    const resolved = companyId ?? client.config.defaultCompanyId
    if (!resolved) {
      throw new ConfigurationError(
        'No company id given and no defaultCompanyId configured',
        'defaultCompanyId'
      )
    }
    return resolved
  }
}

/**
 * Drop undefined filter values so they are not sent
 */
export function compactParams(params: QueryParams): QueryParams | undefined {
  const entries = Object.entries(params).filter(([, value]) => value !== undefined)
  return entries.length > 0 ? Object.fromEntries(entries) : undefined
}
