/**
 * Offset pagination over list endpoints
 */

import { z, type ZodType, type ZodTypeDef } from 'zod'
import { DEFAULT_CONFIG } from '../core/constants'
import type { RequestExecutor } from '../http/executor'
import { parseResponse } from '../http/response'
import type { QueryParams } from '../http/types'
import { Page } from './page'

export const DEFAULT_PAGE_LIMIT = DEFAULT_CONFIG.PAGINATION.DEFAULT_LIMIT
export const MAX_PAGE_LIMIT = DEFAULT_CONFIG.PAGINATION.MAX_LIMIT

export interface FetchPageOptions {
  limit?: number
  offset?: number
  params?: QueryParams
  signal?: AbortSignal
}

export interface IterateOptions {
  /** Page size, defaults to MAX_PAGE_LIMIT */
  limit?: number
  params?: QueryParams
  signal?: AbortSignal
}

function pageBodySchema<T>(item: ZodType<T, ZodTypeDef, unknown>) {
  return z.object({
    items: z.array(item).default([]),
    limit: z.number().int().default(0),
    offset: z.number().int().default(0),
    total: z.number().int().default(0),
  })
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

// NaN and infinities fall back to the default
function toCount(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? Math.trunc(value) : fallback
}

function normalizeLimit(value: number | undefined, fallback: number): number {
  return clamp(toCount(value, fallback), 0, MAX_PAGE_LIMIT)
}

export class Paginator {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * Fetch one page. limit is clamped to [0, MAX_PAGE_LIMIT] and offset to
   * at least 0. Non-finite values are replaced by the defaults.
   */
  async fetchPage(path: string, options: FetchPageOptions = {}): Promise<Page<unknown>> {
    return this.fetchPageAs(path, z.unknown(), options)
  }

  /**
   * Fetch one page and validate every item against `schema`
   */
  async fetchPageAs<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, options: FetchPageOptions = {}): Promise<Page<T>> {
    const limit = normalizeLimit(options.limit, DEFAULT_PAGE_LIMIT)
    const offset = Math.max(toCount(options.offset, 0), 0)

    const response = await this.executor.get(path, {
      params: { limit, offset, ...options.params },
      signal: options.signal,
    })

    return new Page(parseResponse(pageBodySchema(schema), response))
  }

  /**
   * Lazily yield every item, one page at a time. The next page is only
   * requested once the current one has been consumed.
   */
  async *iterateAll(path: string, options: IterateOptions = {}): AsyncGenerator<unknown, void, undefined> {
    yield* this.iterateAllAs(path, z.unknown(), options)
  }

  async *iterateAllAs<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: IterateOptions = {}
  ): AsyncGenerator<T, void, undefined> {
    const limit = normalizeLimit(options.limit, MAX_PAGE_LIMIT)
    let offset = 0

    while (true) {
      const page = await this.fetchPageAs(path, schema, {
        limit,
        offset,
        params: options.params,
        signal: options.signal,
      })
      yield* page.items

      // a page without a limit advances by the requested one
      const next = page.limit > 0 ? page.nextOffset : offset + limit
      // the offset must move forward, whatever total the server reports
      if (!page.hasMore || page.items.length === 0 || next <= offset || next >= page.total) {
        return
      }
      offset = next
    }
  }

  /**
   * Collect every item into one array. Holds the whole collection in memory;
   * prefer iterateAll for large collections.
   */
  async collectAll(path: string, options: IterateOptions = {}): Promise<unknown[]> {
    return this.collectAllAs(path, z.unknown(), options)
  }

  async collectAllAs<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, options: IterateOptions = {}): Promise<T[]> {
    const items: T[] = []
    for await (const item of this.iterateAllAs(path, schema, options)) {
      items.push(item)
    }
    return items
  }
}
