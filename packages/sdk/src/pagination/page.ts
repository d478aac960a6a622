/**
 * One slice of a paginated collection
 */

import type { PaginatedResponseBody } from '@chronicle-api/shared/types'

export class Page<T> implements PaginatedResponseBody<T> {
  readonly items: T[]
  readonly limit: number
  readonly offset: number
  readonly total: number

  constructor(body: PaginatedResponseBody<T>) {
    this.items = body.items
    this.limit = body.limit
    this.offset = body.offset
    this.total = body.total
  }

  /**
   * True while items remain after this page
   */
  get hasMore(): boolean {
    return this.offset + this.items.length < this.total
  }

  /**
   * Offset of the following page
   */
  get nextOffset(): number {
    return this.offset + this.limit
  }

  get totalPages(): number {
    if (this.limit === 0) {
      return 0
    }
    return Math.ceil(this.total / this.limit)
  }

  /**
   * 1-indexed; 0 when limit is 0
   */
  get currentPage(): number {
    if (this.limit === 0) {
      return 0
    }
    return Math.floor(this.offset / this.limit) + 1
  }

  map<U>(fn: (item: T, index: number) => U): Page<U> {
    return new Page<U>({
      items: this.items.map(fn),
      limit: this.limit,
      offset: this.offset,
      total: this.total,
    })
  }
}
