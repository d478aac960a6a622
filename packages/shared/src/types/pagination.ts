/**
 * Pagination wire types shared by list endpoints
 */

/**
 * Body returned by every list endpoint
 */
export interface PaginatedResponseBody<T = unknown> {
  /** The requested slice of results */
  items: T[]
  /** The limit the server applied */
  limit: number
  /** The offset the server applied */
  offset: number
  /** Total number of items across all pages */
  total: number
}
