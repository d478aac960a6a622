/**
 * Shared types for the Chronicle SDK
 *
 * Wire-level shapes of the remote API, kept in one place so the SDK and its
 * tests agree on them.
 */

export type { HttpMethod } from './http'
export type { PaginatedResponseBody } from './pagination'
