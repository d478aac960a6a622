/**
 * Chronicle SDK - Main Entry Point
 * Typed client for the Chronicle campaign management API
 */

export const VERSION = '1.0.0'

// Client
export { ChronicleClient, type ChronicleClientInternals } from './core/chronicle-client'
export { loadConfigFromEnv, resolveConfig } from './core/config'
export type { ChronicleClientConfig, ResolvedConfig } from './core/types'

// Request execution
export { RequestExecutor, type RequestExecutorOptions } from './http/executor'
export { createFetchTransport, buildUrl } from './http/transport'
export { classifyResponse, type Outcome } from './http/classifier'
export { canRetry, generateIdempotencyKey } from './http/idempotency'
export { extractRateLimitParameter, parseRemaining, parseRetryAfter } from './http/rate-limit'
export type {
  FilePayload,
  QueryParams,
  RequestOptions,
  Transport,
  TransportRequest,
  TransportResponse,
} from './http/types'
export { calculateBackoffDelay, sleep, type SleepFn } from './utils/retry'
export { createDefaultLogger } from './utils/logger'

// Pagination
export { Page } from './pagination/page'
export {
  Paginator,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  type FetchPageOptions,
  type IterateOptions,
} from './pagination/paginator'

// Services
export type { CallOptions, IterOptions, PageOptions, WriteOptions } from './services/base'
export { SystemService } from './services/system'
export { DevelopersService } from './services/developers'
export { CompaniesService } from './services/companies'
export { UsersService, type UploadAssetOptions, type UserListFilters } from './services/users'
export { CampaignsService } from './services/campaigns'
export { BooksService } from './services/books'
export { ChaptersService } from './services/chapters'
export { CharactersService } from './services/characters'
export { CharacterTraitsService } from './services/character-traits'
export type { BookScope, CharacterScope, TraitValueChange } from './api/endpoints'
export { DicerollsService } from './services/dicerolls'

// Records
export * from './models'

// Errors
export {
  APIError,
  AuthenticationError,
  AuthorizationError,
  ConfigurationError,
  ConflictError,
  ConnectionError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  RequestAbortedError,
  RequestValidationError,
  ResponseParseError,
  ServerError,
  TimeoutError,
  ValidationError,
} from './utils/error'
export { ChronicleError, ErrorCode, isChronicleError } from '@chronicle-api/shared/errors'

// Constants
export { DEFAULT_CONFIG, API_ENDPOINTS, HEADERS, HTTP_STATUS } from './core/constants'

import { ChronicleClient } from './core/chronicle-client'
export default ChronicleClient
