/**
 * Global constants for the Chronicle SDK
 */

import type { HttpMethod } from '@chronicle-api/shared/types'

export const DEFAULT_CONFIG = {
  /** Default HTTP client settings */
  HTTP_CLIENT: {
    TIMEOUT: 30000, // 30 seconds
    MAX_RETRIES: 3,
    MAX_RETRIES_LIMIT: 10,
    RETRY_DELAY: 1000, // base backoff, doubled per attempt
    MAX_DELAY: 300000, // 5 minutes, any single backoff wait
    RETRY_STATUSES: [500, 502, 503, 504],
  },

  /** Pagination limits enforced by the API */
  PAGINATION: {
    DEFAULT_LIMIT: 10,
    MAX_LIMIT: 100,
  },

  /** Statuses in [LOWER, UPPER) are server errors */
  SERVER_ERROR_RANGE: {
    LOWER: 500,
    UPPER: 600,
  },

  /** Jitter added on top of each backoff delay, as a fraction of it */
  BACKOFF_JITTER_RATIO: 0.25,
} as const

export const HEADERS = {
  API_KEY: 'X-API-KEY',
  IDEMPOTENCY_KEY: 'Idempotency-Key',
  RATE_LIMIT: 'RateLimit',
  RETRY_AFTER: 'Retry-After',
} as const

/** Methods that may always be repeated without an idempotency key */
export const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(['GET', 'PUT', 'DELETE'])

const BASE = '/api/v1'
const COMPANY = `${BASE}/companies/{company_id}`
const USER = `${COMPANY}/users/{user_id}`
const CAMPAIGN = `${USER}/campaigns/{campaign_id}`
const BOOK = `${CAMPAIGN}/books/{book_id}`
const CHAPTER = `${BOOK}/chapters/{chapter_id}`
const CHARACTER = `${CAMPAIGN}/characters/{character_id}`
const CHARACTER_TRAIT = `${CHARACTER}/traits/{character_trait_id}`

export const API_ENDPOINTS = {
  /** System endpoints */
  HEALTH: `${BASE}/health`,

  /** Developer self-service endpoints */
  DEVELOPER: {
    ME: `${BASE}/developers/me`,
    ME_NEW_KEY: `${BASE}/developers/me/new-key`,
  },

  /** Company endpoints */
  COMPANY: {
    LIST: `${BASE}/companies`,
    GET: COMPANY,
    ACCESS: `${COMPANY}/access`,
  },

  /** User endpoints, scoped to a company */
  USER: {
    LIST: `${COMPANY}/users`,
    GET: USER,
    ASSET_UPLOAD: `${USER}/assets/upload`,
    EXPERIENCE: `${USER}/experience/{campaign_id}`,
    XP_ADD: `${USER}/experience/xp/add`,
    XP_REMOVE: `${USER}/experience/xp/remove`,
    CP_ADD: `${USER}/experience/cp/add`,
  },

  /** Campaign endpoints, scoped to a company and user */
  CAMPAIGN: {
    LIST: `${USER}/campaigns`,
    GET: CAMPAIGN,
  },

  /** Book endpoints, scoped to a campaign */
  BOOK: {
    LIST: `${CAMPAIGN}/books`,
    GET: BOOK,
    NUMBER: `${BOOK}/number`,
  },

  /** Chapter endpoints, scoped to a book */
  CHAPTER: {
    LIST: `${BOOK}/chapters`,
    GET: CHAPTER,
    NUMBER: `${CHAPTER}/number`,
  },

  /** Character endpoints, scoped to a campaign */
  CHARACTER: {
    LIST: `${CAMPAIGN}/characters`,
    GET: CHARACTER,
  },

  /** Trait endpoints, scoped to a character */
  CHARACTER_TRAIT: {
    LIST: `${CHARACTER}/traits`,
    GET: CHARACTER_TRAIT,
    /** Assigns an existing trait or creates a custom one */
    CREATE: `${CHARACTER}/traits/create`,
    INCREASE: `${CHARACTER_TRAIT}/increase`,
    DECREASE: `${CHARACTER_TRAIT}/decrease`,
    XP_PURCHASE: `${CHARACTER_TRAIT}/xp/purchase`,
    XP_REFUND: `${CHARACTER_TRAIT}/xp/refund`,
    STARTING_POINTS_PURCHASE: `${CHARACTER_TRAIT}/startingpoints/purchase`,
    STARTING_POINTS_REFUND: `${CHARACTER_TRAIT}/startingpoints/refund`,
  },

  /** Dice roll endpoints, scoped to a company and user */
  DICEROLL: {
    LIST: `${USER}/dicerolls`,
    GET: `${USER}/dicerolls/{diceroll_id}`,
    QUICKROLL: `${USER}/dicerolls/quickroll`,
  },
} as const

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
} as const
