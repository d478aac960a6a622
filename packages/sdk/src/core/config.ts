/**
 * Client configuration: validation, defaults and environment loading
 */

import { z } from 'zod'
import { ConfigurationError } from '../utils/error'
import { DEFAULT_CONFIG } from './constants'
import type { ChronicleClientConfig, ResolvedConfig } from './types'

const ConfigSchema = z.object({
  baseUrl: z.string().url('baseUrl must be an absolute URL'),
  apiKey: z.string().min(1, 'apiKey cannot be empty'),
  timeout: z.number().int().positive().default(DEFAULT_CONFIG.HTTP_CLIENT.TIMEOUT),
  maxRetries: z
    .number()
    .int()
    .min(0)
    .max(DEFAULT_CONFIG.HTTP_CLIENT.MAX_RETRIES_LIMIT)
    .default(DEFAULT_CONFIG.HTTP_CLIENT.MAX_RETRIES),
  retryDelay: z.number().min(0).default(DEFAULT_CONFIG.HTTP_CLIENT.RETRY_DELAY),
  autoRetryRateLimit: z.boolean().default(true),
  autoIdempotencyKeys: z.boolean().default(false),
  retryStatuses: z
    .array(z.number().int().min(100).max(599))
    .default([...DEFAULT_CONFIG.HTTP_CLIENT.RETRY_STATUSES]),
  defaultCompanyId: z.string().min(1).optional(),
  headers: z.record(z.string()).default({}),
})

/**
 * Validate user options and fill in defaults
 *
 * @throws {ConfigurationError} naming the first offending option
 */
export function resolveConfig(config: ChronicleClientConfig): ResolvedConfig {
  const { logger: _logger, transport: _transport, ...options } = config
  const result = ConfigSchema.safeParse(options)

  if (!result.success) {
    const issue = result.error.issues[0]
    const option = issue ? issue.path.join('.') : 'config'
    const reason = issue ? issue.message : 'invalid configuration'
    throw new ConfigurationError(`Invalid client configuration: ${option}: ${reason}`, option, result.error)
  }

  const data = result.data
  return Object.freeze({
    baseUrl: data.baseUrl.replace(/\/+$/, ''),
    apiKey: data.apiKey,
    timeout: data.timeout,
    maxRetries: data.maxRetries,
    retryDelay: data.retryDelay,
    autoRetryRateLimit: data.autoRetryRateLimit,
    autoIdempotencyKeys: data.autoIdempotencyKeys,
    retryStatuses: new Set(data.retryStatuses),
    defaultCompanyId: data.defaultCompanyId,
    headers: Object.freeze({ ...data.headers }),
  })
}

const EnvSchema = z.object({
  CHRONICLE_API_URL: z.string().optional(),
  CHRONICLE_API_KEY: z.string().optional(),
  CHRONICLE_TIMEOUT: z.coerce.number().int().positive().optional(),
  CHRONICLE_MAX_RETRIES: z.coerce
    .number()
    .int()
    .min(0)
    .max(DEFAULT_CONFIG.HTTP_CLIENT.MAX_RETRIES_LIMIT)
    .optional(),
  CHRONICLE_RETRY_DELAY: z.coerce.number().min(0).optional(),
  CHRONICLE_AUTO_IDEMPOTENCY_KEYS: z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1')
    .optional(),
  CHRONICLE_DEFAULT_COMPANY_ID: z.string().optional(),
})

/**
 * Read client options from CHRONICLE_* environment variables. Absent
 * variables are left out so defaults apply.
 *
 * @example
 * ```ts
 * const client = new ChronicleClient(loadConfigFromEnv())
 * ```
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ChronicleClientConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    const issue = result.error.issues[0]
    const option = issue ? issue.path.join('.') : 'env'
    throw new ConfigurationError(
      `Invalid environment variable ${option}: ${issue?.message ?? 'invalid value'}`,
      option,
      result.error
    )
  }

  const vars = result.data
  const config: ChronicleClientConfig = {
    baseUrl: vars.CHRONICLE_API_URL ?? '',
    apiKey: vars.CHRONICLE_API_KEY ?? '',
  }
  if (vars.CHRONICLE_TIMEOUT !== undefined) config.timeout = vars.CHRONICLE_TIMEOUT
  if (vars.CHRONICLE_MAX_RETRIES !== undefined) config.maxRetries = vars.CHRONICLE_MAX_RETRIES
  if (vars.CHRONICLE_RETRY_DELAY !== undefined) config.retryDelay = vars.CHRONICLE_RETRY_DELAY
  if (vars.CHRONICLE_AUTO_IDEMPOTENCY_KEYS !== undefined) {
    config.autoIdempotencyKeys = vars.CHRONICLE_AUTO_IDEMPOTENCY_KEYS
  }
  if (vars.CHRONICLE_DEFAULT_COMPANY_ID) config.defaultCompanyId = vars.CHRONICLE_DEFAULT_COMPANY_ID
  return config
}
