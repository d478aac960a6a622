/**
 * Default logger for the Chronicle SDK
 * Output level comes from the LOG_LEVEL environment variable
 * Supports: DEBUG, INFO, WARN, ERROR
 * Default: SILENT (no logs output)
 */

import { Logger, parseLogLevel } from '@chronicle-api/shared/logger'

export function createDefaultLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  return new Logger(
    {
      level: parseLogLevel(env.LOG_LEVEL),
      enableJson: env.LOG_FORMAT?.toLowerCase() === 'json',
    },
    { component: 'chronicle-sdk' }
  )
}

export const logger = createDefaultLogger()
