/**
 * Logging
 *
 * pino loggers for the loader and the text front end.
 */

import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino'
import { z } from 'zod'
import { InvalidArgumentError } from '../errors'

export type { Logger }

/** Environment variable that sets the default log level */
export const LOG_LEVEL_ENV = 'PATTERNGRAPH_LOG_LEVEL'

const levelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

export interface LoggerOptions {
  /** Log level (default: `PATTERNGRAPH_LOG_LEVEL`, else 'silent') */
  level?: LevelWithSilent
  /** Logger name (default: 'patterngraph') */
  name?: string
  /** Bindings added to every record */
  base?: Record<string, unknown>
}

/**
 * Resolve the log level from an explicit option or the environment.
 * @throws InvalidArgumentError if the environment holds an unknown level
 */
export function resolveLogLevel(
  level?: LevelWithSilent,
  env: Record<string, string | undefined> = process.env,
): LevelWithSilent {
  if (level !== undefined) return level
  const fromEnv = env[LOG_LEVEL_ENV]
  if (fromEnv === undefined || fromEnv === '') return 'silent'

  const result = levelSchema.safeParse(fromEnv.toLowerCase())
  if (!result.success) {
    throw new InvalidArgumentError(`Unknown log level in ${LOG_LEVEL_ENV}: '${fromEnv}'`, LOG_LEVEL_ENV)
  }
  return result.data
}

/**
 * Create the library logger. Silent unless a level is configured.
 */
export function createLogger(options: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const { name = 'patterngraph', base = {} } = options
  return pino(
    {
      name,
      level: resolveLogLevel(options.level),
      base: { ...base },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  )
}
