export { createLogger, resolveLogLevel, LOG_LEVEL_ENV } from './logger'
export type { Logger, LoggerOptions } from './logger'
