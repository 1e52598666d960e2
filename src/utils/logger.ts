/**
 * Logger utility for WORKBank Analysis
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to noop logger so the library stays silent,
 * the CLI switches to a leveled console logger.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Log levels, ordered from most to least verbose
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages (library default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Wrap a logger so that messages below `level` are dropped
 *
 * @example
 * ```typescript
 * setLogger(createLeveledLogger('warn'))
 * ```
 */
export function createLeveledLogger(level: LogLevel, target: Logger = consoleLogger): Logger {
  if (level === 'silent') return noopLogger
  const min = LEVEL_RANK[level]
  return {
    debug(message, ...args) {
      if (min <= LEVEL_RANK.debug) target.debug(message, ...args)
    },
    info(message, ...args) {
      if (min <= LEVEL_RANK.info) target.info(message, ...args)
    },
    warn(message, ...args) {
      if (min <= LEVEL_RANK.warn) target.warn(message, ...args)
    },
    error(message, error, ...args) {
      target.error(message, error, ...args)
    },
  }
}

/**
 * Wrap a logger so that a throwing sink never reaches the caller.
 * Used where logging is observability only and must not change control flow.
 */
export function guardLogger(target: Logger): Logger {
  const call = (fn: () => void): void => {
    try {
      fn()
    } catch {
      // A failing log sink has nowhere to report to
    }
  }
  return {
    debug: (message, ...args) => call(() => target.debug(message, ...args)),
    info: (message, ...args) => call(() => target.info(message, ...args)),
    warn: (message, ...args) => call(() => target.warn(message, ...args)),
    error: (message, error, ...args) => call(() => target.error(message, error, ...args)),
  }
}

/**
 * Global logger instance
 * Defaults to noopLogger
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from './utils/logger'
 *
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}

/**
 * Current global logger. Components resolve it at call time so that a
 * later `setLogger` still takes effect.
 */
export function getLogger(): Logger {
  return logger
}
