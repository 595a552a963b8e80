/**
 * Logging interface shared by the pipeline stages
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

/**
 * Logger interface for pipeline logging
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

function formatContext(context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) return ''
  const parts = Object.entries(context).map(([key, value]) => {
    if (value instanceof Error) return `${key}=${value.message}`
    return `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`
  })
  return ` ${parts.join(' ')}`
}

/**
 * Creates a logger writing through `console`.
 * Messages below `level` are dropped; warnings and errors go to stderr.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('debug')
 * logger.info('Loaded rows', { count: 120 })
 * // [info] Loaded rows count=120
 * ```
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level]

  const write = (
    entryLevel: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) return
    const line = `[${entryLevel}] ${message}${formatContext(context)}`
    if (entryLevel === 'warn' || entryLevel === 'error') {
      console.error(line)
    } else {
      console.log(line)
    }
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  }
}

/**
 * Logger that discards everything. Used when no logger is supplied.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
