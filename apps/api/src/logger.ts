/**
 * Scoped console logger.
 *
 * Lines read `[scope] message` followed by an optional metadata object, the
 * same shape the rest of the API has always logged in. Levels below the
 * configured threshold are dropped.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogMeta = Record<string, unknown>

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  child(scope: string): Logger
}

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel) {
  threshold = level
}

function enabled(level: LogLevel) {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)
}

const sinks: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (!enabled(level)) return
    const line = `[${scope}] ${message}`
    if (meta && Object.keys(meta).length > 0) {
      sinks[level](line, meta)
    } else {
      sinks[level](line)
    }
  }

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (childScope) => createLogger(`${scope}:${childScope}`),
  }
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
}
