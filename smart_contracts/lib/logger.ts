/**
 * Console logger with a scope prefix and a minimum level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  readonly level: LogLevel
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
  child(scope: string): Logger
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const enabled = (wanted: LogLevel) => LEVEL_RANK[wanted] >= LEVEL_RANK[level]
  const prefix = `[${scope}]`

  return {
    level,
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details)
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details)
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details)
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details)
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level)
    },
  }
}

export const silentLogger: Logger = createLogger('silent', 'silent')
