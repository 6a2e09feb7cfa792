export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/**
 * Minimal leveled logger; every component takes one so tests can silence it
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

/**
 * Console-backed logger that prefixes every line with `[scope]`
 * @param scope Component name shown in the prefix
 * @param level Lowest level that is written (default: 'info')
 */
export function createConsoleLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level]
  const prefix = `[${scope}]`

  return {
    debug(message, ...details) {
      if (threshold <= LEVEL_ORDER.debug) console.debug(`${prefix} ${message}`, ...details)
    },
    info(message, ...details) {
      if (threshold <= LEVEL_ORDER.info) console.log(`${prefix} ${message}`, ...details)
    },
    warn(message, ...details) {
      if (threshold <= LEVEL_ORDER.warn) console.warn(`${prefix} ${message}`, ...details)
    },
    error(message, ...details) {
      if (threshold <= LEVEL_ORDER.error) console.error(`${prefix} ${message}`, ...details)
    }
  }
}
