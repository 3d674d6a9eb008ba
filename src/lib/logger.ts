/**
 * Logging
 *
 * Thin console wrapper that tags every line with a `[context]` prefix.
 * Debug output is off unless enabled, usually through the `debug` option of
 * the game configuration.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

let debugEnabled = false

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled
}

export function isDebugLogging(): boolean {
  return debugEnabled
}

/**
 * Creates a logger for a module or subsystem.
 *
 * @example
 * const logger = createLogger('Search')
 * logger.info('Evaluated 42 nodes') // [Search] Evaluated 42 nodes
 */
export function createLogger(context: string): Logger {
  const prefix = `[${context}]`

  return {
    debug(message, ...details) {
      if (debugEnabled) console.debug(prefix, message, ...details)
    },
    info(message, ...details) {
      console.info(prefix, message, ...details)
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details)
    },
    error(message, ...details) {
      console.error(prefix, message, ...details)
    },
  }
}
