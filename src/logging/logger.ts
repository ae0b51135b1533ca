/**
 * Level-filtered logger over the LoggingConfig callback
 */

import type { LoggingConfig, LogLevel } from '../types'

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

export interface Logger {
  error(message: string): void
  warn(message: string): void
  info(message: string): void
  debug(message: string): void
  isEnabled(level: LogLevel): boolean
}

function consoleSink(level: LogLevel, message: string): void {
  const line = `[neo4j-rest-client] ${level.toUpperCase()} ${message}`
  switch (level) {
    case 'error':
      console.error(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'info':
      console.info(line)
      break
    case 'debug':
      console.debug(line)
      break
  }
}

/**
 * Create a logger. Without a config nothing is logged; with a config but no
 * `logger` callback, messages go to the console.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const threshold = config ? LEVEL_ORDER[config.level] : -1
  const sink = config?.logger ?? consoleSink

  const isEnabled = (level: LogLevel): boolean => LEVEL_ORDER[level] <= threshold
  const write = (level: LogLevel, message: string): void => {
    if (isEnabled(level)) {
      sink(level, message)
    }
  }

  return {
    error: (message) => write('error', message),
    warn: (message) => write('warn', message),
    info: (message) => write('info', message),
    debug: (message) => write('debug', message),
    isEnabled,
  }
}
