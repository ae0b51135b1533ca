/**
 * Shared Types
 * Authentication and logging shapes used across the client
 */

// Auth token types
export interface AuthToken {
  scheme: string
  principal?: string
  credentials?: string
  realm?: string
}

// Log levels, most severe first
export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

// Logging configuration
export interface LoggingConfig {
  level: LogLevel
  logger?: (level: LogLevel, message: string) => void
}
