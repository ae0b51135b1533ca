/**
 * Execution configuration: the settings that shape every request the
 * graph client sends, resolved once from GraphClientConfig.
 */

import type { AuthToken, LoggingConfig } from '../types'
import { formatVersion, parseServerVersion, VERSION } from '../version'
import { ConfigurationError } from './errors'
import { FetchTransport, type HttpTransport } from './http-transport'

export const PRODUCT_NAME = 'Neo4jRestClient'

/**
 * Header that asks the server to stream JSON results
 */
export const STREAM_HEADER = 'X-Stream'

/**
 * Configuration for GraphClient
 */
export interface GraphClientConfig {
  /** Transport to send requests through (defaults to a FetchTransport) */
  transport?: HttpTransport
  /** Custom fetch implementation for the default transport */
  fetch?: typeof fetch
  /** Request timeout in milliseconds for the default transport */
  timeout?: number
  /** Additional headers to send with each request */
  headers?: Record<string, string>
  /** Send `X-Stream: true` (default true) */
  useJsonStreaming?: boolean
  /** Override the User-Agent header */
  userAgent?: string
  /** Credentials; take precedence over user info in the root URI */
  auth?: AuthToken
  logging?: LoggingConfig
}

/**
 * Resolved settings. `useJsonStreaming` may be changed between connects.
 */
export interface ExecutionConfiguration {
  useJsonStreaming: boolean
  readonly userAgent: string
  readonly transport: HttpTransport
  readonly auth?: AuthToken
  readonly headers: Readonly<Record<string, string>>
}

/**
 * `Neo4jRestClient/<major>.<minor>.<build>.<revision>` for this release
 */
export function defaultUserAgent(): string {
  return `${PRODUCT_NAME}/${formatVersion(parseServerVersion(VERSION))}`
}

export function createExecutionConfiguration(
  config: GraphClientConfig = {},
  uriAuth?: AuthToken
): ExecutionConfiguration {
  if (config.timeout !== undefined && (!Number.isFinite(config.timeout) || config.timeout < 0)) {
    throw new ConfigurationError('timeout must be a non-negative number of milliseconds')
  }
  if (config.transport && (config.fetch !== undefined || config.timeout !== undefined)) {
    throw new ConfigurationError('fetch and timeout apply only to the default transport')
  }
  if (config.userAgent !== undefined && config.userAgent.trim() === '') {
    throw new ConfigurationError('userAgent must not be empty')
  }

  return {
    useJsonStreaming: config.useJsonStreaming ?? true,
    userAgent: config.userAgent ?? defaultUserAgent(),
    transport: config.transport ?? new FetchTransport({ fetch: config.fetch, timeout: config.timeout }),
    auth: config.auth ?? uriAuth,
    headers: { ...config.headers },
  }
}
