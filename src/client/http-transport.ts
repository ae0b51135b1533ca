/**
 * HTTP transport used by the graph client.
 * The client only needs "send a request, get a response"; FetchTransport
 * provides that over fetch with a timeout and network error classification.
 */

import { NetworkError, TimeoutError } from './errors'

/**
 * Network error codes from Node.js
 */
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNRESET',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'ECONNABORTED',
])

export const DEFAULT_TIMEOUT = 30000

/**
 * Check if an error is a network-related error
 */
function isNetworkError(error: Error): boolean {
  // AbortError is how timeouts surface
  if (error.name === 'AbortError') {
    return false
  }

  if (error.name === 'NetworkError') {
    return true
  }

  // Node.js system errors
  if ('code' in error && typeof error.code === 'string' && NETWORK_ERROR_CODES.has(error.code)) {
    return true
  }

  // All TypeErrors from fetch are network errors; engines word them differently
  return error.name === 'TypeError'
}

/**
 * A request as handed to the transport
 */
export interface TransportRequest {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE'
  url: string
  headers: Record<string, string>
  body?: string
}

/**
 * Sends one request and returns the response. Implementations own timeouts
 * and cancellation; the client performs no retries.
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<Response>
}

/**
 * FetchTransport configuration
 */
export interface FetchTransportConfig {
  /** Custom fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch
  /** Request timeout in milliseconds */
  timeout?: number
}

/**
 * Transport over the Fetch API
 */
export class FetchTransport implements HttpTransport {
  readonly timeout: number
  private readonly fetchFn: typeof fetch

  constructor(config: FetchTransportConfig = {}) {
    const fetchFn = config.fetch ?? globalThis.fetch
    if (!fetchFn) {
      throw new Error(
        'No fetch implementation available. ' +
        'Please provide a custom fetch function in the config.'
      )
    }
    this.fetchFn = fetchFn
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT
  }

  async send(request: TransportRequest): Promise<Response> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeout)

    try {
      return await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      })
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new TimeoutError(this.timeout, 'HTTP request')
        }
        if (isNetworkError(error)) {
          throw new NetworkError(`Failed to fetch ${request.url}`, error)
        }
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
