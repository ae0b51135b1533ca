/**
 * Graph Client Errors
 * Custom error classes for connection negotiation
 */

import statusNames from './http-status-names.json'

const STATUS_NAMES: Readonly<Record<string, string>> = statusNames

/**
 * Base class for all graph client errors
 */
export class GraphClientError extends Error {
  readonly code: string
  readonly statusCode?: number
  readonly details?: unknown

  constructor(
    message: string,
    code: string = 'GRAPH_CLIENT_ERROR',
    statusCode?: number,
    details?: unknown
  ) {
    super(message)
    this.name = 'GraphClientError'
    this.code = code
    this.statusCode = statusCode
    this.details = details

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraphClientError)
    }
  }
}

/**
 * Error when a connection-dependent value is read before connect() succeeded
 */
export class NotConnectedError extends GraphClientError {
  static readonly MESSAGE =
    'The graph client is not connected to the server. Call the Connect method first.'

  constructor() {
    super(NotConnectedError.MESSAGE, 'NOT_CONNECTED')
    this.name = 'NotConnectedError'
  }
}

/**
 * Error when the server answers with a status outside 2xx
 */
export class UnexpectedStatusError extends GraphClientError {
  readonly reasonPhrase: string

  constructor(statusCode: number, reasonPhrase: string, body?: string) {
    super(
      'Received an unexpected HTTP status when executing the request.\r\n\r\n' +
        `The response status was: ${statusCode} ${reasonPhrase}`,
      'UNEXPECTED_STATUS',
      statusCode,
      body
    )
    this.name = 'UnexpectedStatusError'
    this.reasonPhrase = reasonPhrase
  }
}

/**
 * Error when a network request fails
 */
export class NetworkError extends GraphClientError {
  constructor(message: string, cause?: Error) {
    super(message, 'NETWORK_ERROR')
    this.name = 'NetworkError'
    if (cause) {
      this.cause = cause
    }
  }
}

/**
 * Error when a request times out
 */
export class TimeoutError extends GraphClientError {
  readonly timeout: number

  constructor(timeout: number, operation: string = 'request') {
    super(`${operation} timed out after ${timeout}ms`, 'TIMEOUT_ERROR')
    this.name = 'TimeoutError'
    this.timeout = timeout
  }
}

/**
 * Error when the root resource cannot be read as a root descriptor
 */
export class RootDescriptorDecodeError extends GraphClientError {
  constructor(message: string, details?: unknown) {
    super(message, 'DECODE_ERROR', undefined, details)
    this.name = 'RootDescriptorDecodeError'
  }
}

/**
 * Error when the client is constructed with unusable settings
 */
export class ConfigurationError extends GraphClientError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION')
    this.name = 'ConfigurationError'
  }
}

/**
 * The PascalCase name of an HTTP status (`500` → `InternalServerError`).
 * Unlisted codes fall back to the response's status text without spaces.
 */
export function reasonPhrase(status: number, statusText: string = ''): string {
  const known = STATUS_NAMES[String(status)]
  if (known !== undefined) {
    return known
  }
  const compact = statusText.replace(/[^0-9A-Za-z]/g, '')
  return compact || 'Unknown'
}

/**
 * Create an error from a non-2xx response. The body is read so the
 * connection can be released; its text is kept in `details`.
 */
export async function createErrorFromResponse(response: Response): Promise<UnexpectedStatusError> {
  let body: string | undefined
  try {
    body = await response.text()
  } catch {
    // Body stream failed; the status alone describes the error
  }

  return new UnexpectedStatusError(
    response.status,
    reasonPhrase(response.status, response.statusText),
    body || undefined
  )
}
