/**
 * neo4j-rest-client - connection and capability negotiation for the Neo4j REST API
 */

export * from './client'

// Re-export auth module
export { auth, authorizationHeader, credentialsFromUri } from './auth'

// Version parsing and capabilities
export {
  VERSION,
  ZERO_VERSION,
  serverVersion,
  parseServerVersion,
  compareVersions,
  formatVersion,
  type ServerVersion,
} from './version'
export {
  CypherCapabilities,
  ALL_CYPHER_CAPABILITIES,
  resolveCypherCapabilities,
  type CypherCapabilitiesName,
} from './cypher/capabilities'

// Logging
export { createLogger, type Logger } from './logging/logger'

// Re-export types
export type { AuthToken, LoggingConfig, LogLevel } from './types'
