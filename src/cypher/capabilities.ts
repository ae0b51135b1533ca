/**
 * Cypher Capabilities
 *
 * The Cypher dialect a server understands is fixed by its version. Each
 * capability set is a frozen, named value; exactly one applies to a connection.
 */

import { compareVersions, serverVersion, ZERO_VERSION, type ServerVersion } from '../version'

export type CypherCapabilitiesName = 'Cypher19' | 'Cypher20' | 'Cypher22'

export interface CypherCapabilities {
  readonly name: CypherCapabilitiesName
  /** Lowest server version this dialect applies to */
  readonly minimumServerVersion: ServerVersion
  /** `n:Label` patterns and label predicates */
  readonly supportsLabels: boolean
  readonly supportsMerge: boolean
  /** `n.prop IS NULL` instead of the `?` / `!` property suffixes */
  readonly supportsNullComparisonsWithIsOperator: boolean
  /** `n.prop?` and `n.prop!` */
  readonly supportsPropertySuffixesForNullability: boolean
  /** The `transaction` endpoint of the REST API */
  readonly supportsTransactionalEndpoint: boolean
  /** `PLANNER COST` / `PLANNER RULE` query prefixes */
  readonly supportsPlanner: boolean
}

const Cypher19 = Object.freeze<CypherCapabilities>({
  name: 'Cypher19',
  minimumServerVersion: ZERO_VERSION,
  supportsLabels: false,
  supportsMerge: false,
  supportsNullComparisonsWithIsOperator: false,
  supportsPropertySuffixesForNullability: true,
  supportsTransactionalEndpoint: false,
  supportsPlanner: false,
})

const Cypher20 = Object.freeze<CypherCapabilities>({
  ...Cypher19,
  name: 'Cypher20',
  minimumServerVersion: serverVersion(2, 0),
  supportsLabels: true,
  supportsMerge: true,
  supportsNullComparisonsWithIsOperator: true,
  supportsPropertySuffixesForNullability: false,
  supportsTransactionalEndpoint: true,
})

const Cypher22 = Object.freeze<CypherCapabilities>({
  ...Cypher20,
  name: 'Cypher22',
  minimumServerVersion: serverVersion(2, 2),
  supportsPlanner: true,
})

/**
 * The known capability sets by name
 */
export const CypherCapabilities = Object.freeze({
  Cypher19,
  Cypher20,
  Cypher22,
})

/**
 * All capability sets, oldest first
 */
export const ALL_CYPHER_CAPABILITIES: readonly CypherCapabilities[] = Object.freeze([
  Cypher19,
  Cypher20,
  Cypher22,
])

/**
 * Pick the capability set for a server version. A version equal to a set's
 * minimum belongs to that set: 2.0.0.0 is Cypher20 and 2.2.0.0 is Cypher22.
 */
export function resolveCypherCapabilities(version: ServerVersion): CypherCapabilities {
  for (let i = ALL_CYPHER_CAPABILITIES.length - 1; i > 0; i--) {
    const capabilities = ALL_CYPHER_CAPABILITIES[i]
    if (compareVersions(version, capabilities.minimumServerVersion) >= 0) {
      return capabilities
    }
  }
  return Cypher19
}
