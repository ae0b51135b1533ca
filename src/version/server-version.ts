/**
 * Server Version Parsing
 *
 * Neo4j reports its version as a free-form string (`1.5.M02`, `2.0.0-M06`,
 * `2.2.0`). Capability resolution needs a comparable four-part value, so the
 * string is reduced to major.minor.build.revision. A milestone qualifier
 * (`M<n>`) fills the revision slot; other qualifiers are kept for display only.
 */

/**
 * Structured, comparable server version
 */
export interface ServerVersion {
  readonly major: number
  readonly minor: number
  readonly build: number
  readonly revision: number
  /** Pre-release qualifier as reported (`M02`, `RC1`); not used for ordering */
  readonly qualifier?: string
}

const VERSION_PATTERN = /^\s*v?(\d+)\.(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:[.-]?([A-Za-z][0-9A-Za-z.-]*))?/
const MILESTONE_PATTERN = /^M(\d+)$/i

/**
 * The version used when the server's version string is missing or unreadable
 */
export const ZERO_VERSION: ServerVersion = Object.freeze({
  major: 0,
  minor: 0,
  build: 0,
  revision: 0,
})

/**
 * Create a version from its numeric parts
 */
export function serverVersion(
  major: number,
  minor: number,
  build: number = 0,
  revision: number = 0,
  qualifier?: string
): ServerVersion {
  const version: ServerVersion =
    qualifier === undefined
      ? { major, minor, build, revision }
      : { major, minor, build, revision, qualifier }
  return Object.freeze(version)
}

function component(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  const parsed = Number.parseInt(value, 10)
  return Number.isSafeInteger(parsed) ? parsed : undefined
}

/**
 * Parse a server version string. Never throws: anything that does not start
 * with at least two dotted numbers yields {@link ZERO_VERSION}.
 *
 * @example
 * ```typescript
 * formatVersion(parseServerVersion('1.5.M02'))   // '1.5.0.2'
 * formatVersion(parseServerVersion('2.0.0-M06')) // '2.0.0.6'
 * formatVersion(parseServerVersion('2.2.0'))     // '2.2.0.0'
 * ```
 */
export function parseServerVersion(raw?: string | null): ServerVersion {
  if (!raw) {
    return ZERO_VERSION
  }

  const match = VERSION_PATTERN.exec(raw)
  if (!match) {
    return ZERO_VERSION
  }

  const major = component(match[1])
  const minor = component(match[2])
  if (major === undefined || minor === undefined) {
    return ZERO_VERSION
  }

  const build = component(match[3])
  let revision = component(match[4])
  const qualifier = match[5]

  if (qualifier !== undefined && revision === undefined) {
    const milestone = MILESTONE_PATTERN.exec(qualifier)
    if (milestone) {
      revision = component(milestone[1])
    }
  }

  return serverVersion(major, minor, build ?? 0, revision ?? 0, qualifier)
}

/**
 * Order two versions by major, minor, build and revision.
 * Qualifiers do not take part.
 */
export function compareVersions(a: ServerVersion, b: ServerVersion): number {
  return (
    a.major - b.major ||
    a.minor - b.minor ||
    a.build - b.build ||
    a.revision - b.revision
  )
}

/**
 * Render the four numeric parts, e.g. `1.5.0.2`
 */
export function formatVersion(version: ServerVersion): string {
  return `${version.major}.${version.minor}.${version.build}.${version.revision}`
}
