import { describe, it, expect } from 'vitest'
import {
  CypherCapabilities,
  ALL_CYPHER_CAPABILITIES,
  resolveCypherCapabilities,
} from '../capabilities'
import { parseServerVersion, serverVersion, ZERO_VERSION } from '../../version'

describe('resolveCypherCapabilities', () => {
  it.each([
    ['1.5.M02', 'Cypher19'],
    ['1.9.9', 'Cypher19'],
    ['1.9.9.9', 'Cypher19'],
    ['2.0', 'Cypher20'],
    ['2.0.0-M06', 'Cypher20'],
    ['2.1.7', 'Cypher20'],
    ['2.2.0', 'Cypher22'],
    ['2.3.1', 'Cypher22'],
    ['3.5.14', 'Cypher22'],
  ])('resolves %s to %s', (raw, expected) => {
    expect(resolveCypherCapabilities(parseServerVersion(raw)).name).toBe(expected)
  })

  it('treats exactly 2.0.0.0 as Cypher20', () => {
    expect(resolveCypherCapabilities(serverVersion(2, 0, 0, 0))).toBe(CypherCapabilities.Cypher20)
  })

  it('treats exactly 2.2.0.0 as Cypher22', () => {
    expect(resolveCypherCapabilities(serverVersion(2, 2, 0, 0))).toBe(CypherCapabilities.Cypher22)
  })

  it('treats an unknown version as Cypher19', () => {
    expect(resolveCypherCapabilities(ZERO_VERSION)).toBe(CypherCapabilities.Cypher19)
  })
})

describe('CypherCapabilities', () => {
  it('lists every set oldest first', () => {
    expect(ALL_CYPHER_CAPABILITIES.map((c) => c.name)).toEqual(['Cypher19', 'Cypher20', 'Cypher22'])
  })

  it('is immutable', () => {
    expect(Object.isFrozen(CypherCapabilities)).toBe(true)
    expect(Object.isFrozen(CypherCapabilities.Cypher22)).toBe(true)
  })

  it('uses property suffixes only in the legacy dialect', () => {
    expect(CypherCapabilities.Cypher19.supportsPropertySuffixesForNullability).toBe(true)
    expect(CypherCapabilities.Cypher19.supportsNullComparisonsWithIsOperator).toBe(false)
    expect(CypherCapabilities.Cypher20.supportsPropertySuffixesForNullability).toBe(false)
    expect(CypherCapabilities.Cypher20.supportsNullComparisonsWithIsOperator).toBe(true)
  })

  it('adds labels and the transactional endpoint at 2.0', () => {
    expect(CypherCapabilities.Cypher19.supportsLabels).toBe(false)
    expect(CypherCapabilities.Cypher20.supportsLabels).toBe(true)
    expect(CypherCapabilities.Cypher20.supportsTransactionalEndpoint).toBe(true)
  })

  it('adds planner hints at 2.2', () => {
    expect(CypherCapabilities.Cypher20.supportsPlanner).toBe(false)
    expect(CypherCapabilities.Cypher22.supportsPlanner).toBe(true)
    expect(CypherCapabilities.Cypher22.supportsMerge).toBe(true)
  })
})
