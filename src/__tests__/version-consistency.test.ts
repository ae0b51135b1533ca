import { describe, it, expect } from 'vitest'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { VERSION } from '../version'
import { defaultUserAgent } from '../client'

describe('version consistency', () => {
  it('VERSION matches package.json', () => {
    const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url))
    const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8'))

    expect(VERSION).toBe(packageJson.version)
  })

  it('user agent carries the package version in four parts', () => {
    const [major, minor, patch] = VERSION.split('.')

    expect(defaultUserAgent()).toBe(`Neo4jRestClient/${major}.${minor}.${patch}.0`)
  })
})
