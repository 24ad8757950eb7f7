import { describe, expect, it } from 'vitest'

import { compareLooseVersions } from '../../core/releases/compare-loose-versions'

describe('compareLooseVersions', () => {
  it('compares numeric segments numerically', () => {
    expect(compareLooseVersions('1.2', '1.10')).toBe(-1)
    expect(compareLooseVersions('2.0', '1.99')).toBe(1)
    expect(compareLooseVersions('08.02.02', '8.2.2')).toBe(0)
  })

  it('compares word segments lexicographically', () => {
    expect(compareLooseVersions('2409.ocicat', '2409.toyger')).toBe(-1)
    expect(compareLooseVersions('beta', 'alpha')).toBe(1)
  })

  it('sorts numbers before words', () => {
    expect(compareLooseVersions('1.2', '1.a')).toBe(-1)
    expect(compareLooseVersions('1.rc', '1.0')).toBe(1)
  })

  it('sorts a prefix before the longer version', () => {
    expect(compareLooseVersions('1.2', '1.2.0')).toBe(-1)
    expect(compareLooseVersions('1.2.0', '1.2')).toBe(1)
    expect(compareLooseVersions('', '')).toBe(0)
  })
})
