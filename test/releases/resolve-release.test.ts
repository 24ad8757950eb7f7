import { describe, expect, it } from 'vitest'

import type { ReleaseTable } from '../../types/release-table'

import { DEFAULT_RELEASE_TABLE } from '../../core/config/default-release-table'
import { resolveRelease } from '../../core/releases/resolve-release'

describe('resolveRelease', () => {
  it('returns the recommended release when none is given', () => {
    expect(resolveRelease(null)).toBe('light-2409-toyger')
    expect(resolveRelease(undefined)).toBe('light-2409-toyger')
  })

  it('returns the recommended release of a custom table', () => {
    let table: ReleaseTable = {
      ...DEFAULT_RELEASE_TABLE,
      recommendedRelease: 'release-08-01-10',
    }
    expect(resolveRelease(null, table)).toBe('release-08-01-10')
  })

  it('keeps every supported full release', () => {
    for (let release of DEFAULT_RELEASE_TABLE.fullReleases) {
      expect(resolveRelease(release)).toBe(release)
    }
  })

  it('keeps full releases newer than every supported one', () => {
    expect(resolveRelease('release-08-02-03')).toBe('release-08-02-03')
    expect(resolveRelease('release-09-00-00')).toBe('release-09-00-00')
    expect(resolveRelease('release-10-01-00')).toBe('release-10-01-00')
  })

  it('rounds older unsupported full releases up to the next supported one', () => {
    expect(resolveRelease('release-04-00-00')).toBe('release-05-01-25')
    expect(resolveRelease('release-05-01-30')).toBe('release-05-02-19')
    expect(resolveRelease('release-06-01-00')).toBe('release-06-01-15')
    expect(resolveRelease('release-07-00-00')).toBe('release-08-00-10')
    expect(resolveRelease('release-08-02-01')).toBe('release-08-02-02')
  })

  it('compares release fields numerically', () => {
    expect(resolveRelease('release-8-1-10')).toBe('release-08-02-02')
    expect(resolveRelease('release-08-01')).toBe('release-08-01-10')
  })

  it('resolves pre-release candidates like their final releases', () => {
    expect(resolveRelease('prerelease-08-02-02')).toBe('release-08-02-02')
    expect(resolveRelease('prerelease-06-01-00')).toBe('release-06-01-15')
    expect(resolveRelease('prerelease-09-00-00')).toBe('release-09-00-00')
  })

  it('only keeps sixteen characters of a pre-release name', () => {
    expect(resolveRelease('prerelease-09-00-00-rc1')).toBe('release-09-00-00')
    expect(resolveRelease('prelight-2403-persian')).toBe('light-2409-toyger')
  })

  it('returns the newest full release for a bare release prefix', () => {
    expect(resolveRelease('release-')).toBe('release-08-02-02')
  })

  it('keeps supported light releases', () => {
    for (let release of DEFAULT_RELEASE_TABLE.lightReleases) {
      expect(resolveRelease(release)).toBe(release)
    }
  })

  it('falls back to the newest light release for unknown light releases', () => {
    expect(resolveRelease('light-2312-nebelung')).toBe('light-2409-toyger')
    expect(resolveRelease('light-2501-unknown')).toBe('light-2409-toyger')
    expect(resolveRelease('light')).toBe('light-2409-toyger')
  })

  it('falls back to the newest full release for anything else', () => {
    expect(resolveRelease('')).toBe('release-08-02-02')
    expect(resolveRelease('main')).toBe('release-08-02-02')
    expect(resolveRelease('release')).toBe('release-08-02-02')
  })

  it('keeps full releases with word versions', () => {
    expect(resolveRelease('release-next')).toBe('release-next')
    expect(resolveRelease('release-rc')).toBe('release-rc')
    expect(resolveRelease('prerelease-next')).toBe('release-next')
  })

  it('uses the release lists of the given table', () => {
    let table: ReleaseTable = {
      ...DEFAULT_RELEASE_TABLE,
      fullReleases: ['release-07-00-00', 'release-07-01-00'],
      lightReleases: ['light-2301-abyssinian'],
    }
    expect(resolveRelease('release-06-00-00', table)).toBe('release-07-00-00')
    expect(resolveRelease('release-07-00-05', table)).toBe('release-07-01-00')
    expect(resolveRelease('light-2409-toyger', table)).toBe(
      'light-2301-abyssinian',
    )
    expect(resolveRelease('unknown', table)).toBe('release-07-01-00')
  })

  it('returns resolved releases unchanged', () => {
    let inputs = [
      null,
      '',
      'release-',
      'release-04-00-00',
      'release-06-00-14',
      'release-06-01-00',
      'release-09-00-00',
      'release-next',
      'prerelease-07-00-00',
      'prerelease-09-00-00-rc1',
      'light',
      'light-2405-quaxo',
      'light-2501-unknown',
      'main_2024-01-01',
    ]
    for (let input of inputs) {
      let resolved = resolveRelease(input)
      expect(resolveRelease(resolved)).toBe(resolved)
    }
  })
})
