import type { ReleaseTable } from '../../types/release-table'

import { compareReleaseVersions } from '../releases/compare-release-versions'
import { LIGHT_RELEASE_PREFIX } from '../constants'
import { ReleaseTableError } from './release-table-error'

/**
 * Check that a release table can be used for resolution.
 *
 * Both release lists must be non-empty, hold releases of their own kind, and
 * be strictly increasing by version. The recommended release must be set.
 *
 * @param table - Release table to check.
 * @returns The same table.
 * @throws {ReleaseTableError} When the table breaks one of the rules.
 */
export function validateReleaseTable(table: ReleaseTable): ReleaseTable {
  if (table.recommendedRelease.trim() === '') {
    throw new ReleaseTableError('The recommended release must be set')
  }

  checkReleaseList('full', table.fullReleases, release =>
    /^release-\d/u.test(release),
  )
  checkReleaseList('light', table.lightReleases, release =>
    release.startsWith(`${LIGHT_RELEASE_PREFIX}-`),
  )

  return table
}

function checkReleaseList(
  kind: 'light' | 'full',
  releases: readonly string[],
  isOfKind: (release: string) => boolean,
): void {
  if (releases.length === 0) {
    throw new ReleaseTableError(`No supported ${kind} releases`)
  }

  let previous: string | null = null
  for (let release of releases) {
    if (!isOfKind(release)) {
      throw new ReleaseTableError(`"${release}" is not a ${kind} release`)
    }
    if (previous !== null && compareReleaseVersions(previous, release) >= 0) {
      throw new ReleaseTableError(
        `Supported ${kind} releases must be in increasing order: "${release}" follows "${previous}"`,
      )
    }
    previous = release
  }
}
