import type { ReleaseTable } from '../../types/release-table'

import {
  PRE_RELEASE_NAME_END,
  LIGHT_RELEASE_PREFIX,
  FULL_RELEASE_PREFIX,
  PRE_RELEASE_PREFIX,
} from '../constants'
import { DEFAULT_RELEASE_TABLE } from '../config/default-release-table'
import { compareReleaseVersions } from './compare-release-versions'

/**
 * Find the supported release that best matches the given one.
 *
 * Rules:
 *
 * - No release: the table's recommended release.
 * - Pre-release candidates resolve like their final counterparts.
 * - Supported full releases, and full releases newer than every supported
 *   one, are returned unchanged.
 * - Older unsupported full releases round up to the next supported one.
 * - Unsupported light releases fall back to the newest light release.
 * - Anything else falls back to the newest full release.
 *
 * Never throws; resolving a resolved release returns it unchanged.
 *
 * @example
 *   resolveRelease('release-06-01-00') // 'release-06-01-15'
 *
 * @param release - Release identifier, free-form.
 * @param table - Release table to resolve against.
 * @returns Name of the supported release.
 */
export function resolveRelease(
  release: undefined | string | null,
  table: ReleaseTable = DEFAULT_RELEASE_TABLE,
): string {
  if (release === null || release === undefined) {
    return table.recommendedRelease
  }

  let candidate = release.startsWith(PRE_RELEASE_PREFIX)
    ? release.slice(PRE_RELEASE_PREFIX.length, PRE_RELEASE_NAME_END)
    : release

  let newestFull = table.fullReleases.at(-1) ?? table.recommendedRelease

  if (candidate === FULL_RELEASE_PREFIX) {
    return newestFull
  }

  if (candidate.startsWith(FULL_RELEASE_PREFIX)) {
    if (
      table.fullReleases.includes(candidate) ||
      compareReleaseVersions(candidate, newestFull) >= 0
    ) {
      return candidate
    }
    return (
      table.fullReleases.find(
        supported => compareReleaseVersions(candidate, supported) < 0,
      ) ?? newestFull
    )
  }

  if (candidate.startsWith(LIGHT_RELEASE_PREFIX)) {
    if (table.lightReleases.includes(candidate)) {
      return candidate
    }
    return table.lightReleases.at(-1) ?? newestFull
  }

  return newestFull
}
