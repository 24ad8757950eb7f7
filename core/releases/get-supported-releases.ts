import type { ReleaseTable } from '../../types/release-table'

import { DEFAULT_RELEASE_TABLE } from '../config/default-release-table'

/**
 * List the supported full or light releases, newest first.
 *
 * @param options - Listing options.
 * @param options.light - List light releases instead of full ones.
 * @param table - Release table to read.
 * @returns Release identifiers, newest first.
 */
export function getSupportedReleases(
  options: { light?: boolean } = {},
  table: ReleaseTable = DEFAULT_RELEASE_TABLE,
): string[] {
  let releases = options.light ? table.lightReleases : table.fullReleases
  return [...releases].reverse()
}
