import type { ReleaseTable } from '../../types/release-table'

import { DEFAULT_RELEASE_TABLE } from '../config/default-release-table'
import { LIGHT_RELEASE_PREFIX } from '../constants'
import { resolveRelease } from './resolve-release'

/**
 * Get the release recommended for training sessions: the newest light
 * release.
 *
 * @param table - Release table to read.
 * @returns Release identifier.
 */
export function getRecommendedTrainingRelease(
  table: ReleaseTable = DEFAULT_RELEASE_TABLE,
): string {
  return resolveRelease(LIGHT_RELEASE_PREFIX, table)
}
