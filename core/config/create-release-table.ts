import type { ReleaseTableConfig } from '../../types/release-table-config'
import type { ReleaseTable } from '../../types/release-table'

import { DEFAULT_RELEASE_TABLE } from './default-release-table'
import { validateReleaseTable } from './validate-release-table'

/**
 * Build a release table from configuration overrides.
 *
 * Release lists and the recommended release replace the defaults. Tag
 * tables are merged entry by entry over the default tables.
 *
 * @param config - Configuration overrides.
 * @param base - Table the overrides apply to.
 * @returns Validated release table.
 * @throws {ReleaseTableError} When the resulting table is invalid.
 */
export function createReleaseTable(
  config: ReleaseTableConfig,
  base: ReleaseTable = DEFAULT_RELEASE_TABLE,
): ReleaseTable {
  return validateReleaseTable({
    analysisTags: { ...base.analysisTags, ...config.analysisTags },
    recommendedRelease: config.recommendedRelease ?? base.recommendedRelease,
    lightReleases: config.lightReleases ?? base.lightReleases,
    fullReleases: config.fullReleases ?? base.fullReleases,
    dataTags: { ...base.dataTags, ...config.dataTags },
    mcTags: { ...base.mcTags, ...config.mcTags },
  })
}
