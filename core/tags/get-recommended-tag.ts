import type { RecommendedTagCategory } from '../../types/tag-category'
import type { ReleaseTable } from '../../types/release-table'

/** Table field holding each category's tags. */
const TABLE_FIELDS = {
  analysis: 'analysisTags',
  data: 'dataTags',
  mc: 'mcTags',
} as const satisfies Record<RecommendedTagCategory, keyof ReleaseTable>

/**
 * Look up the recommended tag of a category for a release.
 *
 * @param table - Release table.
 * @param category - Tag category.
 * @param release - Supported release.
 * @returns Tag name, or null when the table has no entry.
 */
export function getRecommendedTag(
  table: ReleaseTable,
  category: RecommendedTagCategory,
  release: string,
): string | null {
  let tags = table[TABLE_FIELDS[category]]
  if (!Object.hasOwn(tags, release)) {
    return null
  }
  return tags[release] ?? null
}
