import type { InputMetadata } from '../../types/input-metadata'
import type { ReleaseTable } from '../../types/release-table'

import { DEFAULT_RELEASE_TABLE } from '../config/default-release-table'
import { resolveRelease } from '../releases/resolve-release'
import { getRecommendedTag } from './get-recommended-tag'
import { composeTags } from './compose-tags'

/** Options of the flag-driven recommendation. */
interface RecommendOptions {
  /** Tags used to produce the input files. */
  inputTags?: string[]

  /** Keep the analysis tag, for skimming and analysis jobs. */
  analysis?: boolean

  /** Add the MC tag, for run-dependent MC production. */
  mc?: boolean
}

/**
 * Recommend global tags from a few flags instead of full input metadata.
 *
 * With `mc` the tags are composed as for event generation, otherwise as for
 * processing input files that are not run-independent MC.
 *
 * @param release - Release the user has set up.
 * @param options - Recommendation flags.
 * @param table - Release table to use.
 * @returns Recommended tags, highest priority first.
 */
export function recommendGlobalTags(
  release: string,
  options: RecommendOptions = {},
  table: ReleaseTable = DEFAULT_RELEASE_TABLE,
): string[] {
  let { analysis = true, inputTags = [], mc = false } = options

  let metadata: InputMetadata[] | null = mc ? null : [{ isMC: false }]
  let { tags } = composeTags(release, inputTags, null, metadata, table)

  if (analysis) {
    return tags
  }
  let analysisTag = getRecommendedTag(
    table,
    'analysis',
    resolveRelease(release, table),
  )
  return tags.filter(tag => tag !== analysisTag)
}
