import type { RecommendedTagCategory } from '../../types/tag-category'
import type { InputMetadata } from '../../types/input-metadata'
import type { Recommendation } from '../../types/recommendation'
import type { ReleaseTable } from '../../types/release-table'

import {
  LIGHT_RELEASE_PREFIX,
  LEGACY_INPUT_TAG,
  ONLINE_TAG,
} from '../constants'
import { DEFAULT_RELEASE_TABLE } from '../config/default-release-table'
import { resolveRelease } from '../releases/resolve-release'
import { isRunIndependentMc } from './is-run-independent-mc'
import { getRecommendedTag } from './get-recommended-tag'
import { classifyTags } from './classify-tags'

/**
 * Compose the recommended global tags for a processing job.
 *
 * The result lists, highest priority first: the analysis tag, the MC tag
 * (when generating events or reading files produced with an MC tag), the data
 * tag (unless reading run-independent MC), `online`, and finally the main
 * tags already present in the base tags. Legacy input without metadata gets
 * the legacy tag alone.
 *
 * Missing table entries and unknown releases never fail: they end up as
 * notes in the message.
 *
 * @param release - Release the user has set up.
 * @param baseTags - Tags of the input files, or the defaults without input.
 * @param userTags - Tags the user set explicitly. They only add a note.
 * @param metadata - Metadata of the input files: null without input, empty
 *   for legacy input.
 * @param table - Release table to use.
 * @returns Recommended tags with advisory message and suggested release.
 */
export function composeTags(
  release: string,
  baseTags: readonly string[],
  userTags: readonly string[] | null,
  metadata: readonly InputMetadata[] | null,
  table: ReleaseTable = DEFAULT_RELEASE_TABLE,
): Recommendation {
  let notes: string[] = []
  let existing = classifyTags(baseTags)
  let runIndependentMc = isRunIndependentMc(metadata)

  let recommendedRelease = resolveRelease(release, table)
  let suggestRelease =
    (release.startsWith('release') ||
      release.startsWith(LIGHT_RELEASE_PREFIX)) &&
    recommendedRelease !== release
  if (suggestRelease) {
    notes.push(
      `You are using ${release}, but we recommend to use ${recommendedRelease}.`,
    )
  }

  let tags: string[] = []

  function prepend(category: RecommendedTagCategory): void {
    let tag = getRecommendedTag(table, category, recommendedRelease)
    if (tag) {
      tags.unshift(tag)
    } else {
      notes.push(`WARNING: There is no recommended ${category} global tag.`)
    }
  }

  if (metadata?.length === 0) {
    tags.push(LEGACY_INPUT_TAG)
  } else {
    /** Main tags mean generated or produced with them: keep them last. */
    tags.push(...existing.main)
    tags.unshift(ONLINE_TAG)

    if (metadata === null || !runIndependentMc) {
      prepend('data')
    }
    if (metadata === null || existing.mc.length > 0) {
      prepend('mc')
    }
    prepend('analysis')
  }

  if (!isSameTagList(tags, baseTags)) {
    notes.push(
      `The recommended tags differ from the base tags: ${baseTags.join(' ')}`,
      'Use the default conditions configuration if you want to take the base tags.',
    )
  }

  if (userTags && userTags.length > 0) {
    notes.push(
      `Your own global tags take precedence over the recommended ones: ${userTags.join(' ')}`,
    )
  }

  let recommendation: Recommendation = {
    message: notes.map(note => `${note}\n`).join(''),
    tags,
  }
  if (suggestRelease) {
    recommendation.release = recommendedRelease
  }
  return recommendation
}

function isSameTagList(
  left: readonly string[],
  right: readonly string[],
): boolean {
  return (
    left.length === right.length &&
    left.every((tag, index) => tag === right[index])
  )
}
