import type { TagCategory } from '../../types/tag-category'

import { ONLINE_TAG } from '../constants'

/** Name prefixes of each tag category, checked in order. */
const CATEGORY_PREFIXES: [TagCategory, string[]][] = [
  ['main', ['main_', 'master_', 'release-', 'prerelease-']],
  ['data', ['data_']],
  ['mc', ['mc_']],
  ['analysis', ['analysis_']],
]

/**
 * Determine the category of a global tag from its name.
 *
 * @param tag - Global tag name.
 * @returns Tag category, or null for tags outside every category.
 */
export function getTagCategory(tag: string): TagCategory | null {
  if (tag === ONLINE_TAG) {
    return 'online'
  }
  for (let [category, prefixes] of CATEGORY_PREFIXES) {
    if (prefixes.some(prefix => tag.startsWith(prefix))) {
      return category
    }
  }
  return null
}
