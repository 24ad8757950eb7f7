import type { ClassifiedTags } from '../../types/classified-tags'

import { getTagCategory } from './get-tag-category'

/**
 * Group global tags by category, keeping their order within each group.
 *
 * @param tags - Global tags.
 * @returns Tags grouped by category.
 */
export function classifyTags(tags: readonly string[]): ClassifiedTags {
  let classified: ClassifiedTags = {
    analysis: [],
    online: [],
    other: [],
    data: [],
    main: [],
    mc: [],
  }
  for (let tag of tags) {
    classified[getTagCategory(tag) ?? 'other'].push(tag)
  }
  return classified
}
