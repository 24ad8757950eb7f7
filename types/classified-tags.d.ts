import type { TagCategory } from './tag-category'

/** Global tags grouped by category, each group in input order. */
export type ClassifiedTags = Record<TagCategory | 'other', string[]>
