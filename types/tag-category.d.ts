/** Category of a global tag, derived from its name prefix. */
export type TagCategory = 'analysis' | 'online' | 'data' | 'main' | 'mc'

/** Categories with a per-release recommended tag. */
export type RecommendedTagCategory = 'analysis' | 'data' | 'mc'
