/** Result of a global tag recommendation. */
export interface Recommendation {
  /** Release the user should switch to, when it differs from theirs. */
  release?: string

  /** Recommended global tags, highest priority first. */
  tags: string[]

  /** Advisory text for the user, one line per note. */
  message: string
}
