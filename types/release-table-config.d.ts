/** Release table overrides as read from a configuration file. */
export interface ReleaseTableConfig {
  /** Overrides for the analysis tag table. */
  analysisTags?: Record<string, string>

  /** Overrides for the data tag table. */
  dataTags?: Record<string, string>

  /** Overrides for the MC tag table. */
  mcTags?: Record<string, string>

  /** Replacement list of supported light releases. */
  lightReleases?: string[]

  /** Replacement list of supported full releases. */
  fullReleases?: string[]

  /** Replacement for the recommended release. */
  recommendedRelease?: string
}
