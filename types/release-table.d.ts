/** Static tables that drive release resolution and tag recommendation. */
export interface ReleaseTable {
  /** Recommended global tag for analysis tools, by release. */
  analysisTags: Readonly<Record<string, string>>

  /** Recommended global tag for raw data processing, by release. */
  dataTags: Readonly<Record<string, string>>

  /** Recommended global tag for run-dependent MC production, by release. */
  mcTags: Readonly<Record<string, string>>

  /** Supported light releases, oldest first. */
  lightReleases: readonly string[]

  /** Supported full releases, oldest first. */
  fullReleases: readonly string[]

  /**
   * Release returned when the caller does not name one. Always set explicitly
   * by whoever provides the table.
   */
  recommendedRelease: string
}
