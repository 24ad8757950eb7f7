import type { ReleaseTable } from '../../types/release-table'

/** Supported full releases, oldest first. */
const FULL_RELEASES = [
  'release-05-01-25',
  'release-05-02-19',
  'release-06-00-14',
  'release-06-01-15',
  'release-06-02-00',
  'release-08-00-10',
  'release-08-01-10',
  'release-08-02-02',
] as const

/** Supported light releases, oldest first. */
const LIGHT_RELEASES = [
  'light-2401-ocicat',
  'light-2403-persian',
  'light-2405-quaxo',
  'light-2406-ragdoll',
  'light-2409-toyger',
] as const

/** Release that already has an analysis tag but is not supported yet. */
const UPCOMING_RELEASE = 'release-09-00-00'

type FullRelease = (typeof FULL_RELEASES)[number]

type LightRelease = (typeof LIGHT_RELEASES)[number]

type KnownRelease = typeof UPCOMING_RELEASE | FullRelease | LightRelease

const DATA_TAGS = {
  'release-08-02-02': 'data_reprocessing_proc9',
} satisfies Partial<Record<FullRelease, string>>

const MC_TAGS = {
  'release-08-02-02': 'mc_production_mc12',
} satisfies Partial<Record<FullRelease, string>>

const ANALYSIS_TAG = 'analysis_tools_light-2406-ragdoll'

const ANALYSIS_TAGS: Record<KnownRelease, string> = {
  'release-05-01-25': ANALYSIS_TAG,
  'release-05-02-19': ANALYSIS_TAG,
  'release-06-00-14': ANALYSIS_TAG,
  'release-06-01-15': ANALYSIS_TAG,
  'release-06-02-00': ANALYSIS_TAG,
  'release-08-00-10': ANALYSIS_TAG,
  'release-08-01-10': ANALYSIS_TAG,
  'release-08-02-02': ANALYSIS_TAG,
  'light-2401-ocicat': ANALYSIS_TAG,
  'light-2403-persian': ANALYSIS_TAG,
  'light-2405-quaxo': ANALYSIS_TAG,
  'light-2406-ragdoll': ANALYSIS_TAG,
  'light-2409-toyger': ANALYSIS_TAG,
  [UPCOMING_RELEASE]: ANALYSIS_TAG,
}

/** Release table shipped with the package. */
export const DEFAULT_RELEASE_TABLE: ReleaseTable = {
  recommendedRelease: 'light-2409-toyger',
  lightReleases: LIGHT_RELEASES,
  fullReleases: FULL_RELEASES,
  analysisTags: ANALYSIS_TAGS,
  dataTags: DATA_TAGS,
  mcTags: MC_TAGS,
}
