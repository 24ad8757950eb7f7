import type { ConditionsTask } from '../types/conditions-task'

/** Tag of the online conditions, part of every recommendation. */
export const ONLINE_TAG = 'online'

/** Only tag recommended for legacy input files that carry no metadata. */
export const LEGACY_INPUT_TAG = 'B2BII'

/** Analysis tag for legacy input files. */
export const LEGACY_ANALYSIS_TAG = 'analysis_b2bii'

/** Experiment numbers reserved for run-independent MC. */
export const RUN_INDEPENDENT_EXPERIMENTS: ReadonlySet<number> = new Set([
  0, 1002, 1003,
])

/** Prefix of pre-release candidates. */
export const PRE_RELEASE_PREFIX = 'pre'

/**
 * End offset (exclusive) of the release name inside a pre-release
 * identifier.
 */
export const PRE_RELEASE_NAME_END = 19

/** Prefix of full release identifiers. */
export const FULL_RELEASE_PREFIX = 'release-'

/** Prefix of light release identifiers. */
export const LIGHT_RELEASE_PREFIX = 'light'

/** Every task known to the upload and ticket tables. */
export const CONDITIONS_TASKS: readonly ConditionsTask[] = [
  'master',
  'main',
  'validation',
  'online',
  'prompt',
  'data',
  'mc',
  'analysis',
]

/** Ticket-tracker project used when a route does not name one. */
export const DEFAULT_TICKET_PROJECT = 'BII'

/** Issue type id of a sub-issue. */
export const SUB_ISSUE_TYPE_ID = '5'

/** Issue type name used when a route does not name one. */
export const DEFAULT_ISSUE_TYPE = 'Task'
