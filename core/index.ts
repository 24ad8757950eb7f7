export type {
  RecommendedTagCategory,
  TagCategory,
} from '../types/tag-category'
export type { LegacyTicketRoute, TicketRoute } from '../types/ticket-route'
export type { PerformanceRecommendation } from '../types/performance-recommendation'
export type { ReleaseTableConfig } from '../types/release-table-config'
export type { ConditionsTask } from '../types/conditions-task'
export type { ClassifiedTags } from '../types/classified-tags'
export type { InputMetadata } from '../types/input-metadata'
export type { Recommendation } from '../types/recommendation'
export type { ReleaseTable } from '../types/release-table'
export type { TicketIssue } from '../types/ticket-issue'

export { getRecommendedTrainingRelease } from './releases/get-recommended-training-release'
export { getPerformanceRecommendation } from './tags/get-performance-recommendation'
export { getLegacyAnalysisGlobalTag } from './tags/get-legacy-analysis-global-tag'
export { compareReleaseVersions } from './releases/compare-release-versions'
export { getSupportedReleases } from './releases/get-supported-releases'
export { compareLooseVersions } from './releases/compare-loose-versions'
export { DEFAULT_RELEASE_TABLE } from './config/default-release-table'
export { validateReleaseTable } from './config/validate-release-table'
export { recommendGlobalTags } from './tags/recommend-global-tags'
export { normalizeTicketRoute } from './tasks/normalize-ticket-route'
export { getReleaseVersion } from './releases/get-release-version'
export { parseLooseVersion } from './releases/parse-loose-version'
export { createReleaseTable } from './config/create-release-table'
export { InputMetadataError } from './metadata/input-metadata-error'
export { getUploadGlobalTag } from './tasks/get-upload-global-tag'
export { readMetadataFile } from './metadata/read-metadata-file'
export { ReleaseTableError } from './config/release-table-error'
export { loadReleaseTable } from './config/load-release-table'
export { isRunIndependentMc } from './tags/is-run-independent-mc'
export { getRecommendedTag } from './tags/get-recommended-tag'
export { isConditionsTask } from './tasks/is-conditions-task'
export { resolveRelease } from './releases/resolve-release'
export { getTicketRoute } from './tasks/get-ticket-route'
export { jiraTicketSpec } from './tasks/jira-ticket-spec'
export { getTagCategory } from './tags/get-tag-category'
export { toTicketIssue } from './tasks/to-ticket-issue'
export { classifyTags } from './tags/classify-tags'
export { composeTags } from './tags/compose-tags'
