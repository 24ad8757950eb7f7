import { LEGACY_ANALYSIS_TAG } from '../constants'

/**
 * Get the recommended analysis tag for legacy (B2BII) input.
 *
 * @returns Global tag name.
 */
export function getLegacyAnalysisGlobalTag(): string {
  return LEGACY_ANALYSIS_TAG
}
