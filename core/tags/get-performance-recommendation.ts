import type { PerformanceRecommendation } from '../../types/performance-recommendation'

/** Campaigns with a published performance recommendation. */
const CAMPAIGNS = new Set(['MC15', 'MC16'])

/**
 * Locate the performance recommendation payload of an MC campaign.
 *
 * @param campaign - MC campaign name.
 * @returns Global tag and payload name; the tag is empty for unknown
 *   campaigns.
 */
export function getPerformanceRecommendation(
  campaign: string = 'MC15',
): PerformanceRecommendation {
  return {
    globalTag: CAMPAIGNS.has(campaign)
      ? `analysis_performance_recommendation_${campaign}`
      : '',
    payload: 'recommendation_payload',
  }
}
