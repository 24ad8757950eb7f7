/** Location of the performance recommendation payload. */
export interface PerformanceRecommendation {
  /** Global tag holding the payload, empty for unknown campaigns. */
  globalTag: string

  /** Payload name. */
  payload: string
}
