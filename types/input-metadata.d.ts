/**
 * Event metadata of an input file, as far as the tag recommendation needs
 * it.
 */
export interface InputMetadata {
  /** Release the input file was produced with. */
  release?: string | null

  /** Highest experiment number in the file. */
  experimentHigh?: number

  /** Lowest experiment number in the file. */
  experimentLow?: number

  /** Whether the file holds simulated events. */
  isMC?: boolean
}
