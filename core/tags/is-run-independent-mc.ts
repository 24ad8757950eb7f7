import type { InputMetadata } from '../../types/input-metadata'

import { RUN_INDEPENDENT_EXPERIMENTS } from '../constants'

/**
 * Check whether input files hold run-independent MC.
 *
 * Only the first metadata record is inspected. It must cover a single
 * experiment reserved for run-independent MC.
 *
 * @param metadata - Metadata of the input files, null without input.
 * @returns True for run-independent MC input.
 */
export function isRunIndependentMc(
  metadata: readonly InputMetadata[] | null,
): boolean {
  let [first] = metadata ?? []
  if (!first) {
    return false
  }
  let { experimentHigh, experimentLow } = first
  return (
    experimentLow !== undefined &&
    experimentLow === experimentHigh &&
    RUN_INDEPENDENT_EXPERIMENTS.has(experimentLow)
  )
}
