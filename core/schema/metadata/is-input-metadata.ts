import type { InputMetadata } from '../../../types/input-metadata'

import { isPlainObject } from '../guards/is-plain-object'

/**
 * Type guard to check if a value conforms to the InputMetadata interface.
 *
 * @param value - The value to check.
 * @returns True if every known field present has the expected type.
 */
export function isInputMetadata(value: unknown): value is InputMetadata {
  if (!isPlainObject(value)) {
    return false
  }

  let { experimentHigh, experimentLow, release, isMC } = value
  return (
    (isMC === undefined || typeof isMC === 'boolean') &&
    (experimentLow === undefined || Number.isInteger(experimentLow)) &&
    (experimentHigh === undefined || Number.isInteger(experimentHigh)) &&
    (release === undefined || release === null || typeof release === 'string')
  )
}
