import type { ReleaseTableConfig } from '../../../types/release-table-config'

import { isStringRecord } from '../guards/is-string-record'
import { isPlainObject } from '../guards/is-plain-object'
import { isStringList } from '../guards/is-string-list'

/** Validators of each configuration field. */
const FIELD_GUARDS: Record<
  keyof ReleaseTableConfig,
  (value: unknown) => boolean
> = {
  recommendedRelease: value => typeof value === 'string',
  lightReleases: isStringList,
  fullReleases: isStringList,
  analysisTags: isStringRecord,
  dataTags: isStringRecord,
  mcTags: isStringRecord,
}

/**
 * Type guard to check if a value conforms to the ReleaseTableConfig
 * interface.
 *
 * Unknown fields are rejected so that misspelled keys do not go unnoticed.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid release table configuration.
 */
export function isReleaseTableConfig(
  value: unknown,
): value is ReleaseTableConfig {
  if (!isPlainObject(value)) {
    return false
  }

  return Object.entries(value).every(
    ([key, field]) => isConfigField(key) && FIELD_GUARDS[key](field),
  )
}

function isConfigField(key: string): key is keyof ReleaseTableConfig {
  return Object.hasOwn(FIELD_GUARDS, key)
}
