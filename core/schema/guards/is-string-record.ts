import { isPlainObject } from './is-plain-object'

/**
 * Type guard for objects mapping strings to strings.
 *
 * @param value - The value to check.
 * @returns True if every property value is a string.
 */
export function isStringRecord(
  value: unknown,
): value is Record<string, string> {
  return (
    isPlainObject(value) &&
    Object.values(value).every(item => typeof item === 'string')
  )
}
