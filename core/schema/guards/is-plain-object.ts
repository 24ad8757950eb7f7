/**
 * Type guard for plain objects parsed from YAML or JSON.
 *
 * @param value - The value to check.
 * @returns True if the value is a non-null, non-array object.
 */
export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}
