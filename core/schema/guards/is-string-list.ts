/**
 * Type guard for lists of strings.
 *
 * @param value - The value to check.
 * @returns True if the value is an array holding only strings.
 */
export function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}
