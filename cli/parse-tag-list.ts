/**
 * Collects global tags from a repeatable CLI option.
 *
 * Each occurrence may hold a comma-separated list.
 *
 * @param value - Option value(s) as parsed by cac.
 * @returns Tags in order, without blanks.
 */
export function parseTagList(value: undefined | string[] | string): string[] {
  let raw: string[] = []
  if (Array.isArray(value)) {
    raw.push(...value)
  } else if (typeof value === 'string') {
    raw.push(value)
  }

  return raw
    .flatMap(item => item.split(','))
    .map(item => item.trim())
    .filter(Boolean)
}
