/** Segment of a loose version: a number or a run of non-digit characters. */
export type LooseVersionSegment = string | number

/**
 * Split a version string into numeric and word segments.
 *
 * Dots only separate segments. Any other run of non-digit characters forms a
 * word segment, so `2409.toyger` gives `[2409, 'toyger']` and `1.2rc3` gives
 * `[1, 2, 'rc', 3]`.
 *
 * @param version - Version string.
 * @returns Parsed segments in order.
 */
export function parseLooseVersion(version: string): LooseVersionSegment[] {
  let segments: LooseVersionSegment[] = []
  for (let [value] of version.matchAll(/\d+|[^\d.]+/gu)) {
    segments.push(/^\d/u.test(value) ? Number.parseInt(value, 10) : value)
  }
  return segments
}
