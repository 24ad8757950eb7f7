import type { LooseVersionSegment } from './parse-loose-version'

import { parseLooseVersion } from './parse-loose-version'

/**
 * Compare two versions segment by segment.
 *
 * Rules:
 *
 * - Numbers compare numerically, words lexicographically.
 * - A number sorts before a word.
 * - When one version is a prefix of the other, the shorter one sorts first.
 *
 * @param left - First version.
 * @param right - Second version.
 * @returns -1, 0 or 1 as `left` sorts before, equal to, or after `right`.
 */
export function compareLooseVersions(left: string, right: string): -1 | 0 | 1 {
  let leftSegments = parseLooseVersion(left)
  let rightSegments = parseLooseVersion(right)

  for (let [index, leftSegment] of leftSegments.entries()) {
    let rightSegment = rightSegments[index]
    if (rightSegment === undefined) {
      return 1
    }
    let result = compareSegments(leftSegment, rightSegment)
    if (result !== 0) {
      return result
    }
  }

  return leftSegments.length < rightSegments.length ? -1 : 0
}

function compareSegments(
  left: LooseVersionSegment,
  right: LooseVersionSegment,
): -1 | 0 | 1 {
  if (left === right) {
    return 0
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return left < right ? -1 : 1
  }
  if (typeof left === 'number') {
    return -1
  }
  if (typeof right === 'number') {
    return 1
  }
  return left < right ? -1 : 1
}
