import semver from 'semver'

import { compareLooseVersions } from './compare-loose-versions'
import { getReleaseVersion } from './get-release-version'

/**
 * Order two release identifiers by their versions.
 *
 * Plain numeric triples such as `08.02.02` are compared as semver after
 * dropping leading zeros. Everything else falls back to the loose
 * segment-wise comparison.
 *
 * @example
 *   compareReleaseVersions('release-06-02-00', 'release-08-00-10') // -1
 *
 * @param left - First release identifier.
 * @param right - Second release identifier.
 * @returns -1, 0 or 1 as `left` sorts before, equal to, or after `right`.
 */
export function compareReleaseVersions(
  left: string,
  right: string,
): -1 | 0 | 1 {
  let leftVersion = getReleaseVersion(left)
  let rightVersion = getReleaseVersion(right)

  let leftSemver = toSemver(leftVersion)
  let rightSemver = toSemver(rightVersion)
  if (leftSemver && rightSemver) {
    return semver.compare(leftSemver, rightSemver)
  }

  return compareLooseVersions(leftVersion, rightVersion)
}

/**
 * Convert a dotted numeric triple to a valid semver string.
 *
 * @param version - Dotted version.
 * @returns Semver string, or null when the version is not a numeric triple.
 */
function toSemver(version: string): string | null {
  if (!/^\d+\.\d+\.\d+$/u.test(version)) {
    return null
  }
  return semver.valid(
    version
      .split('.')
      .map(part => Number.parseInt(part, 10))
      .join('.'),
  )
}
