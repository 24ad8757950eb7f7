/**
 * Extract the dotted version of a release identifier.
 *
 * The leading keyword is dropped and the remaining dash-separated fields are
 * joined with dots, so `release-08-02-02` becomes `08.02.02` and
 * `light-2409-toyger` becomes `2409.toyger`.
 *
 * @param release - Release identifier.
 * @returns Dotted version string, empty when the identifier has no fields.
 */
export function getReleaseVersion(release: string): string {
  return release.split('-').slice(1).join('.')
}
