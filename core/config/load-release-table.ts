import type { ReleaseTable } from '../../types/release-table'

import { isReleaseTableConfig } from '../schema/config/is-release-table-config'
import { createReleaseTable } from './create-release-table'
import { ReleaseTableError } from './release-table-error'
import { readYamlFile } from '../fs/read-yaml-file'

/**
 * Load a release table from a YAML or JSON configuration file.
 *
 * @example
 *   // conditions.yml
 *   // recommendedRelease: release-08-02-02
 *   // dataTags:
 *   //   release-08-02-02: data_reprocessing_proc9
 *   let table = await loadReleaseTable('conditions.yml')
 *
 * @param filePath - Path to the configuration file.
 * @returns Validated release table.
 * @throws {ReleaseTableError} When the file cannot be read or is invalid.
 */
export async function loadReleaseTable(
  filePath: string,
): Promise<ReleaseTable> {
  let config: unknown
  try {
    config = await readYamlFile(filePath)
  } catch (error) {
    throw new ReleaseTableError(
      `Cannot read release table ${filePath}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    )
  }

  if (!isReleaseTableConfig(config)) {
    throw new ReleaseTableError(`Invalid release table in ${filePath}`)
  }

  return createReleaseTable(config)
}
