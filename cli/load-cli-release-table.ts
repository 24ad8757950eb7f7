import { createSpinner } from 'nanospinner'
import pc from 'picocolors'

import type { ReleaseTable } from '../types/release-table'

import { DEFAULT_RELEASE_TABLE } from '../core/config/default-release-table'
import { loadReleaseTable } from '../core/config/load-release-table'

/**
 * Loads the release table named by `--config`, or the bundled one.
 *
 * @param configPath - Path given with `--config`.
 * @returns Release table.
 */
export async function loadCliReleaseTable(
  configPath: undefined | string,
): Promise<ReleaseTable> {
  if (!configPath) {
    return DEFAULT_RELEASE_TABLE
  }

  let spinner = createSpinner(`Loading release table ${configPath}...`).start()
  try {
    let table = await loadReleaseTable(configPath)
    spinner.success(
      `Loaded ${pc.yellow(table.fullReleases.length)} full and ` +
        `${pc.yellow(table.lightReleases.length)} light releases`,
    )
    return table
  } catch (error) {
    spinner.error('Failed')
    throw error
  }
}
