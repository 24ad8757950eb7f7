import pc from 'picocolors'

import { InputMetadataError } from '../core/metadata/input-metadata-error'
import { ReleaseTableError } from '../core/config/release-table-error'

/**
 * Prints a failure message.
 *
 * @param error - Thrown value.
 */
export function printError(error: unknown): void {
  if (
    error instanceof ReleaseTableError ||
    error instanceof InputMetadataError
  ) {
    console.error(pc.yellow(`\n⚠️  ${error.message}\n`))
    console.error(pc.gray('Check the file and run the command again.\n'))
    return
  }
  console.error(
    pc.redBright('\nError:'),
    error instanceof Error ? error.message : String(error),
  )
}
