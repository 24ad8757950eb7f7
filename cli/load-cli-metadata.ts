import { createSpinner } from 'nanospinner'

import type { InputMetadata } from '../types/input-metadata'

import { readMetadataFile } from '../core/metadata/read-metadata-file'

/**
 * Reads the input metadata named by `--metadata`.
 *
 * Without a file there is no input, as when generating events.
 *
 * @param metadataPath - Path given with `--metadata`.
 * @returns Metadata records, or null without input.
 */
export async function loadCliMetadata(
  metadataPath: undefined | string,
): Promise<InputMetadata[] | null> {
  if (!metadataPath) {
    return null
  }

  let spinner = createSpinner(`Reading metadata ${metadataPath}...`).start()
  try {
    let metadata = await readMetadataFile(metadataPath)
    spinner.success(
      metadata === null
        ? 'No input metadata'
        : `Read ${metadata.length} metadata records`,
    )
    return metadata
  } catch (error) {
    spinner.error('Failed')
    throw error
  }
}
