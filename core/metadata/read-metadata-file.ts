import type { InputMetadata } from '../../types/input-metadata'

import { isInputMetadata } from '../schema/metadata/is-input-metadata'
import { InputMetadataError } from './input-metadata-error'
import { readYamlFile } from '../fs/read-yaml-file'

/**
 * Read the metadata of input files from a YAML or JSON file.
 *
 * An empty or `none` document means there is no input (event generation);
 * an empty list means legacy input without metadata.
 *
 * @param filePath - Path to the metadata file.
 * @returns Metadata records, or null without input.
 * @throws {InputMetadataError} When the file cannot be read or is invalid.
 */
export async function readMetadataFile(
  filePath: string,
): Promise<InputMetadata[] | null> {
  let value: unknown
  try {
    value = await readYamlFile(filePath)
  } catch (error) {
    throw new InputMetadataError(
      `Cannot read metadata ${filePath}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    )
  }

  if (value === null || value === 'none') {
    return null
  }
  if (!Array.isArray(value)) {
    throw new InputMetadataError(
      `Metadata in ${filePath} must be a list of records`,
    )
  }

  let records: InputMetadata[] = []
  for (let [index, entry] of value.entries()) {
    if (!isInputMetadata(entry)) {
      throw new InputMetadataError(
        `Invalid metadata record ${index + 1} in ${filePath}`,
      )
    }
    records.push(entry)
  }
  return records
}
