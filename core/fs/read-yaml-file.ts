import { readFile } from 'node:fs/promises'
import { parseDocument } from 'yaml'

/**
 * Reads a YAML (or JSON) file and returns its plain value.
 *
 * @param filePath - Path to the file.
 * @returns Parsed value; null for an empty document.
 * @throws {YAMLParseError} When the file is not valid YAML.
 */
export async function readYamlFile(filePath: string): Promise<unknown> {
  let content = await readFile(filePath, 'utf8')
  let document = parseDocument(content)
  let [error] = document.errors
  if (error) {
    throw error
  }
  let value: unknown = document.toJS()
  return value ?? null
}
