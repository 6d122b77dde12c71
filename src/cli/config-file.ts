import { promises as fs } from 'node:fs'
import { parse as yamlParse } from 'yaml'
import { ConfigFileError } from '../errors.js'
import { describeFsError } from '../utils/fs.js'

/**
 * Loads a YAML config file and returns its top-level mapping.
 * An empty file yields `{}`. Values are validated later by `parseConfig`.
 *
 * @throws {ConfigFileError} if the file cannot be read, is not valid YAML,
 *   or its document is not a mapping.
 */
export async function loadConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let text: string
  try {
    text = await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    throw new ConfigFileError(filePath, describeFsError(err), { cause: err })
  }

  let doc: unknown
  try {
    doc = yamlParse(text)
  } catch (err) {
    throw new ConfigFileError(filePath, `YAML parse error: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    })
  }

  if (doc === null || doc === undefined) return {}
  if (typeof doc !== 'object' || Array.isArray(doc)) {
    throw new ConfigFileError(filePath, 'expected a mapping of option names to values')
  }
  const mapping: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(doc)) mapping[key] = value
  return mapping
}
