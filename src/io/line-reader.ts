import { promises as fs } from 'node:fs'
import { LogFileReadError } from '../errors.js'
import { describeFsError, splitLines } from '../utils/fs.js'

/**
 * Reads the whole log file as UTF-8 and returns its lines.
 *
 * @throws {LogFileReadError} if the file is missing, is a directory, or
 *   cannot be read. The filesystem error is kept as `cause`.
 */
export async function readLogLines(filePath: string): Promise<string[]> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    throw new LogFileReadError(filePath, describeFsError(err), { cause: err })
  }
  return splitLines(content)
}
