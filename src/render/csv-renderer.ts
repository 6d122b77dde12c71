import { stringify } from 'csv-stringify/sync'
import type { Statistics } from '../types.js'
import { LOG_LEVELS } from '../types.js'
import type { OutputRenderer } from './renderer.js'

export const CSV_HEADER = ['type', 'name', 'count'] as const

/**
 * One row per fact:
 *
 *   type,name,count
 *   total,all,<total>
 *   level,<LEVEL>,<count>      (INFO, WARNING, ERROR, DEBUG)
 *   error,<message>,<count>    (rank order)
 *
 * Quoting follows RFC 4180 as implemented by csv-stringify.
 */
export class CsvRenderer implements OutputRenderer {
  readonly format = 'csv' as const

  render(stats: Statistics): string {
    const rows: string[][] = [
      [...CSV_HEADER],
      ['total', 'all', String(stats.total)],
      ...LOG_LEVELS.map((level) => ['level', level, String(stats.countsByLevel[level])]),
      ...stats.topErrors.map((e) => ['error', e.message, String(e.count)]),
    ]
    // csv-stringify quotes on LF by itself; a bare CR needs quoted_match.
    return stringify(rows, { record_delimiter: 'unix', quoted_match: /\r/ })
  }
}
