import type { LogRecord, Statistics } from '../types.js'
import { LOG_LEVELS } from '../types.js'
import { formatTimestamp } from '../parser/record-parser.js'
import { renderTable } from './table.js'
import type { OutputRenderer } from './renderer.js'

const TITLE = 'Log Analysis Results'

/** Human-readable report: totals, level table, top errors and optional record listing. */
export class TextRenderer implements OutputRenderer {
  readonly format = 'text' as const

  render(stats: Statistics, records?: readonly LogRecord[]): string {
    const lines: string[] = [
      TITLE,
      '='.repeat(TITLE.length),
      `Total entries: ${stats.total}`,
      '',
      ...renderTable(
        ['Level', 'Count'],
        LOG_LEVELS.map((level) => [level, String(stats.countsByLevel[level])]),
      ),
    ]

    if (stats.topErrors.length > 0) {
      lines.push(
        '',
        'Top errors:',
        ...renderTable(
          ['Message', 'Occurrences'],
          stats.topErrors.map((e) => [e.message, String(e.count)]),
        ),
      )
    }

    if (records !== undefined) {
      lines.push(
        '',
        `Records (${records.length}):`,
        ...renderTable(
          ['Timestamp', 'Level', 'Message'],
          records.map((r) => [formatTimestamp(r.timestamp), r.level, r.message]),
        ),
      )
    }

    return `${lines.join('\n')}\n`
  }
}
