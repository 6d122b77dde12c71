import type { Statistics } from '../types.js'
import { LOG_LEVELS } from '../types.js'
import type { OutputRenderer } from './renderer.js'

/**
 * Pretty-printed JSON document `{ total, countsByLevel, topErrors }`.
 * Keys are written in a fixed order so output is byte-stable.
 */
export class JsonRenderer implements OutputRenderer {
  readonly format = 'json' as const

  render(stats: Statistics): string {
    const countsByLevel = Object.fromEntries(LOG_LEVELS.map((level) => [level, stats.countsByLevel[level]]))
    const document = {
      total: stats.total,
      countsByLevel,
      topErrors: stats.topErrors.map((e) => ({ message: e.message, count: e.count })),
    }
    return `${JSON.stringify(document, null, 2)}\n`
  }
}
