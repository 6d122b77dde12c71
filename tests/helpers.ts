import type { LogLevel, LogRecord, Statistics } from '../src/types.js'

const TS = Object.freeze({ year: 2024, month: 1, day: 15, hour: 10, minute: 31, second: 15 })

/** Builds a record at a fixed timestamp. */
export function record(level: LogLevel, message: string): LogRecord {
  return { timestamp: TS, level, message }
}

/** Builds statistics with every level at zero unless overridden. */
export function stats(overrides: Partial<Statistics> = {}): Statistics {
  return {
    total: 0,
    countsByLevel: { INFO: 0, WARNING: 0, ERROR: 0, DEBUG: 0 },
    topErrors: [],
    ...overrides,
  }
}
