/**
 * Single-pass aggregation of filtered records into level counts and an
 * ERROR message frequency table.
 */

import type { Aggregation, LogRecord, Statistics } from '../types.js'
import { emptyLevelCounts } from '../types.js'
import { selectTopErrors } from './rank.js'

/**
 * Consumes `records` exactly once.
 * Only ERROR messages are tallied, keyed by their exact (already trimmed) text.
 */
export function aggregateRecords(records: Iterable<LogRecord>): Aggregation {
  const countsByLevel = emptyLevelCounts()
  const errorFrequencies = new Map<string, number>()
  let total = 0

  for (const record of records) {
    total++
    countsByLevel[record.level]++
    if (record.level === 'ERROR') {
      errorFrequencies.set(record.message, (errorFrequencies.get(record.message) ?? 0) + 1)
    }
  }

  return {
    total,
    countsByLevel: Object.freeze(countsByLevel),
    errorFrequencies,
  }
}

/** Combines an aggregation with the ranked top-N errors into frozen `Statistics`. */
export function buildStatistics(aggregation: Aggregation, topN: number): Statistics {
  return Object.freeze({
    total: aggregation.total,
    countsByLevel: aggregation.countsByLevel,
    topErrors: selectTopErrors(aggregation.errorFrequencies, topN),
  })
}
