/**
 * Record filtering: severity and case-insensitive message search.
 */

import type { FilterCriteria, LogRecord } from '../types.js'

/** Returns true when no predicate in `criteria` is active. */
export function isPassThrough(criteria: FilterCriteria): boolean {
  return !criteria.errorsOnly && !criteria.searchTerm
}

/**
 * Builds a single predicate from the active criteria.
 * An empty search term is treated as absent.
 */
export function buildRecordPredicate(criteria: FilterCriteria): (record: LogRecord) => boolean {
  const needle = criteria.searchTerm ? criteria.searchTerm.toLowerCase() : null
  return (record) => {
    if (criteria.errorsOnly && record.level !== 'ERROR') return false
    if (needle !== null && !record.message.toLowerCase().includes(needle)) return false
    return true
  }
}

/**
 * Lazily yields the records that satisfy every active predicate, in input order.
 * Single pass: the input iterable is consumed as the output is consumed.
 */
export function* filterRecords(
  records: Iterable<LogRecord>,
  criteria: FilterCriteria,
): Generator<LogRecord> {
  if (isPassThrough(criteria)) {
    yield* records
    return
  }
  const keep = buildRecordPredicate(criteria)
  for (const record of records) {
    if (keep(record)) yield record
  }
}
