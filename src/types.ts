/**
 * Core types for the loglyzer analysis pipeline.
 * All types are immutable (readonly where appropriate).
 */

// ---------------------------------------------------------------------------
// Enums / Unions
// ---------------------------------------------------------------------------

/**
 * All valid severity levels as a const array — the single source of truth
 * for both the `LogLevel` union and the `isLogLevel` runtime guard.
 * The array order is the canonical display order used by every renderer.
 */
export const LOG_LEVELS = ['INFO', 'WARNING', 'ERROR', 'DEBUG'] as const

/** Severity classification of a log record. */
export type LogLevel = typeof LOG_LEVELS[number]

/** Returns true if `v` is one of the four uppercase level tokens. */
export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && (LOG_LEVELS as readonly string[]).includes(v)
}

/** All supported output encodings. */
export const OUTPUT_FORMATS = ['text', 'json', 'csv'] as const

/** Output encoding selected on the command line. */
export type OutputFormat = typeof OUTPUT_FORMATS[number]

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Calendar date and wall-clock time of a record. No timezone is implied. */
export interface LogTimestamp {
  readonly year: number
  /** 1–12 */
  readonly month: number
  /** 1–31, validated against the month length */
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
}

/** One structured entry decoded from a single log line. */
export interface LogRecord {
  readonly timestamp: LogTimestamp
  readonly level: LogLevel
  /** Message text with surrounding whitespace trimmed. May be empty. */
  readonly message: string
}

/** Result of parsing one line: a record, or the raw text that failed to match. */
export type ParseOutcome =
  | { readonly kind: 'ok'; readonly record: LogRecord }
  | { readonly kind: 'malformed'; readonly line: string }

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

/** Optional predicates applied to parsed records. Active predicates are ANDed. */
export interface FilterCriteria {
  /** Keep only ERROR records. */
  readonly errorsOnly: boolean
  /** Case-insensitive substring the message must contain. */
  readonly searchTerm?: string
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

/** Per-level record counts. Every level is always present. */
export type LevelCounts = Readonly<Record<LogLevel, number>>

/** A distinct ERROR message and how many times it occurred. */
export interface ErrorFrequency {
  readonly message: string
  readonly count: number
}

/** Raw aggregation pass result, before ranking. */
export interface Aggregation {
  readonly total: number
  readonly countsByLevel: LevelCounts
  /** ERROR message text → occurrence count, in first-seen order. */
  readonly errorFrequencies: ReadonlyMap<string, number>
}

/**
 * Final statistics handed to the renderers.
 *
 * Invariants:
 *   - sum(countsByLevel) === total
 *   - topErrors is sorted by (count desc, message asc)
 */
export interface Statistics {
  readonly total: number
  readonly countsByLevel: LevelCounts
  readonly topErrors: readonly ErrorFrequency[]
}

/** Returns a fresh counts object with every level set to zero. */
export function emptyLevelCounts(): Record<LogLevel, number> {
  return { INFO: 0, WARNING: 0, ERROR: 0, DEBUG: 0 }
}
