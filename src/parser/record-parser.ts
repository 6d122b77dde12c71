/**
 * Line parser for the fixed `YYYY-MM-DD HH:MM:SS [LEVEL] Message` layout.
 *
 * `parseLogLine` never throws. A line that does not match the layout, names
 * an unknown level token, or carries an impossible date or time is returned
 * as `malformed` and the caller decides what to do with it.
 */

import type { LogRecord, LogTimestamp, ParseOutcome } from '../types.js'
import { isLogLevel } from '../types.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Anchored at both ends of the whole string. The level group takes any
 * bracketed token; `isLogLevel` decides which tokens are known. The message
 * may not contain LF, so an unsplit multi-line chunk is malformed.
 */
const LINE_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) \[([^\]]*)\] ([^\n]*)$/

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return DAYS_IN_MONTH[month - 1] ?? 0
}

/** Returns true when the components describe a real calendar moment. */
export function isValidTimestamp(ts: LogTimestamp): boolean {
  if (ts.month < 1 || ts.month > 12) return false
  if (ts.day < 1 || ts.day > daysInMonth(ts.year, ts.month)) return false
  return ts.hour <= 23 && ts.minute <= 59 && ts.second <= 59
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0')
}

/** Formats a timestamp back to `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(ts: LogTimestamp): string {
  const date = `${pad(ts.year, 4)}-${pad(ts.month, 2)}-${pad(ts.day, 2)}`
  const time = `${pad(ts.hour, 2)}:${pad(ts.minute, 2)}:${pad(ts.second, 2)}`
  return `${date} ${time}`
}

// ---------------------------------------------------------------------------
// parseLogLine
// ---------------------------------------------------------------------------

/**
 * Parses one raw line. A single trailing carriage return (CRLF input) is
 * removed before matching; nothing else is stripped from the line itself.
 */
export function parseLogLine(line: string): ParseOutcome {
  const input = line.endsWith('\r') ? line.slice(0, -1) : line
  const match = LINE_RE.exec(input)
  if (match === null) return { kind: 'malformed', line }

  const [, year, month, day, hour, minute, second, level, message] = match
  if (!isLogLevel(level)) return { kind: 'malformed', line }

  const timestamp: LogTimestamp = Object.freeze({
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  })
  if (!isValidTimestamp(timestamp)) return { kind: 'malformed', line }

  const record: LogRecord = Object.freeze({
    timestamp,
    level,
    message: (message ?? '').trim(),
  })
  return { kind: 'ok', record }
}

// ---------------------------------------------------------------------------
// parseLogLines
// ---------------------------------------------------------------------------

/**
 * Lazily parses a sequence of lines, yielding only well-formed records.
 *
 * The 1-based line number of every malformed line is appended to `skipped`,
 * which the caller owns. The input is consumed once.
 */
export function* parseLogLines(lines: Iterable<string>, skipped: number[]): Generator<LogRecord> {
  let lineNumber = 0
  for (const line of lines) {
    lineNumber++
    const outcome = parseLogLine(line)
    if (outcome.kind === 'ok') {
      yield outcome.record
    } else {
      skipped.push(lineNumber)
    }
  }
}
