/**
 * Pipeline entry point: parse → filter → aggregate → rank → render.
 *
 * `analyze` is synchronous and pure apart from consuming `lines` once.
 * Malformed-line tracking is returned with the result rather than kept in
 * module state.
 */

import type { FilterCriteria, LogRecord, OutputFormat, Statistics } from './types.js'
import { parseLogLines } from './parser/record-parser.js'
import { filterRecords } from './pipeline/filter.js'
import { aggregateRecords, buildStatistics } from './pipeline/aggregator.js'
import { createRenderer } from './render/renderer.js'

export interface AnalyzeParams {
  readonly criteria: FilterCriteria
  /** Number of top error messages to rank. Must be a non-negative integer. */
  readonly topN: number
  readonly format: OutputFormat
  /**
   * Retain the filtered records and pass them to the renderer for a detail
   * listing. Only the text format displays them.
   */
  readonly includeRecords?: boolean
}

export interface AnalysisResult {
  /** Complete rendered payload, newline-terminated. */
  readonly output: string
  readonly statistics: Statistics
  readonly linesRead: number
  readonly malformedCount: number
  /** 1-based line numbers of the malformed lines, ascending. */
  readonly malformedLineNumbers: readonly number[]
  /** Number of distinct ERROR messages seen after filtering. */
  readonly distinctErrorMessages: number
}

/** Passes records through unchanged while appending each one to `sink`. */
function* retainInto(records: Iterable<LogRecord>, sink: LogRecord[]): Generator<LogRecord> {
  for (const record of records) {
    sink.push(record)
    yield record
  }
}

/** Counts lines as they are pulled so the input is still read only once. */
function* countLines(lines: Iterable<string>, counter: { value: number }): Generator<string> {
  for (const line of lines) {
    counter.value++
    yield line
  }
}

export function analyze(lines: Iterable<string>, params: AnalyzeParams): AnalysisResult {
  const skipped: number[] = []
  const linesRead = { value: 0 }
  const retained: LogRecord[] | undefined = params.includeRecords ? [] : undefined

  const parsed = parseLogLines(countLines(lines, linesRead), skipped)
  const filtered = filterRecords(parsed, params.criteria)
  const aggregation = aggregateRecords(retained ? retainInto(filtered, retained) : filtered)
  const statistics = buildStatistics(aggregation, params.topN)

  const output = createRenderer(params.format).render(statistics, retained)

  return {
    output,
    statistics,
    linesRead: linesRead.value,
    malformedCount: skipped.length,
    malformedLineNumbers: skipped,
    distinctErrorMessages: aggregation.errorFrequencies.size,
  }
}
