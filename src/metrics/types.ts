/**
 * Structured metric types emitted for one analysis run.
 * All types are immutable and serializable to JSON.
 */

/** Line-level parse results. */
export interface ParseMetrics {
  readonly stage: 'parse'
  readonly linesRead: number
  readonly recordsParsed: number
  readonly malformedCount: number
}

/** Results of filtering, aggregation and ranking. */
export interface AggregateMetrics {
  readonly stage: 'aggregate'
  readonly recordsMatched: number
  readonly distinctErrorMessages: number
  readonly topErrorsReported: number
}

/** Union of all metric payload types. */
export type MetricData = ParseMetrics | AggregateMetrics

/** A timestamped metric event carrying one of the metric payloads. */
export interface MetricEvent {
  readonly stage: MetricData['stage']
  readonly timestamp: string
  readonly data: MetricData
}
