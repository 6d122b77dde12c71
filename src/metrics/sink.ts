/**
 * Metric emission: one JSON line per event on stderr, prefixed with
 * `[loglyzer:metrics]` so it can be grepped out of verbose output.
 */

import type { AnalysisResult } from '../analyze.js'
import type { MetricData, MetricEvent } from './types.js'

/** Wraps a payload in a timestamped event. */
export function createMetricEvent(data: MetricData, now: Date = new Date()): MetricEvent {
  return { stage: data.stage, timestamp: now.toISOString(), data }
}

/** Derives the per-stage metric payloads from a finished analysis. */
export function collectAnalysisMetrics(result: AnalysisResult): readonly MetricData[] {
  return [
    {
      stage: 'parse',
      linesRead: result.linesRead,
      recordsParsed: result.linesRead - result.malformedCount,
      malformedCount: result.malformedCount,
    },
    {
      stage: 'aggregate',
      recordsMatched: result.statistics.total,
      distinctErrorMessages: result.distinctErrorMessages,
      topErrorsReported: result.statistics.topErrors.length,
    },
  ]
}

/**
 * Emits a metric event to stderr via console.warn.
 * Callers decide whether to call this (the CLI does so only in verbose mode).
 */
export function emitMetric(event: MetricEvent): void {
  console.warn(`[loglyzer:metrics] ${JSON.stringify(event)}`)
}
