/**
 * Command-line front end: argv → config → file → analyze → stdout.
 *
 * Every failure is reported on stderr with a `[loglyzer]` prefix and mapped
 * to an exit code. Nothing is written to stdout unless the whole run succeeds.
 */

import { analyze } from '../analyze.js'
import type { AnalysisResult } from '../analyze.js'
import { parseConfig, toFilterCriteria, ConfigValidationError } from '../config.js'
import type { LoglyzerConfig } from '../config.js'
import { ConfigFileError, LogFileReadError, UsageError } from '../errors.js'
import { readLogLines } from '../io/line-reader.js'
import { collectAnalysisMetrics, createMetricEvent, emitMetric } from '../metrics/sink.js'
import { VERSION } from '../version.js'
import { USAGE, parseCliArgs } from './args.js'
import { loadConfigFile } from './config-file.js'

export const EXIT_OK = 0
export const EXIT_IO_ERROR = 1
export const EXIT_USAGE = 2

/** Maximum number of malformed line numbers listed in verbose mode. */
const MAX_REPORTED_LINES = 10

/** Destination for the rendered payload. */
export type OutputSink = (chunk: string) => void

const stdoutSink: OutputSink = (chunk) => {
  process.stdout.write(chunk)
}

function reportConfig(config: LoglyzerConfig): void {
  console.error(`[loglyzer] analysing file: ${config.input}`)
  console.error(`[loglyzer] format: ${config.format}`)
  console.error(`[loglyzer] top errors: ${config.top}`)
  console.error(`[loglyzer] errors only: ${config.errorsOnly}`)
  console.error(`[loglyzer] search filter: ${config.search ?? '(none)'}`)
}

function reportMalformed(result: AnalysisResult): void {
  if (result.malformedCount === 0) return
  const shown = result.malformedLineNumbers.slice(0, MAX_REPORTED_LINES).join(', ')
  const more = result.malformedCount > MAX_REPORTED_LINES ? ', …' : ''
  console.error(`[loglyzer] skipped ${result.malformedCount} malformed line(s): ${shown}${more}`)
}

async function resolveConfig(
  configPath: string | undefined,
  overrides: Readonly<Record<string, unknown>>,
): Promise<LoglyzerConfig> {
  const fromFile = configPath === undefined ? {} : await loadConfigFile(configPath)
  return parseConfig(
    { ...fromFile, ...overrides },
    {
      onUnknownKeys: (keys) => console.warn(`[loglyzer] ignoring unknown config keys: ${keys.join(', ')}`),
    },
  )
}

/**
 * Runs the tool and resolves with the process exit code.
 * Unexpected errors (bugs) are not caught and propagate to the caller.
 */
export async function runCli(argv: readonly string[], write: OutputSink = stdoutSink): Promise<number> {
  let config: LoglyzerConfig
  try {
    const command = parseCliArgs(argv)
    if (command.kind === 'help') {
      write(`${USAGE}\n`)
      return EXIT_OK
    }
    if (command.kind === 'version') {
      write(`loglyzer ${VERSION}\n`)
      return EXIT_OK
    }
    config = await resolveConfig(command.configPath, command.overrides)
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`[loglyzer] ${err.message}`)
      console.error(USAGE)
      return EXIT_USAGE
    }
    if (err instanceof ConfigValidationError || err instanceof ConfigFileError) {
      console.error(`[loglyzer] ${err.message}`)
      return EXIT_USAGE
    }
    throw err
  }

  if (config.verbose) reportConfig(config)

  let lines: string[]
  try {
    lines = await readLogLines(config.input)
  } catch (err) {
    if (err instanceof LogFileReadError) {
      console.error(`[loglyzer] ${err.message}`)
      return EXIT_IO_ERROR
    }
    throw err
  }

  const result = analyze(lines, {
    criteria: toFilterCriteria(config),
    topN: config.top,
    format: config.format,
    includeRecords: config.details,
  })

  write(result.output)

  if (config.verbose) {
    reportMalformed(result)
    for (const data of collectAnalysisMetrics(result)) {
      emitMetric(createMetricEvent(data))
    }
  }
  return EXIT_OK
}
