export { analyze } from './analyze.js'
export type { AnalyzeParams, AnalysisResult } from './analyze.js'

export { LOG_LEVELS, OUTPUT_FORMATS, isLogLevel, emptyLevelCounts } from './types.js'
export type {
  LogLevel,
  OutputFormat,
  LogTimestamp,
  LogRecord,
  ParseOutcome,
  FilterCriteria,
  LevelCounts,
  ErrorFrequency,
  Aggregation,
  Statistics,
} from './types.js'

export { parseLogLine, parseLogLines, formatTimestamp, isValidTimestamp } from './parser/record-parser.js'
export { filterRecords, buildRecordPredicate, isPassThrough } from './pipeline/filter.js'
export { aggregateRecords, buildStatistics } from './pipeline/aggregator.js'
export { selectTopErrors, compareErrorFrequency } from './pipeline/rank.js'

export { createRenderer } from './render/renderer.js'
export type { OutputRenderer } from './render/renderer.js'
export { TextRenderer } from './render/text-renderer.js'
export { JsonRenderer } from './render/json-renderer.js'
export { CsvRenderer, CSV_HEADER } from './render/csv-renderer.js'

export { parseConfig, loglyzerConfigSchema, toFilterCriteria, ConfigValidationError } from './config.js'
export type { LoglyzerConfig, ParseConfigOptions } from './config.js'
export { UsageError, ConfigFileError, LogFileReadError } from './errors.js'

export { readLogLines } from './io/line-reader.js'
export { runCli, EXIT_OK, EXIT_IO_ERROR, EXIT_USAGE } from './cli/main.js'
export type { OutputSink } from './cli/main.js'
