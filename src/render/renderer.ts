import type { LogRecord, OutputFormat, Statistics } from '../types.js'
import { TextRenderer } from './text-renderer.js'
import { JsonRenderer } from './json-renderer.js'
import { CsvRenderer } from './csv-renderer.js'

/**
 * Turns final statistics into a complete output payload.
 *
 * Implementations are pure: the same input always produces the same string,
 * and rendering never fails for a well-formed `Statistics` value.
 */
export interface OutputRenderer {
  readonly format: OutputFormat
  /**
   * @param records Filtered records for a detail listing. Only the text
   *   renderer displays them; the structured encodings ignore the argument.
   */
  render(stats: Statistics, records?: readonly LogRecord[]): string
}

/** Selects the renderer for a validated output format. */
export function createRenderer(format: OutputFormat): OutputRenderer {
  switch (format) {
    case 'text':
      return new TextRenderer()
    case 'json':
      return new JsonRenderer()
    case 'csv':
      return new CsvRenderer()
  }
}
