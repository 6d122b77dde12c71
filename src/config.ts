import { z } from 'zod'
import { OUTPUT_FORMATS } from './types.js'
import type { FilterCriteria } from './types.js'
import { formatZodErrors } from './errors.js'

// ---------------------------------------------------------------------------
// Fields
// ---------------------------------------------------------------------------

/**
 * Number of top error messages to report.
 * Command-line values arrive as strings and are converted here only when they
 * are plain decimal integers; anything else (blank, hex, exponent) is left as
 * a string so it fails the type check. YAML values arrive as numbers.
 */
const DECIMAL_INT_RE = /^-?\d+$/

const topField = z
  .preprocess(
    (v) => (typeof v === 'string' && DECIMAL_INT_RE.test(v) ? Number(v) : v),
    z
      .number({ invalid_type_error: 'top must be a number' })
      .int('top must be an integer')
      .min(0, 'top must be >= 0'),
  )
  .default(5)

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const baseConfigSchema = z
  .object({
    /** Path of the log file to analyse. */
    input: z
      .string({ required_error: 'input file path is required' })
      .min(1, 'input file path is required'),
    /** Output encoding. */
    format: z.enum(OUTPUT_FORMATS).default('text'),
    /**
     * How many of the most frequent ERROR messages to list.
     * @default 5
     */
    top: topField,
    /** Keep only ERROR records before aggregating. */
    errorsOnly: z.boolean().default(false),
    /** Case-insensitive substring a message must contain. */
    search: z.string().min(1, 'search must not be empty').optional(),
    /** Print run details and malformed-line diagnostics on stderr. */
    verbose: z.boolean().default(false),
    /** Append a table of the filtered records (text format only). */
    details: z.boolean().default(false),
  })
  .strip()

export const loglyzerConfigSchema = baseConfigSchema.superRefine((cfg, ctx) => {
  if (cfg.details && cfg.format !== 'text') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['details'],
      message: `details is only available with format "text" (got "${cfg.format}")`,
    })
  }
})

/** Keys recognised at the top level of a config object. */
export const CONFIG_KEYS: readonly string[] = Object.freeze(Object.keys(baseConfigSchema.shape))

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

/** Fully-resolved run configuration with all defaults applied. Immutable. */
export type LoglyzerConfig = Readonly<z.infer<typeof loglyzerConfigSchema>>

export interface ParseConfigOptions {
  /**
   * Called with the unknown keys (e.g. `["colour"]`) when the raw input
   * contains keys the schema does not recognise. They are stripped either way.
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values.
 * The message lists every failing field; the `ZodError` is kept as `cause`.
 */
export class ConfigValidationError extends Error {
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(`Invalid configuration:\n${formatZodErrors(zodError.issues)}`, { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.issues
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parse function
// ---------------------------------------------------------------------------

function collectUnknownKeys(raw: object): string[] {
  return Object.keys(raw).filter((key) => !CONFIG_KEYS.includes(key))
}

/**
 * Validates raw (unknown) config input and applies defaults.
 *
 * @throws {ConfigValidationError} with a field-by-field breakdown.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): LoglyzerConfig {
  const result = loglyzerConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (raw !== null && typeof raw === 'object' && !Array.isArray(raw)) {
    const unknownKeys = collectUnknownKeys(raw)
    if (unknownKeys.length > 0) options.onUnknownKeys?.(unknownKeys)
  }

  return Object.freeze(result.data)
}

/** Extracts the filter predicates from a validated config. */
export function toFilterCriteria(config: LoglyzerConfig): FilterCriteria {
  return config.search === undefined
    ? { errorsOnly: config.errorsOnly }
    : { errorsOnly: config.errorsOnly, searchTerm: config.search }
}
