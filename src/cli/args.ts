import { parseArgs } from 'node:util'
import type { ParseArgsConfig } from 'node:util'
import { UsageError } from '../errors.js'
import { errnoCode } from '../utils/fs.js'

export const USAGE = `Usage: loglyzer <FILE> [options]

Analyze a log file of "YYYY-MM-DD HH:MM:SS [LEVEL] Message" lines.

Options:
  -f, --format <text|json|csv>  Output format (default: text)
  -e, --errors-only             Only count ERROR records
      --top <N>                 Show the N most frequent errors (default: 5)
      --search <TEXT>           Only count records whose message contains TEXT (case-insensitive)
  -d, --details                 List the matching records (text format only)
  -c, --config <PATH>           Read default options from a YAML file
  -v, --verbose                 Print run details and skipped lines on stderr
  -h, --help                    Show this help
  -V, --version                 Show the version`

const OPTIONS = {
  format: { type: 'string', short: 'f' },
  'errors-only': { type: 'boolean', short: 'e' },
  top: { type: 'string' },
  search: { type: 'string' },
  details: { type: 'boolean', short: 'd' },
  config: { type: 'string', short: 'c' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'V' },
} as const satisfies ParseArgsConfig['options']

function tokenize(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: true })
  } catch (err) {
    if (err instanceof Error && errnoCode(err)?.startsWith('ERR_PARSE_ARGS')) {
      throw new UsageError(err.message, { cause: err })
    }
    throw err
  }
}

/** What the command line asks for. */
export type CliCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'version' }
  | {
      readonly kind: 'analyze'
      /** `--config` path, when given. */
      readonly configPath?: string
      /** Options given explicitly on the command line, keyed like the config schema. */
      readonly overrides: Readonly<Record<string, unknown>>
    }

/**
 * Parses argv (without the node and script entries).
 * Values are not validated here beyond their shape; `parseConfig` does that.
 *
 * @throws {UsageError} on unknown flags, missing option values or more than
 *   one positional argument.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = tokenize(argv)
  if (values.help) return { kind: 'help' }
  if (values.version) return { kind: 'version' }

  if (positionals.length > 1) {
    throw new UsageError(`expected one input file, got ${positionals.length}: ${positionals.join(' ')}`)
  }

  const overrides: Record<string, unknown> = {}
  const [input] = positionals
  if (input !== undefined) overrides['input'] = input
  if (values.format !== undefined) overrides['format'] = values.format
  if (values.top !== undefined) overrides['top'] = values.top
  if (values.search !== undefined) overrides['search'] = values.search
  if (values['errors-only']) overrides['errorsOnly'] = true
  if (values.details) overrides['details'] = true
  if (values.verbose) overrides['verbose'] = true

  return values.config === undefined
    ? { kind: 'analyze', overrides }
    : { kind: 'analyze', configPath: values.config, overrides }
}
