import type { z } from 'zod'

/**
 * Formats a Zod issue path as a dot/bracket string.
 *
 * Examples:
 *   []             → "(root)"
 *   ["top"]        → "top"
 *   ["rows", 0]    → "rows[0]"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)'
  let out = ''
  for (const seg of path) {
    if (typeof seg === 'number') out += `[${seg}]`
    else out += out === '' ? seg : `.${seg}`
  }
  return out
}

/** One indented `path: message` line per issue. */
export function formatZodErrors(issues: readonly z.ZodIssue[]): string {
  return issues.map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`).join('\n')
}

/** Thrown when the command line cannot be parsed (unknown flag, extra positional, …). */
export class UsageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'UsageError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** Thrown when a `--config` file is missing, unreadable or not a YAML mapping. */
export class ConfigFileError extends Error {
  readonly filePath: string

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Config file ${filePath} is invalid: ${reason}`, options)
    this.name = 'ConfigFileError'
    this.filePath = filePath
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Thrown when the input log file cannot be read. The underlying filesystem
 * error is preserved as `Error.cause`.
 */
export class LogFileReadError extends Error {
  readonly filePath: string

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to read log file ${filePath}: ${reason}`, options)
    this.name = 'LogFileReadError'
    this.filePath = filePath
    Object.setPrototypeOf(this, new.target.prototype)
  }
}
