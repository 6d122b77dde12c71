/**
 * Returns the `code` of a Node.js filesystem error (e.g. "ENOENT"), or null
 * when `err` is not an errno-style error.
 */
export function errnoCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) return null
  return typeof err.code === 'string' ? err.code : null
}

/** Short reason for a failed read, suitable for a one-line diagnostic. */
export function describeFsError(err: unknown): string {
  switch (errnoCode(err)) {
    case 'ENOENT':
      return 'no such file'
    case 'EISDIR':
      return 'is a directory'
    case 'EACCES':
    case 'EPERM':
      return 'permission denied'
    default:
      return err instanceof Error ? err.message : String(err)
  }
}

/**
 * Splits file content into lines on LF. A final newline does not produce a
 * trailing empty line; CR is left in place for the line parser to handle.
 */
export function splitLines(content: string): string[] {
  if (content === '') return []
  const lines = content.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}
