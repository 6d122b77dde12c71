/**
 * Minimal boxed table layout for the text renderer.
 *
 *   +-------+-------+
 *   | Level | Count |
 *   +-------+-------+
 *   | INFO  | 3     |
 *   +-------+-------+
 *
 * Cells are left-aligned; each column is as wide as its longest cell.
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((header, col) =>
    rows.reduce((max, row) => Math.max(max, (row[col] ?? '').length), header.length),
  )

  const border = `+${widths.map((w) => '-'.repeat(w + 2)).join('+')}+`
  const line = (cells: readonly string[]): string =>
    `| ${widths.map((w, col) => (cells[col] ?? '').padEnd(w)).join(' | ')} |`

  return [border, line(headers), border, ...rows.map(line), border]
}
