/**
 * Plain-text table rendering for terminal output.
 */

export interface TableColumn<Row> {
  header: string
  value: (row: Row) => string
}

/**
 * Render rows as aligned columns separated by ` | `, with a `-+-` rule
 * under the header. Every column is as wide as its longest cell.
 */
export function formatTable<Row>(columns: readonly TableColumn<Row>[], rows: readonly Row[]): string {
  const cells = rows.map((row) => columns.map((column) => column.value(row)))
  const widths = columns.map((column, i) =>
    cells.reduce((width, line) => Math.max(width, (line[i] ?? '').length), column.header.length)
  )
  const renderLine = (values: readonly string[]): string =>
    values.map((value, i) => value.padEnd(widths[i] ?? value.length)).join(' | ')

  return [
    renderLine(columns.map((column) => column.header)),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...cells.map(renderLine),
  ].join('\n')
}
