/**
 * CLI table rendering.
 */

export type ColumnAlign = 'left' | 'right'

export interface TableColumn {
  header: string
  /** Row property to read */
  key: string
  /** Numbers read better right-aligned (default: left) */
  align?: ColumnAlign
}

function pad(value: string, width: number, align: ColumnAlign): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width)
}

/**
 * Render rows as aligned columns separated by ` | `, with a dashed rule
 * under the header. Each column is as wide as its widest cell.
 */
export function formatTable(columns: readonly TableColumn[], rows: readonly Record<string, string>[]): string {
  const widths = columns.map((column) =>
    rows.reduce((max, row) => Math.max(max, (row[column.key] ?? '').length), column.header.length),
  )

  const render = (cell: (column: TableColumn) => string): string =>
    columns.map((column, i) => pad(cell(column), widths[i] ?? 0, column.align ?? 'left')).join(' | ')

  const rule = widths.map((w) => '-'.repeat(w)).join('-+-')
  return [render((c) => c.header), rule, ...rows.map((row) => render((c) => row[c.key] ?? ''))].join('\n')
}
