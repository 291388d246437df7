/**
 * Duplicate-row dropping on a subset of columns. The first row of each key
 * is kept and order is preserved.
 */

import { ConfigurationError } from '../errors.js'
import type { Row, Table } from '../types.js'

export interface DedupeResult {
  table: Table
  dropped: number
}

/**
 * @throws ConfigurationError when a key column is not part of the table
 */
export function assertDedupeColumns(columns: readonly string[], keyColumns: readonly string[]): void {
  const unknown = keyColumns.filter(column => !columns.includes(column))
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown dropDuplicates column(s): ${unknown.join(', ')}`)
  }
  if (keyColumns.length === 0) {
    throw new ConfigurationError('dropDuplicates needs at least one column')
  }
}

export function dropDuplicateRows(table: Table, keyColumns: readonly string[]): DedupeResult {
  assertDedupeColumns(table.columns, keyColumns)

  const seen = new Set<string>()
  const rows: Row[] = []
  for (const row of table.rows) {
    const key = JSON.stringify(keyColumns.map(column => row[column]))
    if (seen.has(key)) continue
    seen.add(key)
    rows.push(row)
  }

  return {
    table: { columns: table.columns, rows },
    dropped: table.rows.length - rows.length,
  }
}
