/**
 * Result Sinks
 *
 * Where a finished run's table and error log go.
 */

import type { ErrorRecord, Table } from '../types.js'

/** Identifies the unit of work the output belongs to. */
export interface SinkContext {
  runId: string
  /** ISO 8601 */
  startDate: string
  taskId: string
}

export interface ResultSink {
  /** Fails when the destination cannot be written. Called before any scraping. */
  testConnection(): Promise<void>
  storeResults(table: Table, context: SinkContext): Promise<void>
  storeErrors(errors: readonly ErrorRecord[], context: SinkContext): Promise<void>
}
