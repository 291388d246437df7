/**
 * Writes results to the structured log. Nothing to connect to.
 */

import type { ILogger } from '@rowharvest/logger'
import { loggers } from '../../config/logger.js'
import type { ErrorRecord, Table } from '../types.js'
import type { ResultSink, SinkContext } from './types.js'

export class LogResultSink implements ResultSink {
  constructor(private readonly log: ILogger = loggers.sink) {}

  async testConnection(): Promise<void> {}

  async storeResults(table: Table, context: SinkContext): Promise<void> {
    this.log.info('Results', { ...context, rows: table.rows.length, columns: table.columns.join(',') })
    for (const row of table.rows) {
      this.log.info('Row', { taskId: context.taskId, row })
    }
  }

  async storeErrors(errors: readonly ErrorRecord[], context: SinkContext): Promise<void> {
    for (const error of errors) {
      this.log.warn('Scrape error', { ...context, url: error.url, kind: error.kind, error: error.message })
    }
  }
}
