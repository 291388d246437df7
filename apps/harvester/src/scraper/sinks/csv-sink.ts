/**
 * CSV file sink
 *
 * The table goes to `path`, the error log to a sibling `<name>.errors.csv`
 * with columns run_id,start_date,task_id,message. Fields are quoted per
 * RFC 4180 when they hold a comma, quote or line break.
 */

import { access, mkdir, writeFile } from 'node:fs/promises'
import { constants } from 'node:fs'
import { dirname, extname, join, basename } from 'node:path'
import type { ILogger } from '@rowharvest/logger'
import { loggers } from '../../config/logger.js'
import type { ErrorRecord, Scalar, Table } from '../types.js'
import type { ResultSink, SinkContext } from './types.js'

export const ERROR_COLUMNS = ['run_id', 'start_date', 'task_id', 'message'] as const

export function csvEscape(value: Scalar | undefined): string {
  if (value === null || value === undefined) return ''
  const str = String(value)
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`
  }
  return str
}

export function toCsv(headers: readonly string[], rows: ReadonlyArray<ReadonlyArray<Scalar | undefined>>): string {
  const lines = [headers.map(csvEscape).join(',')]
  for (const row of rows) {
    lines.push(row.map(csvEscape).join(','))
  }
  return lines.join('\r\n') + '\r\n'
}

export function errorsPathFor(resultsPath: string): string {
  const ext = extname(resultsPath)
  return join(dirname(resultsPath), `${basename(resultsPath, ext)}.errors.csv`)
}

export class CsvFileResultSink implements ResultSink {
  readonly errorsPath: string

  constructor(
    readonly path: string,
    private readonly log: ILogger = loggers.sink
  ) {
    this.errorsPath = errorsPathFor(path)
  }

  async testConnection(): Promise<void> {
    const directory = dirname(this.path)
    await mkdir(directory, { recursive: true })
    await access(directory, constants.W_OK)
  }

  async storeResults(table: Table, context: SinkContext): Promise<void> {
    const rows = table.rows.map(row => table.columns.map(column => row[column]))
    await writeFile(this.path, toCsv(table.columns, rows), 'utf-8')
    this.log.info('Results written', { ...context, path: this.path, rows: rows.length })
  }

  async storeErrors(errors: readonly ErrorRecord[], context: SinkContext): Promise<void> {
    const rows = errors.map(error => [
      context.runId,
      context.startDate,
      context.taskId,
      `${error.url}: ${error.message}`,
    ])
    await writeFile(this.errorsPath, toCsv(ERROR_COLUMNS, rows), 'utf-8')
    this.log.info('Errors written', { ...context, path: this.errorsPath, errors: rows.length })
  }
}
