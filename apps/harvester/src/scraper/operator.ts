/**
 * Scraper Operator
 *
 * The unit of work a host scheduler calls: check the sink, run the scrapers,
 * store what came out. Stored rows carry the run's start date.
 */

import { randomUUID } from 'crypto'
import type { ILogger } from '@rowharvest/logger'
import { loggers } from '../config/logger.js'
import { EmptyResultsError } from './errors.js'
import { runPipeline, type PipelineOptions } from './pipeline.js'
import type { ResultSink, SinkContext } from './sinks/types.js'
import type { ScraperSpec, SeedInput, Table } from './types.js'

/** Column stamped on every stored row with the run's start date */
export const SCRAPED_DATE_COLUMN = 'scraped_date'

export interface ScraperOperatorConfig extends Omit<PipelineOptions, 'signal' | 'runId' | 'logger'> {
  taskId: string
  /** One scraper, or several chained through their url column */
  scrapers: readonly ScraperSpec[]
  seeds: readonly SeedInput[]
  sink: ResultSink
  /** Store the error log through the sink (default: false) */
  saveErrors?: boolean
  /** Fail when the final table is empty (default: true) */
  failIfEmptyResults?: boolean
}

export interface RunSummary {
  taskId: string
  runId: string
  /** ISO 8601 */
  startDate: string
  durationMs: number
  stages: number
  urlsResolved: number
  rows: number
  errors: number
  resultsStored: boolean
  errorsStored: boolean
}

function withScrapedDate(table: Table, startDate: string): Table {
  const columns = table.columns.includes(SCRAPED_DATE_COLUMN)
    ? table.columns
    : [...table.columns, SCRAPED_DATE_COLUMN]
  return {
    columns,
    rows: table.rows.map(row => ({ ...row, [SCRAPED_DATE_COLUMN]: startDate })),
  }
}

export class ScraperOperator {
  private readonly log: ILogger

  constructor(
    private readonly config: ScraperOperatorConfig,
    logger: ILogger = loggers.executor
  ) {
    this.log = logger.child({ taskId: config.taskId })
  }

  /**
   * @throws EmptyResultsError when nothing was scraped and failIfEmptyResults is on
   */
  async execute(signal?: AbortSignal): Promise<RunSummary> {
    const startedAt = Date.now()
    const { taskId, scrapers, seeds, sink, saveErrors, failIfEmptyResults, ...pipelineOptions } = this.config
    const context: SinkContext = {
      runId: randomUUID(),
      startDate: new Date(startedAt).toISOString(),
      taskId,
    }

    await sink.testConnection()
    this.log.debug('Sink connection ok')

    const result = await runPipeline(scrapers, seeds, {
      ...pipelineOptions,
      runId: context.runId,
      signal,
      logger: this.log,
    })

    let errorsStored = false
    if ((saveErrors ?? false) && result.errorLog.length > 0) {
      await sink.storeErrors(result.errorLog, context)
      errorsStored = true
    }

    let resultsStored = false
    if (result.table.rows.length > 0) {
      await sink.storeResults(withScrapedDate(result.table, context.startDate), context)
      resultsStored = true
    } else if (failIfEmptyResults ?? true) {
      this.log.error('No results from scraper run', { runId: context.runId, errors: result.errorLog.length })
      throw new EmptyResultsError()
    } else {
      this.log.warn('No results from scraper run', { runId: context.runId })
    }

    const summary: RunSummary = {
      taskId,
      runId: context.runId,
      startDate: context.startDate,
      durationMs: Date.now() - startedAt,
      stages: result.stages.length,
      urlsResolved: result.stages.reduce((total, stage) => total + stage.urlsResolved, 0),
      rows: result.table.rows.length,
      errors: result.errorLog.length,
      resultsStored,
      errorsStored,
    }
    this.log.info('Task completed', { ...summary })
    return summary
  }
}
