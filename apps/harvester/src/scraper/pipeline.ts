/**
 * Scraper Pipeline
 *
 * Runs scrapers in sequence. The first stage gets the seeds (and discovery);
 * every later stage reads the previous table: its `url` column gives the
 * URLs and every other column travels along as extras.
 */

import { loggers } from '../config/logger.js'
import { ConfigurationError, EmptyUrlSetError } from './errors.js'
import { run, type RunOptions } from './executor.js'
import type { FetchStrategy } from './fetch/strategy.js'
import { assertDedupeColumns } from './process/dedupe.js'
import { assertValidScraperSpec } from './scraper.js'
import type { ErrorRecord, RunStats, Scalar, ScraperSpec, SeedInput, Table } from './types.js'
import { isValidUrl } from './utils/url.js'

export const URL_COLUMN = 'url'

export interface PipelineOptions extends Omit<RunOptions, 'fetchStrategy'> {
  /** Strategy per stage; stages without one get the default for their mode */
  fetchStrategyFor?: (spec: ScraperSpec, stageIndex: number) => FetchStrategy | undefined
}

export interface PipelineResult {
  /** The last stage's table */
  table: Table
  /** Every stage's error log, in stage order */
  errorLog: ErrorRecord[]
  stages: RunStats[]
}

/**
 * Turn a stage's output into the next stage's seeds. Rows without a usable
 * URL are skipped.
 */
export function tableToSeeds(table: Table): SeedInput[] {
  const log = loggers.executor
  const seeds: SeedInput[] = []

  for (const row of table.rows) {
    const url = row[URL_COLUMN]
    if (typeof url !== 'string' || !isValidUrl(url)) {
      log.warn('Skipping row without a usable url', { url: String(url) })
      continue
    }

    const extras: Record<string, Scalar> = {}
    for (const column of table.columns) {
      if (column !== URL_COLUMN) {
        extras[column] = row[column] ?? null
      }
    }
    seeds.push({ url, extras })
  }

  return seeds
}

/**
 * @throws ConfigurationError before any fetch when the chain cannot work
 */
function validatePipeline(scrapers: readonly ScraperSpec[], options: PipelineOptions): void {
  if (scrapers.length === 0) {
    throw new ConfigurationError('Pipeline needs at least one scraper')
  }

  scrapers.forEach((spec, index) => {
    assertValidScraperSpec(spec)
    const previous = scrapers[index - 1]
    if (previous && !previous.columns.includes(URL_COLUMN)) {
      throw new ConfigurationError(
        `Stage ${index + 1} ('${spec.id}') reads URLs from '${previous.id}', which has no '${URL_COLUMN}' column`
      )
    }
  })

  const last = scrapers[scrapers.length - 1]
  if (options.dropDuplicates && last) {
    assertDedupeColumns(last.columns, options.dropDuplicates)
  }
}

export async function runPipeline(
  scrapers: readonly ScraperSpec[],
  seeds: readonly SeedInput[],
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  validatePipeline(scrapers, options)

  const { fetchStrategyFor, dropDuplicates, discovery, ...shared } = options
  const errorLog: ErrorRecord[] = []
  const stages: RunStats[] = []
  let stageSeeds: readonly SeedInput[] = seeds
  let table: Table | null = null

  for (const [index, spec] of scrapers.entries()) {
    const isFirst = index === 0
    const isLast = index === scrapers.length - 1

    if (!isFirst && stageSeeds.length === 0) {
      loggers.executor.error('Pipeline stage has no input URLs', { stage: index + 1, scraperId: spec.id })
      throw new EmptyUrlSetError(errorLog)
    }

    const result = await run(spec, stageSeeds, {
      ...shared,
      discovery: isFirst ? discovery : undefined,
      dropDuplicates: isLast ? dropDuplicates : undefined,
      fetchStrategy: fetchStrategyFor?.(spec, index),
    })

    errorLog.push(...result.errorLog)
    stages.push(result.stats)
    table = result.table
    stageSeeds = tableToSeeds(result.table)
  }

  if (!table) {
    throw new ConfigurationError('Pipeline needs at least one scraper')
  }

  return { table, errorLog, stages }
}
