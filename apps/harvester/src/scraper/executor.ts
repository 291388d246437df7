/**
 * Executor
 *
 * Runs one scraper over one URL set:
 * 1. Validate configuration (nothing is fetched before this passes)
 * 2. Resolve the URL set (seeds plus discovery)
 * 3. Fetch each URL, call the handler, validate its rows
 * 4. Concatenate rows and failures in URL order
 *
 * A failure on one URL is recorded and never reaches any other URL. Only
 * configuration errors, an empty URL set, the error threshold and
 * cancellation reject the run.
 */

import { randomUUID } from 'crypto'
import type { ILogger } from '@rowharvest/logger'
import { loggers } from '../config/logger.js'
import { loadSettings, type HarvestSettings } from '../config/settings.js'
import { normalizeSeeds, resolveUrlSet } from './discovery/resolve-urls.js'
import type { DiscoveryStrategy } from './discovery/types.js'
import {
  ConfigurationError,
  EmptyUrlSetError,
  ErrorThresholdExceededError,
  FetchFailure,
  HandlerFailure,
  RunCancelledError,
  UrlFailure,
  describeThrown,
} from './errors.js'
import { createFetchStrategy, createHttpFetcher } from './fetch/factory.js'
import type { FetchStrategy } from './fetch/strategy.js'
import { deriveRunStatus, recordRunCompleted, type RunStatus } from './metrics.js'
import { assertDedupeColumns, dropDuplicateRows } from './process/dedupe.js'
import { validateRows } from './process/validator.js'
import { assertValidScraperSpec } from './scraper.js'
import type {
  ErrorRecord,
  ExecutionOutcome,
  Fetcher,
  FetchResult,
  Row,
  RunResult,
  RunStats,
  ScrapeContext,
  ScraperSpec,
  SeedInput,
  Table,
  UrlEntry,
} from './types.js'

export interface RunOptions {
  discovery?: DiscoveryStrategy

  /** Parallel URLs (default: HARVEST_CONCURRENCY, else 1) */
  concurrency?: number

  /** Fraction of the URL set allowed to fail before the run is stopped */
  errorThreshold?: number

  /** Relaunch the browser every n URLs (rendered mode, default strategy only) */
  resetSessionAfter?: number

  /** Drop rows repeating an earlier row on these columns */
  dropDuplicates?: readonly string[]

  /** Cancels the run. In-flight fetches are abandoned. */
  signal?: AbortSignal

  runId?: string

  /** Overrides for environment settings */
  settings?: Partial<HarvestSettings>

  /**
   * Fetch strategy for the scraper's mode. Built from settings when omitted.
   * Once the run has passed validation it owns the strategy and closes it
   * when it ends.
   */
  fetchStrategy?: FetchStrategy

  /** HTTP client for raw fetches and discovery */
  fetcher?: Fetcher

  logger?: ILogger
}

/**
 * Validate everything that can be checked without the network.
 *
 * @throws ConfigurationError
 */
function validateRun(spec: ScraperSpec, seeds: readonly SeedInput[], options: RunOptions): HarvestSettings {
  assertValidScraperSpec(spec)

  const settings = loadSettings({
    ...options.settings,
    concurrency: options.concurrency,
    errorThreshold: options.errorThreshold,
    resetSessionAfter: options.resetSessionAfter,
  })

  if (seeds.length === 0 && !options.discovery) {
    throw new ConfigurationError('No seed URLs given and no discovery strategy configured')
  }
  normalizeSeeds(seeds)

  if (options.dropDuplicates) {
    assertDedupeColumns(spec.columns, options.dropDuplicates)
  }

  if (options.fetchStrategy && options.fetchStrategy.mode !== spec.mode) {
    throw new ConfigurationError(
      `Scraper '${spec.id}' expects ${spec.mode} documents but the fetch strategy produces ${options.fetchStrategy.mode}`
    )
  }

  return settings
}

/**
 * Bind the handler to the payload matching the scraper's mode. A payload of
 * the other mode is a FetchFailure for the URL; the handler is not called.
 */
function bindHandler(
  spec: ScraperSpec,
  url: string,
  result: FetchResult
): (context: ScrapeContext) => Row[] | Promise<Row[]> {
  if (spec.mode === 'raw' && result.mode === 'raw') {
    const markup = result.rawMarkup
    return context => spec.scrapeHandler(url, markup, context)
  }
  if (spec.mode === 'rendered' && result.mode === 'rendered') {
    const handle = result.renderedHandle
    return context => spec.scrapeHandler(url, handle, context)
  }
  throw new FetchFailure(url, `Scraper '${spec.id}' expects ${spec.mode} documents but received ${result.mode}`)
}

function buildTable(columns: readonly string[], outcomes: Array<ExecutionOutcome | undefined>): Table {
  const rows: Row[] = []
  for (const outcome of outcomes) {
    if (outcome?.ok) {
      rows.push(...outcome.rows)
    }
  }
  return { columns: [...columns], rows }
}

function buildErrorLog(
  discoveryFailures: ErrorRecord[],
  outcomes: Array<ExecutionOutcome | undefined>
): ErrorRecord[] {
  const errorLog = [...discoveryFailures]
  for (const outcome of outcomes) {
    if (outcome && !outcome.ok) {
      errorLog.push(outcome.error)
    }
  }
  return errorLog
}

class RunExecution {
  private readonly controller = new AbortController()
  private readonly log: ILogger
  private readonly runId: string
  private readonly startedAt = Date.now()

  constructor(
    private readonly spec: ScraperSpec,
    private readonly seeds: readonly SeedInput[],
    private readonly options: RunOptions,
    private readonly settings: HarvestSettings
  ) {
    this.runId = options.runId ?? randomUUID()
    this.log = (options.logger ?? loggers.executor).child({ runId: this.runId, scraperId: spec.id })
  }

  async execute(): Promise<RunResult> {
    const external = this.options.signal
    const onAbort = () => this.controller.abort(external?.reason)
    if (external?.aborted) {
      throw new RunCancelledError({ table: buildTable(this.spec.columns, []), errorLog: [] }, external.reason)
    }
    external?.addEventListener('abort', onAbort, { once: true })

    const fetcher = this.options.fetcher ?? createHttpFetcher(this.settings, loggers.fetch)
    const strategy =
      this.options.fetchStrategy ?? createFetchStrategy(this.spec.mode, this.settings, loggers.fetch, fetcher)

    try {
      return await this.executeWith(strategy, fetcher)
    } finally {
      external?.removeEventListener('abort', onAbort)
      try {
        await strategy.close()
      } catch (error) {
        this.log.warn('Failed to release fetch resources', { error: describeThrown(error) })
      }
    }
  }

  private async executeWith(strategy: FetchStrategy, fetcher: Fetcher): Promise<RunResult> {
    const resolved = await resolveUrlSet(this.seeds, {
      discovery: this.options.discovery,
      fetcher,
      logger: loggers.discovery.child({ runId: this.runId }),
      signal: this.controller.signal,
    })

    if (this.isCancelled()) {
      this.record('CANCELLED', resolved.urls.length, [], resolved.failures.length, 0)
      throw new RunCancelledError(
        { table: buildTable(this.spec.columns, []), errorLog: resolved.failures },
        this.options.signal?.reason
      )
    }

    if (resolved.urls.length === 0) {
      this.log.error('No URLs to fetch after discovery', { discoveryFailures: resolved.failures.length })
      throw new EmptyUrlSetError(resolved.failures)
    }

    const concurrency = Math.min(this.settings.concurrency, resolved.urls.length)
    this.log.info('Run started', {
      mode: this.spec.mode,
      urls: resolved.urls.length,
      seeded: resolved.seeded,
      discovered: resolved.discovered,
      concurrency,
    })

    const { outcomes, thresholdExceeded } = await this.processAll(strategy, resolved.urls, concurrency)
    const errorLog = buildErrorLog(resolved.failures, outcomes)
    let table = buildTable(this.spec.columns, outcomes)

    if (thresholdExceeded && this.settings.errorThreshold !== undefined) {
      this.record('FAILED', resolved.urls.length, outcomes, resolved.failures.length, table.rows.length)
      this.log.error('Error threshold exceeded', { threshold: this.settings.errorThreshold })
      throw new ErrorThresholdExceededError(this.settings.errorThreshold, errorLog)
    }

    if (this.isCancelled()) {
      this.record('CANCELLED', resolved.urls.length, outcomes, resolved.failures.length, table.rows.length)
      throw new RunCancelledError({ table, errorLog }, this.options.signal?.reason)
    }

    let duplicatesDropped = 0
    if (this.options.dropDuplicates) {
      const deduped = dropDuplicateRows(table, this.options.dropDuplicates)
      table = deduped.table
      duplicatesDropped = deduped.dropped
      this.log.info('Duplicate rows dropped', {
        columns: this.options.dropDuplicates.join(','),
        dropped: duplicatesDropped,
      })
    }

    const stats = this.record(
      deriveRunStatus(
        outcomes.filter(outcome => outcome?.ok).length,
        outcomes.filter(outcome => outcome && !outcome.ok).length
      ),
      resolved.urls.length,
      outcomes,
      resolved.failures.length,
      table.rows.length,
      {
        urlsSeeded: resolved.seeded,
        urlsDiscovered: resolved.discovered,
        duplicatesDropped,
      }
    )

    return { table, errorLog, stats }
  }

  /**
   * Bounded worker pool. Each worker takes the next URL index; outcomes are
   * stored by index so output order never depends on completion order.
   */
  private async processAll(
    strategy: FetchStrategy,
    urls: readonly UrlEntry[],
    concurrency: number
  ): Promise<{ outcomes: Array<ExecutionOutcome | undefined>; thresholdExceeded: boolean }> {
    const outcomes: Array<ExecutionOutcome | undefined> = new Array<ExecutionOutcome | undefined>(urls.length)
    const threshold = this.settings.errorThreshold
    const failureLimit = threshold === undefined ? Infinity : threshold * urls.length
    let nextIndex = 0
    let failures = 0
    let thresholdExceeded = false

    const worker = async (): Promise<void> => {
      while (!this.controller.signal.aborted) {
        const index = nextIndex++
        const entry = urls[index]
        if (entry === undefined) return

        const outcome = await this.processUrl(strategy, entry)

        // Failures caused by the abort itself are not the URL's fault
        if (this.controller.signal.aborted && !outcome.ok) return

        outcomes[index] = outcome
        if (!outcome.ok) {
          failures++
          if (failures > failureLimit && !thresholdExceeded) {
            thresholdExceeded = true
            this.controller.abort()
          }
        }
      }
    }

    // A worker that throws stops the others; all of them settle before the strategy is closed
    const settled = await Promise.allSettled(
      Array.from({ length: concurrency }, () =>
        worker().catch((error: unknown) => {
          this.controller.abort(error)
          throw error
        })
      )
    )
    for (const result of settled) {
      if (result.status === 'rejected') throw result.reason
    }
    return { outcomes, thresholdExceeded }
  }

  private async processUrl(strategy: FetchStrategy, entry: UrlEntry): Promise<ExecutionOutcome> {
    const startTime = Date.now()
    const context: ScrapeContext = Object.freeze({
      extras: entry.extras,
      logger: this.log.child({ url: entry.url }),
      signal: this.controller.signal,
    })

    try {
      const rows = await strategy.withDocument(
        entry.url,
        async result => {
          const handler = bindHandler(this.spec, entry.url, result)
          let output: unknown
          try {
            output = await handler(context)
          } catch (error) {
            throw new HandlerFailure(entry.url, error)
          }
          return validateRows(entry.url, this.spec.columns, output)
        },
        this.controller.signal
      )

      this.log.debug('URL processed', { url: entry.url, rows: rows.length })
      return { ok: true, url: entry.url, rows, durationMs: Date.now() - startTime }
    } catch (error) {
      const failure =
        error instanceof UrlFailure ? error : new FetchFailure(entry.url, describeThrown(error), undefined, error)
      if (!this.controller.signal.aborted) {
        this.log.warn('URL failed', { url: entry.url, kind: failure.kind, error: failure.message })
      }
      return { ok: false, url: entry.url, error: failure.toRecord(), durationMs: Date.now() - startTime }
    }
  }

  private isCancelled(): boolean {
    return this.options.signal?.aborted ?? false
  }

  private record(
    status: RunStatus,
    urlsResolved: number,
    outcomes: Array<ExecutionOutcome | undefined>,
    discoveryFailures: number,
    rowsExtracted: number,
    extra: Partial<Pick<RunStats, 'urlsSeeded' | 'urlsDiscovered' | 'duplicatesDropped'>> = {}
  ): RunStats {
    const urlsSucceeded = outcomes.filter(outcome => outcome?.ok).length
    const urlsFailed = outcomes.filter(outcome => outcome && !outcome.ok).length
    const durationMs = Date.now() - this.startedAt

    recordRunCompleted(
      {
        runId: this.runId,
        scraperId: this.spec.id,
        status,
        urlsResolved,
        urlsSucceeded,
        urlsFailed,
        discoveryFailures,
        rowsExtracted,
        failureRate: urlsResolved > 0 ? urlsFailed / urlsResolved : 0,
        durationMs,
      },
      this.log
    )

    return {
      runId: this.runId,
      urlsResolved,
      urlsSeeded: extra.urlsSeeded ?? 0,
      urlsDiscovered: extra.urlsDiscovered ?? 0,
      urlsSucceeded,
      urlsFailed,
      rowsExtracted,
      duplicatesDropped: extra.duplicatesDropped ?? 0,
      discoveryFailures,
      durationMs,
    }
  }
}

/**
 * Run a scraper.
 *
 * @param spec - Scraper to run
 * @param seeds - Seed URLs, optionally with extras for the handler
 * @param options - Discovery, concurrency, threshold and capability overrides
 * @returns The table and error log
 * @throws ConfigurationError before anything is fetched
 * @throws EmptyUrlSetError when discovery leaves nothing to fetch
 * @throws ErrorThresholdExceededError when too many URLs fail
 * @throws RunCancelledError when options.signal fires
 */
export async function run(
  spec: ScraperSpec,
  seeds: readonly SeedInput[],
  options: RunOptions = {}
): Promise<RunResult> {
  const settings = validateRun(spec, seeds, options)
  return new RunExecution(spec, seeds, options, settings).execute()
}
