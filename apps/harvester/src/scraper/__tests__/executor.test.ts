import { describe, it, expect } from 'vitest'
import { silentLogger } from '@rowharvest/logger'
import { cityDirectoryScraper, pageTitleScraper } from '../adapters/index.js'
import { LinkDiscovery } from '../discovery/links.js'
import type { DiscoveryStrategy } from '../discovery/types.js'
import {
  ConfigurationError,
  EmptyUrlSetError,
  ErrorThresholdExceededError,
  RunCancelledError,
} from '../errors.js'
import { run } from '../executor.js'
import { RawFetchStrategy, RenderedFetchStrategy } from '../fetch/strategy.js'
import { defineScraper } from '../scraper.js'
import type { Fetcher, HttpFetchResult, RawScraperSpec } from '../types.js'
import { FakeFetcher, FakeSessionProvider, delay, type FakePage } from './support/fakes.js'

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('expected the promise to reject')
}

function rawRun(fetcher: Fetcher) {
  return { fetcher, fetchStrategy: new RawFetchStrategy(fetcher), logger: silentLogger }
}

function titlePage(title: string): string {
  return `<html><head><title>${title}</title></head><body></body></html>`
}

/** Answers 503 to its first request, then serves the wrapped fetcher. */
class FlakyFetcher implements Fetcher {
  private failed = false

  constructor(private readonly inner: Fetcher) {}

  async fetch(url: string): Promise<HttpFetchResult> {
    if (!this.failed) {
      this.failed = true
      return { status: 'error', statusCode: 503, error: 'HTTP 503: Service Unavailable', durationMs: 0 }
    }
    return this.inner.fetch(url)
  }
}

/** Answers every URL after a per-URL delay and tracks parallelism. */
class DelayedFetcher implements Fetcher {
  inFlight = 0
  maxInFlight = 0

  constructor(private readonly delays: Record<string, number>) {}

  async fetch(url: string): Promise<HttpFetchResult> {
    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    await delay(this.delays[url] ?? 0)
    this.inFlight--
    return { status: 'ok', statusCode: 200, body: titlePage(url), finalUrl: url, durationMs: 0 }
  }
}

describe('run', () => {
  describe('end-to-end', () => {
    it('extracts the links of a rendered directory page', async () => {
      const provider = new FakeSessionProvider({
        'https://example.com/sitemap': {
          html: `<div class="row-content"><div class="row"><section>
            <a href="https://example.com/houston-tx">Houston</a>
            <a href="https://example.com/dallas-tx">Dallas</a>
          </section></div></div>`,
        },
      })

      const result = await run(cityDirectoryScraper, ['https://example.com/sitemap'], {
        fetchStrategy: new RenderedFetchStrategy(provider),
        logger: silentLogger,
      })

      expect(result.table).toEqual({
        columns: ['name', 'url'],
        rows: [
          { name: 'Houston', url: 'https://example.com/houston-tx' },
          { name: 'Dallas', url: 'https://example.com/dallas-tx' },
        ],
      })
      expect(result.errorLog).toEqual([])
      expect(provider.live).toBe(0)
      expect(provider.closed).toBe(true)
    })

    it('records a 404 in the error log and returns an empty table', async () => {
      const fetcher = new FakeFetcher({})

      const result = await run(pageTitleScraper, ['https://bad.example/404'], rawRun(fetcher))

      expect(result.table.rows).toEqual([])
      expect(result.errorLog).toEqual([
        { url: 'https://bad.example/404', message: 'HTTP 404: Not Found', kind: 'FetchFailure' },
      ])
      expect(result.stats.urlsFailed).toBe(1)
    })

    it('rejects rows that do not match the declared columns', async () => {
      const spec = defineScraper({
        id: 'cities',
        columns: ['name', 'url'],
        mode: 'raw',
        scrapeHandler: url =>
          url.endsWith('/bad') ? [{ city: 'Houston', url }] : [{ name: 'Dallas', url }],
      })
      const fetcher = new FakeFetcher({ 'https://example.com/bad': '', 'https://example.com/good': '' })

      const result = await run(spec, ['https://example.com/bad', 'https://example.com/good'], rawRun(fetcher))

      expect(result.table.rows).toEqual([{ name: 'Dallas', url: 'https://example.com/good' }])
      expect(result.errorLog).toEqual([
        {
          url: 'https://example.com/bad',
          message: 'Schema violation in row 0: missing columns [name]; unexpected columns [city]',
          kind: 'SchemaViolation',
        },
      ])
    })

    it('rejects an empty column list before anything is fetched', async () => {
      const fetcher = new FakeFetcher({ 'https://example.com/a': '' })
      const spec: RawScraperSpec = { id: 'empty', columns: [], mode: 'raw', scrapeHandler: () => [] }

      await expect(run(spec, ['https://example.com/a'], rawRun(fetcher))).rejects.toBeInstanceOf(
        ConfigurationError
      )
      expect(fetcher.calls).toEqual([])
    })
  })

  describe('per-URL isolation', () => {
    it('keeps going after a failed URL', async () => {
      const fetcher = new FakeFetcher({ 'https://example.com/b': titlePage('B') })

      const result = await run(
        pageTitleScraper,
        ['https://example.com/a', 'https://example.com/b'],
        rawRun(fetcher)
      )

      expect(result.table.rows).toEqual([{ url: 'https://example.com/b', title: 'B' }])
      expect(result.errorLog.map(record => record.url)).toEqual(['https://example.com/a'])
      expect(result.stats).toMatchObject({ urlsResolved: 2, urlsSucceeded: 1, urlsFailed: 1, rowsExtracted: 1 })
    })

    it('resolves with an empty table when every URL fails', async () => {
      const result = await run(
        pageTitleScraper,
        ['https://example.com/a', 'https://example.com/b'],
        rawRun(new FakeFetcher({}))
      )

      expect(result.table.rows).toEqual([])
      expect(result.errorLog).toHaveLength(2)
    })

    it('records handler errors with their original message', async () => {
      const spec = defineScraper({
        id: 'throws',
        columns: ['url'],
        mode: 'raw',
        scrapeHandler: () => {
          throw new RangeError('price out of range')
        },
      })

      const result = await run(
        spec,
        ['https://example.com/a'],
        rawRun(new FakeFetcher({ 'https://example.com/a': '' }))
      )

      expect(result.errorLog).toEqual([
        { url: 'https://example.com/a', message: 'price out of range', kind: 'HandlerFailure' },
      ])
    })

    it('records a ConfigurationError thrown by the handler as a HandlerFailure', async () => {
      const fetcher = new DelayedFetcher({ 'https://example.com/b': 20 })
      const spec = defineScraper({
        id: 'nested-config',
        columns: ['url'],
        mode: 'raw',
        scrapeHandler: url => {
          if (url.endsWith('/a')) throw new ConfigurationError('bad nested config')
          return [{ url }]
        },
      })

      const result = await run(
        spec,
        ['https://example.com/a', 'https://example.com/b', 'https://example.com/c'],
        { ...rawRun(fetcher), concurrency: 2 }
      )

      expect(result.errorLog).toEqual([
        { url: 'https://example.com/a', message: 'bad nested config', kind: 'HandlerFailure' },
      ])
      expect(result.table.rows).toEqual([{ url: 'https://example.com/b' }, { url: 'https://example.com/c' }])
    })

    it('visits a repeated seed once', async () => {
      const fetcher = new FakeFetcher({ 'https://example.com/a': titlePage('A') })

      const result = await run(
        pageTitleScraper,
        ['https://example.com/a', 'https://example.com/a'],
        rawRun(fetcher)
      )

      expect(fetcher.calls).toEqual(['https://example.com/a'])
      expect(result.table.rows).toHaveLength(1)
    })

    it('passes seed extras to the handler', async () => {
      const spec = defineScraper({
        id: 'with-region',
        columns: ['url', 'region'],
        mode: 'raw',
        scrapeHandler: (url, _markup, context) => [{ url, region: context.extras.region ?? null }],
      })

      const result = await run(
        spec,
        [{ url: 'https://example.com/a', extras: { region: 'north' } }, 'https://example.com/b'],
        rawRun(new FakeFetcher({ 'https://example.com/a': '', 'https://example.com/b': '' }))
      )

      expect(result.table.rows).toEqual([
        { url: 'https://example.com/a', region: 'north' },
        { url: 'https://example.com/b', region: null },
      ])
    })
  })

  describe('concurrency', () => {
    it('keeps URL order regardless of completion order', async () => {
      const urls = ['https://example.com/1', 'https://example.com/2', 'https://example.com/3', 'https://example.com/4']
      const fetcher = new DelayedFetcher({ 'https://example.com/1': 40, 'https://example.com/2': 20 })

      const result = await run(pageTitleScraper, urls, { ...rawRun(fetcher), concurrency: 3 })

      expect(result.table.rows.map(row => row.url)).toEqual(urls)
      expect(fetcher.maxInFlight).toBe(3)
    })

    it('never holds more sessions than the concurrency limit', async () => {
      const pages = Object.fromEntries(
        Array.from({ length: 6 }, (_, i): [string, FakePage] => [
          `https://example.com/${i}`,
          { html: '<p>x</p>', delayMs: 5 },
        ])
      )
      const provider = new FakeSessionProvider(pages)
      const spec = defineScraper({
        id: 'echo',
        columns: ['url'],
        mode: 'rendered',
        scrapeHandler: url => [{ url }],
      })

      const result = await run(spec, [...Object.keys(pages), 'https://example.com/missing'], {
        fetchStrategy: new RenderedFetchStrategy(provider),
        concurrency: 2,
        logger: silentLogger,
      })

      expect(result.table.rows).toHaveLength(6)
      expect(result.errorLog).toHaveLength(1)
      expect(provider.maxLive).toBe(2)
      expect(provider.live).toBe(0)
      expect(provider.sessions).toHaveLength(7)
    })
  })

  describe('discovery', () => {
    const listing: DiscoveryStrategy = {
      name: 'listing',
      keepSeeds: false,
      async discover(seedUrl) {
        if (seedUrl.endsWith('/broken')) throw new Error('listing unavailable')
        return ['https://example.com/item-1', 'https://example.com/item-2']
      },
    }

    it('puts discovery failures ahead of URL failures', async () => {
      const fetcher = new FakeFetcher({ 'https://example.com/item-2': titlePage('Item 2') })

      const result = await run(pageTitleScraper, ['https://example.com/broken', 'https://example.com/list'], {
        ...rawRun(fetcher),
        discovery: listing,
      })

      expect(result.errorLog).toEqual([
        { url: 'https://example.com/broken', message: 'listing unavailable', kind: 'DiscoveryFailure' },
        { url: 'https://example.com/item-1', message: 'HTTP 404: Not Found', kind: 'FetchFailure' },
      ])
      expect(result.table.rows).toEqual([{ url: 'https://example.com/item-2', title: 'Item 2' }])
      expect(result.stats).toMatchObject({ urlsDiscovered: 2, urlsSeeded: 0, discoveryFailures: 1 })
    })

    it('rejects with EmptyUrlSetError when discovery leaves nothing', async () => {
      const fetcher = new FakeFetcher({})

      const error = await rejectionOf(
        run(pageTitleScraper, ['https://example.com/broken'], { ...rawRun(fetcher), discovery: listing })
      )

      expect(error).toBeInstanceOf(EmptyUrlSetError)
      if (error instanceof EmptyUrlSetError) {
        expect(error.errorLog.map(record => record.kind)).toEqual(['DiscoveryFailure'])
      }
      expect(fetcher.calls).toEqual([])
    })

    it('still scrapes a kept seed whose link discovery failed', async () => {
      const fetcher = new FlakyFetcher(new FakeFetcher({ 'https://example.com/': titlePage('Home') }))

      const result = await run(pageTitleScraper, ['https://example.com/'], {
        ...rawRun(fetcher),
        discovery: new LinkDiscovery(),
      })

      expect(result.table.rows).toEqual([{ url: 'https://example.com/', title: 'Home' }])
      expect(result.errorLog).toEqual([
        { url: 'https://example.com/', message: 'HTTP 503: Service Unavailable', kind: 'DiscoveryFailure' },
      ])
      expect(result.stats).toMatchObject({ urlsSeeded: 1, urlsDiscovered: 0, discoveryFailures: 1 })
    })

    it('accepts discovery without seeds as configuration', async () => {
      await expect(
        run(pageTitleScraper, [], { ...rawRun(new FakeFetcher({})), discovery: listing })
      ).rejects.toBeInstanceOf(EmptyUrlSetError)
    })
  })

  describe('error threshold', () => {
    const urls = ['https://example.com/f1', 'https://example.com/f2', 'https://example.com/f3', 'https://example.com/ok']

    it('stops the run once failures pass the threshold', async () => {
      const fetcher = new FakeFetcher({ 'https://example.com/ok': titlePage('OK') })

      const error = await rejectionOf(
        run(pageTitleScraper, urls, { ...rawRun(fetcher), errorThreshold: 0.5 })
      )

      expect(error).toBeInstanceOf(ErrorThresholdExceededError)
      if (error instanceof ErrorThresholdExceededError) {
        expect(error.message).toBe('Errors passed the 50% threshold')
        expect(error.errorLog).toHaveLength(3)
      }
      expect(fetcher.calls).not.toContain('https://example.com/ok')
    })

    it('resolves when failures stay at the threshold', async () => {
      const fetcher = new FakeFetcher({
        'https://example.com/f3': titlePage('F3'),
        'https://example.com/ok': titlePage('OK'),
      })

      const result = await run(pageTitleScraper, urls, { ...rawRun(fetcher), errorThreshold: 0.5 })

      expect(result.errorLog).toHaveLength(2)
      expect(result.table.rows).toHaveLength(2)
    })

    it('rejects on the first failure with a zero threshold', async () => {
      await expect(
        run(pageTitleScraper, urls, { ...rawRun(new FakeFetcher({})), errorThreshold: 0 })
      ).rejects.toThrow('Errors passed the 0% threshold')
    })
  })

  describe('cancellation', () => {
    it('rejects with what was gathered before the signal fired', async () => {
      const provider = new FakeSessionProvider({
        'https://example.com/fast': { html: '<p>fast</p>' },
        'https://example.com/slow': { html: '<p>slow</p>', delayMs: 5000 },
        'https://example.com/never': { html: '<p>never</p>' },
      })
      const spec = defineScraper({ id: 'echo', columns: ['url'], mode: 'rendered', scrapeHandler: url => [{ url }] })
      const controller = new AbortController()
      setTimeout(() => controller.abort(), 30)

      const error = await rejectionOf(
        run(spec, ['https://example.com/fast', 'https://example.com/slow', 'https://example.com/never'], {
          fetchStrategy: new RenderedFetchStrategy(provider),
          signal: controller.signal,
          logger: silentLogger,
        })
      )

      expect(error).toBeInstanceOf(RunCancelledError)
      if (error instanceof RunCancelledError) {
        expect(error.partial.table.rows).toEqual([{ url: 'https://example.com/fast' }])
        expect(error.partial.errorLog).toEqual([])
      }
      expect(provider.opened).toEqual(['https://example.com/fast', 'https://example.com/slow'])
      expect(provider.live).toBe(0)
      expect(provider.closed).toBe(true)
    })

    it('rejects without fetching when the signal has already fired', async () => {
      const fetcher = new FakeFetcher({ 'https://example.com/a': titlePage('A') })
      const controller = new AbortController()
      controller.abort()

      await expect(
        run(pageTitleScraper, ['https://example.com/a'], { ...rawRun(fetcher), signal: controller.signal })
      ).rejects.toBeInstanceOf(RunCancelledError)
      expect(fetcher.calls).toEqual([])
    })
  })

  describe('dropDuplicates', () => {
    it('drops repeated rows on the key columns', async () => {
      const spec = defineScraper({
        id: 'constant',
        columns: ['url', 'title'],
        mode: 'raw',
        scrapeHandler: () => [{ url: 'https://example.com/shared', title: 'Shared' }],
      })
      const fetcher = new FakeFetcher({ 'https://example.com/a': '', 'https://example.com/b': '' })

      const result = await run(spec, ['https://example.com/a', 'https://example.com/b'], {
        ...rawRun(fetcher),
        dropDuplicates: ['url'],
      })

      expect(result.table.rows).toEqual([{ url: 'https://example.com/shared', title: 'Shared' }])
      expect(result.stats.duplicatesDropped).toBe(1)
    })

    it('rejects unknown key columns before fetching', async () => {
      const fetcher = new FakeFetcher({})

      await expect(
        run(pageTitleScraper, ['https://example.com/a'], { ...rawRun(fetcher), dropDuplicates: ['sku'] })
      ).rejects.toThrow('Unknown dropDuplicates column(s): sku')
      expect(fetcher.calls).toEqual([])
    })
  })

  describe('configuration', () => {
    it('rejects a run without seeds or discovery', async () => {
      await expect(run(pageTitleScraper, [], rawRun(new FakeFetcher({})))).rejects.toThrow(
        'No seed URLs given and no discovery strategy configured'
      )
    })

    it('rejects a malformed seed', async () => {
      await expect(
        run(pageTitleScraper, ['https://example.com/a', 'example.com'], rawRun(new FakeFetcher({})))
      ).rejects.toThrow('Invalid seed URL: example.com')
    })

    it('rejects a fetch strategy for the wrong mode', async () => {
      const provider = new FakeSessionProvider({})

      await expect(
        run(pageTitleScraper, ['https://example.com/a'], {
          fetchStrategy: new RenderedFetchStrategy(provider),
          logger: silentLogger,
        })
      ).rejects.toThrow("Scraper 'page-title' expects raw documents but the fetch strategy produces rendered")
      expect(provider.sessions).toHaveLength(0)
    })

    it('rejects an out-of-range threshold', async () => {
      await expect(
        run(pageTitleScraper, ['https://example.com/a'], {
          ...rawRun(new FakeFetcher({})),
          errorThreshold: 1.5,
        })
      ).rejects.toBeInstanceOf(ConfigurationError)
    })

    it('uses the run id it is given', async () => {
      const result = await run(pageTitleScraper, ['https://example.com/a'], {
        ...rawRun(new FakeFetcher({ 'https://example.com/a': titlePage('A') })),
        runId: 'run-test-1',
      })

      expect(result.stats.runId).toBe('run-test-1')
    })
  })
})
