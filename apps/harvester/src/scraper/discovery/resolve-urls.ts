/**
 * URL Set Resolution
 *
 * URL set = seeds (when the strategy keeps them) followed by discovered URLs
 * in production order, de-duplicated on the exact string with the first
 * occurrence winning. Each distinct seed is expanded once. The result is
 * frozen.
 */

import type { ILogger } from '@rowharvest/logger'
import { ConfigurationError, FetchFailure, type DiscoveryFailure } from '../errors.js'
import type { ErrorRecord, Fetcher, Scalar, SeedInput, UrlEntry } from '../types.js'
import { isValidUrl } from '../utils/url.js'
import { toDiscoveryFailure } from './chain.js'
import type { DiscoveryContext, DiscoveryStrategy } from './types.js'

export interface ResolvedUrlSet {
  urls: readonly UrlEntry[]
  /** Discovery failures, in seed order */
  failures: ErrorRecord[]
  seeded: number
  discovered: number
}

export interface ResolveOptions {
  discovery?: DiscoveryStrategy
  fetcher: Fetcher
  logger: ILogger
  signal: AbortSignal
}

const NO_EXTRAS: Readonly<Record<string, Scalar>> = Object.freeze({})

/**
 * Turn caller input into seed entries.
 *
 * @throws ConfigurationError for a seed that is not an absolute http(s) URL
 */
export function normalizeSeeds(seeds: readonly SeedInput[]): UrlEntry[] {
  return seeds.map((seed): UrlEntry => {
    const url = typeof seed === 'string' ? seed : seed.url
    if (!isValidUrl(url)) {
      throw new ConfigurationError(`Invalid seed URL: ${url}`)
    }
    const extras = typeof seed === 'string' || !seed.extras ? NO_EXTRAS : seed.extras
    return { url, extras, origin: 'seed' }
  })
}

function dedupe(entries: UrlEntry[]): UrlEntry[] {
  const seen = new Set<string>()
  const unique: UrlEntry[] = []
  for (const entry of entries) {
    if (seen.has(entry.url)) continue
    seen.add(entry.url)
    unique.push(entry)
  }
  return unique
}

function freeze(entries: UrlEntry[]): readonly UrlEntry[] {
  return Object.freeze(
    entries.map(entry => Object.freeze({ ...entry, extras: Object.freeze({ ...entry.extras }) }))
  )
}

function createDiscoveryContext(
  options: ResolveOptions,
  failures: DiscoveryFailure[]
): DiscoveryContext {
  return {
    logger: options.logger,
    signal: options.signal,
    recordFailure: failure => {
      failures.push(failure)
    },
    fetchText: async url => {
      const result = await options.fetcher.fetch(url, { signal: options.signal })
      if (result.status !== 'ok' || result.body === undefined) {
        throw new FetchFailure(url, result.error ?? `Fetch failed: ${result.status}`, result.statusCode)
      }
      return result.body
    },
  }
}

export async function resolveUrlSet(
  seeds: readonly SeedInput[],
  options: ResolveOptions
): Promise<ResolvedUrlSet> {
  const seedEntries = dedupe(normalizeSeeds(seeds))
  const { discovery, logger } = options

  if (!discovery) {
    return { urls: freeze(seedEntries), failures: [], seeded: seedEntries.length, discovered: 0 }
  }

  const keptSeeds: UrlEntry[] = []
  const discovered: UrlEntry[] = []
  const failures: DiscoveryFailure[] = []
  const context = createDiscoveryContext(options, failures)

  for (const seed of seedEntries) {
    if (options.signal.aborted) break

    // A kept seed stays even when its expansion fails
    if (discovery.keepSeeds) {
      keptSeeds.push(seed)
    }

    let produced: string[]
    try {
      produced = await discovery.discover(seed.url, context)
    } catch (error) {
      const failure = toDiscoveryFailure(seed.url, error)
      logger.warn('Discovery failed for seed', { seedUrl: seed.url, error: failure.message })
      failures.push(failure)
      continue
    }

    let skipped = 0
    for (const url of produced) {
      if (!isValidUrl(url)) {
        skipped++
        continue
      }
      discovered.push({ url, extras: NO_EXTRAS, origin: 'discovered' })
    }

    logger.debug('Seed expanded', {
      seedUrl: seed.url,
      strategy: discovery.name,
      produced: produced.length,
      skippedMalformed: skipped,
    })
  }

  const urls = dedupe([...keptSeeds, ...discovered])
  const seeded = urls.filter(entry => entry.origin === 'seed').length

  return {
    urls: freeze(urls),
    failures: failures.map(failure => failure.toRecord()),
    seeded,
    discovered: urls.length - seeded,
  }
}
