/**
 * Discovery Types
 */

import type { ILogger } from '@rowharvest/logger'
import type { DiscoveryFailure } from '../errors.js'

/**
 * What a strategy gets while expanding one seed. Strategies never touch
 * the browser; they read markup over plain HTTP.
 */
export interface DiscoveryContext {
  /** GET the URL and return its body. Rejects with FetchFailure. */
  fetchText(url: string): Promise<string>
  /** Record a failure below the seed (a child sitemap, a chained step) without failing the seed. */
  recordFailure(failure: DiscoveryFailure): void
  readonly logger: ILogger
  readonly signal: AbortSignal
}

/**
 * Expands one seed URL into more URLs to visit. Must be deterministic for
 * the same seed document. Output may contain malformed or duplicate
 * values; URL-set resolution filters them.
 */
export interface DiscoveryStrategy {
  readonly name: string
  /** Whether the seeds themselves stay in the URL set next to what they expand to */
  readonly keepSeeds: boolean
  discover(seedUrl: string, context: DiscoveryContext): Promise<string[]>
}
