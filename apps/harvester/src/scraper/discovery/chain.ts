/**
 * Explicit multi-level discovery: every URL the first strategy yields is
 * expanded once more by the second.
 */

import { DiscoveryFailure, describeThrown } from '../errors.js'
import type { DiscoveryStrategy } from './types.js'

export function toDiscoveryFailure(url: string, error: unknown): DiscoveryFailure {
  return error instanceof DiscoveryFailure ? error : new DiscoveryFailure(url, describeThrown(error), error)
}

/**
 * A failure while expanding an intermediate URL is recorded against that
 * URL; its siblings still expand. The intermediate URL itself is kept when
 * the second strategy keeps seeds, whether or not its expansion failed.
 */
export function chainDiscovery(first: DiscoveryStrategy, second: DiscoveryStrategy): DiscoveryStrategy {
  return {
    name: `${first.name}>${second.name}`,
    keepSeeds: first.keepSeeds,
    async discover(seedUrl, context) {
      const intermediate = await first.discover(seedUrl, context)
      const urls: string[] = []

      for (const url of intermediate) {
        if (second.keepSeeds) {
          urls.push(url)
        }
        try {
          urls.push(...(await second.discover(url, context)))
        } catch (error) {
          context.recordFailure(toDiscoveryFailure(url, error))
        }
      }

      return urls
    },
  }
}
