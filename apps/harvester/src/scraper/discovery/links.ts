/**
 * Link Discovery
 *
 * Fetches the seed markup and follows its anchors one level deep.
 */

import { loadHtml } from '../dom/cheerio-handle.js'
import { getRegistrableDomain, resolveHttpUrl } from '../utils/url.js'
import type { DiscoveryContext, DiscoveryStrategy } from './types.js'

export interface LinkDiscoveryOptions {
  /** CSS selector for link elements (default: 'a[href]') */
  selector?: string
  /** Keep only links matching this pattern */
  include?: RegExp
  /** Drop links matching any of these patterns */
  exclude?: RegExp[]
  /** Keep only links on the seed's registrable domain (default: false) */
  sameSite?: boolean
  /** Cap per seed */
  maxUrls?: number
  /** Keep the seed pages themselves in the URL set (default: true) */
  keepSeeds?: boolean
}

export class LinkDiscovery implements DiscoveryStrategy {
  readonly name = 'links'
  readonly keepSeeds: boolean

  constructor(private readonly options: LinkDiscoveryOptions = {}) {
    this.keepSeeds = options.keepSeeds ?? true
  }

  async discover(seedUrl: string, context: DiscoveryContext): Promise<string[]> {
    const markup = await context.fetchText(seedUrl)
    return this.extractLinks(seedUrl, markup)
  }

  /**
   * Resolved, filtered links in document order, without repeats.
   */
  extractLinks(seedUrl: string, markup: string): string[] {
    const $ = loadHtml(markup)
    const seedDomain = this.options.sameSite ? getRegistrableDomain(seedUrl) : null
    const seen = new Set<string>()
    const links: string[] = []

    for (const element of $(this.options.selector ?? 'a[href]').toArray()) {
      const href = $(element).attr('href')
      if (!href) continue

      const url = resolveHttpUrl(href, seedUrl)
      if (!url || seen.has(url)) continue
      if (this.options.include && !this.options.include.test(url)) continue
      if (this.options.exclude?.some(pattern => pattern.test(url))) continue
      if (seedDomain && getRegistrableDomain(url) !== seedDomain) continue

      seen.add(url)
      links.push(url)

      if (this.options.maxUrls !== undefined && links.length >= this.options.maxUrls) {
        break
      }
    }

    return links
  }
}
