/**
 * Sitemap Discovery
 *
 * A <urlset> yields its <loc> values. A <sitemapindex> yields the <loc>s of
 * each child sitemap that passes shouldCrawl. Only one tree level is read:
 * an index found inside an index is skipped.
 */

import { XMLParser } from 'fast-xml-parser'
import { z } from 'zod'
import { DiscoveryFailure } from '../errors.js'
import { toDiscoveryFailure } from './chain.js'
import type { DiscoveryContext, DiscoveryStrategy } from './types.js'

export interface SitemapDiscoveryOptions {
  /** Filter for child sitemaps of an index (default: accept all) */
  shouldCrawl?: (childSitemapUrl: string) => boolean
  /** Keep the sitemap URLs themselves in the URL set (default: false) */
  keepSeeds?: boolean
}

export interface ParsedSitemap {
  kind: 'urlset' | 'sitemapindex'
  locs: string[]
}

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  isArray: name => name === 'sitemap' || name === 'url',
})

const entrySchema = z.object({ loc: z.string().optional() })

// An element with no children parses to '' rather than an object
const sitemapDocumentSchema = z.object({
  urlset: z.union([z.object({ url: z.array(entrySchema).optional() }), z.literal('')]).optional(),
  sitemapindex: z
    .union([z.object({ sitemap: z.array(entrySchema).optional() }), z.literal('')])
    .optional(),
})

function collectLocs(entries: Array<{ loc?: string }> | undefined): string[] {
  return (entries ?? [])
    .map(entry => entry.loc?.trim() ?? '')
    .filter(Boolean)
}

/**
 * Parse sitemap XML. Returns null when the document is neither a urlset
 * nor a sitemap index.
 */
export function parseSitemap(xml: string): ParsedSitemap | null {
  let raw: unknown
  try {
    raw = xmlParser.parse(xml)
  } catch {
    return null
  }

  const parsed = sitemapDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    return null
  }

  const { urlset, sitemapindex } = parsed.data
  if (sitemapindex !== undefined) {
    return { kind: 'sitemapindex', locs: collectLocs(sitemapindex === '' ? [] : sitemapindex.sitemap) }
  }
  if (urlset !== undefined) {
    return { kind: 'urlset', locs: collectLocs(urlset === '' ? [] : urlset.url) }
  }
  return null
}

export class SitemapDiscovery implements DiscoveryStrategy {
  readonly name = 'sitemap'
  readonly keepSeeds: boolean
  private readonly shouldCrawl: (childSitemapUrl: string) => boolean

  constructor(options: SitemapDiscoveryOptions = {}) {
    this.keepSeeds = options.keepSeeds ?? false
    this.shouldCrawl = options.shouldCrawl ?? (() => true)
  }

  async discover(seedUrl: string, context: DiscoveryContext): Promise<string[]> {
    const root = await this.load(seedUrl, context)
    if (root.kind === 'urlset') {
      return root.locs
    }

    const urls: string[] = []
    for (const childUrl of root.locs) {
      if (!this.shouldCrawl(childUrl)) {
        context.logger.debug('Child sitemap filtered out', { seedUrl, childUrl })
        continue
      }

      let child: ParsedSitemap
      try {
        child = await this.load(childUrl, context)
      } catch (error) {
        context.recordFailure(toDiscoveryFailure(childUrl, error))
        continue
      }

      if (child.kind === 'sitemapindex') {
        context.logger.warn('Nested sitemap index not followed', { seedUrl, childUrl })
        continue
      }
      urls.push(...child.locs)
    }
    return urls
  }

  private async load(url: string, context: DiscoveryContext): Promise<ParsedSitemap> {
    const xml = await context.fetchText(url)
    const parsed = parseSitemap(xml)
    if (!parsed) {
      throw new DiscoveryFailure(url, `Not a sitemap: ${url}`)
    }
    context.logger.debug('Sitemap parsed', { url, kind: parsed.kind, entries: parsed.locs.length })
    return parsed
  }
}
