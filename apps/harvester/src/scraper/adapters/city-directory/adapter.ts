/**
 * City Directory Scraper
 *
 * Rendered mode: the city grid is filled in by script on most directory
 * pages. One row per city link.
 */

import { defineScraper } from '../../scraper.js'
import type { Row } from '../../types.js'
import { resolveHttpUrl } from '../../utils/url.js'
import { SELECTORS } from './selectors.js'

export const cityDirectoryScraper = defineScraper({
  id: 'city-directory',
  columns: ['name', 'url'],
  mode: 'rendered',
  async scrapeHandler(pageUrl, document) {
    const container = await document.findByClass(SELECTORS.container)
    const row = await container.findByClass(SELECTORS.row)
    const rows: Row[] = []

    for (const section of await row.findAllByTag(SELECTORS.section)) {
      for (const link of await section.findAllByTag(SELECTORS.link)) {
        const href = await link.attribute('href')
        rows.push({
          name: await link.text(),
          url: href === null ? null : (resolveHttpUrl(href, pageUrl) ?? href),
        })
      }
    }

    return rows
  },
})
