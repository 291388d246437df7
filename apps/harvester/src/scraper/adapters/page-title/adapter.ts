/**
 * Page Title Scraper
 *
 * Raw mode: one row per page with its <title>, falling back to the first
 * <h1>. Pages with neither get a null title.
 */

import { firstText, loadHtml } from '../../dom/cheerio-handle.js'
import { defineScraper } from '../../scraper.js'
import { SELECTORS } from './selectors.js'

export const pageTitleScraper = defineScraper({
  id: 'page-title',
  columns: ['url', 'title'],
  mode: 'raw',
  scrapeHandler(url, markup) {
    const $ = loadHtml(markup)
    const title = firstText($, SELECTORS.title) || firstText($, SELECTORS.fallbackTitle)
    return [{ url, title: title || null }]
  },
})
