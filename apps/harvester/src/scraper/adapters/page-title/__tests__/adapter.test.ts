import { describe, it, expect } from 'vitest'
import { readFileSync } from 'fs'
import { join } from 'path'
import { fileURLToPath } from 'url'
import { silentLogger } from '@rowharvest/logger'
import type { ScrapeContext } from '../../../types.js'
import { pageTitleScraper } from '../adapter.js'

const fixturesDir = join(fileURLToPath(new URL('.', import.meta.url)), 'fixtures')
const PAGE_URL = 'https://ferries.example.com/timetable'

const context: ScrapeContext = {
  extras: {},
  logger: silentLogger,
  signal: new AbortController().signal,
}

describe('page-title scraper', () => {
  it('reads the trimmed <title>', async () => {
    const markup = readFileSync(join(fixturesDir, 'article.html'), 'utf8')

    expect(await pageTitleScraper.scrapeHandler(PAGE_URL, markup, context)).toEqual([
      { url: PAGE_URL, title: 'Fjord Ferries: Summer Timetable' },
    ])
  })

  it('falls back to the first <h1>', async () => {
    const markup = '<html><body><h1>Departures</h1><h1>Arrivals</h1></body></html>'

    expect(await pageTitleScraper.scrapeHandler(PAGE_URL, markup, context)).toEqual([
      { url: PAGE_URL, title: 'Departures' },
    ])
  })

  it('returns a null title when the page has neither', async () => {
    expect(await pageTitleScraper.scrapeHandler(PAGE_URL, '<p>plain</p>', context)).toEqual([
      { url: PAGE_URL, title: null },
    ])
  })
})
