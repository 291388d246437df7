import { describe, it, expect, beforeEach } from 'vitest'
import { cityDirectoryScraper, pageTitleScraper, registerAllScrapers } from '../adapters/index.js'
import { ConfigurationError } from '../errors.js'
import { InMemoryScraperRegistry, getScraperRegistry, resetScraperRegistry } from '../registry.js'
import type { RawScraperSpec } from '../types.js'

describe('InMemoryScraperRegistry', () => {
  it('registers and looks up scrapers by id', () => {
    const registry = new InMemoryScraperRegistry()
    registry.register(pageTitleScraper)

    expect(registry.get('page-title')).toBe(pageTitleScraper)
    expect(registry.get('unknown')).toBeUndefined()
    expect(registry.size()).toBe(1)
  })

  it('rejects a duplicate id', () => {
    const registry = new InMemoryScraperRegistry()
    registry.register(pageTitleScraper)

    expect(() => registry.register(pageTitleScraper)).toThrow("Scraper with ID 'page-title' is already registered")
  })

  it('validates what it registers', () => {
    const invalid: RawScraperSpec = { id: 'bad', columns: ['a', 'a'], mode: 'raw', scrapeHandler: () => [] }

    expect(() => new InMemoryScraperRegistry().register(invalid)).toThrow(ConfigurationError)
  })
})

describe('global registry', () => {
  beforeEach(() => {
    resetScraperRegistry()
  })

  it('holds the bundled scrapers after registerAllScrapers()', () => {
    registerAllScrapers()

    expect(getScraperRegistry().list()).toEqual([cityDirectoryScraper.id, pageTitleScraper.id])
  })

  it('starts empty after a reset', () => {
    registerAllScrapers()
    resetScraperRegistry()

    expect(getScraperRegistry().size()).toBe(0)
  })
})
