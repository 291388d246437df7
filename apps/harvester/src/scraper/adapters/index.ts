/**
 * Scraper Registration
 *
 * Registers the bundled scrapers with the global registry.
 * Scrapers are explicitly registered here - no auto-discovery.
 */

import { getScraperRegistry } from '../registry.js'
import { cityDirectoryScraper } from './city-directory/adapter.js'
import { pageTitleScraper } from './page-title/adapter.js'

/**
 * Register all bundled scrapers.
 * Call this once at startup.
 */
export function registerAllScrapers(): void {
  const registry = getScraperRegistry()

  registry.register(cityDirectoryScraper)
  registry.register(pageTitleScraper)
}

// Re-export scrapers for direct access (e.g., in tests)
export { cityDirectoryScraper } from './city-directory/adapter.js'
export { pageTitleScraper } from './page-title/adapter.js'
