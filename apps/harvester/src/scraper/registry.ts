/**
 * Scraper Registry
 *
 * Scrapers must be explicitly registered; no auto-discovery.
 */

import { ConfigurationError } from './errors.js'
import { assertValidScraperSpec } from './scraper.js'
import type { ScraperRegistry, ScraperSpec } from './types.js'

/**
 * In-memory scraper registry implementation.
 * Scrapers are registered at startup and remain immutable during runtime.
 */
export class InMemoryScraperRegistry implements ScraperRegistry {
  private readonly scrapers = new Map<string, ScraperSpec>()

  /**
   * Register a scraper.
   * @throws ConfigurationError if a scraper with the same ID is already registered
   */
  register(spec: ScraperSpec): void {
    assertValidScraperSpec(spec)
    if (this.scrapers.has(spec.id)) {
      throw new ConfigurationError(`Scraper with ID '${spec.id}' is already registered`)
    }
    this.scrapers.set(spec.id, spec)
  }

  /**
   * Get scraper by ID.
   */
  get(scraperId: string): ScraperSpec | undefined {
    return this.scrapers.get(scraperId)
  }

  /**
   * List all registered scraper IDs.
   */
  list(): string[] {
    return Array.from(this.scrapers.keys())
  }

  /**
   * Get count of registered scrapers.
   */
  size(): number {
    return this.scrapers.size
  }
}

// Global singleton registry instance
let globalRegistry: InMemoryScraperRegistry | null = null

/**
 * Get or create the global scraper registry.
 */
export function getScraperRegistry(): InMemoryScraperRegistry {
  if (!globalRegistry) {
    globalRegistry = new InMemoryScraperRegistry()
  }
  return globalRegistry
}

/**
 * Reset the global registry (for testing).
 */
export function resetScraperRegistry(): void {
  globalRegistry = null
}
