/**
 * Scraper Execution Engine
 *
 * Fetch pages, extract typed rows, survive per-page failures.
 */

// Core types
export * from './types.js'

// Errors
export * from './errors.js'

// Declaring and registering scrapers
export { defineScraper, assertValidScraperSpec } from './scraper.js'
export { InMemoryScraperRegistry, getScraperRegistry, resetScraperRegistry } from './registry.js'
export { registerAllScrapers, cityDirectoryScraper, pageTitleScraper } from './adapters/index.js'

// Execution
export { run } from './executor.js'
export type { RunOptions } from './executor.js'
export { runPipeline, tableToSeeds, URL_COLUMN } from './pipeline.js'
export type { PipelineOptions, PipelineResult } from './pipeline.js'
export { ScraperOperator } from './operator.js'
export type { ScraperOperatorConfig, RunSummary } from './operator.js'

// Fetch layer
export { HttpFetcher } from './fetch/http-fetcher.js'
export type { HttpFetcherOptions } from './fetch/http-fetcher.js'
export { RobotsPolicyImpl } from './fetch/robots.js'
export { RawFetchStrategy, RenderedFetchStrategy } from './fetch/strategy.js'
export type { FetchStrategy } from './fetch/strategy.js'
export { PlaywrightSessionProvider } from './fetch/browser-session.js'
export type { BrowserSession, SessionProvider, NavigationOptions } from './fetch/browser-session.js'
export { createFetchStrategy, createHttpFetcher } from './fetch/factory.js'

// Documents
export { CheerioDocumentHandle, loadHtml, firstText, firstAttr } from './dom/cheerio-handle.js'

// Discovery
export type { DiscoveryStrategy, DiscoveryContext } from './discovery/types.js'
export { SitemapDiscovery, parseSitemap } from './discovery/sitemap.js'
export { LinkDiscovery } from './discovery/links.js'
export { chainDiscovery } from './discovery/chain.js'
export { resolveUrlSet } from './discovery/resolve-urls.js'

// Processing
export { validateRows } from './process/validator.js'
export { dropDuplicateRows } from './process/dedupe.js'

// Sinks
export type { ResultSink, SinkContext } from './sinks/types.js'
export { LogResultSink } from './sinks/log-sink.js'
export { CsvFileResultSink } from './sinks/csv-sink.js'

// Utilities
export { isValidUrl, getRegistrableDomain, resolveHttpUrl } from './utils/url.js'
