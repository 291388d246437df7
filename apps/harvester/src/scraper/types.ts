/**
 * Harvester Core Types
 *
 * Scraper contract, fetch results, per-URL outcomes and the run result.
 */

import type { ILogger } from '@rowharvest/logger'
import type { ScraperErrorKind } from './errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Rows and Tables
// ═══════════════════════════════════════════════════════════════════════════════

/** Cell values a row may carry. */
export type Scalar = string | number | boolean | null

/**
 * One extracted record. Keys must equal the scraper's declared columns
 * exactly; the executor checks this before a row reaches the table.
 */
export type Row = Record<string, Scalar>

/**
 * The run's tabular output. `rows` are in URL-processing order and,
 * within a URL, in the order the handler returned them.
 */
export interface Table {
  readonly columns: readonly string[]
  readonly rows: readonly Row[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Modes and Document Access
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * rendered: full browser session, page scripts run before extraction.
 * raw: plain HTTP GET, the handler receives the response body.
 */
export type FetchMode = 'rendered' | 'raw'

/**
 * A queryable element. Both the browser-backed and the markup-backed
 * implementations satisfy this, so handlers are written once.
 */
export interface ElementHandle {
  /** First descendant carrying the class. Throws ElementNotFoundError when absent. */
  findByClass(className: string): Promise<ElementHandle>
  findAllByClass(className: string): Promise<ElementHandle[]>
  /** First descendant with the tag name. Throws ElementNotFoundError when absent. */
  findByTag(tagName: string): Promise<ElementHandle>
  findAllByTag(tagName: string): Promise<ElementHandle[]>
  /** Visible text, whitespace-trimmed. */
  text(): Promise<string>
  /** Attribute value, or null when the attribute is missing. */
  attribute(name: string): Promise<string | null>
}

/**
 * A live document. The whole page is the root element; `url` is the
 * address after redirects.
 */
export interface DocumentHandle extends ElementHandle {
  url(): string
  /** Full serialised markup of the current DOM. */
  content(): Promise<string>
}

/**
 * What a fetch produced. Exactly one payload per mode.
 */
export type FetchResult =
  | { mode: 'raw'; url: string; rawMarkup: string; statusCode: number }
  | { mode: 'rendered'; url: string; renderedHandle: DocumentHandle }

// ═══════════════════════════════════════════════════════════════════════════════
// Scraper Contract
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Read-only view a handler gets alongside the document.
 */
export interface ScrapeContext {
  /** Extra values carried with the URL (e.g. columns from a previous stage). */
  readonly extras: Readonly<Record<string, Scalar>>
  readonly logger: ILogger
  /** Aborted when the run is cancelled. */
  readonly signal: AbortSignal
}

export type ScrapeHandler<D> = (
  url: string,
  document: D,
  context: ScrapeContext
) => Row[] | Promise<Row[]>

interface ScraperSpecBase {
  /** Unique scraper identifier (e.g. 'city-directory') */
  readonly id: string

  /** Ordered, non-empty, unique column names */
  readonly columns: readonly string[]
}

export interface RenderedScraperSpec extends ScraperSpecBase {
  readonly mode: 'rendered'
  readonly scrapeHandler: ScrapeHandler<DocumentHandle>
}

export interface RawScraperSpec extends ScraperSpecBase {
  readonly mode: 'raw'
  readonly scrapeHandler: ScrapeHandler<string>
}

/**
 * Immutable descriptor of a scraper type. Build it with defineScraper().
 */
export type ScraperSpec = RenderedScraperSpec | RawScraperSpec

/**
 * Registry for scrapers. Scrapers are registered explicitly; no auto-discovery.
 */
export interface ScraperRegistry {
  register(spec: ScraperSpec): void
  get(scraperId: string): ScraperSpec | undefined
  list(): string[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// URLs
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A URL to visit, with optional extras forwarded to the handler.
 */
export interface UrlEntry {
  url: string
  extras: Readonly<Record<string, Scalar>>
  /** 'seed' when supplied by the caller, 'discovered' when a strategy produced it */
  origin: 'seed' | 'discovered'
}

export type SeedInput = string | { url: string; extras?: Record<string, Scalar> }

// ═══════════════════════════════════════════════════════════════════════════════
// Outcomes and Results
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One error log record. `message` is the failure description verbatim.
 */
export interface ErrorRecord {
  url: string
  message: string
  kind: ScraperErrorKind
}

/**
 * Per-URL result: rows or a captured failure. Never both.
 */
export type ExecutionOutcome =
  | { ok: true; url: string; rows: Row[]; durationMs: number }
  | { ok: false; url: string; error: ErrorRecord; durationMs: number }

export interface RunResult {
  table: Table
  /** Discovery failures first, then per-URL failures in URL order */
  errorLog: ErrorRecord[]
  stats: RunStats
}

export interface RunStats {
  runId: string
  urlsResolved: number
  urlsSeeded: number
  urlsDiscovered: number
  urlsSucceeded: number
  urlsFailed: number
  rowsExtracted: number
  duplicatesDropped: number
  discoveryFailures: number
  durationMs: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Options and Policies
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchOptions {
  /** Request / navigation timeout in ms (default: 30000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB), raw mode only */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** Abandons the fetch when aborted */
  signal?: AbortSignal
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'

/**
 * Default headers for all HTTP requests.
 */
export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': DEFAULT_USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 30000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const

export type HttpFetchStatus =
  | 'ok'
  | 'error'
  | 'blocked'
  | 'timeout'
  | 'too_large'
  | 'robots_blocked'
  | 'aborted'

/**
 * Low-level HTTP response summary. The raw fetch strategy turns
 * anything but 'ok' into a FetchFailure.
 */
export interface HttpFetchResult {
  status: HttpFetchStatus
  statusCode?: number
  body?: string
  finalUrl?: string
  error?: string
  durationMs: number
}

/**
 * Plain HTTP GET capability. Used by the raw fetch strategy and by
 * discovery strategies that need a seed's markup.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<HttpFetchResult>
}

export interface RobotsPolicy {
  /**
   * Check if URL is allowed by robots.txt.
   * Returns false if disallowed OR unavailable (fail-closed).
   */
  isAllowed(url: string): Promise<boolean>
}

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

/** Page readiness the rendered fetch waits for before handing over. */
export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle'
