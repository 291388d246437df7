/**
 * Robots.txt Policy Implementation
 *
 * Policy rules:
 * 1. Obey all Disallow rules for `User-agent: *` and our own agent name
 * 2. Honor Crawl-delay (min 1s, max 60s, default 2s if not specified)
 * 3. If robots.txt unavailable after the configured retries: fail closed (block the origin)
 * 4. Cache robots.txt per origin for 24 hours
 */

import type { ILogger } from '@rowharvest/logger'
import { silentLogger } from '@rowharvest/logger'
import { describeThrown } from '../errors.js'
import type { RobotsPolicy } from '../types.js'
import { DEFAULT_USER_AGENT } from '../types.js'

/**
 * Parsed robots.txt rules for an origin.
 */
interface RobotsRules {
  /** Paths disallowed for User-agent: * */
  globalDisallowed: string[]
  /** Paths disallowed for our own User-agent */
  agentDisallowed: string[]
  /** Crawl-delay in seconds (null if not specified) */
  crawlDelay: number | null
  /** When this cache entry was created */
  cachedAt: number
  /** Whether robots.txt fetch was successful */
  fetchSucceeded: boolean
}

export interface RobotsPolicyOptions {
  /** Cache TTL in ms (default: 24 hours) */
  cacheTtlMs?: number
  /** Number of fetch retries (default: 3) */
  fetchRetries?: number
  /** Base delay between retries in ms, multiplied by the attempt number (default: 1000) */
  retryDelayMs?: number
  /** Request timeout in ms (default: 10000) */
  fetchTimeoutMs?: number
  /** Our User-Agent name for matching rules */
  userAgentName?: string
  /** Default crawl delay in seconds if not specified (default: 2) */
  defaultCrawlDelay?: number
  /** Min crawl delay in seconds (default: 1) */
  minCrawlDelay?: number
  /** Max crawl delay in seconds (default: 60) */
  maxCrawlDelay?: number
  /** User-Agent header sent with the robots.txt request */
  userAgent?: string
}

const DEFAULT_OPTIONS: Required<RobotsPolicyOptions> = {
  cacheTtlMs: 24 * 60 * 60 * 1000, // 24 hours
  fetchRetries: 3,
  retryDelayMs: 1000,
  fetchTimeoutMs: 10000,
  userAgentName: 'rowharvest',
  defaultCrawlDelay: 2,
  minCrawlDelay: 1,
  maxCrawlDelay: 60,
  userAgent: DEFAULT_USER_AGENT,
}

/**
 * Robots.txt policy implementation with caching.
 * Fail-closed: if we can't fetch robots.txt, block the origin.
 */
export class RobotsPolicyImpl implements RobotsPolicy {
  private readonly options: Required<RobotsPolicyOptions>
  private readonly cache = new Map<string, RobotsRules>()
  private readonly log: ILogger

  constructor(options: RobotsPolicyOptions = {}, logger: ILogger = silentLogger) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
    this.log = logger
  }

  /**
   * Check if URL is allowed by robots.txt.
   * Returns false if disallowed OR unavailable (fail-closed).
   */
  async isAllowed(url: string): Promise<boolean> {
    const urlObj = new URL(url)
    const rules = await this.getRules(urlObj.origin)

    // Fail-closed: if fetch failed, block the URL
    if (!rules.fetchSucceeded) {
      return false
    }

    const path = urlObj.pathname + urlObj.search

    // Check agent-specific rules first (more specific)
    if (this.matchesAnyRule(path, rules.agentDisallowed)) {
      return false
    }

    // Check global rules
    if (this.matchesAnyRule(path, rules.globalDisallowed)) {
      return false
    }

    return true
  }

  /**
   * Get crawl delay from robots.txt.
   */
  async getCrawlDelay(url: string): Promise<number | null> {
    const rules = await this.getRules(new URL(url).origin)

    if (rules.crawlDelay !== null) {
      return Math.max(
        this.options.minCrawlDelay,
        Math.min(this.options.maxCrawlDelay, rules.crawlDelay)
      )
    }

    return this.options.defaultCrawlDelay
  }

  /**
   * Get rules for an origin, fetching if not cached.
   */
  private async getRules(origin: string): Promise<RobotsRules> {
    const cached = this.cache.get(origin)
    const now = Date.now()

    if (cached && now - cached.cachedAt < this.options.cacheTtlMs) {
      return cached
    }

    const rules = await this.fetchAndParseRobots(origin)
    this.cache.set(origin, rules)
    return rules
  }

  /**
   * Fetch and parse robots.txt for an origin.
   */
  private async fetchAndParseRobots(origin: string): Promise<RobotsRules> {
    const robotsUrl = `${origin}/robots.txt`
    let text: string | null = null

    for (let attempt = 1; attempt <= this.options.fetchRetries; attempt++) {
      try {
        const response = await fetch(robotsUrl, {
          method: 'GET',
          headers: { 'User-Agent': this.options.userAgent },
          signal: AbortSignal.timeout(this.options.fetchTimeoutMs),
        })

        // 404 = no robots.txt = allow all
        if (response.status === 404) {
          return {
            globalDisallowed: [],
            agentDisallowed: [],
            crawlDelay: null,
            cachedAt: Date.now(),
            fetchSucceeded: true,
          }
        }

        if (response.ok) {
          text = await response.text()
          break
        }

        this.log.debug('robots.txt request failed', { robotsUrl, attempt, statusCode: response.status })
      } catch (error) {
        this.log.debug('robots.txt request failed', { robotsUrl, attempt, error: describeThrown(error) })
      }

      // Wait before retry
      if (attempt < this.options.fetchRetries) {
        await this.sleep(this.options.retryDelayMs * attempt)
      }
    }

    // Fail-closed: if we couldn't fetch, block the origin
    if (text === null) {
      this.log.warn('robots.txt unavailable, blocking origin', { origin })
      return {
        globalDisallowed: ['*'], // Block everything
        agentDisallowed: [],
        crawlDelay: null,
        cachedAt: Date.now(),
        fetchSucceeded: false,
      }
    }

    return this.parseRobotsTxt(text)
  }

  /**
   * Parse robots.txt content.
   */
  private parseRobotsTxt(text: string): RobotsRules {
    const rules: RobotsRules = {
      globalDisallowed: [],
      agentDisallowed: [],
      crawlDelay: null,
      cachedAt: Date.now(),
      fetchSucceeded: true,
    }

    const lines = text.split('\n')
    let currentAgents: string[] = []
    let lastDirective = ''

    for (const rawLine of lines) {
      const line = rawLine.trim()

      // Skip empty lines and comments
      if (!line || line.startsWith('#')) {
        continue
      }

      const colonIndex = line.indexOf(':')
      if (colonIndex === -1) continue

      const directive = line.slice(0, colonIndex).trim().toLowerCase()
      const value = line.slice(colonIndex + 1).trim()
      const previousDirective = lastDirective
      lastDirective = directive

      if (directive === 'user-agent') {
        // New user-agent section
        // Consecutive User-agent lines share one group
        const agent = value.toLowerCase()
        if (previousDirective === 'user-agent') {
          currentAgents.push(agent)
        } else {
          currentAgents = [agent]
        }
      } else if (directive === 'disallow') {
        if (!value) continue // Empty disallow = allow all

        const isGlobal = currentAgents.includes('*')
        const isOurAgent = currentAgents.includes(this.options.userAgentName.toLowerCase())

        if (isOurAgent) {
          rules.agentDisallowed.push(value)
        } else if (isGlobal) {
          rules.globalDisallowed.push(value)
        }
      } else if (directive === 'crawl-delay') {
        const isOurAgent = currentAgents.includes(this.options.userAgentName.toLowerCase())
        const isGlobal = currentAgents.includes('*')

        if (isOurAgent || isGlobal) {
          const delay = parseFloat(value)
          if (!isNaN(delay) && delay > 0) {
            rules.crawlDelay = delay
          }
        }
      }
    }

    return rules
  }

  /**
   * Check if path matches any of the rules.
   * Simple prefix matching (not full glob support).
   */
  private matchesAnyRule(path: string, rules: string[]): boolean {
    for (const rule of rules) {
      // Disallow: * or Disallow: / blocks everything
      if (rule === '*' || rule === '/') return true

      // Simple prefix match
      if (rule.endsWith('*')) {
        const prefix = rule.slice(0, -1)
        if (path.startsWith(prefix)) return true
      } else {
        if (path.startsWith(rule)) return true
      }
    }

    return false
  }

  /**
   * Clear the cache (for testing).
   */
  clearCache(): void {
    this.cache.clear()
  }

  /**
   * Sleep helper.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}
