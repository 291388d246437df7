/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch API for HTTP requests.
 * Supports timeout, size limits, retries, cancellation and a custom User-Agent.
 */

import type { ILogger } from '@rowharvest/logger'
import { silentLogger } from '@rowharvest/logger'
import { describeThrown } from '../errors.js'
import type { Fetcher, FetchOptions, HttpFetchResult, RetryPolicy, RobotsPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_RETRY_POLICY } from '../types.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Robots.txt policy checker (optional) */
  robotsPolicy?: RobotsPolicy

  /** Overrides the default User-Agent header */
  userAgent?: string

  /** Defaults applied to every request, overridden per call */
  defaults?: Pick<FetchOptions, 'timeoutMs' | 'maxSizeBytes' | 'headers'>

  logger?: ILogger
}

/**
 * HTTP-based fetcher using native fetch.
 */
export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly robotsPolicy?: RobotsPolicy
  private readonly userAgent?: string
  private readonly defaults: Pick<FetchOptions, 'timeoutMs' | 'maxSizeBytes' | 'headers'>
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.robotsPolicy = options.robotsPolicy
    this.userAgent = options.userAgent
    this.defaults = options.defaults ?? {}
    this.log = options.logger ?? silentLogger
  }

  /**
   * Fetch a URL and return the body.
   */
  async fetch(url: string, options?: FetchOptions): Promise<HttpFetchResult> {
    const startTime = Date.now()
    const timeoutMs = options?.timeoutMs ?? this.defaults.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    const maxSizeBytes =
      options?.maxSizeBytes ?? this.defaults.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
    const signal = options?.signal

    if (signal?.aborted) {
      return this.abortedResult(startTime)
    }

    // Check robots.txt if policy is configured
    if (this.robotsPolicy) {
      const allowed = await this.robotsPolicy.isAllowed(url)
      if (!allowed) {
        return {
          status: 'robots_blocked',
          durationMs: Date.now() - startTime,
          error: 'URL disallowed by robots.txt',
        }
      }
    }

    // Merge headers
    const headers: Record<string, string> = {
      ...DEFAULT_FETCH_HEADERS,
      ...(this.userAgent ? { 'User-Agent': this.userAgent } : {}),
      ...(this.defaults.headers ?? {}),
      ...(options?.headers ?? {}),
    }

    let lastError: string | null = null

    // Retry loop
    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return this.abortedResult(startTime)
      }

      try {
        const result = await this.fetchOnce(url, headers, timeoutMs, maxSizeBytes, startTime, signal)

        // Check if we should retry based on status code
        if (
          result.status === 'error' &&
          result.statusCode &&
          this.retryPolicy.retryableStatusCodes.includes(result.statusCode) &&
          attempt < this.retryPolicy.maxAttempts
        ) {
          this.log.debug('Retrying after retryable status', { url, statusCode: result.statusCode, attempt })
          await this.sleep(this.backoffDelay(attempt), signal)
          continue
        }

        return result
      } catch (error) {
        if (signal?.aborted) {
          return this.abortedResult(startTime)
        }

        lastError = describeThrown(error)

        // Retry on network errors
        if (attempt < this.retryPolicy.maxAttempts) {
          this.log.debug('Retrying after network error', { url, attempt, error: lastError })
          await this.sleep(this.backoffDelay(attempt), signal)
          continue
        }
      }
    }

    if (signal?.aborted) {
      return this.abortedResult(startTime)
    }

    // All retries exhausted
    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError ?? 'Unknown error after retries',
    }
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number,
    maxSizeBytes: number,
    startTime: number,
    signal?: AbortSignal
  ): Promise<HttpFetchResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      // Check for blocked responses (403, 503 with captcha indicators)
      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (this.looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            durationMs: Date.now() - startTime,
            error: 'Request blocked (captcha or access denied)',
          }
        }
      }

      // Check for non-success status codes
      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      // Check content length header for early size check
      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      // Read body with size limit
      const body = await this.readBodyWithLimit(response, maxSizeBytes)
      if (body === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        body,
        finalUrl: response.url || url,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (signal?.aborted) {
        return this.abortedResult(startTime)
      }

      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      const decoder = new TextDecoder('utf-8')
      return decoder.decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  /**
   * Heuristic check for blocked/captcha pages.
   */
  private looksLikeBlockedPage(html: string): boolean {
    const lowerHtml = html.toLowerCase()
    const blockIndicators = [
      'captcha',
      'recaptcha',
      'hcaptcha',
      'challenge-form',
      'challenge-running',
      'cf-browser-verification',
      'please verify you are a human',
      'access denied',
      'blocked',
      'bot detection',
      'rate limit',
    ]

    return blockIndicators.some(indicator => lowerHtml.includes(indicator))
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  private abortedResult(startTime: number): HttpFetchResult {
    return {
      status: 'aborted',
      durationMs: Date.now() - startTime,
      error: 'Request aborted',
    }
  }

  /**
   * Sleep helper for retry delays. Wakes early when the signal fires.
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(done, ms)
      signal?.addEventListener('abort', done, { once: true })
      function done() {
        clearTimeout(timer)
        signal?.removeEventListener('abort', done)
        resolve()
      }
    })
  }
}
