/**
 * In-process stand-ins for the network and the browser.
 */

import { CheerioDocumentHandle } from '../../dom/cheerio-handle.js'
import type { BrowserSession, NavigationOptions, SessionProvider } from '../../fetch/browser-session.js'
import type { DocumentHandle, Fetcher, FetchOptions, HttpFetchResult } from '../../types.js'

export type FakeResponse = string | Error | HttpFetchResult

/**
 * Serves bodies from a map. Unknown URLs answer 404.
 */
export class FakeFetcher implements Fetcher {
  readonly calls: string[] = []

  constructor(private readonly responses: Record<string, FakeResponse>) {}

  async fetch(url: string, options?: FetchOptions): Promise<HttpFetchResult> {
    this.calls.push(url)
    if (options?.signal?.aborted) {
      return { status: 'aborted', error: 'Request aborted', durationMs: 0 }
    }

    const response = this.responses[url]
    if (response === undefined) {
      return { status: 'error', statusCode: 404, error: 'HTTP 404: Not Found', durationMs: 0 }
    }
    if (response instanceof Error) {
      return { status: 'error', error: response.message, durationMs: 0 }
    }
    if (typeof response === 'string') {
      return { status: 'ok', statusCode: 200, body: response, finalUrl: url, durationMs: 0 }
    }
    return response
  }
}

export interface FakePage {
  html?: string
  /** Navigation rejects with this */
  error?: Error
  /** Navigation takes this long; closing the session ends it early */
  delayMs?: number
}

class FakeSession implements BrowserSession {
  closed = false
  private readonly closeListeners: Array<() => void> = []

  constructor(
    private readonly provider: FakeSessionProvider,
    readonly generation: number
  ) {}

  async open(url: string, options: NavigationOptions): Promise<DocumentHandle> {
    this.provider.opened.push(url)
    this.provider.navigations.push(options)
    const page = this.provider.pages[url] ?? { error: new Error(`HTTP 404: Not Found`) }

    if (page.delayMs !== undefined) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, page.delayMs)
        this.closeListeners.push(() => {
          clearTimeout(timer)
          reject(new Error('Target page, context or browser has been closed'))
        })
      })
    }

    if (page.error) {
      throw page.error
    }
    return new CheerioDocumentHandle(url, page.html ?? '<html></html>')
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.provider.live--
    for (const listener of this.closeListeners.splice(0)) {
      listener()
    }
    if (this.provider.failClose) {
      throw this.provider.failClose
    }
  }
}

/**
 * Hands out sessions serving fixture markup and keeps count of what is
 * still open.
 */
export class FakeSessionProvider implements SessionProvider {
  readonly opened: string[] = []
  readonly navigations: NavigationOptions[] = []
  readonly sessions: FakeSession[] = []
  live = 0
  maxLive = 0
  resets = 0
  closed = false
  failAcquire: Error | null = null
  /** Session close() rejects with this, after releasing */
  failClose: Error | null = null

  constructor(readonly pages: Record<string, FakePage>) {}

  async acquire(): Promise<BrowserSession> {
    if (this.failAcquire) {
      throw this.failAcquire
    }
    const session = new FakeSession(this, this.resets)
    this.sessions.push(session)
    this.live++
    this.maxLive = Math.max(this.maxLive, this.live)
    return session
  }

  async reset(): Promise<void> {
    this.resets++
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
