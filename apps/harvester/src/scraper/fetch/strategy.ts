/**
 * Fetch Strategies
 *
 * Turn a URL into a FetchResult for one fetch mode and hand it to a consumer.
 * Whatever the strategy acquires for the URL is released when the consumer
 * settles, on every exit path. A failed fetch rejects with FetchFailure and
 * the consumer is never called.
 */

import type { ILogger } from '@rowharvest/logger'
import { silentLogger } from '@rowharvest/logger'
import { FetchFailure, describeThrown } from '../errors.js'
import type { DocumentHandle, Fetcher, FetchMode, FetchResult, WaitUntil } from '../types.js'
import { DEFAULT_FETCH_OPTIONS } from '../types.js'
import type { BrowserSession, SessionProvider } from './browser-session.js'

export interface FetchStrategy {
  readonly mode: FetchMode
  withDocument<T>(
    url: string,
    consume: (result: FetchResult) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T>
  /** Release everything still held (browser process, connections). */
  close(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Raw
// ═══════════════════════════════════════════════════════════════════════════════

export interface RawFetchStrategyOptions {
  timeoutMs?: number
  maxSizeBytes?: number
}

export class RawFetchStrategy implements FetchStrategy {
  readonly mode = 'raw'

  constructor(
    private readonly fetcher: Fetcher,
    private readonly options: RawFetchStrategyOptions = {}
  ) {}

  async withDocument<T>(
    url: string,
    consume: (result: FetchResult) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const result = await this.fetcher.fetch(url, {
      timeoutMs: this.options.timeoutMs,
      maxSizeBytes: this.options.maxSizeBytes,
      signal,
    })

    if (result.status !== 'ok' || result.body === undefined) {
      throw new FetchFailure(url, result.error ?? `Fetch failed: ${result.status}`, result.statusCode)
    }

    return consume({
      mode: 'raw',
      url: result.finalUrl ?? url,
      rawMarkup: result.body,
      statusCode: result.statusCode ?? 200,
    })
  }

  async close(): Promise<void> {}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rendered
// ═══════════════════════════════════════════════════════════════════════════════

export interface RenderedFetchStrategyOptions {
  timeoutMs?: number
  waitUntil?: WaitUntil
  /** Relaunch the browser after this many URLs */
  resetSessionAfter?: number
  logger?: ILogger
}

export class RenderedFetchStrategy implements FetchStrategy {
  readonly mode = 'rendered'
  private servedSinceReset = 0
  private readonly log: ILogger

  constructor(
    private readonly sessions: SessionProvider,
    private readonly options: RenderedFetchStrategyOptions = {}
  ) {
    this.log = options.logger ?? silentLogger
  }

  async withDocument<T>(
    url: string,
    consume: (result: FetchResult) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    if (signal?.aborted) {
      throw new FetchFailure(url, 'Fetch aborted')
    }

    await this.resetIfDue()

    let session: BrowserSession
    try {
      session = await this.sessions.acquire()
    } catch (error) {
      throw new FetchFailure(url, `Unable to open browser session: ${describeThrown(error)}`, undefined, error)
    }

    // Closing the session makes a pending navigation reject
    const onAbort = () => {
      session.close().catch((error: unknown) => {
        this.log.warn('Failed to close session on abort', { url, error: describeThrown(error) })
      })
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      let handle: DocumentHandle
      try {
        handle = await session.open(url, {
          timeoutMs: this.options.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs,
          waitUntil: this.options.waitUntil ?? 'load',
        })
      } catch (error) {
        throw new FetchFailure(url, signal?.aborted ? 'Fetch aborted' : describeThrown(error), undefined, error)
      }

      return await consume({ mode: 'rendered', url: handle.url(), renderedHandle: handle })
    } finally {
      signal?.removeEventListener('abort', onAbort)
      try {
        await session.close()
      } catch (error) {
        this.log.warn('Failed to close session', { url, error: describeThrown(error) })
      }
    }
  }

  async close(): Promise<void> {
    await this.sessions.close()
  }

  private async resetIfDue(): Promise<void> {
    const limit = this.options.resetSessionAfter
    const due = limit !== undefined && this.servedSinceReset >= limit
    if (due) {
      this.servedSinceReset = 0
    }
    this.servedSinceReset++
    if (due) {
      this.log.debug('Session reset due', { after: limit })
      await this.sessions.reset()
    }
  }
}
