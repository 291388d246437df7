/**
 * Browser Sessions
 *
 * A session is one isolated browser context (own cookies, storage and DOM)
 * serving exactly one URL. The provider owns the browser process: it is
 * launched on the first acquire and closed by close(). reset() swaps in a
 * fresh process; sessions still open on the old one keep working and the old
 * process exits once the last of them is closed.
 */

import type { ILogger } from '@rowharvest/logger'
import { silentLogger } from '@rowharvest/logger'
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core'
import { PlaywrightDocumentHandle } from '../dom/playwright-handle.js'
import type { DocumentHandle, WaitUntil } from '../types.js'

export interface NavigationOptions {
  timeoutMs: number
  waitUntil: WaitUntil
}

export interface BrowserSession {
  /**
   * Navigate and return a live handle bound to this session.
   * Rejects on navigation failure, HTTP error status or timeout.
   */
  open(url: string, options: NavigationOptions): Promise<DocumentHandle>
  /** Idempotent. */
  close(): Promise<void>
}

export interface SessionProvider {
  acquire(): Promise<BrowserSession>
  reset(): Promise<void>
  close(): Promise<void>
}

export interface PlaywrightSessionOptions {
  headless?: boolean
  userAgent?: string
  /** Chromium binary; playwright-core does not download one */
  executablePath?: string
  /** Abort image requests (default: true) */
  blockImages?: boolean
  logger?: ILogger
}

class PlaywrightSession implements BrowserSession {
  private closed = false

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly onClose: () => Promise<void>
  ) {}

  async open(url: string, options: NavigationOptions): Promise<DocumentHandle> {
    const response = await this.page.goto(url, {
      timeout: options.timeoutMs,
      waitUntil: options.waitUntil,
    })
    if (response && response.status() >= 400) {
      throw new Error(`HTTP ${response.status()}: ${response.statusText()}`)
    }
    return new PlaywrightDocumentHandle(this.page)
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.context.close()
    await this.onClose()
  }
}

export class PlaywrightSessionProvider implements SessionProvider {
  private browser: Promise<Browser> | null = null
  private readonly retired = new Set<Browser>()
  private readonly log: ILogger

  constructor(private readonly options: PlaywrightSessionOptions = {}) {
    this.log = options.logger ?? silentLogger
  }

  async acquire(): Promise<BrowserSession> {
    const browser = await this.getBrowser()
    const context = await browser.newContext({ userAgent: this.options.userAgent })

    let page: Page
    try {
      if (this.options.blockImages ?? true) {
        await context.route('**/*', route =>
          route.request().resourceType() === 'image' ? route.abort() : route.continue()
        )
      }
      page = await context.newPage()
    } catch (error) {
      await this.discardContext(context, browser)
      throw error
    }
    return new PlaywrightSession(context, page, () => this.releaseRetired(browser))
  }

  async reset(): Promise<void> {
    const current = await this.detachBrowser()
    if (!current) return

    this.log.info('Relaunching browser')
    if (current.contexts().length === 0) {
      await current.close()
    } else {
      this.retired.add(current)
    }
  }

  async close(): Promise<void> {
    const current = await this.detachBrowser()
    const browsers = [...this.retired]
    this.retired.clear()
    if (current) {
      browsers.push(current)
    }
    await Promise.all(browsers.map(browser => browser.close()))
  }

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      const headless = this.options.headless ?? true
      this.log.info('Launching browser', { headless })
      this.browser = chromium
        .launch({ headless, executablePath: this.options.executablePath })
        .catch((error: unknown) => {
          this.browser = null
          throw error
        })
    }
    return this.browser
  }

  /**
   * Forget the current browser so the next acquire launches a new one.
   * A launch that failed has nothing to close.
   */
  private async detachBrowser(): Promise<Browser | null> {
    const pending = this.browser
    this.browser = null
    if (!pending) return null
    try {
      return await pending
    } catch (error) {
      this.log.debug('Browser launch had failed, nothing to close', { error: String(error) })
      return null
    }
  }

  private async discardContext(context: BrowserContext, browser: Browser): Promise<void> {
    try {
      await context.close()
      await this.releaseRetired(browser)
    } catch (error) {
      this.log.warn('Failed to close half-opened browser context', { error: String(error) })
    }
  }

  private async releaseRetired(browser: Browser): Promise<void> {
    if (this.retired.has(browser) && browser.contexts().length === 0) {
      this.retired.delete(browser)
      await browser.close()
    }
  }
}
