/**
 * Browser-backed document handles
 *
 * Wrap playwright locators. Handles are only valid while the session that
 * produced them is open; the rendered fetch strategy closes it as soon as
 * the handler returns.
 */

import type { Locator, Page } from 'playwright-core'
import { ElementNotFoundError } from '../errors.js'
import type { DocumentHandle, ElementHandle } from '../types.js'
import { classSelector, tagSelector } from './selectors.js'

class LocatorElementHandle implements ElementHandle {
  constructor(protected readonly locator: Locator) {}

  async findByClass(className: string): Promise<ElementHandle> {
    return this.first(classSelector(className))
  }

  async findAllByClass(className: string): Promise<ElementHandle[]> {
    return this.all(classSelector(className))
  }

  async findByTag(tagName: string): Promise<ElementHandle> {
    return this.first(tagSelector(tagName))
  }

  async findAllByTag(tagName: string): Promise<ElementHandle[]> {
    return this.all(tagSelector(tagName))
  }

  async text(): Promise<string> {
    return (await this.locator.innerText()).trim()
  }

  async attribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name)
  }

  private async first(selector: string): Promise<ElementHandle> {
    const matches = this.locator.locator(selector)
    if ((await matches.count()) === 0) {
      throw new ElementNotFoundError(selector)
    }
    return new LocatorElementHandle(matches.first())
  }

  private async all(selector: string): Promise<ElementHandle[]> {
    const matches = await this.locator.locator(selector).all()
    return matches.map(match => new LocatorElementHandle(match))
  }
}

export class PlaywrightDocumentHandle extends LocatorElementHandle implements DocumentHandle {
  constructor(private readonly page: Page) {
    super(page.locator('html'))
  }

  url(): string {
    return this.page.url()
  }

  async content(): Promise<string> {
    return this.page.content()
  }
}
