/**
 * Markup-backed document handles
 *
 * Offers the DocumentHandle API over a cheerio tree, so raw markup can be
 * queried the same way as a live page.
 */

import * as cheerio from 'cheerio'
import type { Element } from 'domhandler'
import { ElementNotFoundError } from '../errors.js'
import type { DocumentHandle, ElementHandle } from '../types.js'
import { classSelector, tagSelector } from './selectors.js'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return $(selector).first().text().trim()
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

class CheerioElementHandle implements ElementHandle {
  constructor(protected readonly selection: cheerio.Cheerio<Element>) {}

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
    return this.selection.text().trim()
  }

  async attribute(name: string): Promise<string | null> {
    return this.selection.attr(name) ?? null
  }

  private first(selector: string): ElementHandle {
    const match = this.selection.find(selector).first()
    if (match.length === 0) {
      throw new ElementNotFoundError(selector)
    }
    return new CheerioElementHandle(match)
  }

  private all(selector: string): ElementHandle[] {
    const matches = this.selection.find(selector)
    const handles: ElementHandle[] = []
    for (let i = 0; i < matches.length; i++) {
      handles.push(new CheerioElementHandle(matches.eq(i)))
    }
    return handles
  }
}

/**
 * DocumentHandle over parsed markup. The root element is <html>; cheerio
 * adds it when the markup is a fragment.
 */
export class CheerioDocumentHandle extends CheerioElementHandle implements DocumentHandle {
  private readonly $: cheerio.CheerioAPI

  constructor(
    private readonly documentUrl: string,
    markup: string
  ) {
    const $ = loadHtml(markup)
    super($('html'))
    this.$ = $
  }

  url(): string {
    return this.documentUrl
  }

  async content(): Promise<string> {
    return this.$.html()
  }
}
