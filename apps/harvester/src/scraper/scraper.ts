/**
 * Scraper Definition
 *
 * A scraper is a plain value: id, ordered column schema, fetch mode and the
 * extraction function. defineScraper() validates it and freezes it.
 */

import { z } from 'zod'
import { formatZodIssues } from '../config/settings.js'
import { ConfigurationError } from './errors.js'
import type { RawScraperSpec, RenderedScraperSpec, ScraperSpec } from './types.js'

const scraperSpecSchema = z.object({
  id: z.string().trim().min(1, 'Scraper id must not be empty'),
  columns: z
    .array(z.string().min(1, 'Column names must not be empty'))
    .min(1, 'Scraper must declare at least one column')
    .superRefine((columns, ctx) => {
      const seen = new Set<string>()
      for (const column of columns) {
        if (seen.has(column)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate column '${column}'` })
        }
        seen.add(column)
      }
    }),
  mode: z.enum(['rendered', 'raw']),
  scrapeHandler: z.custom<(...args: unknown[]) => unknown>(
    value => typeof value === 'function',
    'scrapeHandler must be a function'
  ),
})

/**
 * Check a scraper value before it is used. The executor calls this again
 * at the start of every run, so hand-built specs get the same checks.
 *
 * @throws ConfigurationError
 */
export function assertValidScraperSpec(spec: unknown): asserts spec is ScraperSpec {
  const parsed = scraperSpecSchema.safeParse(spec)
  if (!parsed.success) {
    const id = typeof spec === 'object' && spec !== null && 'id' in spec ? String(spec.id) : '?'
    throw new ConfigurationError(`Invalid scraper '${id}': ${formatZodIssues(parsed.error)}`, parsed.error)
  }
}

/**
 * Declare a scraper.
 *
 * @example
 * ```ts
 * export const titles = defineScraper({
 *   id: 'page-title',
 *   columns: ['url', 'title'],
 *   mode: 'raw',
 *   scrapeHandler: (url, markup) => [{ url, title: loadHtml(markup)('title').text() }],
 * })
 * ```
 */
export function defineScraper(spec: RenderedScraperSpec): RenderedScraperSpec
export function defineScraper(spec: RawScraperSpec): RawScraperSpec
export function defineScraper(spec: ScraperSpec): ScraperSpec {
  assertValidScraperSpec(spec)
  return Object.freeze({ ...spec, columns: Object.freeze([...spec.columns]) })
}
