import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { loggers } from '../../config/logger.js'
import { registerAllScrapers } from '../../scraper/adapters/index.js'
import { chainDiscovery } from '../../scraper/discovery/chain.js'
import { LinkDiscovery } from '../../scraper/discovery/links.js'
import { SitemapDiscovery } from '../../scraper/discovery/sitemap.js'
import type { DiscoveryStrategy } from '../../scraper/discovery/types.js'
import { ConfigurationError, classifyError, formatErrorForLog } from '../../scraper/errors.js'
import { ScraperOperator } from '../../scraper/operator.js'
import { getScraperRegistry } from '../../scraper/registry.js'
import { CsvFileResultSink } from '../../scraper/sinks/csv-sink.js'
import { LogResultSink } from '../../scraper/sinks/log-sink.js'

export interface RunCommandArgs {
  scraperId: string
  urls: string[]
  urlFile?: string
  sitemap: boolean
  /** Link selector; enables link discovery */
  links?: string
  saveErrors: boolean
  output?: string
  concurrency?: number
  errorThreshold?: number
  dropDuplicates: string[]
  allowEmpty: boolean
  signal?: AbortSignal
}

const log = loggers.cli

/** One URL per line; blank lines and lines starting with # are skipped. */
export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'))
}

function buildDiscovery(args: RunCommandArgs): DiscoveryStrategy | undefined {
  const links = args.links !== undefined ? new LinkDiscovery({ selector: args.links || undefined }) : undefined
  if (args.sitemap && links) {
    return chainDiscovery(new SitemapDiscovery(), links)
  }
  if (args.sitemap) {
    return new SitemapDiscovery()
  }
  return links
}

export async function runRunCommand(args: RunCommandArgs): Promise<number> {
  if (!args.scraperId) {
    console.error('Missing --scraper <id>')
    return 2
  }
  if (args.concurrency !== undefined && !Number.isInteger(args.concurrency)) {
    console.error('--concurrency must be an integer')
    return 2
  }
  if (args.errorThreshold !== undefined && Number.isNaN(args.errorThreshold)) {
    console.error('--error-threshold must be a number between 0 and 1')
    return 2
  }

  const registry = getScraperRegistry()
  if (registry.size() === 0) {
    registerAllScrapers()
  }
  const spec = registry.get(args.scraperId)
  if (!spec) {
    console.error(`Unknown scraper: ${args.scraperId} (available: ${registry.list().join(', ')})`)
    return 2
  }

  const seeds = [...args.urls]
  if (args.urlFile) {
    const urlFilePath = resolve(args.urlFile)
    if (!existsSync(urlFilePath)) {
      console.error(`URL file not found: ${urlFilePath}`)
      return 2
    }
    seeds.push(...parseUrlList(await readFile(urlFilePath, 'utf-8')))
  }
  if (seeds.length === 0) {
    console.error('No URLs given: use --url <url> or --url-file <path>')
    return 2
  }

  const operator = new ScraperOperator(
    {
      taskId: `cli-${spec.id}`,
      scrapers: [spec],
      seeds,
      sink: args.output ? new CsvFileResultSink(resolve(args.output)) : new LogResultSink(),
      saveErrors: args.saveErrors,
      failIfEmptyResults: !args.allowEmpty,
      discovery: buildDiscovery(args),
      concurrency: args.concurrency,
      errorThreshold: args.errorThreshold,
      dropDuplicates: args.dropDuplicates.length > 0 ? args.dropDuplicates : undefined,
    },
    log
  )

  try {
    const summary = await operator.execute(args.signal)
    console.log(JSON.stringify(summary))
    return 0
  } catch (error) {
    const classified = classifyError(error)
    log.error('Run failed', formatErrorForLog(classified))
    console.error(classified.message)
    return error instanceof ConfigurationError ? 2 : 1
  }
}
