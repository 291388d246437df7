import '../env.js'
import { runListCommand } from './commands/list.js'
import { runRunCommand } from './commands/run.js'
import { asList, asNumber, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Harvest CLI')
  console.log('')
  console.log('Commands:')
  console.log('  run --scraper <id> [--url <url>]... [--url-file <path>] [--sitemap] [--links [selector]]')
  console.log('      [--save-errors] [--output <file.csv>] [--concurrency <n>] [--error-threshold <0..1>]')
  console.log('      [--drop-duplicates <col,col>] [--allow-empty]')
  console.log('  list')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'run': {
      const controller = new AbortController()
      process.once('SIGINT', () => controller.abort())
      exitCode = await runRunCommand({
        scraperId: asString(flags.scraper),
        urls: asList(flags.url),
        urlFile: asString(flags['url-file']) || undefined,
        sitemap: flags.sitemap === true,
        links: flags.links === undefined ? undefined : asString(flags.links),
        saveErrors: flags['save-errors'] === true,
        output: asString(flags.output) || undefined,
        concurrency: asNumber(flags.concurrency),
        errorThreshold: asNumber(flags['error-threshold']),
        dropDuplicates: asList(flags['drop-duplicates']),
        allowEmpty: flags['allow-empty'] === true,
        signal: controller.signal,
      })
      break
    }
    case 'list':
      exitCode = await runListCommand()
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
