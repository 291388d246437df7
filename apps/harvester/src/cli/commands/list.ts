import { registerAllScrapers } from '../../scraper/adapters/index.js'
import { getScraperRegistry } from '../../scraper/registry.js'

export async function runListCommand(): Promise<number> {
  const registry = getScraperRegistry()
  if (registry.size() === 0) {
    registerAllScrapers()
  }

  for (const id of registry.list()) {
    const spec = registry.get(id)
    if (spec) {
      console.log(`${spec.id}\t${spec.mode}\t${spec.columns.join(',')}`)
    }
  }
  return 0
}
