/**
 * Environment loader - must be imported first before any other modules
 *
 * This uses an explicit path to load from apps/harvester/.env.local
 * Only loads in development - production uses platform-injected env vars
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

// Only load .env.local outside production
if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
