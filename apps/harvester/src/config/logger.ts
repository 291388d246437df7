/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@rowharvest/logger'

// Root logger for the harvester
export const logger = createLogger('harvester')

// Pre-configured child loggers for common components
export const loggers = {
  executor: logger.child('executor'),
  fetch: logger.child('fetch'),
  discovery: logger.child('discovery'),
  sink: logger.child('sink'),
  cli: logger.child('cli'),
}
