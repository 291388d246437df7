/**
 * Default capability providers built from settings.
 */

import type { ILogger } from '@rowharvest/logger'
import type { HarvestSettings } from '../../config/settings.js'
import type { Fetcher, FetchMode } from '../types.js'
import { PlaywrightSessionProvider } from './browser-session.js'
import { HttpFetcher } from './http-fetcher.js'
import { RobotsPolicyImpl } from './robots.js'
import { RawFetchStrategy, RenderedFetchStrategy, type FetchStrategy } from './strategy.js'

export function createHttpFetcher(settings: HarvestSettings, logger: ILogger): Fetcher {
  return new HttpFetcher({
    userAgent: settings.userAgent,
    robotsPolicy: settings.respectRobots
      ? new RobotsPolicyImpl({ userAgent: settings.userAgent }, logger.child('robots'))
      : undefined,
    defaults: {
      timeoutMs: settings.fetchTimeoutMs,
      maxSizeBytes: settings.maxResponseBytes,
    },
    logger: logger.child('http'),
  })
}

export function createFetchStrategy(
  mode: FetchMode,
  settings: HarvestSettings,
  logger: ILogger,
  fetcher: Fetcher = createHttpFetcher(settings, logger)
): FetchStrategy {
  if (mode === 'raw') {
    return new RawFetchStrategy(fetcher, {
      timeoutMs: settings.fetchTimeoutMs,
      maxSizeBytes: settings.maxResponseBytes,
    })
  }

  return new RenderedFetchStrategy(
    new PlaywrightSessionProvider({
      headless: settings.headless,
      userAgent: settings.userAgent,
      executablePath: settings.browserExecutablePath,
      logger: logger.child('browser'),
    }),
    {
      timeoutMs: settings.fetchTimeoutMs,
      waitUntil: settings.waitUntil,
      resetSessionAfter: settings.resetSessionAfter,
      logger: logger.child('rendered'),
    }
  )
}
