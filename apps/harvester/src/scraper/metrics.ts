/**
 * Harvest Metrics
 *
 * No metrics backend. This module emits structured log events only.
 */

import type { ILogger } from '@rowharvest/logger'
import { loggers } from '../config/logger.js'

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_URLS_FOR_ALERT = 20

export type RunStatus = 'SUCCESS' | 'PARTIAL' | 'FAILED' | 'CANCELLED'

export interface RunCompletedPayload {
  runId: string
  scraperId: string
  status: RunStatus
  urlsResolved: number
  urlsSucceeded: number
  urlsFailed: number
  discoveryFailures: number
  rowsExtracted: number
  failureRate: number
  durationMs: number
}

export function deriveRunStatus(succeeded: number, failed: number): RunStatus {
  if (failed === 0) return 'SUCCESS'
  if (succeeded === 0) return 'FAILED'
  return 'PARTIAL'
}

export function recordRunCompleted(payload: RunCompletedPayload, log: ILogger = loggers.executor): void {
  log.info('HARVEST_RUN_COMPLETED', {
    event_name: 'HARVEST_RUN_COMPLETED',
    ...payload,
  })

  if (payload.urlsResolved >= MIN_URLS_FOR_ALERT && payload.failureRate > FAILURE_RATE_ALERT_THRESHOLD) {
    log.warn('HARVEST_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'HARVEST_ALERT_HIGH_FAILURE_RATE',
      runId: payload.runId,
      scraperId: payload.scraperId,
      failureRate: payload.failureRate,
      urlsResolved: payload.urlsResolved,
    })
  }
}
