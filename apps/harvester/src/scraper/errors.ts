/**
 * Harvester Error Taxonomy
 *
 * Per-URL kinds (fetch, schema, handler, discovery) are captured into the
 * error log and never thrown past the URL boundary. Run-level errors reject
 * the run.
 */

import { ZodError } from 'zod'
import type { ErrorRecord, Table } from './types.js'

export type ScraperErrorKind =
  | 'FetchFailure'
  | 'SchemaViolation'
  | 'HandlerFailure'
  | 'DiscoveryFailure'

export type RunErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'EMPTY_URL_SET'
  | 'ERROR_THRESHOLD_EXCEEDED'
  | 'RUN_CANCELLED'
  | 'EMPTY_RESULTS'

export class HarvestError extends Error {
  public readonly code: string
  public readonly retryable: boolean

  constructor(message: string, options: { code: string; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.code = options.code
    this.retryable = options.retryable ?? false
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Per-URL failures
// ═══════════════════════════════════════════════════════════════════════════════

export abstract class UrlFailure extends HarvestError {
  abstract readonly kind: ScraperErrorKind

  constructor(
    public readonly url: string,
    message: string,
    options: { code: string; retryable?: boolean; cause?: unknown }
  ) {
    super(message, options)
  }

  toRecord(): ErrorRecord {
    return { url: this.url, message: this.message, kind: this.kind }
  }
}

export class FetchFailure extends UrlFailure {
  readonly kind = 'FetchFailure'

  constructor(url: string, message: string, public readonly statusCode?: number, cause?: unknown) {
    super(url, message, { code: 'FETCH_FAILED', retryable: true, cause })
  }
}

export class SchemaViolation extends UrlFailure {
  readonly kind = 'SchemaViolation'

  constructor(url: string, message: string) {
    super(url, message, { code: 'SCHEMA_VIOLATION' })
  }

  static forRow(url: string, rowIndex: number, missing: string[], unexpected: string[]): SchemaViolation {
    return new SchemaViolation(url, describeSchemaViolation(rowIndex, missing, unexpected))
  }
}

/**
 * Wraps whatever the handler threw. The message is the original one,
 * unchanged, so the error log shows exactly what the handler reported.
 */
export class HandlerFailure extends UrlFailure {
  readonly kind = 'HandlerFailure'

  constructor(url: string, cause: unknown) {
    super(url, describeThrown(cause), { code: 'HANDLER_FAILED', cause })
  }
}

export class DiscoveryFailure extends UrlFailure {
  readonly kind = 'DiscoveryFailure'

  constructor(seedUrl: string, message: string, cause?: unknown) {
    super(seedUrl, message, { code: 'DISCOVERY_FAILED', retryable: true, cause })
  }
}

/**
 * Thrown by DocumentHandle queries when an expected element is absent.
 * Surfaces in the error log as a HandlerFailure.
 */
export class ElementNotFoundError extends HarvestError {
  constructor(selector: string) {
    super(`Unable to locate element: ${selector}`, { code: 'ELEMENT_NOT_FOUND' })
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run-level failures
// ═══════════════════════════════════════════════════════════════════════════════

export class ConfigurationError extends HarvestError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'CONFIGURATION_ERROR', cause })
  }
}

export class EmptyUrlSetError extends HarvestError {
  constructor(public readonly errorLog: ErrorRecord[] = []) {
    super('No URLs to fetch after discovery', { code: 'EMPTY_URL_SET', retryable: true })
  }
}

export class ErrorThresholdExceededError extends HarvestError {
  constructor(
    public readonly threshold: number,
    public readonly errorLog: ErrorRecord[]
  ) {
    super(`Errors passed the ${formatPercent(threshold)}% threshold`, {
      code: 'ERROR_THRESHOLD_EXCEEDED',
    })
  }
}

/**
 * Rejection of a cancelled run. Carries what was accumulated before the
 * signal fired.
 */
export class RunCancelledError extends HarvestError {
  constructor(
    public readonly partial: { table: Table; errorLog: ErrorRecord[] },
    cause?: unknown
  ) {
    super('Run cancelled', { code: 'RUN_CANCELLED', retryable: true, cause })
  }
}

export class EmptyResultsError extends HarvestError {
  constructor() {
    super('No results from scraper run', { code: 'EMPTY_RESULTS', retryable: true })
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification for logs
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory = 'configuration' | 'fetch' | 'extraction' | 'discovery' | 'run' | 'internal'

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ZodError) {
    return {
      category: 'configuration',
      code: 'CONFIGURATION_ERROR',
      message: 'Validation failed',
      isRetryable: false,
      details: {
        issues: error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof UrlFailure) {
    return {
      category: categoryForKind(error.kind),
      code: error.code,
      message: error.message,
      isRetryable: error.retryable,
      details: { url: error.url, kind: error.kind },
      originalError: error,
    }
  }

  if (error instanceof HarvestError) {
    return {
      category: error instanceof ConfigurationError ? 'configuration' : 'run',
      code: error.code,
      message: error.message,
      isRetryable: error.retryable,
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return {
      category: 'internal',
      code: 'UNEXPECTED_ERROR',
      message: error.message || 'An unexpected error occurred',
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: 'UNEXPECTED_ERROR',
    message: String(error),
    isRetryable: false,
  }
}

/**
 * Format a classified error for logging
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_stack: classified.originalError.stack,
      error_name: classified.originalError.name,
    }),
  }
}

function categoryForKind(kind: ScraperErrorKind): ErrorCategory {
  switch (kind) {
    case 'FetchFailure':
      return 'fetch'
    case 'SchemaViolation':
    case 'HandlerFailure':
      return 'extraction'
    case 'DiscoveryFailure':
      return 'discovery'
  }
}

export function describeThrown(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

function describeSchemaViolation(rowIndex: number, missing: string[], unexpected: string[]): string {
  const parts: string[] = []
  if (missing.length > 0) {
    parts.push(`missing columns [${missing.join(', ')}]`)
  }
  if (unexpected.length > 0) {
    parts.push(`unexpected columns [${unexpected.join(', ')}]`)
  }
  return `Schema violation in row ${rowIndex}: ${parts.join('; ')}`
}

function formatPercent(fraction: number): string {
  return String(Math.round(fraction * 10000) / 100)
}
