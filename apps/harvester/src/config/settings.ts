/**
 * Harvester Settings
 *
 * Environment-driven defaults for fetching and execution, validated with zod.
 * Programmatic overrides win over environment values.
 */

import { z, type ZodError } from 'zod'
import { ConfigurationError } from '../scraper/errors.js'
import { DEFAULT_FETCH_OPTIONS, DEFAULT_USER_AGENT } from '../scraper/types.js'

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1')

const envSchema = z.object({
  HARVEST_FETCH_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_FETCH_OPTIONS.timeoutMs)
  ),
  HARVEST_MAX_RESPONSE_BYTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_FETCH_OPTIONS.maxSizeBytes)
  ),
  HARVEST_USER_AGENT: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_USER_AGENT)),
  HARVEST_HEADLESS: z.preprocess(emptyToUndefined, booleanFlag.default('true')),
  HARVEST_WAIT_UNTIL: z.preprocess(
    emptyToUndefined,
    z.enum(['load', 'domcontentloaded', 'networkidle']).default('load')
  ),
  HARVEST_CONCURRENCY: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).default(1)),
  HARVEST_ERROR_THRESHOLD: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(1).optional()),
  HARVEST_RESET_SESSION_AFTER: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().optional()
  ),
  HARVEST_RESPECT_ROBOTS: z.preprocess(emptyToUndefined, booleanFlag.default('false')),
  HARVEST_BROWSER_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
})

export const harvestSettingsSchema = z.object({
  fetchTimeoutMs: z.number().int().positive(),
  maxResponseBytes: z.number().int().positive(),
  userAgent: z.string().min(1),
  headless: z.boolean(),
  waitUntil: z.enum(['load', 'domcontentloaded', 'networkidle']),
  concurrency: z.number().int().min(1),
  errorThreshold: z.number().min(0).max(1).optional(),
  resetSessionAfter: z.number().int().positive().optional(),
  respectRobots: z.boolean(),
  browserExecutablePath: z.string().min(1).optional(),
})

export type HarvestSettings = z.infer<typeof harvestSettingsSchema>

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Resolve settings from the environment plus overrides.
 *
 * @throws ConfigurationError when a value does not validate
 */
export function loadSettings(
  overrides: Partial<HarvestSettings> = {},
  env: NodeJS.ProcessEnv = process.env
): HarvestSettings {
  const parsedEnv = envSchema.safeParse(env)
  if (!parsedEnv.success) {
    throw new ConfigurationError(
      `Invalid harvester environment: ${formatZodIssues(parsedEnv.error)}`,
      parsedEnv.error
    )
  }

  const fromEnv = parsedEnv.data
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  )

  const parsed = harvestSettingsSchema.safeParse({
    fetchTimeoutMs: fromEnv.HARVEST_FETCH_TIMEOUT_MS,
    maxResponseBytes: fromEnv.HARVEST_MAX_RESPONSE_BYTES,
    userAgent: fromEnv.HARVEST_USER_AGENT,
    headless: fromEnv.HARVEST_HEADLESS,
    waitUntil: fromEnv.HARVEST_WAIT_UNTIL,
    concurrency: fromEnv.HARVEST_CONCURRENCY,
    errorThreshold: fromEnv.HARVEST_ERROR_THRESHOLD,
    resetSessionAfter: fromEnv.HARVEST_RESET_SESSION_AFTER,
    respectRobots: fromEnv.HARVEST_RESPECT_ROBOTS,
    browserExecutablePath: fromEnv.HARVEST_BROWSER_PATH,
    ...defined,
  })
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid harvester settings: ${formatZodIssues(parsed.error)}`, parsed.error)
  }
  return parsed.data
}
