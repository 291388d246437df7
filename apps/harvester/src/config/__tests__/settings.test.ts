import { describe, it, expect } from 'vitest'
import { loadSettings } from '../settings.js'
import { ConfigurationError } from '../../scraper/errors.js'

describe('loadSettings', () => {
  it('applies defaults when the environment is empty', () => {
    const settings = loadSettings({}, {})

    expect(settings.fetchTimeoutMs).toBe(30000)
    expect(settings.maxResponseBytes).toBe(10 * 1024 * 1024)
    expect(settings.headless).toBe(true)
    expect(settings.waitUntil).toBe('load')
    expect(settings.concurrency).toBe(1)
    expect(settings.errorThreshold).toBeUndefined()
    expect(settings.resetSessionAfter).toBeUndefined()
    expect(settings.respectRobots).toBe(false)
  })

  it('reads and coerces HARVEST_* variables', () => {
    const settings = loadSettings(
      {},
      {
        HARVEST_FETCH_TIMEOUT_MS: '5000',
        HARVEST_HEADLESS: 'false',
        HARVEST_WAIT_UNTIL: 'networkidle',
        HARVEST_CONCURRENCY: '4',
        HARVEST_ERROR_THRESHOLD: '0.25',
        HARVEST_RESET_SESSION_AFTER: '50',
        HARVEST_RESPECT_ROBOTS: '1',
      }
    )

    expect(settings.fetchTimeoutMs).toBe(5000)
    expect(settings.headless).toBe(false)
    expect(settings.waitUntil).toBe('networkidle')
    expect(settings.concurrency).toBe(4)
    expect(settings.errorThreshold).toBe(0.25)
    expect(settings.resetSessionAfter).toBe(50)
    expect(settings.respectRobots).toBe(true)
  })

  it('treats blank variables as unset', () => {
    const settings = loadSettings({}, { HARVEST_ERROR_THRESHOLD: '', HARVEST_CONCURRENCY: '  ' })

    expect(settings.errorThreshold).toBeUndefined()
    expect(settings.concurrency).toBe(1)
  })

  it('lets overrides win over the environment', () => {
    const settings = loadSettings({ concurrency: 2, errorThreshold: undefined }, { HARVEST_CONCURRENCY: '8' })

    expect(settings.concurrency).toBe(2)
  })

  it('rejects invalid environment values with ConfigurationError', () => {
    expect(() => loadSettings({}, { HARVEST_WAIT_UNTIL: 'whenever' })).toThrow(ConfigurationError)
    expect(() => loadSettings({}, { HARVEST_CONCURRENCY: 'many' })).toThrow(
      /Invalid harvester environment: HARVEST_CONCURRENCY/
    )
  })

  it('rejects invalid overrides', () => {
    expect(() => loadSettings({ errorThreshold: 1.5 }, {})).toThrow(
      /Invalid harvester settings: errorThreshold/
    )
  })
})
