import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, setLogLevel, setRedactionEnabled, silentLogger } from '../index.js'

function lastJsonLine(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const calls = spy.mock.calls
  const [line] = calls[calls.length - 1]
  const parsed: unknown = JSON.parse(String(line))
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Expected a JSON object, got: ${String(line)}`)
  }
  return Object.fromEntries(Object.entries(parsed))
}

describe('logger', () => {
  const originalLogFormat = process.env.LOG_FORMAT

  afterEach(() => {
    vi.restoreAllMocks()
    setRedactionEnabled(null)
    setLogLevel(null)
    process.env.LOG_FORMAT = originalLogFormat
  })

  it('writes JSON entries with service, component and context', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')

    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    const logger = createLogger('harvester').child('executor', { runId: 'run-1' })

    logger.info('Run started', { urlCount: 3 })

    expect(consoleInfo).toHaveBeenCalledTimes(1)
    const payload = lastJsonLine(consoleInfo)
    expect(payload.service).toBe('harvester')
    expect(payload.component).toBe('executor')
    expect(payload.message).toBe('Run started')
    expect(payload.level).toBe('info')
    expect(payload.runId).toBe('run-1')
    expect(payload.urlCount).toBe(3)
  })

  it('nests component names for grandchildren', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('debug')

    const consoleDebug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    createLogger('harvester').child('fetch').child('rendered').debug('navigating')

    expect(lastJsonLine(consoleDebug).component).toBe('fetch:rendered')
  })

  it('drops entries below the configured level', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('warn')

    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const logger = createLogger('harvester')

    logger.info('hidden')
    logger.warn('shown')

    expect(consoleInfo).not.toHaveBeenCalled()
    expect(consoleWarn).toHaveBeenCalledTimes(1)
  })

  it('serialises errors passed to error()', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')

    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    createLogger('harvester').error('Run failed', {}, new TypeError('boom'))

    const payload = lastJsonLine(consoleError)
    expect(payload.error).toMatchObject({ name: 'TypeError', message: 'boom' })
  })

  it('redacts credential-like fields when enabled', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')
    setRedactionEnabled(true)

    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    createLogger('harvester').info('request', {
      Authorization: 'Bearer test-secret',
      cookie: 'session=test-secret',
      url: 'https://example.com/a',
    })

    const payload = lastJsonLine(consoleInfo)
    expect(payload.Authorization).toBe('[REDACTED]')
    expect(payload.cookie).toBe('[REDACTED]')
    expect(payload.url).toBe('https://example.com/a')
  })

  it('keeps values as-is when redaction is off', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')
    setRedactionEnabled(false)

    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    createLogger('harvester').info('request', { token: 'test-token' })

    expect(lastJsonLine(consoleInfo).token).toBe('test-token')
  })

  it('silentLogger swallows every level and returns itself as child', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    silentLogger.info('nothing')
    expect(silentLogger.child('x')).toBe(silentLogger)
    expect(consoleInfo).not.toHaveBeenCalled()
  })
})
