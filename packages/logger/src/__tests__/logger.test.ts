import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createLogger, redact, setLogSink, shouldLog, type LogEntry } from '../index.js'

describe('logger', () => {
  const entries: LogEntry[] = []
  const lines: string[] = []
  let restoreSink: () => void
  const originalLevel = process.env.LOG_LEVEL
  const originalFormat = process.env.LOG_FORMAT

  beforeEach(() => {
    entries.length = 0
    lines.length = 0
    process.env.LOG_LEVEL = 'debug'
    process.env.LOG_FORMAT = 'json'
    restoreSink = setLogSink((entry, formatted) => {
      entries.push(entry)
      lines.push(formatted)
    })
  })

  afterEach(() => {
    restoreSink()
    if (originalLevel === undefined) delete process.env.LOG_LEVEL
    else process.env.LOG_LEVEL = originalLevel
    if (originalFormat === undefined) delete process.env.LOG_FORMAT
    else process.env.LOG_FORMAT = originalFormat
  })

  it('writes one JSON line per entry with service and message', () => {
    createLogger('engine').info('Search started', { region: 'US' })

    expect(entries).toHaveLength(1)
    const parsed = JSON.parse(lines[0])
    expect(parsed.service).toBe('engine')
    expect(parsed.level).toBe('info')
    expect(parsed.message).toBe('Search started')
    expect(parsed.region).toBe('US')
  })

  it('builds component paths for nested children', () => {
    const log = createLogger('engine').child('orchestrator').child('fetch', { runId: 'run_1' })
    log.warn('Source failed', { sourceId: 'ebay' })

    expect(entries[0].component).toBe('orchestrator:fetch')
    expect(entries[0].runId).toBe('run_1')
    expect(entries[0].sourceId).toBe('ebay')
  })

  it('respects LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn'
    const log = createLogger('engine')
    log.info('dropped')
    log.error('kept')

    expect(entries.map((e) => e.message)).toEqual(['kept'])
  })

  it('serializes errors with name, message and code', () => {
    const err = Object.assign(new Error('boom'), { code: 'SOURCE_TIMEOUT' })
    createLogger('engine').error('Adapter failed', {}, err)

    expect(entries[0].error?.name).toBe('Error')
    expect(entries[0].error?.message).toBe('boom')
    expect(entries[0].error?.code).toBe('SOURCE_TIMEOUT')
  })

  it('redacts credential-like keys', () => {
    createLogger('engine').info('Connecting', { password: 'test-secret', host: 'localhost' })

    expect(entries[0].password).toBe('[REDACTED]')
    expect(entries[0].host).toBe('localhost')
  })
})

describe('redact', () => {
  it('redacts nested credential keys one level deep', () => {
    expect(redact({ redis: { host: 'localhost', password: 'test-secret' } })).toEqual({
      redis: { host: 'localhost', password: '[REDACTED]' },
    })
  })

  it('leaves arrays untouched', () => {
    expect(redact({ failedSources: ['a', 'b'] })).toEqual({ failedSources: ['a', 'b'] })
  })
})

describe('shouldLog', () => {
  it('compares against the minimum level', () => {
    expect(shouldLog('debug', 'info')).toBe(false)
    expect(shouldLog('info', 'info')).toBe(true)
    expect(shouldLog('fatal', 'error')).toBe(true)
  })
})
