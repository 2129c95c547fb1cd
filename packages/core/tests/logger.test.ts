/**
 * Logger tests
 */

import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest'
import {
  LogLevel,
  MemoryLogAggregator,
  createLogger,
  formatLogEntry,
  getLogAggregator,
  setLogAggregator,
  type LogAggregator,
} from '../src/utils/logger.js'

describe('formatLogEntry', () => {
  const entry = {
    level: LogLevel.WARN,
    timestamp: '2024-01-01T00:00:00.000Z',
    namespace: 'BatchRunner',
    message: 'Record scoring defect',
    context: { recordId: 'r1' },
  }

  it('should prefix the namespace', () => {
    expect(formatLogEntry(entry, false)).toBe(
      '[mqa:BatchRunner] Record scoring defect {"recordId":"r1"}'
    )
    expect(formatLogEntry({ ...entry, namespace: undefined, context: undefined }, false)).toBe(
      '[mqa] Record scoring defect'
    )
  })

  it('should emit JSON with the level name', () => {
    expect(JSON.parse(formatLogEntry(entry, true))).toEqual({
      level: 'WARN',
      timestamp: '2024-01-01T00:00:00.000Z',
      namespace: 'BatchRunner',
      message: 'Record scoring defect',
      context: { recordId: 'r1' },
    })
  })
})

describe('MemoryLogAggregator', () => {
  it('should keep only the newest entries', () => {
    const aggregator = new MemoryLogAggregator(2)
    for (const message of ['a', 'b', 'c']) {
      aggregator.add({ level: LogLevel.INFO, timestamp: '', message })
    }

    expect(aggregator.getLogs().map((entry) => entry.message)).toEqual(['b', 'c'])
    aggregator.clear()
    expect(aggregator.getLogs()).toEqual([])
  })
})

describe('createLogger', () => {
  let previous: LogAggregator
  let aggregator: MemoryLogAggregator

  beforeEach(() => {
    previous = getLogAggregator()
    aggregator = new MemoryLogAggregator()
    setLogAggregator(aggregator)
  })

  afterEach(() => {
    setLogAggregator(previous)
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('should record entries even when output is suppressed', () => {
    vi.stubEnv('NODE_ENV', 'test')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createLogger('BatchRunner').warn('Record scoring defect', { recordId: 'r1' })

    expect(warn).not.toHaveBeenCalled()
    expect(aggregator.getLogs()).toHaveLength(1)
    expect(aggregator.getLogs()[0]).toMatchObject({
      level: LogLevel.WARN,
      namespace: 'BatchRunner',
      message: 'Record scoring defect',
      context: { recordId: 'r1' },
    })
  })

  it('should print errors', () => {
    vi.stubEnv('LOG_FORMAT', 'json')
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    createLogger('Catalog').error('Fetch failed', new Error('HTTP 503'))

    expect(error).toHaveBeenCalledTimes(1)
    expect(aggregator.getLogs()[0]?.error?.message).toBe('HTTP 503')
  })

  it('should print debug output only when DEBUG is set', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

    vi.stubEnv('DEBUG', '')
    createLogger('Probe').debug('quiet')
    expect(debug).not.toHaveBeenCalled()

    vi.stubEnv('DEBUG', 'true')
    createLogger('Probe').debug('loud')
    expect(debug).toHaveBeenCalledWith('[mqa:Probe] loud')
  })
})
