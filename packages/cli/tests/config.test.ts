/**
 * Run configuration tests
 */

import { describe, it, expect } from 'vitest'
import { InvalidArgumentError } from 'commander'
import { ConfigurationError } from '@opendata-mqa/core'
import { DEFAULT_CKAN_URL, resolveRunConfig } from '../src/config.js'
import { parseLocale, parseNonNegativeInt, parsePositiveInt } from '../src/utils/options.js'

describe('resolveRunConfig', () => {
  it('should fall back to defaults', () => {
    expect(resolveRunConfig({}, {})).toEqual({
      ckanUrl: DEFAULT_CKAN_URL,
      dataDir: 'data',
      resultsDir: 'results',
      timeoutMs: 5000,
      concurrency: 4,
      pageSize: 500,
      pageDelayMs: 2000,
    })
  })

  it('should read environment variables', () => {
    const config = resolveRunConfig(
      {},
      { MQA_TIMEOUT_MS: '3000', MQA_CONCURRENCY: '8', MQA_RESULTS_DIR: '' }
    )

    expect(config.timeoutMs).toBe(3000)
    expect(config.concurrency).toBe(8)
    expect(config.resultsDir).toBe('results')
  })

  it('should prefer command options over the environment', () => {
    const config = resolveRunConfig({ timeoutMs: 1000 }, { MQA_TIMEOUT_MS: '3000' })
    expect(config.timeoutMs).toBe(1000)
  })

  it('should name the invalid field', () => {
    expect(() => resolveRunConfig({}, { MQA_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError)
    expect(() => resolveRunConfig({}, { MQA_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid timeoutMs: Expected number, received nan'
    )
    expect(() => resolveRunConfig({ concurrency: 100 }, {})).toThrow(
      'Invalid concurrency: Number must be less than or equal to 64'
    )
    expect(() => resolveRunConfig({ ckanUrl: 'catalog' }, {})).toThrow('Invalid ckanUrl: Invalid url')
  })
})

describe('option parsers', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('3')).toBe(3)
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError)
    expect(() => parsePositiveInt('2.5')).toThrow('Expected a positive integer.')
  })

  it('should parse non-negative integers', () => {
    expect(parseNonNegativeInt('0')).toBe(0)
    expect(() => parseNonNegativeInt('-1')).toThrow('Expected a non-negative integer.')
  })

  it('should accept only supported locales', () => {
    expect(parseLocale('de')).toBe('de')
    expect(() => parseLocale('fr')).toThrow('Expected "en" or "de".')
  })
})
