/**
 * Rules command tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { describeRules, runRules } from '../src/commands/rules.js'

describe('describeRules', () => {
  it('should describe all dimensions and indicators', () => {
    const rules = describeRules()

    expect(rules.maxTotalScore).toBe(405)
    expect(rules.dimensions.map((dimension) => [dimension.name, dimension.maxPoints])).toEqual([
      ['Findability', 100],
      ['Accessibility', 100],
      ['Interoperability', 110],
      ['Reusability', 75],
      ['Context', 20],
    ])
    expect(rules.dimensions.flatMap((dimension) => dimension.indicators)).toHaveLength(23)
  })

  it('should label rating bands in the requested locale', () => {
    expect(describeRules('de').ratings).toEqual([
      { rating: 'Mangelhaft', max: 120 },
      { rating: 'Ausreichend', max: 220 },
      { rating: 'Gut', max: 350 },
      { rating: 'Ausgezeichnet', max: 405 },
    ])
  })
})

describe('runRules', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should print JSON', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    runRules({ json: true })

    expect(log).toHaveBeenCalledTimes(1)
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual(describeRules('en'))
  })

  it('should print the table and rating bands', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    runRules({})

    expect(log).toHaveBeenCalledTimes(2)
    expect(log).toHaveBeenLastCalledWith(
      'Ratings: Poor ≤ 120 < Sufficient ≤ 220 < Good ≤ 350 < Excellent ≤ 405'
    )
  })
})
