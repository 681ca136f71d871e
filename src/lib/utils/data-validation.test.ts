import { describe, expect, it } from 'vitest'
import { makeSeries } from '@/test/fixtures'
import { availableIndicators, findStaleSeries, getSeriesAgeInDays, validateSeries } from './data-validation'

describe('validateSeries', () => {
  it('accepts an ordered series', () => {
    expect(validateSeries(makeSeries([1, 2, 3]), 'vix')).toEqual({ isValid: true, errors: [], warnings: [] })
  })

  it('flags unordered and malformed dates', () => {
    const result = validateSeries(
      [
        { date: '2024-01-02', value: 1 },
        { date: '2024-01-02', value: 2 },
        { date: '01/03/2024', value: 3 },
      ],
      'vix'
    )

    expect(result.isValid).toBe(false)
    expect(result.errors).toEqual([
      'vix: dates not strictly increasing at index 1 (2024-01-02 -> 2024-01-02)',
      'vix: invalid date "01/03/2024" at index 2',
      'vix: dates not strictly increasing at index 2 (2024-01-02 -> 01/03/2024)',
    ])
  })

  it('warns about gaps and empty series', () => {
    expect(validateSeries(makeSeries([1, NaN, NaN]), 'spread').warnings).toEqual(['spread: 2 missing values'])
    expect(validateSeries([], 'spread').warnings).toEqual(['spread: series is empty'])
  })
})

describe('staleness', () => {
  const now = new Date(2024, 1, 9)

  it('measures age from the last observation', () => {
    expect(getSeriesAgeInDays(makeSeries([1, 2], '2024-02-01'), now)).toBe(7)
    expect(getSeriesAgeInDays([], now)).toBeNull()
  })

  it('lists series older than the limit in input order', () => {
    const stale = findStaleSeries(
      {
        vix: makeSeries([1], '2024-01-10'),
        spread: makeSeries([1], '2024-02-05'),
        credit_growth: makeSeries([1], '2024-02-02'),
        m2: undefined,
      },
      now,
      7
    )

    expect(stale).toEqual([{ name: 'vix', lastDate: '2024-01-10', ageInDays: 30 }])
  })

  it('counts available indicators', () => {
    expect(availableIndicators({ vix: makeSeries([1]), spread: [] }, ['vix', 'spread', 'hy_spread'])).toEqual(['vix'])
  })
})
