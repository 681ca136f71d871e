import { describe, expect, it } from 'vitest'
import { makeSeries } from '@/test/fixtures'
import { combineOnDates, daysBetween, latestValue, sliceAsOf, standardizeFrequency } from './alignment'

describe('sliceAsOf', () => {
  const series = makeSeries([1, 2, 3, 4, 5], '2024-01-01')

  it('keeps points on or before the as-of date', () => {
    expect(sliceAsOf(series, '2024-01-03').map((p) => p.value)).toEqual([1, 2, 3])
  })

  it('returns nothing before the first point', () => {
    expect(sliceAsOf(series, '2023-12-31')).toEqual([])
  })

  it('copies the whole series without a date', () => {
    const sliced = sliceAsOf(series)
    expect(sliced).toEqual(series)
    expect(sliced).not.toBe(series)
  })
})

describe('latestValue', () => {
  it('reads the value at the as-of date', () => {
    expect(latestValue(makeSeries([1, 2, 3], '2024-01-01'), '2024-01-02')).toBe(2)
  })

  it('treats a trailing NaN as unavailable', () => {
    expect(latestValue(makeSeries([1, 2, NaN]))).toBeNull()
  })

  it('returns null for an empty series', () => {
    expect(latestValue([])).toBeNull()
  })
})

describe('combineOnDates', () => {
  it('combines shared dates only', () => {
    const a = makeSeries([10, 20, 30], '2024-01-01')
    const b = makeSeries([1, 2], '2024-01-02')

    expect(combineOnDates(a, b, (x, y) => x - y)).toEqual([
      { date: '2024-01-02', value: 19 },
      { date: '2024-01-03', value: 28 },
    ])
  })
})

describe('daysBetween', () => {
  it('counts calendar days across a leap February', () => {
    expect(daysBetween('2024-01-01', '2024-03-01')).toBe(60)
  })
})

describe('standardizeFrequency', () => {
  // 2024-01-01 is a Monday; weeks close on Sunday
  const daily = makeSeries([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], '2024-01-01')

  it('takes the last value of each week by default', () => {
    expect(standardizeFrequency(daily)).toEqual([
      { date: '2024-01-07', value: 7 },
      { date: '2024-01-14', value: 10 },
    ])
  })

  it('supports first and mean aggregation', () => {
    expect(standardizeFrequency(daily, 'W', 'first').map((p) => p.value)).toEqual([1, 8])
    expect(standardizeFrequency(daily, 'W', 'mean').map((p) => p.value)).toEqual([4, 9])
  })

  it('buckets by month end and ignores missing values', () => {
    const series = [
      { date: '2024-01-30', value: 1 },
      { date: '2024-01-31', value: NaN },
      { date: '2024-02-01', value: 3 },
    ]
    expect(standardizeFrequency(series, 'M')).toEqual([
      { date: '2024-01-31', value: 1 },
      { date: '2024-02-29', value: 3 },
    ])
  })
})
