import { describe, expect, it } from 'vitest'
import { linear, makeSeries } from '@/test/fixtures'
import {
  calc3mAnnualized,
  calcAcceleration,
  calcDiff,
  calcPctChange,
  calcPercentile,
  calcRollingStats,
  calcZscore,
  detectInflection,
  getLatestValues,
} from './transforms'

const values = (series: { value: number }[]) => series.map((p) => p.value)

describe('changes', () => {
  it('computes percent change with NaN for a zero or missing base', () => {
    const result = values(calcPctChange(makeSeries([100, 110, 0, 50]), 1))

    expect(result[0]).toBeNaN()
    expect(result[1]).toBeCloseTo(10, 10)
    expect(result[2]).toBeCloseTo(-100, 10)
    expect(result[3]).toBeNaN()
  })

  it('keeps the input dates', () => {
    const series = makeSeries([1, 2, 3])
    expect(calcDiff(series).map((p) => p.date)).toEqual(['2020-01-01', '2020-01-02', '2020-01-03'])
  })

  it('differences over several periods', () => {
    const result = values(calcDiff(makeSeries([1, 4, 9, 16]), 2))
    expect(result.slice(2)).toEqual([8, 12])
    expect(result[0]).toBeNaN()
    expect(result[1]).toBeNaN()
  })

  it('compounds a quarterly change to an annual rate', () => {
    const result = values(calc3mAnnualized(makeSeries([100, 110]), 1))
    expect(result[1]).toBeCloseTo(46.41, 8)
  })

  it('takes the second difference for acceleration', () => {
    const result = values(calcAcceleration(makeSeries([0, 1, 4, 9, 16, 25]), 1, 1))
    expect(result.slice(2)).toEqual([2, 2, 2, 2])
  })
})

describe('calcZscore', () => {
  it('has exactly half a window of leading NaNs and is finite afterwards', () => {
    const series = makeSeries(Array.from({ length: 60 }, (_, i) => (i % 5) + i * 0.1))
    const result = values(calcZscore(series, { windowYears: 1, periodsPerYear: 20 }))

    const firstFinite = result.findIndex((v) => Number.isFinite(v))
    expect(firstFinite).toBe(10)
    expect(result.slice(10).every((v) => Number.isFinite(v))).toBe(true)
  })

  it('scores against the trailing window including the current point', () => {
    const result = values(calcZscore(makeSeries([1, 2, 3, 4]), { windowYears: 1, periodsPerYear: 4 }))

    expect(result[0]).toBeNaN()
    expect(result[1]).toBeNaN()
    expect(result[2]).toBeCloseTo(1, 10)
    expect(result[3]).toBeCloseTo(1.5 / Math.sqrt(5 / 3), 10)
  })

  it('accepts a full window as the minimum and agrees with calcPercentile on coverage', () => {
    const series = makeSeries(linear(40, 1, 1))
    const options = { windowYears: 1, periodsPerYear: 4, minPeriods: 4 }
    const z = values(calcZscore(series, options))
    const pct = values(calcPercentile(series, options))

    expect(z.slice(0, 3).every((v) => Number.isNaN(v))).toBe(true)
    expect(z.filter((v) => Number.isFinite(v))).toHaveLength(37)
    expect(pct.filter((v) => Number.isFinite(v))).toHaveLength(37)
    for (const v of z.slice(3)) {
      expect(v).toBeCloseTo(1.5 / Math.sqrt(5 / 3), 10)
    }
  })

  it('returns NaN where the window has zero variance', () => {
    const result = values(calcZscore(makeSeries(Array(20).fill(5)), { windowYears: 1, periodsPerYear: 10 }))
    expect(result.every((v) => Number.isNaN(v))).toBe(true)
  })
})

describe('calcPercentile', () => {
  it('ranks the window maximum at 100', () => {
    const result = values(calcPercentile(makeSeries(linear(30, 1, 1)), { windowYears: 1, periodsPerYear: 10 }))

    expect(result[3]).toBeNaN()
    expect(result[4]).toBe(100)
    expect(result[29]).toBe(100)
  })

  it('ranks the window minimum at 100 / n', () => {
    const result = values(calcPercentile(makeSeries(linear(20, 100, -1)), { windowYears: 1, periodsPerYear: 10 }))
    expect(result[19]).toBeCloseTo(10, 10)
  })

  it('averages tied ranks', () => {
    const result = values(calcPercentile(makeSeries([5, 5, 5, 5]), { windowYears: 1, periodsPerYear: 4 }))
    expect(result[1]).toBe(75)
    expect(result[3]).toBe(62.5)
  })

  it('counts ties as at-or-below for the weak kind', () => {
    const tied = values(calcPercentile(makeSeries([5, 5, 5, 5]), { windowYears: 1, periodsPerYear: 4, kind: 'weak' }))
    expect(tied[0]).toBeNaN()
    expect(tied[1]).toBe(100)
    expect(tied[3]).toBe(100)

    const mixed = makeSeries([1, 3, 2, 2])
    expect(calcPercentile(mixed, { windowYears: 1, periodsPerYear: 4, kind: 'weak' })[3]?.value).toBe(75)
    expect(calcPercentile(mixed, { windowYears: 1, periodsPerYear: 4 })[3]?.value).toBe(62.5)
  })

  it('stays within [0, 100]', () => {
    const noisy = makeSeries(Array.from({ length: 200 }, (_, i) => Math.sin(i) * 10 + (i % 7)))
    const result = values(calcPercentile(noisy, { windowYears: 1, periodsPerYear: 50 }))

    for (const v of result.filter((x) => !Number.isNaN(x))) {
      expect(v).toBeGreaterThanOrEqual(0)
      expect(v).toBeLessThanOrEqual(100)
    }
  })

  it('skips a missing current value', () => {
    const result = values(calcPercentile(makeSeries([1, 2, 3, NaN]), { windowYears: 1, periodsPerYear: 4 }))
    expect(result[3]).toBeNaN()
  })
})

describe('calcRollingStats', () => {
  it('summarizes a full window', () => {
    const stats = calcRollingStats(makeSeries([1, 2, 3, 4]), 4, 2)
    const last = stats[3]

    expect(stats[0]?.mean).toBeNaN()
    expect(last?.mean).toBe(2.5)
    expect(last?.median).toBe(2.5)
    expect(last?.min).toBe(1)
    expect(last?.max).toBe(4)
    expect(last?.std).toBeCloseTo(Math.sqrt(5 / 3), 10)
    expect(last?.skew).toBeCloseTo(0, 10)
    expect(last?.kurt).toBeCloseTo(-1.2, 10)
  })
})

describe('detectInflection', () => {
  it('marks peaks and troughs against a centered window', () => {
    const result = values(detectInflection(makeSeries([1, 3, 2, 0, 1, 1]), 3))
    expect(result).toEqual([0, 1, 0, -1, 0, 0])
  })

  it('drops turning points whose move is below the sensitivity', () => {
    const result = values(detectInflection(makeSeries([1, 3, 2, 0, 1, 1]), 3, 50))
    expect(result).toEqual([0, 0, 0, -1, 0, 0])
  })
})

describe('getLatestValues', () => {
  it('reports only the level for short series', () => {
    const result = getLatestValues(makeSeries([1, 2, 3]))
    expect(result).toEqual({ latest: 3, date: '2020-01-03' })
  })

  it('reports a trailing NaN as a missing level', () => {
    expect(getLatestValues(makeSeries([1, 2, NaN]))).toEqual({ latest: null, date: '2020-01-03' })
  })

  it('adds changes once more than a year of data is present', () => {
    const result = getLatestValues(makeSeries(linear(300, 100, 1)))

    expect(result.latest).toBe(399)
    expect(result.yoy).toBeCloseTo((399 / 147 - 1) * 100, 10)
    expect(result.change1m).toBeCloseTo((399 / 378 - 1) * 100, 10)
    expect(result.zscore3y).toBeNull()
    expect(result.zscore5y).toBeNull()
    expect(result.percentile3y).toBeNull()
  })
})
