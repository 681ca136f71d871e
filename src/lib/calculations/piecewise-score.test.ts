import { describe, expect, it } from 'vitest'
import { makeSeries } from '@/test/fixtures'
import { MONEY_MARKET_SCALE } from './money-market'
import { scorePiecewise, scoreSeries, shareOfTotal } from './piecewise-score'
import { reserveScale } from './reserves'

describe('scorePiecewise', () => {
  it('rescales within the matched band', () => {
    expect(scorePiecewise(250, MONEY_MARKET_SCALE)).toEqual({ label: 'Normal', score: 25 })
    expect(scorePiecewise(1000, MONEY_MARKET_SCALE)).toEqual({ label: 'Elevated', score: 70 })
    expect(scorePiecewise(2200, MONEY_MARKET_SCALE)).toEqual({ label: 'Stress', score: 100 })
  })

  it('assigns a boundary value to the higher band', () => {
    expect(scorePiecewise(500, MONEY_MARKET_SCALE)).toEqual({ label: 'Elevated', score: 50 })
    expect(scorePiecewise(1500, MONEY_MARKET_SCALE)).toEqual({ label: 'Stress', score: 90 })
  })

  it('is continuous across band boundaries', () => {
    expect(scorePiecewise(499.999, MONEY_MARKET_SCALE).score).toBeCloseTo(50, 3)
    expect(scorePiecewise(1499.999, MONEY_MARKET_SCALE).score).toBeCloseTo(90, 3)
  })

  it('clamps values outside the scale', () => {
    expect(scorePiecewise(-100, MONEY_MARKET_SCALE)).toEqual({ label: 'Normal', score: 0 })
    expect(scorePiecewise(5000, MONEY_MARKET_SCALE)).toEqual({ label: 'Stress', score: 100 })
  })

  it('leaves missing values unlabelled', () => {
    const result = scorePiecewise(NaN, MONEY_MARKET_SCALE)
    expect(result.label).toBeNull()
    expect(result.score).toBeNaN()
  })

  it('supports descending score ranges', () => {
    const scale = reserveScale()
    expect(scorePiecewise(3000, scale)).toEqual({ label: 'Abundant', score: 20 })
    expect(scorePiecewise(250, scale)).toEqual({ label: 'Scarce', score: 87.5 })
  })
})

describe('scoreSeries', () => {
  it('keeps the input dates', () => {
    const { labels, scores } = scoreSeries(makeSeries([250, NaN], '2024-03-01'), MONEY_MARKET_SCALE)

    expect(labels).toEqual([
      { date: '2024-03-01', value: 'Normal' },
      { date: '2024-03-02', value: null },
    ])
    expect(scores[0]).toEqual({ date: '2024-03-01', value: 25 })
  })
})

describe('shareOfTotal', () => {
  it('divides by the combined total', () => {
    expect(shareOfTotal(100, 900)).toBe(0.1)
    expect(shareOfTotal(0, 0)).toBeNaN()
  })
})
