import { describe, expect, it } from 'vitest'
import { linear, makeSeries } from '@/test/fixtures'
import { detectMoneyMarketStress } from './money-market'

describe('detectMoneyMarketStress', () => {
  it('classifies reverse repo usage into stress bands', () => {
    const result = detectMoneyMarketStress(makeSeries([250, 1000, 2000]))

    expect(result.stressRegime.map((p) => p.value)).toEqual(['Normal', 'Elevated', 'Stress'])
    expect(result.stressScore[0]?.value).toBe(25)
    expect(result.stressScore[1]?.value).toBe(70)
    expect(result.stressScore[2]?.value).toBeCloseTo(90 + 50 / 7, 8)
    expect(result.rrpLevel.map((p) => p.value)).toEqual([250, 1000, 2000])
  })

  it('tracks monthly change and acceleration', () => {
    const result = detectMoneyMarketStress(makeSeries(linear(50, 100, 10)))

    expect(result.rrpChange1m[20]?.value).toBeNaN()
    expect(result.rrpChange1m[21]?.value).toBeCloseTo((310 / 100 - 1) * 100, 8)
    expect(result.rrpAcceleration[41]?.value).toBeNaN()
    expect(result.rrpAcceleration[42]?.value).toBe(0)
  })

  it('returns an empty bundle for an empty series', () => {
    expect(detectMoneyMarketStress([]).stressScore).toEqual([])
  })
})
