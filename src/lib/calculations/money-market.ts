import { CONFIG } from '@/lib/config'
import { calcDiff, calcPctChange } from '@/lib/research/transforms'
import type { Series, TimePoint } from '@/lib/research/types'
import { scoreSeries, type BandScale, type LabelSeries } from './piecewise-score'

export type MoneyMarketRegime = 'Normal' | 'Elevated' | 'Stress'

// Overnight RRP usage in billions; the 2022-23 peak sat around 2,200
export const MONEY_MARKET_SCALE: BandScale<MoneyMarketRegime> = {
  bands: [
    { lower: 0, label: 'Normal', scoreRange: [0, 50] },
    { lower: 500, label: 'Elevated', scoreRange: [50, 90] },
    { lower: 1500, label: 'Stress', scoreRange: [90, 100] },
  ],
  upper: 2200,
}

export interface MoneyMarketStressResult {
  rrpLevel: Series
  stressRegime: LabelSeries<MoneyMarketRegime>
  stressScore: Series
  /** % change over one month */
  rrpChange1m: Series
  /** Change of the one-month change */
  rrpAcceleration: Series
}

export function detectMoneyMarketStress(reverseRepo: readonly TimePoint[] | undefined): MoneyMarketStressResult {
  if (!reverseRepo || reverseRepo.length === 0) {
    return { rrpLevel: [], stressRegime: [], stressScore: [], rrpChange1m: [], rrpAcceleration: [] }
  }

  const month = CONFIG.periods.oneMonthDaily
  const { labels, scores } = scoreSeries(reverseRepo, MONEY_MARKET_SCALE)

  return {
    rrpLevel: reverseRepo.map((p) => ({ date: p.date, value: p.value })),
    stressRegime: labels,
    stressScore: scores,
    rrpChange1m: calcPctChange(reverseRepo, month),
    rrpAcceleration: calcDiff(calcDiff(reverseRepo, month), month),
  }
}
