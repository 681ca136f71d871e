import { CONFIG } from '@/lib/config'
import { calcPercentile, calcYoY } from '@/lib/research/transforms'
import type { Series, TimePoint } from '@/lib/research/types'
import { scoreSeries, type BandScale, type LabelSeries } from './piecewise-score'

export type FedLendingRegime = 'Normal' | 'Elevated' | 'Stress'

// Lending facilities in billions; GFC peaked near 900, COVID near 600
export const FED_LENDING_SCALE: BandScale<FedLendingRegime> = {
  bands: [
    { lower: 0, label: 'Normal', scoreRange: [0, 50] },
    { lower: 100, label: 'Elevated', scoreRange: [50, 90] },
    { lower: 300, label: 'Stress', scoreRange: [90, 100] },
  ],
  upper: 1000,
}

export interface FedLendingStressResult {
  lendingLevel: Series
  stressRegime: LabelSeries<FedLendingRegime>
  stressScore: Series
  lendingYoY: Series
  lendingPercentile3y: Series
}

export function calculateFedLendingStress(fedLending: readonly TimePoint[] | undefined): FedLendingStressResult {
  if (!fedLending || fedLending.length === 0) {
    return { lendingLevel: [], stressRegime: [], stressScore: [], lendingYoY: [], lendingPercentile3y: [] }
  }

  const { tradingDaysPerYear } = CONFIG.periods
  const { labels, scores } = scoreSeries(fedLending, FED_LENDING_SCALE)

  return {
    lendingLevel: fedLending.map((p) => ({ date: p.date, value: p.value })),
    stressRegime: labels,
    stressScore: scores,
    lendingYoY: calcYoY(fedLending, tradingDaysPerYear),
    lendingPercentile3y: calcPercentile(fedLending, {
      windowYears: 3,
      periodsPerYear: tradingDaysPerYear,
      kind: 'weak',
    }),
  }
}
