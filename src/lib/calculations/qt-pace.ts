import { CONFIG } from '@/lib/config'
import { calcDiff, calcPctChange } from '@/lib/research/transforms'
import type { Series, TimePoint } from '@/lib/research/types'
import { scoreSeries, type BandScale, type LabelSeries } from './piecewise-score'

export type QtPaceRegime = 'Normal' | 'Aggressive' | 'Stress'

export interface QtPaceResult {
  /** Month-over-month % change of Fed total assets; negative = QT */
  qtPace: Series
  /** Month-over-month change in billions */
  assetChange1m: Series
  /** Band of |assetChange1m| */
  paceRegime: LabelSeries<QtPaceRegime>
  paceScore: Series
}

/** Bands on the absolute monthly change in billions, run-off or expansion alike */
export const QT_PACE_SCALE: BandScale<QtPaceRegime> = {
  bands: [
    { lower: 0, label: 'Normal', scoreRange: [0, 50] },
    { lower: 50, label: 'Aggressive', scoreRange: [50, 80] },
    { lower: 100, label: 'Stress', scoreRange: [80, 100] },
  ],
  upper: 150,
}

function emptyQtPace(): QtPaceResult {
  return { qtPace: [], assetChange1m: [], paceRegime: [], paceScore: [] }
}

export function calculateQtPace(
  fedAssets: readonly TimePoint[] | undefined,
  periods1m: number = CONFIG.periods.oneMonthDaily
): QtPaceResult {
  if (!fedAssets || fedAssets.length < 2) return emptyQtPace()

  const qtPace = calcPctChange(fedAssets, periods1m)
  const assetChange1m = calcDiff(fedAssets, periods1m)
  const magnitude = assetChange1m.map((p) => ({ date: p.date, value: Math.abs(p.value) }))
  const { labels, scores } = scoreSeries(magnitude, QT_PACE_SCALE)

  return { qtPace, assetChange1m, paceRegime: labels, paceScore: scores }
}
