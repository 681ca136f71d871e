import type { DatedValue, Series, TimePoint } from '@/lib/research/types'

/**
 * One band of a piecewise scale. A value belongs to the last band whose
 * `lower` it reaches; within the band it is rescaled into `scoreRange`.
 */
export interface ScoreBand<L extends string> {
  lower: number
  label: L
  /** [score at lower bound, score at next band's lower bound] */
  scoreRange: readonly [number, number]
}

export interface BandScale<L extends string> {
  /** Ordered by ascending `lower` */
  bands: readonly [ScoreBand<L>, ...ScoreBand<L>[]]
  /** Upper bound of the last band, used only for rescaling */
  upper: number
}

export interface BandScore<L extends string> {
  label: L | null
  score: number
}

export type LabelSeries<L extends string> = DatedValue<L | null>[]
export type FlagSeries = DatedValue<boolean>[]

export interface ScoredSeries<L extends string> {
  labels: LabelSeries<L>
  scores: Series
}

/**
 * Classify a value into a band and rescale it within the band's score range.
 * Bands are applied in ascending order, so a value sitting exactly on a
 * boundary takes the higher band. Values below every band take the first.
 */
export function scorePiecewise<L extends string>(value: number, scale: BandScale<L>): BandScore<L> {
  if (Number.isNaN(value)) return { label: null, score: NaN }

  const { bands, upper } = scale
  let index = 0
  bands.forEach((band, i) => {
    if (value >= band.lower) index = i
  })

  const band = bands[index] ?? bands[0]
  const end = bands[index + 1]?.lower ?? upper
  const span = end - band.lower
  const position = span > 0 ? (value - band.lower) / span : 0

  const [lo, hi] = band.scoreRange
  const raw = lo + (hi - lo) * position
  const score = Math.min(Math.max(raw, Math.min(lo, hi)), Math.max(lo, hi))

  return { label: band.label, score }
}

/**
 * Apply `scorePiecewise` point by point, preserving the input's dates
 */
export function scoreSeries<L extends string>(series: readonly TimePoint[], scale: BandScale<L>): ScoredSeries<L> {
  const labels: LabelSeries<L> = []
  const scores: Series = []

  for (const point of series) {
    const { label, score } = scorePiecewise(point.value, scale)
    labels.push({ date: point.date, value: label })
    scores.push({ date: point.date, value: score })
  }

  return { labels, scores }
}

/**
 * Combine two equal-length series point by point; dates come from `a`
 */
export function zipSeries(
  a: readonly TimePoint[],
  b: readonly TimePoint[],
  combine: (x: number, y: number) => number
): Series {
  return a.map((p, i) => ({ date: p.date, value: combine(p.value, b[i]?.value ?? NaN) }))
}

/**
 * part / (part + other), NaN where the total is zero
 */
export function shareOfTotal(part: number, other: number): number {
  const total = part + other
  return total === 0 ? NaN : part / total
}
