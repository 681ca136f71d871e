/**
 * Transform Library
 *
 * Pure, index-preserving transforms from one series to a derived series:
 * growth rates, rolling z-scores, percentile ranks, acceleration and
 * inflection markers. Insufficient history yields NaN at that point.
 * Frequency is never inferred; callers pass periods-per-year explicitly.
 */

import { CONFIG } from '@/lib/config'
import { latestPoint } from './alignment'
import type { Series, TimePoint } from './types'

const { tradingDaysPerYear, oneMonthDaily, threeMonthsDaily } = CONFIG.periods

export interface RollingWindowOptions {
  /** Window length in years (default 3) */
  windowYears?: number
  /** Observations per year (252 daily, 52 weekly, 12 monthly) */
  periodsPerYear?: number
  /** Minimum valid observations in the window, current point included (default: half the window) */
  minPeriods?: number
}

/**
 * `rank` averages tied ranks; `weak` is the share of the window at or below
 * the current value.
 */
export type PercentileKind = 'rank' | 'weak'

export interface PercentileOptions extends RollingWindowOptions {
  kind?: PercentileKind
}

export interface RollingStatsPoint {
  date: string
  mean: number
  std: number
  min: number
  max: number
  median: number
  skew: number
  kurt: number
}

export interface LatestValues {
  latest: number | null
  date: string | null
  yoy?: number | null
  ann3m?: number | null
  change1m?: number | null
  zscore3y?: number | null
  zscore5y?: number | null
  percentile3y?: number | null
}

// ============================================================================
// Internal Helpers
// ============================================================================

function withValues(series: readonly TimePoint[], values: number[]): Series {
  return series.map((p, i) => ({ date: p.date, value: values[i] ?? NaN }))
}

function finiteIn(values: readonly number[], start: number, end: number): number[] {
  const out: number[] = []
  for (let j = Math.max(0, start); j <= end; j++) {
    const v = values[j]
    if (v !== undefined && Number.isFinite(v)) out.push(v)
  }
  return out
}

function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length
}

/**
 * Sample standard deviation (ddof = 1). A window of identical values is exactly 0.
 */
function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN
  if (Math.min(...values) === Math.max(...values)) return 0
  const m = mean(values)
  const ss = values.reduce((sum, v) => sum + (v - m) ** 2, 0)
  return Math.sqrt(ss / (values.length - 1))
}

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  if (sorted.length % 2 === 1) return sorted[mid] ?? NaN
  return ((sorted[mid - 1] ?? NaN) + (sorted[mid] ?? NaN)) / 2
}

/** Adjusted Fisher-Pearson skewness, NaN below 3 observations */
function skewness(values: readonly number[]): number {
  const n = values.length
  if (n < 3) return NaN
  const s = sampleStd(values)
  if (!(s > 0)) return NaN
  const m = mean(values)
  const sum3 = values.reduce((acc, v) => acc + ((v - m) / s) ** 3, 0)
  return (n / ((n - 1) * (n - 2))) * sum3
}

/** Bias-corrected excess kurtosis, NaN below 4 observations */
function kurtosis(values: readonly number[]): number {
  const n = values.length
  if (n < 4) return NaN
  const s = sampleStd(values)
  if (!(s > 0)) return NaN
  const m = mean(values)
  const sum4 = values.reduce((acc, v) => acc + ((v - m) / s) ** 4, 0)
  return (
    ((n * (n + 1)) / ((n - 1) * (n - 2) * (n - 3))) * sum4 -
    (3 * (n - 1) ** 2) / ((n - 2) * (n - 3))
  )
}

function resolveWindow(
  options: RollingWindowOptions,
  defaultMinPeriods: (window: number) => number = (window) => Math.floor(window / 2)
): { window: number; minPeriods: number } {
  const window = (options.windowYears ?? 3) * (options.periodsPerYear ?? tradingDaysPerYear)
  return { window, minPeriods: options.minPeriods ?? defaultMinPeriods(window) }
}

// ============================================================================
// Changes
// ============================================================================

/**
 * Percent change over `periods` observations. A zero or missing base is NaN.
 */
export function calcPctChange(series: readonly TimePoint[], periods: number): Series {
  const values = series.map((p, i) => {
    if (i < periods) return NaN
    const previous = series[i - periods]?.value ?? NaN
    if (!Number.isFinite(previous) || previous === 0) return NaN
    return (p.value / previous - 1) * 100
  })
  return withValues(series, values)
}

/**
 * Difference over `periods` observations (value[i] - value[i - periods])
 */
export function calcDiff(series: readonly TimePoint[], periods: number = 1): Series {
  const values = series.map((p, i) => {
    if (i < periods) return NaN
    return p.value - (series[i - periods]?.value ?? NaN)
  })
  return withValues(series, values)
}

/**
 * Year-over-year change in percent
 */
export function calcYoY(series: readonly TimePoint[], periods: number = tradingDaysPerYear): Series {
  return calcPctChange(series, periods)
}

/**
 * One-month change in percent
 */
export function calc1mChange(series: readonly TimePoint[], periods1m: number = oneMonthDaily): Series {
  return calcPctChange(series, periods1m)
}

/**
 * Three-month change compounded to an annual rate: ((1 + r)^4 - 1) * 100
 */
export function calc3mAnnualized(series: readonly TimePoint[], periods3m: number = threeMonthsDaily): Series {
  const change = calcPctChange(series, periods3m)
  return change.map((p) => ({ date: p.date, value: ((1 + p.value / 100) ** 4 - 1) * 100 }))
}

// ============================================================================
// Rolling Statistics
// ============================================================================

/**
 * Rolling z-score: (value - rolling mean) / rolling sample std.
 *
 * Mean and std come from the trailing window including the current point.
 * `minPeriods` counts valid points in that window and defaults to
 * floor(W/2) + 1, so a gap-free series has exactly floor(W/2) leading NaNs.
 * Zero std yields NaN.
 */
export function calcZscore(series: readonly TimePoint[], options: RollingWindowOptions = {}): Series {
  const { window, minPeriods } = resolveWindow(options, (w) => Math.floor(w / 2) + 1)
  const raw = series.map((p) => p.value)

  const values = raw.map((current, i) => {
    if (!Number.isFinite(current)) return NaN
    const windowValues = finiteIn(raw, i - window + 1, i)
    if (windowValues.length < minPeriods) return NaN

    const std = sampleStd(windowValues)
    if (!Number.isFinite(std) || std === 0) return NaN
    return (current - mean(windowValues)) / std
  })

  return withValues(series, values)
}

/**
 * Change in rolling z-score over `changePeriods`
 */
export function calcZscoreChange(
  series: readonly TimePoint[],
  options: RollingWindowOptions & { changePeriods?: number } = {}
): Series {
  const { changePeriods = oneMonthDaily, ...windowOptions } = options
  return calcDiff(calcZscore(series, windowOptions), changePeriods)
}

/**
 * Second difference: the change in the `firstDiffPeriods` change
 */
export function calcAcceleration(
  series: readonly TimePoint[],
  firstDiffPeriods: number = oneMonthDaily,
  secondDiffPeriods: number = oneMonthDaily
): Series {
  return calcDiff(calcDiff(series, firstDiffPeriods), secondDiffPeriods)
}

/**
 * Rolling percentile (0-100) of the latest value within the trailing
 * window. Ties take the average rank unless `kind` is `weak`. NaN below
 * `minPeriods` valid points.
 */
export function calcPercentile(series: readonly TimePoint[], options: PercentileOptions = {}): Series {
  const { window, minPeriods } = resolveWindow(options)
  const kind = options.kind ?? 'rank'
  const raw = series.map((p) => p.value)

  const values = raw.map((current, i) => {
    if (!Number.isFinite(current)) return NaN
    const windowValues = finiteIn(raw, i - window + 1, i)
    if (windowValues.length < minPeriods || windowValues.length === 0) return NaN

    let below = 0
    let atOrBelow = 0
    for (const v of windowValues) {
      if (v < current) below++
      if (v <= current) atOrBelow++
    }
    const n = windowValues.length
    const rank = kind === 'weak'
      ? (atOrBelow * 100) / n
      : ((below + atOrBelow + (atOrBelow > below ? 1 : 0)) * 50) / n
    return Math.max(0, Math.min(100, rank))
  })

  return withValues(series, values)
}

/**
 * Rolling mean / std / min / max / median / skew / kurtosis over a fixed window
 */
export function calcRollingStats(
  series: readonly TimePoint[],
  window: number = tradingDaysPerYear,
  minPeriods: number = Math.floor(window / 2)
): RollingStatsPoint[] {
  const raw = series.map((p) => p.value)

  return series.map((p, i) => {
    const w = finiteIn(raw, i - window + 1, i)
    if (w.length === 0 || w.length < minPeriods) {
      return { date: p.date, mean: NaN, std: NaN, min: NaN, max: NaN, median: NaN, skew: NaN, kurt: NaN }
    }
    return {
      date: p.date,
      mean: mean(w),
      std: sampleStd(w),
      min: Math.min(...w),
      max: Math.max(...w),
      median: median(w),
      skew: skewness(w),
      kurt: kurtosis(w),
    }
  })
}

// ============================================================================
// Turning Points
// ============================================================================

/**
 * Mark local peaks (+1) and troughs (-1) against a centered window of
 * `lookback` points; everything else is 0. Points whose centered window
 * runs off either end of the series are never marked.
 *
 * With `sensitivity > 0` a turning point also needs an absolute percent move
 * over `lookback` of at least `sensitivity`.
 */
export function detectInflection(
  series: readonly TimePoint[],
  lookback: number = oneMonthDaily,
  sensitivity: number = 0
): Series {
  const raw = series.map((p) => p.value)
  const after = Math.floor((lookback - 1) / 2)
  const before = lookback - 1 - after
  const moves = sensitivity > 0 ? calcPctChange(series, lookback).map((p) => Math.abs(p.value)) : null

  const values = raw.map((current, i) => {
    const start = i - before
    const end = i + after
    if (start < 0 || end >= raw.length) return 0

    const windowValues = finiteIn(raw, start, end)
    if (windowValues.length < lookback) return 0

    const prev = raw[i - 1] ?? NaN
    const next = raw[i + 1] ?? NaN

    let marker = 0
    if (current === Math.max(...windowValues) && prev < current && next < current) marker = 1
    else if (current === Math.min(...windowValues) && prev > current && next > current) marker = -1

    if (marker !== 0 && moves && !((moves[i] ?? NaN) >= sensitivity)) return 0
    return marker
  })

  return withValues(series, values)
}

// ============================================================================
// Snapshots
// ============================================================================

function finiteOrNull(point: TimePoint | null): number | null {
  return point && Number.isFinite(point.value) ? point.value : null
}

/**
 * Latest level plus the standard change / z-score / percentile set.
 * Changes are only computed once the series holds more than a year of data.
 */
export function getLatestValues(series: readonly TimePoint[], includeChanges: boolean = true): LatestValues {
  const last = latestPoint(series)
  const result: LatestValues = {
    latest: finiteOrNull(last),
    date: last ? last.date : null,
  }

  if (includeChanges && series.length > tradingDaysPerYear) {
    result.yoy = finiteOrNull(latestPoint(calcYoY(series)))
    result.ann3m = finiteOrNull(latestPoint(calc3mAnnualized(series)))
    result.change1m = finiteOrNull(latestPoint(calc1mChange(series)))
    result.zscore3y = finiteOrNull(latestPoint(calcZscore(series, { windowYears: 3 })))
    result.zscore5y = finiteOrNull(latestPoint(calcZscore(series, { windowYears: 5 })))
    result.percentile3y = finiteOrNull(latestPoint(calcPercentile(series, { windowYears: 3 })))
  }

  return result
}
