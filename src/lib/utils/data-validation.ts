/**
 * Data Validation and Staleness Detection Utilities
 *
 * Helpers for the data-quality side of the analytics: how old each series
 * is, how many core indicators are present, and whether a series honours
 * the ordering contract loaders must deliver.
 */

import { daysBetween } from '@/lib/research/alignment'
import type { IndicatorMap, Series } from '@/lib/research/types'

export interface ValidationResult {
  isValid: boolean
  errors: string[]
  warnings: string[]
}

export interface StaleSeries {
  name: string
  lastDate: string
  ageInDays: number
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

/**
 * Age in whole calendar days of the series' last observation
 */
export function getSeriesAgeInDays(series: Series, now: Date): number | null {
  const last = series[series.length - 1]
  if (!last) return null
  return daysBetween(last.date, now)
}

/**
 * Series whose last observation is more than `maxAgeDays` old, in input order
 */
export function findStaleSeries(indicators: IndicatorMap, now: Date, maxAgeDays: number): StaleSeries[] {
  const stale: StaleSeries[] = []

  for (const [name, series] of Object.entries(indicators)) {
    if (!series || series.length === 0) continue
    const ageInDays = getSeriesAgeInDays(series, now)
    const last = series[series.length - 1]
    if (ageInDays === null || !last) continue
    if (ageInDays > maxAgeDays) {
      stale.push({ name, lastDate: last.date, ageInDays })
    }
  }

  return stale
}

/**
 * Names from `names` that hold a non-empty series
 */
export function availableIndicators(indicators: IndicatorMap, names: readonly string[]): string[] {
  return names.filter((name) => {
    const series = indicators[name]
    return series !== undefined && series.length > 0
  })
}

/**
 * Check the ordering contract: ISO dates, strictly increasing, no duplicates.
 * Non-finite values are allowed (they mark gaps) but reported as warnings.
 */
export function validateSeries(series: Series, seriesName: string): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []
  let missing = 0

  for (let i = 0; i < series.length; i++) {
    const point = series[i]
    if (!point) continue

    if (!ISO_DATE.test(point.date)) {
      errors.push(`${seriesName}: invalid date "${point.date}" at index ${i}`)
    }

    const previous = series[i - 1]
    if (previous && previous.date >= point.date) {
      errors.push(`${seriesName}: dates not strictly increasing at index ${i} (${previous.date} -> ${point.date})`)
    }

    if (!Number.isFinite(point.value)) missing++
  }

  if (series.length === 0) {
    warnings.push(`${seriesName}: series is empty`)
  }
  if (missing > 0) {
    warnings.push(`${seriesName}: ${missing} missing value${missing > 1 ? 's' : ''}`)
  }

  return { isValid: errors.length === 0, errors, warnings }
}
