/**
 * Time Index Utilities
 *
 * As-of slicing, date arithmetic and frequency standardization.
 * All functions use ISO date strings (YYYY-MM-DD) and never mutate their input.
 */

import { differenceInCalendarDays, endOfMonth, endOfWeek, format, parseISO } from 'date-fns'
import type { Series, TimePoint } from './types'

// ============================================================================
// Date Utilities
// ============================================================================

/**
 * Format Date to ISO date string
 */
export function formatDate(d: Date): string {
  return format(d, 'yyyy-MM-dd')
}

/**
 * Get the difference in calendar days between two dates
 */
export function daysBetween(start: string | Date, end: string | Date): number {
  const startD = typeof start === 'string' ? parseISO(start) : start
  const endD = typeof end === 'string' ? parseISO(end) : end
  return differenceInCalendarDays(endD, startD)
}

// ============================================================================
// As-Of Slicing
// ============================================================================

/**
 * Points dated on or before `asOfDate` (the whole series when omitted)
 */
export function sliceAsOf<T extends { date: string }>(series: readonly T[], asOfDate?: string): T[] {
  if (!asOfDate) return [...series]

  // Binary search for the last point <= asOfDate
  let low = 0
  let high = series.length - 1
  let end = 0

  while (low <= high) {
    const mid = Math.floor((low + high) / 2)
    const point = series[mid]
    if (!point) break

    if (point.date <= asOfDate) {
      end = mid + 1
      low = mid + 1
    } else {
      high = mid - 1
    }
  }

  return series.slice(0, end)
}

/**
 * Latest point as of a date, or null when the series has none
 */
export function latestPoint(series: readonly TimePoint[], asOfDate?: string): TimePoint | null {
  const sliced = sliceAsOf(series, asOfDate)
  return sliced.length > 0 ? sliced[sliced.length - 1] ?? null : null
}

/**
 * Latest finite value as of a date. NaN at the as-of point counts as unavailable.
 */
export function latestValue(series: readonly TimePoint[], asOfDate?: string): number | null {
  const point = latestPoint(series, asOfDate)
  if (!point || !Number.isFinite(point.value)) return null
  return point.value
}

/**
 * Combine two series on their shared dates
 */
export function combineOnDates(
  a: readonly TimePoint[],
  b: readonly TimePoint[],
  combine: (x: number, y: number) => number
): Series {
  const lookup = new Map<string, number>()
  for (const p of b) lookup.set(p.date, p.value)

  const result: Series = []
  for (const p of a) {
    const other = lookup.get(p.date)
    if (other === undefined) continue
    result.push({ date: p.date, value: combine(p.value, other) })
  }
  return result
}

// ============================================================================
// Frequency Standardization
// ============================================================================

export type TargetFrequency = 'D' | 'W' | 'M'
export type AggregationMethod = 'last' | 'mean' | 'first'

function periodEnd(iso: string, freq: TargetFrequency): string {
  if (freq === 'D') return iso
  const d = parseISO(iso)
  // Weeks are labelled by their closing Sunday
  const end = freq === 'W' ? endOfWeek(d, { weekStartsOn: 1 }) : endOfMonth(d)
  return formatDate(end)
}

/**
 * Resample a series to period ends. Missing values are ignored and periods
 * with no finite observation are dropped.
 */
export function standardizeFrequency(
  series: readonly TimePoint[],
  targetFreq: TargetFrequency = 'W',
  aggMethod: AggregationMethod = 'last'
): Series {
  const buckets = new Map<string, number[]>()

  for (const p of series) {
    if (!Number.isFinite(p.value)) continue
    const key = periodEnd(p.date, targetFreq)
    const bucket = buckets.get(key)
    if (bucket) bucket.push(p.value)
    else buckets.set(key, [p.value])
  }

  const result: Series = []
  for (const [date, values] of buckets) {
    let value: number
    switch (aggMethod) {
      case 'first':
        value = values[0] ?? NaN
        break
      case 'mean':
        value = values.reduce((a, b) => a + b, 0) / values.length
        break
      case 'last':
        value = values[values.length - 1] ?? NaN
        break
    }
    result.push({ date, value })
  }

  return result.sort((a, b) => a.date.localeCompare(b.date))
}
