import { addDays, parseISO } from 'date-fns'
import { formatDate } from '@/lib/research/alignment'
import type { Series } from '@/lib/research/types'

/**
 * Build a series from raw values, one observation every `stepDays` days
 */
export function makeSeries(values: readonly number[], start: string = '2020-01-01', stepDays: number = 1): Series {
  const origin = parseISO(start)
  return values.map((value, i) => ({ date: formatDate(addDays(origin, i * stepDays)), value }))
}

export function weeklySeries(values: readonly number[], start: string = '2020-01-06'): Series {
  return makeSeries(values, start, 7)
}

/** n values starting at `first`, each `step` above the previous */
export function linear(n: number, first: number, step: number): number[] {
  return Array.from({ length: n }, (_, i) => first + step * i)
}

/** n values compounding at `rate` per observation */
export function compounding(n: number, first: number, rate: number): number[] {
  return Array.from({ length: n }, (_, i) => first * (1 + rate) ** i)
}
