/**
 * Reserve Diagnostics
 *
 * - Reserve regime: Abundant / Ample / Tight / Scarce on (RRP-adjusted) reserves
 * - TGA reserve drag: Treasury account's share of TGA + reserves
 * - Reserve demand proxy: reverse repo's share of RRP + reserves
 *
 * All inputs in billions USD, aligned on the same dates.
 */

import type { Series, TimePoint } from '@/lib/research/types'
import {
  scoreSeries,
  shareOfTotal,
  zipSeries,
  type BandScale,
  type FlagSeries,
  type LabelSeries,
} from './piecewise-score'

// ============================================================================
// Reserve Regime
// ============================================================================

export type ReserveRegime = 'Scarce' | 'Tight' | 'Ample' | 'Abundant'

export interface ReserveThresholds {
  abundant: number
  ample: number
  tight: number
}

export const DEFAULT_RESERVE_THRESHOLDS: ReserveThresholds = {
  abundant: 2500,
  ample: 1500,
  tight: 500,
}

/** Share of reverse repo balances netted out of reserves */
export const RRP_RESERVE_DAMPING = 0.1

export interface ReserveRegimeResult {
  regime: LabelSeries<ReserveRegime>
  effectiveReserves: Series
  /** 100 = scarce, 0 = abundant */
  scarcityScore: Series
}

/**
 * Scarcity falls as reserves rise; the Abundant band rescales up to twice its lower bound
 */
export function reserveScale(thresholds: ReserveThresholds = DEFAULT_RESERVE_THRESHOLDS): BandScale<ReserveRegime> {
  return {
    bands: [
      { lower: 0, label: 'Scarce', scoreRange: [100, 75] },
      { lower: thresholds.tight, label: 'Tight', scoreRange: [75, 50] },
      { lower: thresholds.ample, label: 'Ample', scoreRange: [50, 25] },
      { lower: thresholds.abundant, label: 'Abundant', scoreRange: [25, 0] },
    ],
    upper: thresholds.abundant * 2,
  }
}

export function classifyReserveRegime(
  reserves: readonly TimePoint[] | undefined,
  reverseRepo?: readonly TimePoint[],
  thresholds: ReserveThresholds = DEFAULT_RESERVE_THRESHOLDS
): ReserveRegimeResult {
  if (!reserves || reserves.length === 0) {
    return { regime: [], effectiveReserves: [], scarcityScore: [] }
  }

  // A reverse repo series on a different index is ignored
  const effectiveReserves =
    reverseRepo && reverseRepo.length === reserves.length
      ? zipSeries(reserves, reverseRepo, (r, rrp) => r - rrp * RRP_RESERVE_DAMPING)
      : reserves.map((p) => ({ date: p.date, value: p.value }))

  const { labels, scores } = scoreSeries(effectiveReserves, reserveScale(thresholds))
  return { regime: labels, effectiveReserves, scarcityScore: scores }
}

// ============================================================================
// TGA Reserve Drag
// ============================================================================

export type TgaDragRegime = 'Minimal' | 'Normal' | 'Elevated' | 'Stress'

export const TGA_DRAG_SCALE: BandScale<TgaDragRegime> = {
  bands: [
    { lower: 0, label: 'Minimal', scoreRange: [0, 50] },
    { lower: 0.05, label: 'Normal', scoreRange: [50, 75] },
    { lower: 0.15, label: 'Elevated', scoreRange: [75, 90] },
    { lower: 0.25, label: 'Stress', scoreRange: [90, 100] },
  ],
  upper: 1,
}

export interface TgaReserveDragResult {
  /** TGA / (TGA + reserves) */
  tgaRatio: Series
  dragRegime: LabelSeries<TgaDragRegime>
  dragScore: Series
  tgaLevel: Series
  /** reserves * (1 - tgaRatio) */
  effectiveReserves: Series
}

export function calculateTgaReserveDrag(
  tga: readonly TimePoint[] | undefined,
  reserves: readonly TimePoint[] | undefined
): TgaReserveDragResult {
  if (!tga || !reserves || tga.length !== reserves.length) {
    return { tgaRatio: [], dragRegime: [], dragScore: [], tgaLevel: [], effectiveReserves: [] }
  }

  const tgaRatio = zipSeries(tga, reserves, shareOfTotal)
  const { labels, scores } = scoreSeries(tgaRatio, TGA_DRAG_SCALE)
  const effectiveReserves = zipSeries(reserves, tgaRatio, (r, ratio) => r * (1 - ratio))

  return {
    tgaRatio,
    dragRegime: labels,
    dragScore: scores,
    tgaLevel: tga.map((p) => ({ date: p.date, value: p.value })),
    effectiveReserves,
  }
}

// ============================================================================
// Reserve Demand Proxy
// ============================================================================

export type ReserveDemandRegime = 'Normal' | 'Elevated' | 'Stress'

export const RESERVE_DEMAND_SCALE: BandScale<ReserveDemandRegime> = {
  bands: [
    { lower: 0, label: 'Normal', scoreRange: [0, 50] },
    { lower: 0.3, label: 'Elevated', scoreRange: [50, 90] },
    { lower: 0.5, label: 'Stress', scoreRange: [90, 100] },
  ],
  upper: 1,
}

/** RRP share above which overnight liquidity is parked at the Fed rather than in reserves */
export const RESERVE_DEMAND_CRISIS_RATIO = 0.5

export interface ReserveDemandResult {
  /** RRP / (RRP + reserves) */
  demandProxyRatio: Series
  demandRegime: LabelSeries<ReserveDemandRegime>
  demandScore: Series
  /** RRP + reserves */
  totalOvernightLiquidity: Series
  crisisIndicator: FlagSeries
}

export function calculateReserveDemandProxy(
  reverseRepo: readonly TimePoint[] | undefined,
  reserves: readonly TimePoint[] | undefined
): ReserveDemandResult {
  if (!reverseRepo || !reserves || reverseRepo.length !== reserves.length) {
    return {
      demandProxyRatio: [],
      demandRegime: [],
      demandScore: [],
      totalOvernightLiquidity: [],
      crisisIndicator: [],
    }
  }

  const demandProxyRatio = zipSeries(reverseRepo, reserves, shareOfTotal)
  const { labels, scores } = scoreSeries(demandProxyRatio, RESERVE_DEMAND_SCALE)

  return {
    demandProxyRatio,
    demandRegime: labels,
    demandScore: scores,
    totalOvernightLiquidity: zipSeries(reverseRepo, reserves, (rrp, r) => rrp + r),
    crisisIndicator: demandProxyRatio.map((p) => ({ date: p.date, value: p.value > RESERVE_DEMAND_CRISIS_RATIO })),
  }
}
