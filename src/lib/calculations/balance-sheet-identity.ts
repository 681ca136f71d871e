/**
 * Fed Balance Sheet Identity
 *
 *   ΔReserves = ΔSOMA + ΔLending - ΔRRP - ΔTGA
 *
 * Checked period by period on first differences. A residual beyond the
 * tolerance points at a missing line item (currency, other liabilities)
 * or a data revision.
 */

import { calcDiff } from '@/lib/research/transforms'
import type { Series, TimePoint } from '@/lib/research/types'
import type { FlagSeries } from './piecewise-score'

export interface BalanceSheetInputs {
  reserves?: readonly TimePoint[]
  somaAssets?: readonly TimePoint[]
  fedLending?: readonly TimePoint[]
  reverseRepo?: readonly TimePoint[]
  tga?: readonly TimePoint[]
}

export interface BalanceSheetIdentityResult {
  /** Observed change in reserves */
  identityLhs: Series
  /** ΔSOMA + ΔLending - ΔRRP - ΔTGA */
  identityRhs: Series
  /** LHS - RHS */
  residual: Series
  isBalanced: FlagSeries
  imbalanceMagnitude: Series
}

/** Billions USD */
export const DEFAULT_IDENTITY_TOLERANCE = 50

export function verifyBalanceSheetIdentity(
  inputs: BalanceSheetInputs,
  tolerance: number = DEFAULT_IDENTITY_TOLERANCE
): BalanceSheetIdentityResult {
  const { reserves, somaAssets, fedLending, reverseRepo, tga } = inputs
  const empty: BalanceSheetIdentityResult = {
    identityLhs: [],
    identityRhs: [],
    residual: [],
    isBalanced: [],
    imbalanceMagnitude: [],
  }

  if (!reserves || !somaAssets || !fedLending || !reverseRepo || !tga) return empty
  const n = reserves.length
  if (n === 0 || [somaAssets, fedLending, reverseRepo, tga].some((s) => s.length !== n)) return empty

  const dReserves = calcDiff(reserves)
  const dSoma = calcDiff(somaAssets)
  const dLending = calcDiff(fedLending)
  const dRrp = calcDiff(reverseRepo)
  const dTga = calcDiff(tga)

  const identityRhs: Series = dSoma.map((p, i) => ({
    date: p.date,
    value: p.value + (dLending[i]?.value ?? NaN) - (dRrp[i]?.value ?? NaN) - (dTga[i]?.value ?? NaN),
  }))
  const residual: Series = dReserves.map((p, i) => ({ date: p.date, value: p.value - (identityRhs[i]?.value ?? NaN) }))
  const imbalanceMagnitude: Series = residual.map((p) => ({ date: p.date, value: Math.abs(p.value) }))

  return {
    identityLhs: dReserves,
    identityRhs,
    residual,
    // NaN (first period, gaps) compares false
    isBalanced: imbalanceMagnitude.map((p) => ({ date: p.date, value: p.value <= tolerance })),
    imbalanceMagnitude,
  }
}
