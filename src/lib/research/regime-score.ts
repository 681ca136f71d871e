/**
 * Regime Classifier
 *
 * Point-in-time classification into Expansion / Late-cycle / Contraction /
 * Stress. Up to five scalar metrics are extracted from the indicator series,
 * each one adds fixed points to one or more regimes, and the totals are
 * rescaled to 0-100. There is no state between calls: every classification
 * is a fresh judgment.
 */

import { z } from 'zod'
import { CONFIG } from '@/lib/config'
import { fromZodError } from '@/lib/utils/errors'
import { mergeOverrides } from '@/lib/utils/overrides'
import { formatFixed } from '@/lib/utils/format'
import { availableIndicators, findStaleSeries } from '@/lib/utils/data-validation'
import type {
  IndicatorMap,
  MetricSnapshot,
  Regime,
  RegimeResult,
  RegimeScore,
  RegimeThresholds,
  RegimeWeights,
} from './types'
import { REGIMES } from './types'
import { combineOnDates, latestValue } from './alignment'
import { calc1mChange, calc3mAnnualized, calcPercentile, calcZscore } from './transforms'
import { CORE_INDICATOR_NAMES, resolveIndicators } from './indicator-registry'

const { tradingDaysPerYear, weeksPerYear, oneMonthDaily, threeMonthsDaily, threeMonthsWeekly } = CONFIG.periods

// ============================================================================
// Calibration
// ============================================================================

export const DEFAULT_REGIME_THRESHOLDS: RegimeThresholds = {
  creditGrowthExpansion: 3.0, // % 3M annualized
  creditGrowthContraction: 0.0,
  spreadZscoreTight: -0.5,
  spreadZscoreWide: 1.0,
  vixPercentileLow: 30,
  vixPercentileHigh: 70,
  vixStress: 90,
  valuationVsEarningsGap: 0.5, // z-score gap
  equityDrawdown: -5.0, // % 1M return
}

/** Calibrated point weights; kept as-is rather than re-derived */
export const DEFAULT_REGIME_WEIGHTS: RegimeWeights = {
  creditExpansion: 30,
  creditContraction: 30,
  creditNeutralSplit: 15,
  spreadTight: 25,
  spreadWideContraction: 20,
  spreadWideStress: 15,
  spreadNeutral: 15,
  vixLow: 25,
  vixStress: 40,
  vixHighContraction: 20,
  vixHighStress: 10,
  vixNeutral: 10,
  equityDrawdownStress: 30,
  equityDrawdownContraction: 10,
  valuationGapLateCycle: 30,
  valuationGapExpansionPenalty: 10,
}

/** Top regime lands at 70 after normalization */
export const DEFAULT_SCORE_SCALE_FACTOR = 0.7

const finite = z.number().finite()

const RegimeThresholdsSchema = z
  .object({
    creditGrowthExpansion: finite,
    creditGrowthContraction: finite,
    spreadZscoreTight: finite,
    spreadZscoreWide: finite,
    vixPercentileLow: finite,
    vixPercentileHigh: finite,
    vixStress: finite,
    valuationVsEarningsGap: finite,
    equityDrawdown: finite,
  })
  .partial()
  .strict()

const RegimeWeightsSchema = z
  .object({
    creditExpansion: finite,
    creditContraction: finite,
    creditNeutralSplit: finite,
    spreadTight: finite,
    spreadWideContraction: finite,
    spreadWideStress: finite,
    spreadNeutral: finite,
    vixLow: finite,
    vixStress: finite,
    vixHighContraction: finite,
    vixHighStress: finite,
    vixNeutral: finite,
    equityDrawdownStress: finite,
    equityDrawdownContraction: finite,
    valuationGapLateCycle: finite,
    valuationGapExpansionPenalty: finite,
  })
  .partial()
  .strict()

// ============================================================================
// Descriptions
// ============================================================================

export const REGIME_DESCRIPTIONS: Record<Regime, string> = {
  Expansion: 'Credit and balance sheets expanding, spreads tightening, volatility stable - risk-on environment',
  'Late-cycle': 'Credit still growing but valuation expansion is outrunning earnings - watch for belief overheating',
  Contraction: 'Credit growth slowing or reversing, spreads widening, volatility rising - balance-sheet contraction under way',
  Stress: 'Volatility spike with sharply wider spreads and falling risk assets - collateral impairment and credit crunch risk',
}

/**
 * Get color for regime (for UI)
 */
export function getRegimeColor(regime: Regime): string {
  switch (regime) {
    case 'Expansion':
      return '#22c55e' // green
    case 'Late-cycle':
      return '#f59e0b' // amber
    case 'Contraction':
      return '#ef4444' // red
    case 'Stress':
      return '#7f1d1d' // dark red
  }
}

// ============================================================================
// Score Helpers
// ============================================================================

const SCORE_KEYS: Record<Regime, keyof RegimeScore> = {
  Expansion: 'expansion',
  'Late-cycle': 'lateCycle',
  Contraction: 'contraction',
  Stress: 'stress',
}

/**
 * Highest-scoring regime; ties go to the earlier regime in enumeration order
 */
export function getPrimaryRegime(scores: RegimeScore): Regime {
  let primary: Regime = 'Expansion'
  for (const regime of REGIMES) {
    if (scores[SCORE_KEYS[regime]] > scores[SCORE_KEYS[primary]]) primary = regime
  }
  return primary
}

/**
 * Gap between the two highest scores, as a fraction of 100
 */
export function computeConfidence(scores: RegimeScore): number {
  const sorted = REGIMES.map((r) => scores[SCORE_KEYS[r]]).sort((a, b) => b - a)
  const [top, second] = sorted
  if (top === undefined || second === undefined) return 1.0
  return (top - second) / 100
}

function clampScore(value: number): number {
  return Math.min(100, Math.max(0, value))
}

function metric(metrics: MetricSnapshot, key: string): number | null {
  return metrics[key] ?? null
}

// ============================================================================
// Classifier
// ============================================================================

export interface RegimeClassifierOptions {
  thresholds?: Partial<RegimeThresholds>
  weights?: Partial<RegimeWeights>
  scaleFactor?: number
  /** Clock used for the staleness check */
  now?: () => Date
}

export class RegimeClassifier {
  readonly thresholds: Readonly<RegimeThresholds>
  readonly weights: Readonly<RegimeWeights>
  readonly scaleFactor: number
  private readonly now: () => Date

  constructor(options: RegimeClassifierOptions = {}) {
    const scaleFactor = finite.positive().safeParse(options.scaleFactor ?? DEFAULT_SCORE_SCALE_FACTOR)
    if (!scaleFactor.success) throw fromZodError(scaleFactor.error, 'score scale factor')

    this.thresholds = mergeOverrides<RegimeThresholds>(
      DEFAULT_REGIME_THRESHOLDS,
      RegimeThresholdsSchema,
      options.thresholds,
      'regime thresholds'
    )
    this.weights = mergeOverrides<RegimeWeights>(DEFAULT_REGIME_WEIGHTS, RegimeWeightsSchema, options.weights, 'regime weights')
    this.scaleFactor = scaleFactor.data
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Classify the market regime as of `asOfDate` (default: latest data)
   */
  classify(indicators: IndicatorMap, asOfDate?: string): RegimeResult {
    const metrics = this.extractMetrics(indicators, asOfDate)
    const scores = this.calculateScores(metrics)
    const primaryRegime = getPrimaryRegime(scores)

    return {
      primaryRegime,
      scores,
      explanations: this.generateExplanations(metrics, primaryRegime),
      confidence: computeConfidence(scores),
      dataQualityWarning: this.checkDataQuality(indicators),
      metrics,
    }
  }

  /**
   * Scalar inputs to the rule table. A metric is null when its series is
   * missing, too short, or NaN at the as-of point.
   */
  extractMetrics(indicators: IndicatorMap, asOfDate?: string): MetricSnapshot {
    const resolved = resolveIndicators(indicators)
    const metrics: MetricSnapshot = {
      credit_growth_3m: null,
      spread_zscore: null,
      spread_level: null,
      vix_percentile: null,
      vix_level: null,
      equity_1m_return: null,
      val_earn_gap: null,
    }

    // Credit is weekly: 13 weeks per quarter
    const credit = resolved.credit_growth
    if (credit && credit.length > threeMonthsDaily) {
      metrics.credit_growth_3m = latestValue(calc3mAnnualized(credit, threeMonthsWeekly), asOfDate)
    }

    // Spread: 3 years of weekly history
    const spread = resolved.spread
    if (spread && spread.length > 3 * weeksPerYear) {
      const zscore = calcZscore(spread, { windowYears: 3, periodsPerYear: weeksPerYear })
      metrics.spread_zscore = latestValue(zscore, asOfDate)
      metrics.spread_level = latestValue(spread, asOfDate)
    }

    // VIX: 3 years of daily history
    const vix = resolved.vix
    if (vix && vix.length > 3 * tradingDaysPerYear) {
      const percentile = calcPercentile(vix, { windowYears: 3, periodsPerYear: tradingDaysPerYear })
      metrics.vix_percentile = latestValue(percentile, asOfDate)
      metrics.vix_level = latestValue(vix, asOfDate)
    }

    const equity = resolved.equity
    if (equity && equity.length > oneMonthDaily) {
      metrics.equity_1m_return = latestValue(calc1mChange(equity, oneMonthDaily), asOfDate)
    }

    const valuationZ = resolved.valuation_zscore
    const earningsZ = resolved.earnings_zscore
    if (valuationZ && earningsZ) {
      const gap = combineOnDates(valuationZ, earningsZ, (v, e) => v - e)
      metrics.val_earn_gap = latestValue(gap, asOfDate)
    }

    return metrics
  }

  /**
   * Accumulate rule points per regime, then rescale so the leader sits at
   * 100 * scaleFactor. Each score is clamped to [0, 100].
   */
  calculateScores(metrics: MetricSnapshot): RegimeScore {
    const t = this.thresholds
    const w = this.weights
    let expansion = 0
    let lateCycle = 0
    let contraction = 0
    let stress = 0

    const credit = metric(metrics, 'credit_growth_3m')
    if (credit !== null) {
      if (credit > t.creditGrowthExpansion) {
        expansion += w.creditExpansion
      } else if (credit < t.creditGrowthContraction) {
        contraction += w.creditContraction
      } else {
        lateCycle += w.creditNeutralSplit
        expansion += w.creditNeutralSplit
      }
    }

    const spreadZ = metric(metrics, 'spread_zscore')
    if (spreadZ !== null) {
      if (spreadZ < t.spreadZscoreTight) {
        expansion += w.spreadTight
      } else if (spreadZ > t.spreadZscoreWide) {
        contraction += w.spreadWideContraction
        stress += w.spreadWideStress
      } else {
        lateCycle += w.spreadNeutral
      }
    }

    const vixPct = metric(metrics, 'vix_percentile')
    if (vixPct !== null) {
      if (vixPct < t.vixPercentileLow) {
        expansion += w.vixLow
      } else if (vixPct > t.vixStress) {
        stress += w.vixStress
      } else if (vixPct > t.vixPercentileHigh) {
        contraction += w.vixHighContraction
        stress += w.vixHighStress
      } else {
        lateCycle += w.vixNeutral
      }
    }

    // Equity drawdown amplifies stress
    const equity1m = metric(metrics, 'equity_1m_return')
    if (equity1m !== null && equity1m < t.equityDrawdown) {
      stress += w.equityDrawdownStress
      contraction += w.equityDrawdownContraction
    }

    // Valuation outrunning earnings marks late cycle
    const gap = metric(metrics, 'val_earn_gap')
    if (gap !== null && gap > t.valuationVsEarningsGap) {
      lateCycle += w.valuationGapLateCycle
      expansion -= w.valuationGapExpansionPenalty
    }

    const maxScore = Math.max(expansion, lateCycle, contraction, stress, 1)
    const factor = (100 / maxScore) * this.scaleFactor

    return {
      expansion: clampScore(expansion * factor),
      lateCycle: clampScore(lateCycle * factor),
      contraction: clampScore(contraction * factor),
      stress: clampScore(stress * factor),
    }
  }

  /**
   * Three lines: credit driver, risk gauges, forward-looking watch point.
   * A missing metric yields a neutral line instead of dropping the slot.
   */
  generateExplanations(metrics: MetricSnapshot, primary: Regime): string[] {
    const explanations: string[] = []

    // Line 1: primary driver
    const credit = metric(metrics, 'credit_growth_3m')
    if (credit === null) {
      explanations.push('Credit growth data unavailable')
    } else if (primary === 'Expansion') {
      explanations.push(`Credit growth continuing (${formatFixed(credit)}% 3M annualized) - balance sheets expanding`)
    } else if (primary === 'Contraction') {
      explanations.push(`Credit growth slowing (${formatFixed(credit)}% 3M annualized) - balance-sheet contraction pressure`)
    } else {
      explanations.push(`Credit growth ${formatFixed(credit)}% (3M annualized)`)
    }

    // Line 2: risk gauges
    const vixPct = metric(metrics, 'vix_percentile')
    const spreadZ = metric(metrics, 'spread_zscore')
    if (vixPct === null || spreadZ === null) {
      explanations.push('Volatility and spread readings unavailable')
    } else if (primary === 'Stress') {
      explanations.push(
        `Volatility at ${formatFixed(vixPct, 0)}th percentile, spread z=${formatFixed(spreadZ)} - collateral stress signal`
      )
    } else if (primary === 'Expansion') {
      explanations.push(
        `Volatility in the bottom ${formatFixed(100 - vixPct, 0)}%, spreads contained - risk appetite intact`
      )
    } else {
      explanations.push(`Volatility ${formatFixed(vixPct, 0)}th percentile, spread z-score ${formatFixed(spreadZ)}`)
    }

    // Line 3: watch point
    const gap = metric(metrics, 'val_earn_gap')
    if (primary === 'Late-cycle' && gap !== null) {
      explanations.push(`Valuation running ${formatFixed(gap)}σ ahead of earnings - belief overheating warning`)
    } else if (primary === 'Expansion') {
      explanations.push('Watch point: credit over-extension')
    } else if (primary === 'Contraction') {
      explanations.push('Watch point: spread widening -> collateral impairment -> forced selling path')
    } else if (primary === 'Stress') {
      explanations.push('Watch point: leveraged position unwinds and liquidity squeeze')
    } else {
      explanations.push('Assessing whether the current regime persists')
    }

    return explanations.slice(0, 3)
  }

  /**
   * Warning text when core indicators are missing or any series is stale
   */
  checkDataQuality(indicators: IndicatorMap): string | null {
    const warnings: string[] = []
    const { minCoreIndicators, maxAgeDays } = CONFIG.dataQuality

    const available = availableIndicators(indicators, CORE_INDICATOR_NAMES)
    if (available.length < minCoreIndicators) {
      warnings.push(`Insufficient core indicators: ${minCoreIndicators - available.length} missing`)
    }

    for (const stale of findStaleSeries(indicators, this.now(), maxAgeDays)) {
      warnings.push(`${stale.name} data is ${stale.ageInDays} days old`)
    }

    return warnings.length > 0 ? warnings.join('; ') : null
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Regime scores with default calibration
 */
export function calculateRegimeScores(data: IndicatorMap): RegimeScore {
  return new RegimeClassifier().classify(data).scores
}

/**
 * Primary regime and its explanation lines with default calibration
 */
export function determineRegime(data: IndicatorMap): { regime: Regime; explanations: string[] } {
  const result = new RegimeClassifier().classify(data)
  return { regime: result.primaryRegime, explanations: result.explanations }
}
