/**
 * Liquidity Monitor - Type Definitions
 *
 * Shared data model for the transform library, the regime classifier,
 * the alert engine and the balance-sheet diagnostics.
 * Every computation is point-in-time: nothing here is cached or persisted.
 */

// ============================================================================
// Time Series Types
// ============================================================================

export interface DatedValue<T> {
  date: string // ISO date string YYYY-MM-DD
  value: T
}

/** Numeric observation; missing or undefined values are NaN */
export type TimePoint = DatedValue<number>

/** Ordered by strictly increasing date, never mutated by this library */
export type Series = TimePoint[]

export interface TimeSeries {
  name: string
  points: Series
}

/**
 * Input boundary: indicator name (canonical role or alias) -> series.
 * Any entry may be absent.
 */
export type IndicatorMap = Record<string, Series | undefined>

/** Metric name -> scalar as of a date; null when unavailable */
export type MetricSnapshot = Record<string, number | null>

// ============================================================================
// Regime Classification
// ============================================================================

export type Regime = 'Expansion' | 'Late-cycle' | 'Contraction' | 'Stress'

/** Fixed enumeration order, also the tie-break order */
export const REGIMES: readonly Regime[] = ['Expansion', 'Late-cycle', 'Contraction', 'Stress']

export interface RegimeScore {
  expansion: number
  lateCycle: number
  contraction: number
  stress: number
}

export interface RegimeResult {
  primaryRegime: Regime
  scores: RegimeScore
  /** At most 3 sentences */
  explanations: string[]
  /** (top score - second score) / 100 */
  confidence: number
  dataQualityWarning: string | null
  metrics: MetricSnapshot
}

export interface RegimeThresholds {
  creditGrowthExpansion: number
  creditGrowthContraction: number
  spreadZscoreTight: number
  spreadZscoreWide: number
  vixPercentileLow: number
  vixPercentileHigh: number
  vixStress: number
  valuationVsEarningsGap: number
  equityDrawdown: number
}

export interface RegimeWeights {
  creditExpansion: number
  creditContraction: number
  creditNeutralSplit: number
  spreadTight: number
  spreadWideContraction: number
  spreadWideStress: number
  spreadNeutral: number
  vixLow: number
  vixStress: number
  vixHighContraction: number
  vixHighStress: number
  vixNeutral: number
  equityDrawdownStress: number
  equityDrawdownContraction: number
  valuationGapLateCycle: number
  valuationGapExpansionPenalty: number
}

// ============================================================================
// Alerts
// ============================================================================

export type AlertLevel = 'Green' | 'Yellow' | 'Red'

export type AlertRuleName = 'belief_overheating' | 'collateral_stress' | 'balance_sheet_contraction'

export interface Alert {
  readonly level: AlertLevel
  readonly ruleName: AlertRuleName
  readonly title: string
  readonly whatChanged: string
  readonly vulnerabilityPath: string
  readonly additionalChecks: readonly string[]
  /** ISO timestamp of creation */
  readonly timestamp: string
}

export interface AlertConfig {
  // Belief overheating
  beliefZscoreGapYellow: number
  beliefZscoreGapRed: number

  // Collateral stress
  vixPercentileYellow: number
  vixPercentileRed: number
  spreadPercentileYellow: number
  spreadPercentileRed: number
  equityDrawdownYellow: number
  equityDrawdownRed: number

  // Balance sheet contraction
  credit3mThreshold: number
  creditDecelerationThreshold: number
}

export type AlertSummary = Record<AlertLevel, number>
