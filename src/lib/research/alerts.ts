/**
 * Alert Engine
 *
 * Three independent rules, each producing at most one Green/Yellow/Red alert:
 * 1. Belief overheating: valuation z-score rising faster than earnings z-score
 * 2. Collateral stress: VIX percentile + spread percentile + 1M equity drawdown
 * 3. Balance-sheet contraction: bank credit 3M annualized < 0, with spread widening
 *
 * Alerts describe a vulnerability to monitor, never a cause.
 */

import { z } from 'zod'
import { CONFIG } from '@/lib/config'
import { getErrorMessage } from '@/lib/utils/errors'
import { formatFixed } from '@/lib/utils/format'
import { mergeOverrides } from '@/lib/utils/overrides'
import type { Alert, AlertConfig, AlertLevel, AlertRuleName, AlertSummary, IndicatorMap } from './types'
import { latestValue } from './alignment'
import { calc1mChange, calc3mAnnualized, calcDiff, calcPercentile, calcZscoreChange } from './transforms'
import { resolveIndicators, type ResolvedIndicators } from './indicator-registry'

const { tradingDaysPerYear, weeksPerYear, oneMonthDaily, oneMonthWeekly, threeMonthsWeekly } = CONFIG.periods

// ============================================================================
// Default Thresholds
// ============================================================================

export const DEFAULT_ALERT_CONFIG: AlertConfig = {
  beliefZscoreGapYellow: 0.3,
  beliefZscoreGapRed: 0.6,

  vixPercentileYellow: 75,
  vixPercentileRed: 90,
  spreadPercentileYellow: 70,
  spreadPercentileRed: 85,
  equityDrawdownYellow: -3.0, // % 1M return
  equityDrawdownRed: -7.0,

  credit3mThreshold: 0.0, // % 3M annualized
  creditDecelerationThreshold: -2.0,
}

const finite = z.number().finite()

const AlertConfigSchema = z
  .object({
    beliefZscoreGapYellow: finite,
    beliefZscoreGapRed: finite,
    vixPercentileYellow: finite,
    vixPercentileRed: finite,
    spreadPercentileYellow: finite,
    spreadPercentileRed: finite,
    equityDrawdownYellow: finite,
    equityDrawdownRed: finite,
    credit3mThreshold: finite,
    creditDecelerationThreshold: finite,
  })
  .partial()
  .strict()

// ============================================================================
// Rule Definitions
// ============================================================================

export interface AlertFinding {
  level: AlertLevel
  whatChanged: string
}

export interface AlertRuleDefinition {
  id: AlertRuleName
  title: string
  vulnerabilityPath: string
  additionalChecks: readonly [string, string]
  evaluate: (data: ResolvedIndicators, config: AlertConfig, asOfDate?: string) => AlertFinding | null
}

function evaluateBeliefOverheating(
  data: ResolvedIndicators,
  config: AlertConfig,
  asOfDate?: string
): AlertFinding | null {
  const { valuation, earnings } = data
  if (!valuation || !earnings) return null
  if (valuation.length < tradingDaysPerYear || earnings.length < tradingDaysPerYear) return null

  const options = { windowYears: 3, changePeriods: oneMonthDaily }
  const valChange = latestValue(calcZscoreChange(valuation, options), asOfDate)
  const earnChange = latestValue(calcZscoreChange(earnings, options), asOfDate)
  if (valChange === null || earnChange === null) return null

  const gap = valChange - earnChange

  let level: AlertLevel
  if (gap >= config.beliefZscoreGapRed) level = 'Red'
  else if (gap >= config.beliefZscoreGapYellow) level = 'Yellow'
  else return null

  return {
    level,
    whatChanged: `Valuation z-score rising ${formatFixed(gap, 2)}σ faster than earnings z-score over 1M`,
  }
}

function evaluateCollateralStress(
  data: ResolvedIndicators,
  config: AlertConfig,
  asOfDate?: string
): AlertFinding | null {
  const { vix, spread, equity } = data
  if (!vix || !spread || !equity) return null

  let vixPercentile: number | null = null
  let spreadPercentile: number | null = null
  let equity1m: number | null = null

  // VIX: 3 years of daily history
  if (vix.length > 3 * tradingDaysPerYear) {
    vixPercentile = latestValue(calcPercentile(vix, { windowYears: 3, periodsPerYear: tradingDaysPerYear }), asOfDate)
  }
  // Spread: 3 years of weekly history
  if (spread.length > 3 * weeksPerYear) {
    spreadPercentile = latestValue(calcPercentile(spread, { windowYears: 3, periodsPerYear: weeksPerYear }), asOfDate)
  }
  if (equity.length > oneMonthDaily) {
    equity1m = latestValue(calc1mChange(equity, oneMonthDaily), asOfDate)
  }

  if (vixPercentile === null || spreadPercentile === null || equity1m === null) return null

  const redSignals = [
    vixPercentile >= config.vixPercentileRed,
    spreadPercentile >= config.spreadPercentileRed,
    equity1m <= config.equityDrawdownRed,
  ].filter(Boolean).length

  const yellowSignals = [
    vixPercentile >= config.vixPercentileYellow,
    spreadPercentile >= config.spreadPercentileYellow,
    equity1m <= config.equityDrawdownYellow,
  ].filter(Boolean).length

  let level: AlertLevel
  if (redSignals >= 2) level = 'Red'
  else if (yellowSignals >= 2) level = 'Yellow'
  else return null

  return {
    level,
    whatChanged:
      `VIX ${formatFixed(vixPercentile, 0)}th percentile, spread ${formatFixed(spreadPercentile, 0)}th percentile, ` +
      `equity 1M ${formatFixed(equity1m)}%`,
  }
}

function evaluateBalanceSheetContraction(
  data: ResolvedIndicators,
  config: AlertConfig,
  asOfDate?: string
): AlertFinding | null {
  const { credit_growth: credit, spread } = data
  // At least 6 months of weekly data
  if (!credit || credit.length < 2 * threeMonthsWeekly) return null

  const creditGrowth = latestValue(calc3mAnnualized(credit, threeMonthsWeekly), asOfDate)
  if (creditGrowth === null) return null

  let spreadChange: number | null = null
  if (spread && spread.length > oneMonthWeekly) {
    spreadChange = latestValue(calcDiff(spread, oneMonthWeekly), asOfDate)
  }
  const spreadWidening = spreadChange !== null && spreadChange > 0

  let level: AlertLevel
  if (creditGrowth < config.credit3mThreshold) level = spreadWidening ? 'Red' : 'Yellow'
  else if (creditGrowth < config.creditDecelerationThreshold) level = 'Yellow'
  else return null

  const spreadMsg = spreadWidening && spreadChange !== null ? `, spread widened ${formatFixed(spreadChange, 2)}pp` : ''

  return {
    level,
    whatChanged: `Bank credit 3M annualized ${formatFixed(creditGrowth)}%${spreadMsg}`,
  }
}

export const ALERT_RULES: readonly AlertRuleDefinition[] = [
  {
    id: 'belief_overheating',
    title: 'Belief Overheating',
    vulnerabilityPath: 'Monitor: valuation expansion leaves room for a sharp reversal if earnings disappoint',
    additionalChecks: ['Forward EPS revision trend', 'Analyst consensus changes'],
    evaluate: evaluateBeliefOverheating,
  },
  {
    id: 'collateral_stress',
    title: 'Collateral Stress',
    vulnerabilityPath: 'Monitor: falling collateral values -> margin calls -> forced liquidation -> further declines',
    additionalChecks: ['Leveraged ETF fund flows', 'High-yield issuance pause'],
    evaluate: evaluateCollateralStress,
  },
  {
    id: 'balance_sheet_contraction',
    title: 'Balance Sheet Contraction',
    vulnerabilityPath:
      'Monitor: credit contraction -> asset price declines -> collateral impairment -> further credit contraction',
    additionalChecks: ['M2 growth rate', 'Fed balance sheet changes'],
    evaluate: evaluateBalanceSheetContraction,
  },
]

function getRule(id: AlertRuleName): AlertRuleDefinition {
  const rule = ALERT_RULES.find((r) => r.id === id)
  if (!rule) throw new Error(`Unknown alert rule: ${id}`)
  return rule
}

function createAlert(rule: AlertRuleDefinition, finding: AlertFinding, timestamp: Date): Alert {
  return Object.freeze({
    level: finding.level,
    ruleName: rule.id,
    title: rule.title,
    whatChanged: finding.whatChanged,
    vulnerabilityPath: rule.vulnerabilityPath,
    additionalChecks: Object.freeze([...rule.additionalChecks]),
    timestamp: timestamp.toISOString(),
  })
}

function runRule(
  id: AlertRuleName,
  data: IndicatorMap,
  config: AlertConfig,
  asOfDate: string | undefined,
  now: Date
): Alert | null {
  const rule = getRule(id)
  const finding = rule.evaluate(resolveIndicators(data), config, asOfDate)
  return finding ? createAlert(rule, finding, now) : null
}

// ============================================================================
// Standalone Rule Checks
// ============================================================================

export function checkBeliefOverheating(
  data: IndicatorMap,
  config: AlertConfig = DEFAULT_ALERT_CONFIG,
  asOfDate?: string,
  now: Date = new Date()
): Alert | null {
  return runRule('belief_overheating', data, config, asOfDate, now)
}

export function checkCollateralStress(
  data: IndicatorMap,
  config: AlertConfig = DEFAULT_ALERT_CONFIG,
  asOfDate?: string,
  now: Date = new Date()
): Alert | null {
  return runRule('collateral_stress', data, config, asOfDate, now)
}

export function checkBalanceSheetContraction(
  data: IndicatorMap,
  config: AlertConfig = DEFAULT_ALERT_CONFIG,
  asOfDate?: string,
  now: Date = new Date()
): Alert | null {
  return runRule('balance_sheet_contraction', data, config, asOfDate, now)
}

// ============================================================================
// Engine
// ============================================================================

export interface AlertEngineOptions {
  /** Clock used for alert timestamps */
  now?: () => Date
}

/**
 * Owns an append-only alert history. Single writer: callers sharing one
 * engine across async contexts must serialize `checkAllAlerts` themselves.
 */
export class AlertEngine {
  readonly config: Readonly<AlertConfig>
  private readonly alertHistory: Alert[] = []
  private readonly now: () => Date

  constructor(config: Partial<AlertConfig> = {}, options: AlertEngineOptions = {}) {
    this.config = mergeOverrides<AlertConfig>(DEFAULT_ALERT_CONFIG, AlertConfigSchema, config, 'alert config')
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Evaluate every rule, append the alerts that fired to history and return them
   */
  checkAllAlerts(indicators: IndicatorMap, asOfDate?: string): Alert[] {
    const data = resolveIndicators(indicators)
    const timestamp = this.now()
    const alerts: Alert[] = []

    for (const rule of ALERT_RULES) {
      let finding: AlertFinding | null
      try {
        finding = rule.evaluate(data, this.config, asOfDate)
      } catch (error) {
        console.warn(`[alerts] rule ${rule.id} failed, skipping:`, getErrorMessage(error))
        continue
      }
      if (!finding) continue

      const alert = createAlert(rule, finding, timestamp)
      alerts.push(alert)
      this.alertHistory.push(alert)
    }

    return alerts
  }

  get history(): readonly Alert[] {
    return this.alertHistory
  }

  /**
   * Most recent `n` alerts, newest first
   */
  getRecentAlerts(n: number = CONFIG.alerts.recentDefault): Alert[] {
    if (n <= 0) return []
    return this.alertHistory.slice(-n).reverse()
  }

  /**
   * Alert counts by level over the most recent history window
   */
  getSummary(): AlertSummary {
    const summary: AlertSummary = { Green: 0, Yellow: 0, Red: 0 }
    for (const alert of this.alertHistory.slice(-CONFIG.alerts.summaryWindow)) {
      summary[alert.level]++
    }
    return summary
  }
}

// ============================================================================
// Presentation Helpers
// ============================================================================

/**
 * Standard one-line alert message
 */
export function formatAlertMessage(alert: Alert): string {
  const checks = alert.additionalChecks.slice(0, 2).join(', ')
  return (
    `[${alert.level}] ${alert.title}: ${alert.whatChanged} -> ` +
    `Vulnerability path: ${alert.vulnerabilityPath}. Also check: ${checks}`
  )
}

export interface AlertRecord {
  level: AlertLevel
  rule: AlertRuleName
  title: string
  whatChanged: string
  vulnerabilityPath: string
  checks: string
  timestamp: string
}

/**
 * Flat record for tables and exports; follow-up checks joined into one cell
 */
export function alertToRecord(alert: Alert): AlertRecord {
  return {
    level: alert.level,
    rule: alert.ruleName,
    title: alert.title,
    whatChanged: alert.whatChanged,
    vulnerabilityPath: alert.vulnerabilityPath,
    checks: alert.additionalChecks.join('; '),
    timestamp: alert.timestamp,
  }
}

/**
 * Get color for alert level (for UI)
 */
export function getAlertLevelColor(level: AlertLevel): string {
  switch (level) {
    case 'Green':
      return '#22c55e'
    case 'Yellow':
      return '#f59e0b'
    case 'Red':
      return '#ef4444'
  }
}
