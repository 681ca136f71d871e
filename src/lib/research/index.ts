/**
 * Research Module - Regime Classification & Alert Engine
 *
 * Transforms, the regime classifier and the alert engine. All computations
 * are point-in-time and lookahead-free when an as-of date is given.
 */

// Types
export type {
  DatedValue,
  TimePoint,
  Series,
  TimeSeries,
  IndicatorMap,
  MetricSnapshot,
  Regime,
  RegimeScore,
  RegimeResult,
  RegimeThresholds,
  RegimeWeights,
  AlertLevel,
  AlertRuleName,
  Alert,
  AlertConfig,
  AlertSummary,
} from './types'
export { REGIMES } from './types'

// Alignment Utilities
export type { TargetFrequency, AggregationMethod } from './alignment'
export {
  formatDate,
  daysBetween,
  sliceAsOf,
  latestPoint,
  latestValue,
  combineOnDates,
  standardizeFrequency,
} from './alignment'

// Transforms
export type {
  RollingWindowOptions,
  PercentileKind,
  PercentileOptions,
  RollingStatsPoint,
  LatestValues,
} from './transforms'
export {
  calcPctChange,
  calcDiff,
  calcYoY,
  calc1mChange,
  calc3mAnnualized,
  calcZscore,
  calcZscoreChange,
  calcAcceleration,
  calcPercentile,
  calcRollingStats,
  detectInflection,
  getLatestValues,
} from './transforms'

// Indicator Registry
export type {
  IndicatorRole,
  ResolvedIndicators,
  IndicatorSource,
  IndicatorCategory,
  IndicatorMetadata,
} from './indicator-registry'
export {
  INDICATOR_ROLES,
  ROLE_ALIASES,
  CORE_INDICATOR_NAMES,
  INDICATOR_REGISTRY,
  resolveIndicators,
  getIndicatorMetadata,
  getIndicatorsByCategory,
} from './indicator-registry'

// Regime Score
export type { RegimeClassifierOptions } from './regime-score'
export {
  DEFAULT_REGIME_THRESHOLDS,
  DEFAULT_REGIME_WEIGHTS,
  DEFAULT_SCORE_SCALE_FACTOR,
  REGIME_DESCRIPTIONS,
  RegimeClassifier,
  getRegimeColor,
  getPrimaryRegime,
  computeConfidence,
  calculateRegimeScores,
  determineRegime,
} from './regime-score'

// Alerts
export type { AlertFinding, AlertRuleDefinition, AlertEngineOptions, AlertRecord } from './alerts'
export {
  DEFAULT_ALERT_CONFIG,
  ALERT_RULES,
  AlertEngine,
  checkBeliefOverheating,
  checkCollateralStress,
  checkBalanceSheetContraction,
  formatAlertMessage,
  alertToRecord,
  getAlertLevelColor,
} from './alerts'
