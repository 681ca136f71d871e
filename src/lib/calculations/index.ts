/**
 * Balance-sheet diagnostics: piecewise band scoring over Fed balance-sheet
 * line items, plus the reserves identity check.
 */

export type { ScoreBand, BandScale, BandScore, LabelSeries, FlagSeries, ScoredSeries } from './piecewise-score'
export { scorePiecewise, scoreSeries, zipSeries, shareOfTotal } from './piecewise-score'

export type { QtPaceRegime, QtPaceResult } from './qt-pace'
export { QT_PACE_SCALE, calculateQtPace } from './qt-pace'

export type {
  ReserveRegime,
  ReserveThresholds,
  ReserveRegimeResult,
  TgaDragRegime,
  TgaReserveDragResult,
  ReserveDemandRegime,
  ReserveDemandResult,
} from './reserves'
export {
  DEFAULT_RESERVE_THRESHOLDS,
  RRP_RESERVE_DAMPING,
  TGA_DRAG_SCALE,
  RESERVE_DEMAND_SCALE,
  RESERVE_DEMAND_CRISIS_RATIO,
  reserveScale,
  classifyReserveRegime,
  calculateTgaReserveDrag,
  calculateReserveDemandProxy,
} from './reserves'

export type { MoneyMarketRegime, MoneyMarketStressResult } from './money-market'
export { MONEY_MARKET_SCALE, detectMoneyMarketStress } from './money-market'

export type { FedLendingRegime, FedLendingStressResult } from './fed-lending'
export { FED_LENDING_SCALE, calculateFedLendingStress } from './fed-lending'

export type { BalanceSheetInputs, BalanceSheetIdentityResult } from './balance-sheet-identity'
export { DEFAULT_IDENTITY_TOLERANCE, verifyBalanceSheetIdentity } from './balance-sheet-identity'
