/**
 * Indicator Registry - Canonical metadata and role resolution
 *
 * Loaders deliver series keyed by whatever name they were fetched under
 * ('bank_credit', 'hy_spread', 'sp500', ...). The classifier and the alert
 * engine only ever see canonical roles: `resolveIndicators` is the single
 * place where aliases are mapped.
 */

import type { IndicatorMap, Series } from './types'

// ============================================================================
// Roles
// ============================================================================

export const INDICATOR_ROLES = [
  'credit_growth',
  'spread',
  'vix',
  'equity',
  'valuation',
  'earnings',
  'valuation_zscore',
  'earnings_zscore',
] as const

export type IndicatorRole = (typeof INDICATOR_ROLES)[number]

/** Names accepted for each role, in lookup order */
export const ROLE_ALIASES: Record<IndicatorRole, readonly string[]> = {
  credit_growth: ['credit_growth', 'bank_credit', 'credit'],
  spread: ['spread', 'hy_spread'],
  vix: ['vix'],
  equity: ['equity', 'sp500'],
  valuation: ['valuation', 'pe_ratio'],
  earnings: ['earnings', 'forward_eps'],
  valuation_zscore: ['valuation_zscore'],
  earnings_zscore: ['earnings_zscore'],
}

/** Names counted by the classifier's data-quality check */
export const CORE_INDICATOR_NAMES: readonly string[] = ['credit_growth', 'bank_credit', 'spread', 'hy_spread', 'vix']

export type ResolvedIndicators = Partial<Record<IndicatorRole, Series>>

/**
 * Map an indicator map onto canonical roles. The first alias holding a
 * non-empty series wins; empty or missing series leave the role unset.
 */
export function resolveIndicators(indicators: IndicatorMap): ResolvedIndicators {
  const resolved: ResolvedIndicators = {}

  for (const role of INDICATOR_ROLES) {
    for (const alias of ROLE_ALIASES[role]) {
      const series = indicators[alias]
      if (series && series.length > 0) {
        resolved[role] = series
        break
      }
    }
  }

  return resolved
}

// ============================================================================
// Metadata
// ============================================================================

export type IndicatorSource = 'FRED' | 'Yahoo' | 'CSV'
export type IndicatorCategory = 'balance_sheet' | 'collateral' | 'belief' | 'leverage' | 'spread'

export interface IndicatorMetadata {
  id: string
  name: string
  source: IndicatorSource
  ticker: string
  category: IndicatorCategory
  /** Lower value = more risk */
  invert: boolean
  units: string
}

export const INDICATOR_REGISTRY: Record<string, IndicatorMetadata> = {
  // =========================================================================
  // Balance Sheet
  // =========================================================================
  fed_assets: {
    id: 'fed_assets',
    name: 'Fed Total Assets',
    source: 'FRED',
    ticker: 'WALCL',
    category: 'balance_sheet',
    invert: false,
    units: 'billions USD',
  },
  reserve_balances: {
    id: 'reserve_balances',
    name: 'Reserve Balances with Fed',
    source: 'FRED',
    ticker: 'WRESBAL',
    category: 'balance_sheet',
    invert: false,
    units: 'billions USD',
  },
  reverse_repo: {
    id: 'reverse_repo',
    name: 'Overnight Reverse Repo',
    source: 'FRED',
    ticker: 'RRPONTSYD',
    category: 'balance_sheet',
    invert: false,
    units: 'billions USD',
  },
  tga_balance: {
    id: 'tga_balance',
    name: 'Treasury General Account',
    source: 'FRED',
    ticker: 'WTREGEN',
    category: 'balance_sheet',
    invert: true, // Higher TGA = fewer reserves in the system
    units: 'billions USD',
  },
  fed_lending: {
    id: 'fed_lending',
    name: 'Fed Lending Facilities',
    source: 'FRED',
    ticker: 'WLCFLPCL',
    category: 'balance_sheet',
    invert: false,
    units: 'billions USD',
  },
  bank_credit: {
    id: 'bank_credit',
    name: 'Commercial Bank Credit',
    source: 'FRED',
    ticker: 'TOTBKCR',
    category: 'balance_sheet',
    invert: false,
    units: 'billions USD',
  },
  m2: {
    id: 'm2',
    name: 'M2 Money Supply',
    source: 'FRED',
    ticker: 'M2SL',
    category: 'balance_sheet',
    invert: false,
    units: 'billions USD',
  },

  // =========================================================================
  // Credit Spreads
  // =========================================================================
  hy_spread: {
    id: 'hy_spread',
    name: 'High Yield Spread',
    source: 'FRED',
    ticker: 'BAMLH0A0HYM2',
    category: 'spread',
    invert: true,
    units: 'percent',
  },
  ig_spread: {
    id: 'ig_spread',
    name: 'Investment Grade Spread',
    source: 'FRED',
    ticker: 'BAMLC0A0CM',
    category: 'spread',
    invert: true,
    units: 'percent',
  },

  // =========================================================================
  // Collateral / Belief
  // =========================================================================
  vix: {
    id: 'vix',
    name: 'VIX',
    source: 'Yahoo',
    ticker: '^VIX',
    category: 'collateral',
    invert: true,
    units: 'index',
  },
  sp500: {
    id: 'sp500',
    name: 'S&P 500',
    source: 'Yahoo',
    ticker: '^GSPC',
    category: 'collateral',
    invert: false,
    units: 'index',
  },
  real_yield_10y: {
    id: 'real_yield_10y',
    name: '10Y Real Yield',
    source: 'FRED',
    ticker: 'DFII10',
    category: 'belief',
    invert: true,
    units: 'percent',
  },
  breakeven_10y: {
    id: 'breakeven_10y',
    name: '10Y Breakeven Inflation',
    source: 'FRED',
    ticker: 'T10YIE',
    category: 'belief',
    invert: false,
    units: 'percent',
  },
  consumer_credit: {
    id: 'consumer_credit',
    name: 'Consumer Credit',
    source: 'FRED',
    ticker: 'TOTALSL',
    category: 'leverage',
    invert: false,
    units: 'billions USD',
  },
}

/**
 * Get metadata for an indicator by ID
 */
export function getIndicatorMetadata(id: string): IndicatorMetadata | null {
  return INDICATOR_REGISTRY[id] ?? null
}

/**
 * Get indicators filtered by category
 */
export function getIndicatorsByCategory(category: IndicatorCategory): IndicatorMetadata[] {
  return Object.values(INDICATOR_REGISTRY).filter((d) => d.category === category)
}
