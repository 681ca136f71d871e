import { describe, expect, it } from 'vitest'
import { makeSeries } from '@/test/fixtures'
import { verifyBalanceSheetIdentity } from './balance-sheet-identity'

const soma = [8000, 7960, 7930, 7950, 7900]
const lending = [10, 12, 15, 11, 9]
const rrp = [500, 520, 480, 450, 470]
const tga = [700, 650, 720, 760, 740]

// Reserves built so that every change satisfies the identity exactly
const reserves = soma.map(
  (_, i) =>
    3000 +
    ((soma[i] ?? 0) - 8000) +
    ((lending[i] ?? 0) - 10) -
    ((rrp[i] ?? 0) - 500) -
    ((tga[i] ?? 0) - 700)
)

describe('verifyBalanceSheetIdentity', () => {
  it('balances every period of a consistent balance sheet', () => {
    const result = verifyBalanceSheetIdentity({
      reserves: makeSeries(reserves),
      somaAssets: makeSeries(soma),
      fedLending: makeSeries(lending),
      reverseRepo: makeSeries(rrp),
      tga: makeSeries(tga),
    })

    expect(result.residual[0]?.value).toBeNaN()
    expect(result.residual.slice(1).map((p) => p.value)).toEqual([0, 0, 0, 0])
    expect(result.isBalanced.map((p) => p.value)).toEqual([false, true, true, true, true])
    expect(result.identityLhs.slice(1).map((p) => p.value)).toEqual(result.identityRhs.slice(1).map((p) => p.value))
  })

  it('flags residuals beyond the tolerance', () => {
    const shifted = reserves.map((v, i) => (i === 2 ? v + 60 : i === 4 ? v + 40 : v))
    const result = verifyBalanceSheetIdentity({
      reserves: makeSeries(shifted),
      somaAssets: makeSeries(soma),
      fedLending: makeSeries(lending),
      reverseRepo: makeSeries(rrp),
      tga: makeSeries(tga),
    })

    expect(result.residual.slice(1).map((p) => p.value)).toEqual([0, 60, -60, 40])
    expect(result.imbalanceMagnitude.slice(1).map((p) => p.value)).toEqual([0, 60, 60, 40])
    expect(result.isBalanced.map((p) => p.value)).toEqual([false, true, false, false, true])
  })

  it('short-circuits on missing or misaligned inputs', () => {
    const empty = { identityLhs: [], identityRhs: [], residual: [], isBalanced: [], imbalanceMagnitude: [] }
    const full = {
      reserves: makeSeries(reserves),
      somaAssets: makeSeries(soma),
      fedLending: makeSeries(lending),
      reverseRepo: makeSeries(rrp),
    }

    expect(verifyBalanceSheetIdentity(full)).toEqual(empty)
    expect(verifyBalanceSheetIdentity({ ...full, tga: makeSeries(tga.slice(1)) })).toEqual(empty)
    expect(verifyBalanceSheetIdentity({ ...full, tga: [] })).toEqual(empty)
  })
})
