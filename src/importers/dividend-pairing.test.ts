import { describe, it, expect } from 'vitest'
import { Decimal } from '~/lib/decimal'
import { createExternalIdFactory } from '~/lib/dedupe'
import { pairDividends } from './dividend-pairing'
import type { DividendLeg } from './dividend-pairing'

const keskob = { isin: 'FI0009000202', symbol: 'KESKOB', venue: null }

function leg(overrides: Partial<DividendLeg> & Pick<DividendLeg, 'role' | 'amount'>): DividendLeg {
  const line = overrides.row?.line ?? 1
  return {
    row: { line, text: `row ${line}`, fields: {} },
    instrument: keskob,
    date: '2025-04-10',
    currency: 'EUR',
    description: 'KESKOB(FI0009000202) Cash Dividend EUR 0.22 per Share',
    nativeId: null,
    ...overrides,
  }
}

const ctx = () => ({
  format: 'multi_section_statement' as const,
  source: 'test',
  externalId: createExternalIdFactory('test'),
})

describe('pairDividends', () => {
  it('merges a dividend with the tax withheld from it', () => {
    const result = pairDividends(
      [
        leg({ role: 'gross', amount: new Decimal(220), perShare: new Decimal('0.22'), row: { line: 4, text: 'div', fields: {} } }),
        leg({ role: 'withholding', amount: new Decimal(-77), row: { line: 9, text: 'tax', fields: {} } }),
      ],
      ctx(),
    )

    expect(result.dividends).toHaveLength(1)
    const [dividend] = result.dividends
    expect(dividend.grossAmount.toFixed()).toBe('220')
    expect(dividend.withholdingTax.toFixed()).toBe('-77')
    expect(dividend.netAmount.toFixed()).toBe('143')
    expect(dividend.amountType).toBe('per_share')
    expect(dividend.raw.rows.map((r) => r.text)).toEqual(['div', 'tax'])
    expect(result.unmatched).toEqual([])
  })

  it('sums several withholding rows', () => {
    const result = pairDividends(
      [
        leg({ role: 'gross', amount: new Decimal(100) }),
        leg({ role: 'withholding', amount: new Decimal(-15) }),
        leg({ role: 'withholding', amount: new Decimal(-10) }),
      ],
      ctx(),
    )
    expect(result.dividends[0].netAmount.toFixed()).toBe('75')
  })

  it('keeps different pay dates apart', () => {
    const result = pairDividends(
      [
        leg({ role: 'gross', amount: new Decimal(100) }),
        leg({ role: 'gross', amount: new Decimal(100), date: '2025-10-10' }),
      ],
      ctx(),
    )
    expect(result.dividends.map((d) => d.payDate)).toEqual(['2025-04-10', '2025-10-10'])
  })

  it('turns withholding without a dividend into an other cash flow and warns', () => {
    const result = pairDividends(
      [leg({ role: 'withholding', amount: new Decimal(-5), row: { line: 12, text: 'tax', fields: {} } })],
      ctx(),
    )
    expect(result.dividends).toEqual([])
    expect(result.unmatched).toHaveLength(1)
    expect(result.unmatched[0].flowType).toBe('other')
    expect(result.unmatched[0].amount.toFixed()).toBe('-5')
    expect(result.warnings).toEqual([
      { line: 12, message: 'Withholding tax for FI0009000202 on 2025-04-10 has no matching dividend' },
    ])
  })

  it('drops a dividend that was reported and reversed', () => {
    const result = pairDividends(
      [leg({ role: 'gross', amount: new Decimal(50) }), leg({ role: 'gross', amount: new Decimal(-50) })],
      ctx(),
    )
    expect(result.dividends).toEqual([])
    expect(result.reversed).toBe(1)
  })

  it('marks dividends without a per-share amount as total net', () => {
    const result = pairDividends([leg({ role: 'gross', amount: new Decimal(12) })], ctx())
    expect(result.dividends[0].amountType).toBe('total_net')
  })
})
