import { describe, it, expect } from 'vitest'
import { parseActivityActions } from './activity-actions'

const content = [
  'ActivityCode,TransactionID,Date,CurrencyPrimary,FXRateToBase,Symbol,ISIN,ActivityDescription,TradeQuantity,TradePrice,Amount,LevelOfDetail',
  'DEP,7001,20250102,EUR,1,,,Cash Transfer,,,5000,Currency',
  'DIV,7002,20250410,EUR,1,KESKOB,FI0009000202,KESKOB(FI0009000202) Cash Dividend EUR 0.22 per Share (Ordinary Dividend),,,220,Currency',
  'FRTAX,7003,20250410,EUR,1,KESKOB,FI0009000202,KESKOB(FI0009000202) Cash Dividend EUR 0.22 per Share - FI Tax,,,-77,Currency',
  'DEP,,20250102,BASE_SUMMARY,,,,Cash Transfer,,,5000,BaseCurrency',
  'ADJ,7006,20250115,EUR,1,,,Adjustment,,,1,Currency',
  'CINT,7004,20250131,USD,0.9,,,USD Credit Interest,,,1.5,Currency',
  'BUY,7005,20250311,EUR,1,KESKOB,FI0009000202,Buy 100 Kesko,100,18.2,-1820,Currency',
].join('\n')

describe('parseActivityActions', () => {
  const result = parseActivityActions(content)

  it('classifies each activity code', () => {
    expect(result.errors).toEqual([])
    expect(result.records.map((r) => [r.kind, r.externalId])).toEqual([
      ['cash_flow', 'ibkr_flex_activity:7001'],
      ['cash_flow', 'ibkr_flex_activity:7004'],
      ['trade', 'ibkr_flex_activity:7005'],
      ['dividend', 'ibkr_flex_activity:7002'],
    ])
  })

  it('skips base-currency summaries and adjustments', () => {
    expect(result.ignored).toBe(2)
  })

  it('maps cash codes to flow types', () => {
    const flows = result.records.flatMap((r) => (r.kind === 'cash_flow' ? [[r.flowType, r.currency]] : []))
    expect(flows).toEqual([
      ['deposit', 'EUR'],
      ['interest', 'USD'],
    ])
  })

  it('pairs the dividend with its withholding', () => {
    const dividend = result.records.find((r) => r.kind === 'dividend')
    if (dividend?.kind !== 'dividend') throw new Error('dividend expected')

    expect(dividend.grossAmount.toFixed()).toBe('220')
    expect(dividend.withholdingTax.toFixed()).toBe('-77')
    expect(dividend.netAmount.toFixed()).toBe('143')
    expect(dividend.perShare?.toFixed()).toBe('0.22')
    expect(dividend.amountType).toBe('per_share')
    expect(dividend.raw.rows.map((r) => r.line)).toEqual([3, 4])
  })

  it('reads trades from the funds statement', () => {
    const trade = result.records.find((r) => r.kind === 'trade')
    if (trade?.kind !== 'trade') throw new Error('trade expected')

    expect(trade.instrument).toEqual({ isin: 'FI0009000202', symbol: 'KESKOB', venue: null })
    expect(trade.quantity.toFixed()).toBe('100')
    expect(trade.price.toFixed()).toBe('18.2')
  })

  it('reports an unreadable amount with its line', () => {
    const bad = parseActivityActions(
      [content.split('\n')[0], 'DEP,7010,20250102,EUR,1,,,Cash Transfer,,,lots,Currency'].join('\n'),
    )
    expect(bad.errors).toEqual([{ line: 2, message: 'Invalid number "lots"' }])
  })
})
