import { describe, it, expect } from 'vitest'
import { parseTransactionExport } from './transaction-export'
import type { RecordDraft } from './types'

const HEADER = [
  'Id',
  'Kirjauspäivä',
  'Kauppapäivä',
  'Maksupäivä',
  'Tapahtumatyyppi',
  'Arvopaperi',
  'ISIN',
  'Määrä',
  'Kurssi',
  'Kokonaiskulut',
  'Valuutta',
  'Summa',
  'Valuutta',
  'Vaihtokurssi',
  'Tapahtumateksti',
  'Mitätöintipäivä',
]

const ROWS = [
  ['101', '2025-03-10', '2025-03-10', '2025-03-12', 'OSTO', 'Kesko B', 'FI0009000202', '100', '18,20', '9,00', 'EUR', '-1829,00', 'EUR', '1', '', ''],
  ['102', '2025-04-10', '2025-04-10', '2025-04-10', 'OSINKO', 'Kesko B', 'FI0009000202', '1000', '0,22', '0', 'EUR', '220,00', 'EUR', '1', 'OSINKO KESKOB 0,22 EUR', ''],
  ['103', '2025-04-10', '2025-04-10', '2025-04-10', 'ENNAKKOPIDÄTYS', 'Kesko B', 'FI0009000202', '', '', '', 'EUR', '-77,00', 'EUR', '1', 'ENNAKKOPIDÄTYS 35 %', ''],
  ['104', '2025-01-02', '', '', 'TALLETUS', '', '', '', '', '', 'EUR', '5000,00', 'EUR', '', '', ''],
  ['105', '2025-01-03', '2025-01-03', '2025-01-03', 'VALUUTAN OSTO', '', '', '', '', '', 'USD', '100,00', 'USD', '0,9', '', ''],
  ['106', '2025-03-11', '2025-03-11', '2025-03-13', 'OSTO', 'Kesko B', 'FI0009000202', '10', '18,30', '9,00', 'EUR', '-192,00', 'EUR', '1', '', '2025-03-11'],
  ['107', '2025-03-12', '', '', 'TUNTEMATON', '', '', '', '', '', 'EUR', '1,00', 'EUR', '', '', ''],
  ['108', '2025-04-01', '2025-04-01', '2025-04-01', 'OSINKO', 'Coca-Cola', 'US1912161007', '100', '0,51', '0', 'USD', '51,00', 'USD', '0,9', '', ''],
]

const content = [HEADER, ...ROWS].map((cells) => cells.join('\t')).join('\n')

describe('parseTransactionExport', () => {
  const result = parseTransactionExport(content)

  it('reads every transaction kind', () => {
    expect(result.errors).toEqual([])
    expect(result.records.map((r) => [r.kind, r.externalId])).toEqual([
      ['trade', 'nordnet:101'],
      ['cash_flow', 'nordnet:104'],
      ['dividend', 'nordnet:102'],
      ['dividend', 'nordnet:108'],
    ])
  })

  it('skips currency exchanges, cancelled rows and unknown types', () => {
    expect(result.ignored).toBe(3)
    expect(result.warnings).toEqual([{ line: 8, message: 'Unknown transaction type "TUNTEMATON"' }])
  })

  it('reads decimal commas and signs costs as outflows', () => {
    const [trade] = result.records
    if (trade.kind !== 'trade') throw new Error('trade expected')
    expect(trade.quantity.toFixed()).toBe('100')
    expect(trade.price.toFixed()).toBe('18.2')
    expect(trade.amount.toFixed()).toBe('-1829')
    expect(trade.commission.toFixed()).toBe('-9')
    expect(trade.settlementDate).toBe('2025-03-12')
    expect(trade.fxRate).toBeNull()
  })

  it('takes the currency of the amount from the second Valuutta column', () => {
    const dividends = result.records.filter((r): r is Extract<RecordDraft, { kind: 'dividend' }> => r.kind === 'dividend')
    expect(dividends.map((d) => d.currency)).toEqual(['EUR', 'USD'])
  })

  it('pairs dividend and withholding rows', () => {
    const dividend = result.records[2]
    if (dividend.kind !== 'dividend') throw new Error('dividend expected')
    expect(dividend.grossAmount.toFixed()).toBe('220')
    expect(dividend.withholdingTax.toFixed()).toBe('-77')
    expect(dividend.netAmount.toFixed()).toBe('143')
    expect(dividend.perShare?.toFixed()).toBe('0.22')
    expect(dividend.quantity?.toFixed()).toBe('1000')
  })

  it('keeps an exchange rate other than 1', () => {
    const dividend = result.records[3]
    if (dividend.kind !== 'dividend') throw new Error('dividend expected')
    expect(dividend.fxRate?.toFixed()).toBe('0.9')
    expect(dividend.withholdingTax.isZero()).toBe(true)
  })

  it('offers traded ISINs to the catalog', () => {
    expect(result.instruments.map((i) => [i.isin, i.name, i.line])).toEqual([['FI0009000202', 'Kesko B', 2]])
  })
})
