import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { Decimal } from '~/lib/decimal'
import { resolveInstrument } from '~/lib/instrument-resolver'
import { writeRecord, writeSnapshot } from '~/lib/ledger-writer'
import { dividend, position, snapshot } from '~/test/builders'
import { createTestDb, insertInstrument, testFx } from '~/test/db'
import type { TestDb } from '~/test/db'
import { dividendIncome, getSnapshot, listInstruments } from './queries'
import type { Database } from './types'

let testDb: TestDb
let db: Database

beforeEach(async () => {
  testDb = await createTestDb()
  db = testDb.db
})

afterEach(async () => {
  await testDb.close()
})

describe('getSnapshot', () => {
  beforeEach(async () => {
    await writeSnapshot(db, snapshot('2026-01-27', [position({ symbol: 'KESKOB', value: new Decimal(18400) })]), {
      baseCurrency: 'EUR',
    })
    await writeSnapshot(
      db,
      snapshot('2026-01-28', [
        position({ symbol: 'KESKOB', isin: 'FI0009000202', quantity: new Decimal(1000), value: new Decimal(18500) }),
        position({ symbol: 'KO', currency: 'USD', value: new Decimal(6000), fxRate: new Decimal(0.85) }),
        position({ symbol: 'TELIA1', currency: 'SEK', value: new Decimal(6800) }),
      ]),
      { baseCurrency: 'EUR' },
    )
  })

  it('values the latest snapshot in base currency', async () => {
    const view = await getSnapshot(db, testFx)

    expect(view?.reportDate).toBe('2026-01-28')
    expect(view?.positions.map((p) => [p.symbol, p.value, p.baseValue])).toEqual([
      ['KESKOB', '18500', '18500.00'],
      ['KO', '6000', '5100.00'],
      ['TELIA1', '6800', null],
    ])
    expect(view?.total).toBe('23600.00')
    expect(view?.unconverted.map((p) => p.symbol)).toEqual(['TELIA1'])
  })

  it('returns the snapshot of a given date', async () => {
    const view = await getSnapshot(db, testFx, '2026-01-27')
    expect(view?.total).toBe('18400.00')
  })

  it('returns null for a date without a snapshot', async () => {
    expect(await getSnapshot(db, testFx, '2026-01-01')).toBeNull()
  })
})

describe('dividendIncome', () => {
  beforeEach(async () => {
    const instrumentId = await insertInstrument(db, 'FI0009000202', 'EUR')
    const ctx = { instrumentId, fx: testFx }
    await writeRecord(db, dividend({ externalId: 'd1', payDate: '2025-04-10', netAmount: new Decimal(143) }), ctx)
    await writeRecord(db, dividend({ externalId: 'd2', payDate: '2025-04-20', netAmount: new Decimal(50) }), ctx)
    await writeRecord(db, dividend({ externalId: 'd3', payDate: '2025-05-02', netAmount: new Decimal(30) }), ctx)
    await writeRecord(
      db,
      dividend({ externalId: 'd4', payDate: '2025-05-05', netAmount: new Decimal(10), currency: 'USD' }),
      ctx,
    )
  })

  it('totals converted dividends by month and lists the rest', async () => {
    expect(await dividendIncome(db)).toEqual({
      total: '223.00',
      byMonth: [
        { month: '2025-04', total: '193.00' },
        { month: '2025-05', total: '30.00' },
      ],
      excluded: { count: 1, byCurrency: { USD: '10' } },
    })
  })

  it('limits the range', async () => {
    const income = await dividendIncome(db, { from: '2025-05-01', to: '2025-05-31' })
    expect(income.total).toBe('30.00')
    expect(income.excluded.count).toBe(1)
  })
})

describe('listInstruments', () => {
  it('lists instruments with their primary symbol', async () => {
    await resolveInstrument(db, {
      isin: 'FI0009000202',
      symbol: 'KESKOB',
      venue: 'HEX',
      name: 'KESKO OYJ-B SHS',
      cusip: null,
      conid: null,
      figi: null,
      assetCategory: 'STK',
      currency: 'EUR',
      multiplier: null,
      source: 'ibkr_flex_portfolio',
      line: 2,
    })
    await insertInstrument(db, 'US1912161007')

    const listed = await listInstruments(db)
    expect(listed.map(({ isin, name, currency, symbol }) => ({ isin, name, currency, symbol }))).toEqual([
      { isin: 'FI0009000202', name: 'KESKO OYJ-B SHS', currency: 'EUR', symbol: 'KESKOB' },
      { isin: 'US1912161007', name: null, currency: null, symbol: null },
    ])
  })
})
