import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { eq } from 'drizzle-orm'
import { accountStatements, cashFlows, dividendPayments, fxRates, positions, trades } from '~/db/schema'
import type { Database } from '~/db/types'
import { cashFlow, dividend, position, snapshot, statement, trade } from '~/test/builders'
import { createTestDb, insertInstrument, testFx } from '~/test/db'
import type { TestDb } from '~/test/db'
import { Decimal } from './decimal'
import { writeRecord, writeSnapshot, writeStatement } from './ledger-writer'

let testDb: TestDb
let db: Database

beforeEach(async () => {
  testDb = await createTestDb()
  db = testDb.db
})

afterEach(async () => {
  await testDb.close()
})

describe('writeRecord', () => {
  it('writes a record once per external id', async () => {
    const instrumentId = await insertInstrument(db, 'FI0009000202')
    const draft = trade({ externalId: 'ibkr_flex_trades:5001', commission: new Decimal(-3.5) })

    expect(await writeRecord(db, draft, { instrumentId, fx: testFx })).toBe('created')
    expect(await writeRecord(db, draft, { instrumentId, fx: testFx })).toBe('skipped')

    const rows = await db.select().from(trades)
    expect(rows).toHaveLength(1)
    expect(rows[0].commission).toBe('-3.5')
    expect(rows[0].quantity).toBe('100')
  })

  it('needs a resolved instrument for trades and dividends', async () => {
    await expect(
      writeRecord(db, trade({ externalId: 'ibkr_flex_trades:5002' }), { instrumentId: null, fx: testFx }),
    ).rejects.toThrow('trade ibkr_flex_trades:5002 has no resolved instrument')
  })

  it('stores base-currency dividends at rate 1', async () => {
    const instrumentId = await insertInstrument(db, 'FI0009000202')
    await writeRecord(
      db,
      dividend({
        externalId: 'ibkr_activity_statement:keskob',
        grossAmount: new Decimal(220),
        withholdingTax: new Decimal(-77),
        netAmount: new Decimal(143),
      }),
      { instrumentId, fx: testFx },
    )

    const [row] = await db.select().from(dividendPayments)
    expect([row.netAmount, row.fxRate, row.fxSource, row.baseAmount]).toEqual(['143', '1', 'same_currency', '143'])
  })

  it('converts with the rate the source carried', async () => {
    const instrumentId = await insertInstrument(db, 'US1912161007')
    await writeRecord(
      db,
      dividend({
        externalId: 'ibkr_flex_dividends:9001',
        instrument: { isin: 'US1912161007', symbol: 'KO', venue: null },
        netAmount: new Decimal(51),
        currency: 'USD',
        fxRate: new Decimal(0.9),
      }),
      { instrumentId, fx: testFx },
    )

    const [row] = await db.select().from(dividendPayments)
    expect([row.fxRate, row.fxSource, row.baseAmount]).toEqual(['0.9', 'explicit', '45.9'])
  })

  it('leaves a foreign amount without a rate unconverted', async () => {
    const draft = cashFlow({
      externalId: 'ibkr_flex_activity:7004',
      flowType: 'interest',
      amount: new Decimal(1.5),
      currency: 'USD',
    })
    await writeRecord(db, draft, { instrumentId: null, fx: testFx })

    const [row] = await db.select().from(cashFlows)
    expect([row.fxRate, row.fxSource, row.baseAmount]).toEqual([null, 'unconverted', null])
  })
})

describe('writeSnapshot', () => {
  const draft = snapshot('2026-01-28', [
    position({ symbol: 'KESKOB', isin: 'FI0009000202', quantity: new Decimal(1000), value: new Decimal(18500) }),
    position({
      symbol: 'KO',
      isin: 'US1912161007',
      quantity: new Decimal(100),
      value: new Decimal(6000),
      currency: 'USD',
      fxRate: new Decimal(0.85),
    }),
  ])

  it('stores positions and seeds the rates they were valued at', async () => {
    const instrumentId = await insertInstrument(db, 'FI0009000202')
    const written = await writeSnapshot(db, draft, { baseCurrency: 'EUR' })

    expect(written).toMatchObject({ created: true, positionsCreated: 2, positionsSkipped: 0, ratesSeeded: 1 })
    const stored = await db
      .select()
      .from(positions)
      .where(eq(positions.snapshotId, written.snapshotId))
      .orderBy(positions.symbol)
    expect(stored.map((p) => [p.symbol, p.instrumentId, p.date])).toEqual([
      ['KESKOB', instrumentId, '2026-01-28'],
      ['KO', null, '2026-01-28'],
    ])
    const rates = await db.select().from(fxRates)
    expect(rates.map((r) => [r.date, r.currency, r.rate, r.source])).toEqual([['2026-01-28', 'USD', '0.85', 'position']])
  })

  it('adds nothing when the same snapshot comes again', async () => {
    const first = await writeSnapshot(db, draft, { baseCurrency: 'EUR' })
    const second = await writeSnapshot(db, draft, { baseCurrency: 'EUR' })

    expect(second).toEqual({
      snapshotId: first.snapshotId,
      created: false,
      positionsCreated: 0,
      positionsSkipped: 2,
      ratesSeeded: 0,
    })
  })
})

describe('writeStatement', () => {
  it('writes each account statement once', async () => {
    const draft = statement({ currency: 'BASE_SUMMARY', endingCash: new Decimal(1250.5) })
    expect(await writeStatement(db, draft)).toBe('created')
    expect(await writeStatement(db, draft)).toBe('skipped')
    const [row] = await db.select().from(accountStatements)
    expect(row.endingCash).toBe('1250.5')
    expect(row.externalId).toBe('ibkr_flex_cash_report:U0000001:BASE_SUMMARY:2025-01-01:2025-03-31')
  })
})
