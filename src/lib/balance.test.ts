import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { Database } from '~/db/types'
import { cashFlow, dividend, position, snapshot, statement, trade } from '~/test/builders'
import { createTestDb, insertInstrument, testFx } from '~/test/db'
import type { TestDb } from '~/test/db'
import { checkBalance, classifyDifference, differencePercent, expectedValue, loadBalanceInputs } from './balance'
import type { BalanceBands, BalanceInputs, Verdict } from './balance'
import { Decimal, ZERO } from './decimal'
import { writeRecord, writeSnapshot, writeStatement } from './ledger-writer'

const bands: BalanceBands = {
  standard: { warnPct: 1, failPct: 5 },
  margin: { warnPct: 3, failPct: 10 },
}

function inputs(overrides: Partial<BalanceInputs> = {}): BalanceInputs {
  return {
    from: '2025-01-01',
    to: '2025-03-31',
    openingValue: new Decimal(10000),
    deposits: new Decimal(1000),
    withdrawals: new Decimal(200),
    realizedPnl: new Decimal(50),
    dividends: new Decimal(143),
    costs: new Decimal(13),
    unrealizedDelta: new Decimal(-80),
    reportedValue: new Decimal(10900),
    margin: false,
    callouts: [],
    ...overrides,
  }
}

describe('expectedValue', () => {
  it('adds inflows and income and takes out withdrawals and costs', () => {
    // 10000 + 1000 − 200 + 50 + 143 − 13 − 80
    expect(expectedValue(inputs()).toFixed()).toBe('10900')
  })
})

describe('classifyDifference', () => {
  const band = bands.standard

  it('passes below the warning threshold and fails from the fail threshold', () => {
    expect(classifyDifference(new Decimal(0.99), band)).toBe('pass')
    expect(classifyDifference(new Decimal(1), band)).toBe('warning')
    expect(classifyDifference(new Decimal(4.99), band)).toBe('warning')
    expect(classifyDifference(new Decimal(5), band)).toBe('fail')
  })

  it('never improves as the difference grows', () => {
    const rank: Record<Verdict, number> = { pass: 0, warning: 1, fail: 2 }
    for (const b of [bands.standard, bands.margin, { warnPct: 0, failPct: 0 }, { warnPct: 2, failPct: 2 }]) {
      let previous = -1
      for (let step = 0; step <= 60; step++) {
        const verdict = rank[classifyDifference(new Decimal(step).div(4), b)]
        expect(verdict).toBeGreaterThanOrEqual(previous)
        previous = verdict
      }
    }
  })
})

describe('checkBalance under wider bands', () => {
  it('only moves from fail towards pass as the band widens', () => {
    const rank: Record<string, number> = { pass: 0, warning: 1, fail: 2 }
    const ledger = inputs({ reportedValue: new Decimal(11300) }) // 400 off, 3.54 %
    const widening = [
      { warnPct: 0.5, failPct: 2 },
      bands.standard,
      { warnPct: 2, failPct: 8 },
      bands.margin,
      { warnPct: 5, failPct: 10 },
    ]

    const verdicts = widening.map((band) => checkBalance(ledger, { standard: band, margin: bands.margin }).status)
    expect(verdicts).toEqual(['fail', 'warning', 'warning', 'warning', 'pass'])
    verdicts.slice(1).forEach((verdict, i) => {
      expect(rank[verdict]).toBeLessThanOrEqual(rank[verdicts[i]])
    })

    // same ledger flagged as a margin account
    const asMargin = checkBalance({ ...ledger, margin: true }, bands)
    expect(asMargin.status).toBe('warning')
    expect(rank[asMargin.status]).toBeLessThanOrEqual(rank[checkBalance(ledger, bands).status])
  })
})

describe('differencePercent', () => {
  it('measures against the reported value', () => {
    expect(differencePercent(new Decimal(-50), new Decimal(1000)).toFixed()).toBe('5')
  })

  it('matches a zero report only with a zero difference', () => {
    expect(differencePercent(ZERO, ZERO).toFixed()).toBe('0')
    expect(differencePercent(new Decimal(0.01), ZERO).toFixed()).toBe('100')
  })
})

describe('checkBalance', () => {
  it('passes an exact match', () => {
    const check = checkBalance(inputs(), bands)
    expect(check).toMatchObject({
      status: 'pass',
      expected: '10900.00',
      reported: '10900.00',
      difference: '0.00',
      differencePct: '0.00',
      margin: false,
    })
    expect(check.components.costs).toBe('13.00')
  })

  it('applies the wider band to margin accounts', () => {
    const reportedValue = new Decimal(11100) // 200 off, 1.80 %
    expect(checkBalance(inputs({ reportedValue }), bands).status).toBe('warning')
    const check = checkBalance(inputs({ reportedValue, margin: true }), bands)
    expect(check.status).toBe('pass')
    expect(check.band).toEqual(bands.margin)
    expect(check.differencePct).toBe('1.80')
  })

  it('skips when nothing reports an ending value', () => {
    const check = checkBalance(inputs({ reportedValue: null }), bands)
    expect(check.status).toBe('skipped')
    expect(check.expected).toBe('10900.00')
    expect(check.difference).toBeNull()
  })
})

describe('loadBalanceInputs', () => {
  let testDb: TestDb
  let db: Database

  beforeEach(async () => {
    testDb = await createTestDb()
    db = testDb.db
  })

  afterEach(async () => {
    await testDb.close()
  })

  it('builds every component in base currency', async () => {
    const instrumentId = await insertInstrument(db, 'FI0009000202', 'EUR')
    const ctx = { instrumentId, fx: testFx }

    await writeSnapshot(
      db,
      snapshot('2025-01-01', [
        position({ symbol: 'KESKOB', value: new Decimal(18000), unrealizedPnl: new Decimal(1000) }),
      ]),
      { baseCurrency: 'EUR' },
    )
    await writeSnapshot(
      db,
      snapshot('2025-03-31', [
        position({ symbol: 'KESKOB', value: new Decimal(18500), unrealizedPnl: new Decimal(1500) }),
        position({
          symbol: 'KO',
          currency: 'USD',
          value: new Decimal(1000),
          unrealizedPnl: new Decimal(100),
          fxRate: new Decimal(0.9),
        }),
      ]),
      { baseCurrency: 'EUR' },
    )
    await writeRecord(db, cashFlow({ externalId: 'dep', amount: new Decimal(1000) }), ctx)
    await writeRecord(
      db,
      cashFlow({ externalId: 'fee', flowType: 'fee', date: '2025-02-03', amount: new Decimal(-10) }),
      ctx,
    )
    await writeRecord(
      db,
      cashFlow({ externalId: 'int', flowType: 'interest', date: '2025-01-31', amount: new Decimal(1.5), currency: 'USD' }),
      ctx,
    )
    await writeRecord(db, dividend({ externalId: 'div', payDate: '2025-02-15', netAmount: new Decimal(143) }), ctx)
    await writeRecord(
      db,
      trade({ externalId: 'sell', quantity: new Decimal(-50), realizedPnl: new Decimal(42.5), commission: new Decimal(-3) }),
      ctx,
    )
    await writeStatement(
      db,
      statement({ currency: 'BASE_SUMMARY', startingCash: new Decimal(500), endingCash: new Decimal(870) }),
    )

    const loaded = await loadBalanceInputs(db, { from: '2025-01-01', to: '2025-03-31', fx: testFx })
    const check = checkBalance(loaded, bands)

    expect(check.components).toEqual({
      openingValue: '18500.00',
      deposits: '1000.00',
      withdrawals: '0.00',
      realizedPnl: '42.50',
      dividends: '143.00',
      costs: '13.00',
      unrealizedDelta: '590.00',
    })
    expect(check).toMatchObject({
      status: 'pass',
      expected: '20262.50',
      reported: '20270.00',
      difference: '7.50',
      differencePct: '0.04',
      margin: false,
    })
    expect(check.callouts).toEqual([
      {
        code: 'unconverted_amounts',
        message: 'Amounts without a base-currency rate',
        amounts: { USD: '1.5' },
        count: 1,
      },
    ])
  })

  it('calls out missing snapshots instead of guessing', async () => {
    const loaded = await loadBalanceInputs(db, { from: '2025-01-01', to: '2025-03-31', fx: testFx })

    expect(loaded.reportedValue).toBeNull()
    expect(loaded.callouts.map((c) => [c.code, c.message])).toEqual([
      ['missing_opening_unrealized', 'No snapshot on or before 2025-01-01 to open the period with'],
      ['missing_reported_value', 'No snapshot reports a value for the end of the period'],
    ])
    expect(checkBalance(loaded, bands).status).toBe('skipped')
  })

  it('treats negative base cash as margin and calls out foreign cash', async () => {
    await writeSnapshot(db, snapshot('2025-03-31', [position({ symbol: 'KESKOB', value: new Decimal(5000) })]), {
      baseCurrency: 'EUR',
    })
    await writeStatement(db, statement({ currency: 'EUR', endingCash: new Decimal(-200) }))
    await writeStatement(db, statement({ currency: 'USD', endingCash: new Decimal(300) }))

    const loaded = await loadBalanceInputs(db, { to: '2025-03-31', fx: testFx })

    expect(loaded.margin).toBe(true)
    expect(loaded.reportedValue?.toFixed()).toBe('4800')
    expect(loaded.callouts).toEqual([
      {
        code: 'untracked_fx_cash',
        message: 'Foreign-currency cash balances outside the base-currency ledger',
        amounts: { USD: '300' },
        count: 1,
      },
    ])
  })
})
