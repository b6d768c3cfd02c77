import { and, asc, desc, eq, gte, lte } from 'drizzle-orm'
import { Decimal, ZERO, toDecimal } from '~/lib/decimal'
import { monthOf } from '~/lib/dates'
import { resolveRate } from '~/lib/fx'
import type { FxOptions } from '~/lib/fx'
import { dividendPayments, instrumentAliases, instruments, portfolioSnapshots, positions } from './schema'
import type { Database } from './types'

// Read-side views over the reconciled ledger. Every total is in base currency;
// amounts without a rate are listed, never counted at 1.

// ─── Snapshots ────────────────────────────────────────────────────────────────

export interface SnapshotPosition {
  symbol: string
  isin: string | null
  name: string | null
  quantity: string
  value: string | null
  currency: string
  baseValue: string | null
}

export interface SnapshotView {
  reportDate: string
  source: string
  positions: SnapshotPosition[]
  total: string
  /** Positions left out of `total` because no rate converts them */
  unconverted: SnapshotPosition[]
}

/** The snapshot for `date`, or the latest one when no date is given. */
export async function getSnapshot(
  db: Database,
  fx: FxOptions,
  date?: string,
): Promise<SnapshotView | null> {
  const [snapshot] = await db
    .select()
    .from(portfolioSnapshots)
    .where(date ? eq(portfolioSnapshots.reportDate, date) : undefined)
    .orderBy(desc(portfolioSnapshots.reportDate))
    .limit(1)
  if (!snapshot) return null

  const rows = await db
    .select()
    .from(positions)
    .where(eq(positions.snapshotId, snapshot.id))
    .orderBy(asc(positions.symbol))

  let total = ZERO
  const view: SnapshotView = {
    reportDate: snapshot.reportDate,
    source: snapshot.source,
    positions: [],
    total: '0',
    unconverted: [],
  }

  for (const row of rows) {
    const value = toDecimal(row.value)
    const { rate } = await resolveRate(
      db,
      {
        currency: row.currency,
        date: row.date,
        explicitRate: toDecimal(row.fxRate),
        instrumentId: row.instrumentId,
      },
      fx,
    )
    const baseValue = value && rate ? value.times(rate) : null
    const position: SnapshotPosition = {
      symbol: row.symbol,
      isin: row.isin,
      name: row.name,
      quantity: new Decimal(row.quantity).toFixed(),
      value: value?.toFixed() ?? null,
      currency: row.currency,
      baseValue: baseValue?.toFixed(2) ?? null,
    }
    view.positions.push(position)
    if (rate === null) view.unconverted.push(position)
    else if (baseValue) total = total.plus(baseValue)
  }

  view.total = total.toFixed(2)
  return view
}

// ─── Dividend income ──────────────────────────────────────────────────────────

export interface DividendIncome {
  total: string
  byMonth: Array<{ month: string; total: string }>
  excluded: { count: number; byCurrency: Record<string, string> }
}

export async function dividendIncome(
  db: Database,
  { from, to }: { from?: string; to?: string } = {},
): Promise<DividendIncome> {
  const rows = await db
    .select({
      payDate: dividendPayments.payDate,
      netAmount: dividendPayments.netAmount,
      currency: dividendPayments.currency,
      baseAmount: dividendPayments.baseAmount,
    })
    .from(dividendPayments)
    .where(
      and(
        from ? gte(dividendPayments.payDate, from) : undefined,
        to ? lte(dividendPayments.payDate, to) : undefined,
      ),
    )
    .orderBy(asc(dividendPayments.payDate))

  let total = ZERO
  const months = new Map<string, Decimal>()
  const excluded = new Map<string, Decimal>()
  let excludedCount = 0

  for (const row of rows) {
    const base = toDecimal(row.baseAmount)
    if (base === null) {
      excludedCount++
      excluded.set(row.currency, (excluded.get(row.currency) ?? ZERO).plus(new Decimal(row.netAmount)))
      continue
    }
    total = total.plus(base)
    const month = monthOf(row.payDate)
    months.set(month, (months.get(month) ?? ZERO).plus(base))
  }

  return {
    total: total.toFixed(2),
    byMonth: [...months.entries()].map(([month, amount]) => ({ month, total: amount.toFixed(2) })),
    excluded: {
      count: excludedCount,
      byCurrency: Object.fromEntries([...excluded.entries()].map(([ccy, amount]) => [ccy, amount.toFixed()])),
    },
  }
}

// ─── Instruments ──────────────────────────────────────────────────────────────

export interface InstrumentListing {
  id: string
  isin: string
  name: string | null
  currency: string | null
  symbol: string | null
}

/** Every catalogued instrument with its primary symbol. */
export async function listInstruments(db: Database): Promise<InstrumentListing[]> {
  return db
    .select({
      id: instruments.id,
      isin: instruments.isin,
      name: instruments.name,
      currency: instruments.currency,
      symbol: instrumentAliases.symbol,
    })
    .from(instruments)
    .leftJoin(
      instrumentAliases,
      and(eq(instrumentAliases.instrumentId, instruments.id), eq(instrumentAliases.isPrimary, true)),
    )
    .orderBy(asc(instruments.isin))
}
