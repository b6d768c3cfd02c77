import { and, asc, desc, eq, gt, gte, isNotNull, isNull, lte, sql } from 'drizzle-orm'
import { cashFlows, dividendPayments, fxRates, positions } from '~/db/schema'
import type { Database } from '~/db/types'
import { addDays } from './dates'
import { Decimal, ONE, toDecimal, toNumeric } from './decimal'
import { createLogger } from './logger'

const log = createLogger('fx')

// ─── Types ────────────────────────────────────────────────────────────────────

export interface FxOptions {
  baseCurrency: string
  /** How far back the rate table may look for a missing date */
  lookbackDays: number
  /** How far (either side) a position's rate may be borrowed from */
  positionWindowDays: number
}

export interface FxRequest {
  currency: string
  date: string
  explicitRate?: Decimal | null
  instrumentId?: string | null
}

export type FxSource = 'same_currency' | 'explicit' | 'position' | 'rate_table'

export type FxResolution =
  | { rate: Decimal; source: FxSource }
  | { rate: null; source: 'unconverted' }

export interface FxStrategy {
  name: FxSource
  /** A rate, or null to hand over to the next strategy */
  resolve: (db: Database, req: FxRequest, opts: FxOptions) => Promise<Decimal | null>
}

// ─── Strategies ───────────────────────────────────────────────────────────────

const sameCurrency: FxStrategy = {
  name: 'same_currency',
  resolve: async (_db, req, opts) => (req.currency === opts.baseCurrency ? ONE : null),
}

// A carried rate of exactly 1 between different currencies is a placeholder
// some exports write when they have no rate, not a conversion.
const explicit: FxStrategy = {
  name: 'explicit',
  resolve: async (_db, req) => {
    const rate = req.explicitRate
    if (!rate || rate.lte(0) || rate.eq(1)) return null
    return rate
  },
}

// Borrow the rate a position in the same currency was valued at, nearest date
// first, preferring the record's own instrument. Never crosses currencies.
const position: FxStrategy = {
  name: 'position',
  resolve: async (db, req, opts) => {
    const from = addDays(req.date, -opts.positionWindowDays)
    const to = addDays(req.date, opts.positionWindowDays)
    const sameInstrument = req.instrumentId
      ? sql`CASE WHEN ${positions.instrumentId} = ${req.instrumentId} THEN 0 ELSE 1 END`
      : sql`0`

    const [hit] = await db
      .select({ rate: positions.fxRate })
      .from(positions)
      .where(
        and(
          eq(positions.currency, req.currency),
          isNotNull(positions.fxRate),
          gt(positions.fxRate, '0'),
          gte(positions.date, from),
          lte(positions.date, to),
        ),
      )
      .orderBy(
        asc(sameInstrument),
        asc(sql`abs(${positions.date} - ${req.date}::date)`),
        desc(positions.date),
      )
      .limit(1)

    return toDecimal(hit?.rate)
  },
}

const rateTable: FxStrategy = {
  name: 'rate_table',
  resolve: (db, req, opts) => lookupRate(db, req.currency, req.date, opts.lookbackDays),
}

export const FX_STRATEGIES: readonly FxStrategy[] = [sameCurrency, explicit, position, rateTable]

// ─── Resolution ───────────────────────────────────────────────────────────────

/**
 * Resolve the rate that converts `req.currency` into base currency on
 * `req.date`. Strategies run in order; the first rate wins. When none has a
 * rate the amount is `unconverted`: callers keep it out of base totals.
 */
export async function resolveRate(
  db: Database,
  req: FxRequest,
  opts: FxOptions,
  strategies: readonly FxStrategy[] = FX_STRATEGIES,
): Promise<FxResolution> {
  for (const strategy of strategies) {
    const rate = await strategy.resolve(db, req, opts)
    if (rate !== null) return { rate, source: strategy.name }
  }
  log.debug(`No ${req.currency}→${opts.baseCurrency} rate for ${req.date}`)
  return { rate: null, source: 'unconverted' }
}

export function convertToBase(amount: Decimal, resolution: FxResolution): Decimal | null {
  return resolution.rate === null ? null : amount.times(resolution.rate)
}

// ─── Rate table ───────────────────────────────────────────────────────────────

/** Rate on `date`, or on the nearest earlier date at most `lookbackDays` back. */
export async function lookupRate(
  db: Database,
  currency: string,
  date: string,
  lookbackDays: number,
): Promise<Decimal | null> {
  const [hit] = await db
    .select({ rate: fxRates.rate })
    .from(fxRates)
    .where(
      and(
        eq(fxRates.currency, currency),
        lte(fxRates.date, date),
        gte(fxRates.date, addDays(date, -lookbackDays)),
      ),
    )
    .orderBy(desc(fxRates.date))
    .limit(1)

  return toDecimal(hit?.rate)
}

export interface FxRateInput {
  date: string
  currency: string
  rate: Decimal
  source: string
}

/**
 * Store rates. An existing (date, currency) rate is kept unless `overwrite`
 * is set. Returns how many rows were written.
 */
export async function upsertFxRates(
  db: Database,
  rates: FxRateInput[],
  { overwrite = false }: { overwrite?: boolean } = {},
): Promise<number> {
  const values = rates
    .filter((r) => r.rate.gt(0))
    .map((r) => ({ date: r.date, currency: r.currency, rate: toNumeric(r.rate), source: r.source }))
  if (values.length === 0) return 0

  const insert = db.insert(fxRates).values(values)
  const written = overwrite
    ? await insert
        .onConflictDoUpdate({
          target: [fxRates.date, fxRates.currency],
          set: { rate: sql`excluded.rate`, source: sql`excluded.source` },
        })
        .returning({ id: fxRates.id })
    : await insert
        .onConflictDoNothing({ target: [fxRates.date, fxRates.currency] })
        .returning({ id: fxRates.id })
  return written.length
}

// ─── Backfill ─────────────────────────────────────────────────────────────────

export interface BackfillResult {
  dividends: number
  cashFlows: number
  stillUnconverted: number
}

/** Convert records stored without a base amount, now that more rates may be known. */
export async function backfillConversions(db: Database, opts: FxOptions): Promise<BackfillResult> {
  const result: BackfillResult = { dividends: 0, cashFlows: 0, stillUnconverted: 0 }

  const dividends = await db
    .select()
    .from(dividendPayments)
    .where(isNull(dividendPayments.baseAmount))
  for (const dividend of dividends) {
    const resolution = await resolveRate(
      db,
      {
        currency: dividend.currency,
        date: dividend.payDate,
        explicitRate: toDecimal(dividend.fxRate),
        instrumentId: dividend.instrumentId,
      },
      opts,
    )
    const base = convertToBase(new Decimal(dividend.netAmount), resolution)
    if (resolution.rate === null || base === null) {
      result.stillUnconverted++
      continue
    }
    await db
      .update(dividendPayments)
      .set({ fxRate: toNumeric(resolution.rate), fxSource: resolution.source, baseAmount: toNumeric(base) })
      .where(eq(dividendPayments.id, dividend.id))
    result.dividends++
  }

  const flows = await db.select().from(cashFlows).where(isNull(cashFlows.baseAmount))
  for (const flow of flows) {
    const resolution = await resolveRate(
      db,
      { currency: flow.currency, date: flow.date, explicitRate: toDecimal(flow.fxRate) },
      opts,
    )
    const base = convertToBase(new Decimal(flow.amount), resolution)
    if (resolution.rate === null || base === null) {
      result.stillUnconverted++
      continue
    }
    await db
      .update(cashFlows)
      .set({ fxRate: toNumeric(resolution.rate), fxSource: resolution.source, baseAmount: toNumeric(base) })
      .where(eq(cashFlows.id, flow.id))
    result.cashFlows++
  }

  log.info(
    `Backfilled ${result.dividends} dividends and ${result.cashFlows} cash flows; ${result.stillUnconverted} still unconverted`,
  )
  return result
}
