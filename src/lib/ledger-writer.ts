import { eq, inArray } from 'drizzle-orm'
import {
  accountStatements,
  cashFlows,
  corporateActions,
  dividendPayments,
  instruments,
  portfolioSnapshots,
  positions,
  trades,
} from '~/db/schema'
import type { Database } from '~/db/types'
import type { RecordDraft, SnapshotDraft, StatementDraft } from '~/importers/types'
import { toNumeric } from './decimal'
import { convertToBase, resolveRate, upsertFxRates } from './fx'
import type { FxOptions, FxRateInput } from './fx'
import { createLogger } from './logger'

const log = createLogger('ledger')

export type WriteOutcome = 'created' | 'skipped'

export interface WriteContext {
  /** Resolved instrument; required for trades and dividends */
  instrumentId: string | null
  fx: FxOptions
}

function outcome(rows: unknown[]): WriteOutcome {
  return rows.length > 0 ? 'created' : 'skipped'
}

function requireInstrument(draft: RecordDraft, ctx: WriteContext): string {
  if (!ctx.instrumentId) throw new Error(`${draft.kind} ${draft.externalId} has no resolved instrument`)
  return ctx.instrumentId
}

// ─── Ledger records ───────────────────────────────────────────────────────────

/**
 * Insert a record unless its external id is already in the ledger.
 * `skipped` means an earlier import wrote the same record.
 */
export async function writeRecord(
  db: Database,
  draft: RecordDraft,
  ctx: WriteContext,
): Promise<WriteOutcome> {
  switch (draft.kind) {
    case 'trade': {
      const rows = await db
        .insert(trades)
        .values({
          externalId: draft.externalId,
          instrumentId: requireInstrument(draft, ctx),
          tradeDate: draft.tradeDate,
          settlementDate: draft.settlementDate,
          quantity: toNumeric(draft.quantity),
          price: toNumeric(draft.price),
          amount: toNumeric(draft.amount),
          commission: toNumeric(draft.commission),
          currency: draft.currency,
          fxRate: toNumeric(draft.fxRate),
          realizedPnl: toNumeric(draft.realizedPnl),
          description: draft.description,
          source: draft.source,
          rawData: draft.raw,
        })
        .onConflictDoNothing({ target: trades.externalId })
        .returning({ id: trades.id })
      return outcome(rows)
    }

    case 'dividend': {
      const instrumentId = requireInstrument(draft, ctx)
      const resolution = await resolveRate(
        db,
        { currency: draft.currency, date: draft.payDate, explicitRate: draft.fxRate, instrumentId },
        ctx.fx,
      )
      const rows = await db
        .insert(dividendPayments)
        .values({
          externalId: draft.externalId,
          instrumentId,
          payDate: draft.payDate,
          exDate: draft.exDate,
          grossAmount: toNumeric(draft.grossAmount),
          withholdingTax: toNumeric(draft.withholdingTax),
          netAmount: toNumeric(draft.netAmount),
          currency: draft.currency,
          quantity: toNumeric(draft.quantity),
          perShare: toNumeric(draft.perShare),
          amountType: draft.amountType,
          fxRate: toNumeric(resolution.rate),
          fxSource: resolution.source,
          baseAmount: toNumeric(convertToBase(draft.netAmount, resolution)),
          description: draft.description,
          source: draft.source,
          rawData: draft.raw,
        })
        .onConflictDoNothing({ target: dividendPayments.externalId })
        .returning({ id: dividendPayments.id })
      return outcome(rows)
    }

    case 'cash_flow': {
      const resolution = await resolveRate(
        db,
        { currency: draft.currency, date: draft.date, explicitRate: draft.fxRate },
        ctx.fx,
      )
      const rows = await db
        .insert(cashFlows)
        .values({
          externalId: draft.externalId,
          flowType: draft.flowType,
          date: draft.date,
          amount: toNumeric(draft.amount),
          currency: draft.currency,
          fxRate: toNumeric(resolution.rate),
          fxSource: resolution.source,
          baseAmount: toNumeric(convertToBase(draft.amount, resolution)),
          description: draft.description,
          source: draft.source,
          rawData: draft.raw,
        })
        .onConflictDoNothing({ target: cashFlows.externalId })
        .returning({ id: cashFlows.id })
      return outcome(rows)
    }

    case 'corporate_action': {
      const rows = await db
        .insert(corporateActions)
        .values({
          externalId: draft.externalId,
          instrumentId: ctx.instrumentId,
          actionType: draft.actionType,
          date: draft.date,
          quantity: toNumeric(draft.quantity),
          amount: toNumeric(draft.amount),
          proceeds: toNumeric(draft.proceeds),
          currency: draft.currency,
          description: draft.description,
          source: draft.source,
          rawData: draft.raw,
        })
        .onConflictDoNothing({ target: corporateActions.externalId })
        .returning({ id: corporateActions.id })
      return outcome(rows)
    }
  }
}

// ─── Snapshots ────────────────────────────────────────────────────────────────

export interface SnapshotWrite {
  snapshotId: string
  created: boolean
  positionsCreated: number
  positionsSkipped: number
  ratesSeeded: number
}

async function existingSnapshotId(db: Database, reportDate: string): Promise<string> {
  const [existing] = await db
    .select({ id: portfolioSnapshots.id })
    .from(portfolioSnapshots)
    .where(eq(portfolioSnapshots.reportDate, reportDate))
  if (!existing) throw new Error(`Snapshot ${reportDate} vanished during import`)
  return existing.id
}

/**
 * One snapshot per report date. Positions already stored for the snapshot are
 * left alone; the rates non-base positions were valued at seed the rate table.
 */
export async function writeSnapshot(
  db: Database,
  draft: SnapshotDraft,
  { baseCurrency }: { baseCurrency: string },
): Promise<SnapshotWrite> {
  const [inserted] = await db
    .insert(portfolioSnapshots)
    .values({ reportDate: draft.reportDate, source: draft.source, rawData: draft.raw })
    .onConflictDoNothing({ target: portfolioSnapshots.reportDate })
    .returning({ id: portfolioSnapshots.id })

  const snapshotId = inserted?.id ?? (await existingSnapshotId(db, draft.reportDate))

  const isins = [...new Set(draft.positions.flatMap((p) => (p.isin ? [p.isin] : [])))]
  const catalog =
    isins.length === 0
      ? []
      : await db
          .select({ id: instruments.id, isin: instruments.isin })
          .from(instruments)
          .where(inArray(instruments.isin, isins))
  const instrumentIds = new Map(catalog.map((row) => [row.isin, row.id]))

  let positionsCreated = 0
  if (draft.positions.length > 0) {
    const written = await db
      .insert(positions)
      .values(
        draft.positions.map((p) => ({
          snapshotId,
          date: draft.reportDate,
          isin: p.isin,
          instrumentId: p.isin ? (instrumentIds.get(p.isin) ?? null) : null,
          symbol: p.symbol,
          name: p.name,
          assetClass: p.assetClass,
          exchange: p.exchange,
          quantity: toNumeric(p.quantity),
          price: toNumeric(p.price),
          value: toNumeric(p.value),
          costBasis: toNumeric(p.costBasis),
          currency: p.currency,
          fxRate: toNumeric(p.fxRate),
          unrealizedPnl: toNumeric(p.unrealizedPnl),
          rawData: p.raw,
        })),
      )
      .onConflictDoNothing({ target: [positions.snapshotId, positions.symbol] })
      .returning({ id: positions.id })
    positionsCreated = written.length
  }

  const rates = new Map<string, FxRateInput>()
  for (const p of draft.positions) {
    if (p.currency === baseCurrency || !p.fxRate || rates.has(p.currency)) continue
    rates.set(p.currency, { date: draft.reportDate, currency: p.currency, rate: p.fxRate, source: 'position' })
  }
  const ratesSeeded = await upsertFxRates(db, [...rates.values()])

  log.debug(
    `Snapshot ${draft.reportDate}: ${positionsCreated} new positions, ${ratesSeeded} rates seeded`,
  )
  return {
    snapshotId,
    created: inserted !== undefined,
    positionsCreated,
    positionsSkipped: draft.positions.length - positionsCreated,
    ratesSeeded,
  }
}

// ─── Account statements ───────────────────────────────────────────────────────

export async function writeStatement(db: Database, draft: StatementDraft): Promise<WriteOutcome> {
  const rows = await db
    .insert(accountStatements)
    .values({
      externalId: draft.externalId,
      accountId: draft.accountId,
      currency: draft.currency,
      fromDate: draft.fromDate,
      toDate: draft.toDate,
      startingCash: toNumeric(draft.startingCash),
      endingCash: toNumeric(draft.endingCash),
      deposits: toNumeric(draft.deposits),
      withdrawals: toNumeric(draft.withdrawals),
      dividends: toNumeric(draft.dividends),
      commissions: toNumeric(draft.commissions),
      source: draft.source,
      rawData: draft.raw,
    })
    .onConflictDoNothing({ target: accountStatements.externalId })
    .returning({ id: accountStatements.id })
  return outcome(rows)
}
