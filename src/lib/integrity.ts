import { and, count, eq, exists, isNotNull, isNull, ne, notExists, notInArray, or, sql } from 'drizzle-orm'
import type { Column, SQL } from 'drizzle-orm'
import type { PgTable } from 'drizzle-orm/pg-core'
import currencyCodes from '~/data/currencies.json'
import {
  cashFlows,
  corporateActions,
  dividendPayments,
  instrumentAliases,
  instruments,
  portfolioSnapshots,
  positions,
  trades,
} from '~/db/schema'
import type { Database } from '~/db/types'
import { currencyFromIsin } from '~/importers/csv'
import { checkBalance, loadBalanceInputs } from './balance'
import type { BalanceBands, BalanceCheck } from './balance'
import type { FxOptions } from './fx'
import { createLogger } from './logger'

const log = createLogger('audit')

// ─── Types ────────────────────────────────────────────────────────────────────

export const CHECKS = [
  'orphan',
  'null_field',
  'fk',
  'duplicate',
  'alias_quality',
  'dividend_quality',
  'balance',
] as const

export type CheckName = (typeof CHECKS)[number]
export type Severity = 'info' | 'warning'

export interface FindingRef {
  table: string
  id: string
}

export interface Finding {
  check: CheckName
  code: string
  severity: Severity
  count: number
  message: string
  refs: FindingRef[]
}

export interface AuditReport {
  generatedAt: string
  findings: Finding[]
  bySeverity: Record<Severity, number>
  byCheck: Partial<Record<CheckName, number>>
  balance: BalanceCheck | null
}

export interface AuditOptions {
  fx: FxOptions
  bands: BalanceBands
  /** Checks to run; all of them when omitted */
  checks?: readonly CheckName[]
  from?: string | null
  to?: string | null
  margin?: boolean
  /** How many record references a finding carries at most */
  refLimit?: number
}

interface Context {
  db: Database
  options: AuditOptions
  refLimit: number
  findings: Finding[]
}

const KNOWN_CURRENCIES: readonly string[] = currencyCodes

function report(
  ctx: Context,
  check: CheckName,
  code: string,
  severity: Severity,
  table: string,
  ids: string[],
  message: string,
) {
  if (ids.length === 0) return
  ctx.findings.push({
    check,
    code,
    severity,
    count: ids.length,
    message: `${message} (${ids.length})`,
    refs: ids.slice(0, ctx.refLimit).map((id) => ({ table, id })),
  })
}

const ids = (rows: Array<{ id: string }>) => rows.map((row) => row.id)

/** NOT EXISTS (SELECT 1 FROM table WHERE condition) */
const absent = (db: Database, table: PgTable, condition: SQL) =>
  notExists(db.select({ one: sql`1` }).from(table).where(condition))

// ─── Orphans ──────────────────────────────────────────────────────────────────

async function orphanCheck(ctx: Context) {
  const { db } = ctx

  const idle = await db
    .select({ id: instruments.id })
    .from(instruments)
    .where(
      and(
        absent(db, trades, eq(trades.instrumentId, instruments.id)),
        absent(db, dividendPayments, eq(dividendPayments.instrumentId, instruments.id)),
      ),
    )
  report(
    ctx,
    'orphan',
    'instrument_without_activity',
    'info',
    'instruments',
    ids(idle),
    'Instruments with no trades and no dividends',
  )

  const aliases = await db
    .select({ id: instrumentAliases.id })
    .from(instrumentAliases)
    .where(absent(db, instruments, eq(instruments.id, instrumentAliases.instrumentId)))
  report(
    ctx,
    'orphan',
    'alias_without_instrument',
    'warning',
    'instrument_aliases',
    ids(aliases),
    'Aliases pointing at a missing instrument',
  )

  const softLinks = await db
    .select({ id: positions.id })
    .from(positions)
    .where(
      and(
        isNotNull(positions.instrumentId),
        absent(db, instruments, eq(instruments.id, positions.instrumentId)),
      ),
    )
  report(
    ctx,
    'orphan',
    'position_without_instrument',
    'warning',
    'positions',
    ids(softLinks),
    'Positions linked to a missing instrument',
  )

  const detached = await db
    .select({ id: positions.id })
    .from(positions)
    .where(absent(db, portfolioSnapshots, eq(portfolioSnapshots.id, positions.snapshotId)))
  report(
    ctx,
    'orphan',
    'position_without_snapshot',
    'warning',
    'positions',
    ids(detached),
    'Positions without a snapshot',
  )
}

// ─── Missing fields ───────────────────────────────────────────────────────────

async function nullFieldCheck(ctx: Context) {
  const { db } = ctx
  const base = ctx.options.fx.baseCurrency

  const unconvertedForeign = await db
    .select({ id: dividendPayments.id })
    .from(dividendPayments)
    .where(and(isNull(dividendPayments.baseAmount), ne(dividendPayments.currency, base)))
  report(
    ctx,
    'null_field',
    'dividend_unconverted',
    'warning',
    'dividend_payments',
    ids(unconvertedForeign),
    'Foreign-currency dividends without a base amount',
  )

  const unconvertedBase = await db
    .select({ id: dividendPayments.id })
    .from(dividendPayments)
    .where(and(isNull(dividendPayments.baseAmount), eq(dividendPayments.currency, base)))
  report(
    ctx,
    'null_field',
    'dividend_missing_base_amount',
    'info',
    'dividend_payments',
    ids(unconvertedBase),
    'Base-currency dividends without a base amount',
  )

  const missingRate = await db
    .select({ id: dividendPayments.id })
    .from(dividendPayments)
    .where(and(isNull(dividendPayments.fxRate), ne(dividendPayments.currency, base)))
  report(
    ctx,
    'null_field',
    'dividend_missing_fx_rate',
    'warning',
    'dividend_payments',
    ids(missingRate),
    'Foreign-currency dividends without an exchange rate',
  )

  const flows = await db.select({ id: cashFlows.id }).from(cashFlows).where(isNull(cashFlows.baseAmount))
  report(
    ctx,
    'null_field',
    'cash_flow_unconverted',
    'warning',
    'cash_flows',
    ids(flows),
    'Cash flows without a base amount',
  )

  const noCurrency = await db.select({ id: instruments.id }).from(instruments).where(isNull(instruments.currency))
  report(
    ctx,
    'null_field',
    'instrument_missing_currency',
    'info',
    'instruments',
    ids(noCurrency),
    'Instruments without a currency',
  )

  const noAlias = await db
    .select({ id: instruments.id })
    .from(instruments)
    .where(absent(db, instrumentAliases, eq(instrumentAliases.instrumentId, instruments.id)))
  report(
    ctx,
    'null_field',
    'instrument_without_alias',
    'info',
    'instruments',
    ids(noAlias),
    'Instruments without any symbol',
  )

  const noIsin = await db.select({ id: positions.id }).from(positions).where(isNull(positions.isin))
  report(
    ctx,
    'null_field',
    'position_missing_isin',
    'info',
    'positions',
    ids(noIsin),
    'Positions without an ISIN',
  )

  const uncatalogued = await db
    .select({ id: positions.id })
    .from(positions)
    .where(
      and(
        isNotNull(positions.isin),
        absent(db, instruments, eq(instruments.isin, positions.isin)),
      ),
    )
  report(
    ctx,
    'null_field',
    'position_not_in_catalog',
    'info',
    'positions',
    ids(uncatalogued),
    'Positions whose ISIN is not in the instrument catalog',
  )
}

// ─── Foreign keys ─────────────────────────────────────────────────────────────

async function fkCheck(ctx: Context) {
  const { db } = ctx
  const missing = (column: Column) =>
    absent(db, instruments, eq(instruments.id, column))

  const tradeRows = await db.select({ id: trades.id }).from(trades).where(missing(trades.instrumentId))
  report(
    ctx,
    'fk',
    'trade_instrument_missing',
    'warning',
    'trades',
    ids(tradeRows),
    'Trades referencing a missing instrument',
  )

  const dividendRows = await db
    .select({ id: dividendPayments.id })
    .from(dividendPayments)
    .where(missing(dividendPayments.instrumentId))
  report(
    ctx,
    'fk',
    'dividend_instrument_missing',
    'warning',
    'dividend_payments',
    ids(dividendRows),
    'Dividends referencing a missing instrument',
  )

  const actionRows = await db
    .select({ id: corporateActions.id })
    .from(corporateActions)
    .where(and(isNotNull(corporateActions.instrumentId), missing(corporateActions.instrumentId)))
  report(
    ctx,
    'fk',
    'corporate_action_instrument_missing',
    'warning',
    'corporate_actions',
    ids(actionRows),
    'Corporate actions referencing a missing instrument',
  )
}

// ─── Duplicates ───────────────────────────────────────────────────────────────

async function duplicateCheck(ctx: Context) {
  const { db } = ctx

  const ledgers = [
    { name: 'trades', table: trades },
    { name: 'dividend_payments', table: dividendPayments },
    { name: 'cash_flows', table: cashFlows },
    { name: 'corporate_actions', table: corporateActions },
  ] as const
  for (const { name, table } of ledgers) {
    const groups = await db
      .select({ ids: sql<string[]>`array_agg(${table.id})` })
      .from(table)
      .groupBy(table.externalId)
      .having(sql`count(*) > 1`)
    report(
      ctx,
      'duplicate',
      `${name}_external_id`,
      'warning',
      name,
      groups.flatMap((g) => g.ids),
      `Repeated external ids in ${name}`,
    )
  }

  const snapshots = await db
    .select({ ids: sql<string[]>`array_agg(${portfolioSnapshots.id})` })
    .from(portfolioSnapshots)
    .groupBy(portfolioSnapshots.reportDate)
    .having(sql`count(*) > 1`)
  report(
    ctx,
    'duplicate',
    'snapshot_date',
    'warning',
    'portfolio_snapshots',
    snapshots.flatMap((g) => g.ids),
    'Snapshots sharing a report date',
  )

  // The same payment imported from two reports carries two external ids
  const crossSource = await db
    .select({ ids: sql<string[]>`array_agg(${dividendPayments.id})` })
    .from(dividendPayments)
    .groupBy(dividendPayments.instrumentId, dividendPayments.payDate)
    .having(sql`count(distinct ${dividendPayments.source}) > 1`)
  report(
    ctx,
    'duplicate',
    'dividend_cross_source',
    'warning',
    'dividend_payments',
    crossSource.flatMap((g) => g.ids),
    'Dividends for one instrument and pay date from several sources',
  )
}

// ─── Aliases ──────────────────────────────────────────────────────────────────

async function aliasQualityCheck(ctx: Context) {
  const { db } = ctx
  const aliasOf = (primary: boolean) =>
    db
      .select({ one: sql`1` })
      .from(instrumentAliases)
      .where(
        and(
          eq(instrumentAliases.instrumentId, instruments.id),
          primary ? eq(instrumentAliases.isPrimary, true) : undefined,
        ),
      )

  const noPrimary = await db
    .select({ id: instruments.id })
    .from(instruments)
    .where(and(exists(aliasOf(false)), notExists(aliasOf(true))))
  report(
    ctx,
    'alias_quality',
    'no_primary_alias',
    'warning',
    'instruments',
    ids(noPrimary),
    'Instruments with aliases but no primary symbol',
  )

  // "OLD, NEW" stored as one symbol instead of two aliases
  const commas = await db
    .select({ id: instrumentAliases.id })
    .from(instrumentAliases)
    .where(sql`${instrumentAliases.symbol} LIKE '%,%'`)
  report(
    ctx,
    'alias_quality',
    'comma_in_symbol',
    'warning',
    'instrument_aliases',
    ids(commas),
    'Aliases whose symbol contains a comma',
  )
}

// ─── Dividends ────────────────────────────────────────────────────────────────

async function dividendQualityCheck(ctx: Context) {
  const { db } = ctx
  const base = ctx.options.fx.baseCurrency

  const unknown = await db
    .select({ id: dividendPayments.id })
    .from(dividendPayments)
    .where(notInArray(dividendPayments.currency, [...KNOWN_CURRENCIES]))
  report(
    ctx,
    'dividend_quality',
    'unknown_currency',
    'warning',
    'dividend_payments',
    ids(unknown),
    'Dividends in an unknown currency',
  )

  const withIsin = await db
    .select({ id: dividendPayments.id, currency: dividendPayments.currency, isin: instruments.isin })
    .from(dividendPayments)
    .innerJoin(instruments, eq(dividendPayments.instrumentId, instruments.id))
  const mismatched = withIsin.filter((row) => {
    const expected = currencyFromIsin(row.isin)
    return expected !== null && expected !== row.currency
  })
  report(
    ctx,
    'dividend_quality',
    'isin_currency_mismatch',
    'info',
    'dividend_payments',
    ids(mismatched),
    'Dividends paid in a currency other than the ISIN country suggests',
  )

  const placeholderRate = await db
    .select({ id: dividendPayments.id })
    .from(dividendPayments)
    .where(
      and(
        eq(dividendPayments.amountType, 'total_net'),
        ne(dividendPayments.currency, base),
        or(isNull(dividendPayments.fxRate), eq(dividendPayments.fxRate, '1')),
      ),
    )
  report(
    ctx,
    'dividend_quality',
    'total_net_without_rate',
    'warning',
    'dividend_payments',
    ids(placeholderRate),
    'Foreign total-net dividends whose rate is missing or exactly 1',
  )
}

// ─── Balance ──────────────────────────────────────────────────────────────────

async function balanceCheck(ctx: Context): Promise<BalanceCheck> {
  const { options } = ctx
  const inputs = await loadBalanceInputs(ctx.db, {
    from: options.from,
    to: options.to,
    fx: options.fx,
    margin: options.margin,
  })
  const result = checkBalance(inputs, options.bands)

  if (result.status === 'warning' || result.status === 'fail') {
    ctx.findings.push({
      check: 'balance',
      code: `balance_${result.status}`,
      severity: 'warning',
      count: 1,
      message: `Ledger implies ${result.expected}, reported ${result.reported} (${result.differencePct}% apart)`,
      refs: [],
    })
  }
  for (const callout of result.callouts) {
    ctx.findings.push({
      check: 'balance',
      code: callout.code,
      severity: 'info',
      count: callout.count,
      message: callout.message,
      refs: [],
    })
  }
  return result
}

// ─── Audit ────────────────────────────────────────────────────────────────────

const RUNNERS: Record<Exclude<CheckName, 'balance'>, (ctx: Context) => Promise<void>> = {
  orphan: orphanCheck,
  null_field: nullFieldCheck,
  fk: fkCheck,
  duplicate: duplicateCheck,
  alias_quality: aliasQualityCheck,
  dividend_quality: dividendQualityCheck,
}

/** Read-only audit of the whole ledger. Findings are advisory; nothing is changed. */
export async function runAudit(db: Database, options: AuditOptions): Promise<AuditReport> {
  const selected = new Set<CheckName>(options.checks ?? CHECKS)
  const ctx: Context = { db, options, refLimit: options.refLimit ?? 20, findings: [] }

  for (const check of CHECKS) {
    if (check === 'balance' || !selected.has(check)) continue
    await RUNNERS[check](ctx)
  }
  const balance = selected.has('balance') ? await balanceCheck(ctx) : null

  const bySeverity: Record<Severity, number> = { info: 0, warning: 0 }
  const byCheck: Partial<Record<CheckName, number>> = {}
  for (const finding of ctx.findings) {
    bySeverity[finding.severity] += finding.count
    byCheck[finding.check] = (byCheck[finding.check] ?? 0) + finding.count
    const line = `[${finding.check}] ${finding.message}`
    if (finding.severity === 'warning') log.warn(line)
    else log.info(line)
  }

  return { generatedAt: new Date().toISOString(), findings: ctx.findings, bySeverity, byCheck, balance }
}

/** Total number of records in each ledger table, for the audit header. */
export async function ledgerCounts(db: Database): Promise<Record<string, number>> {
  const tables = {
    instruments,
    instrument_aliases: instrumentAliases,
    trades,
    dividend_payments: dividendPayments,
    cash_flows: cashFlows,
    corporate_actions: corporateActions,
    portfolio_snapshots: portfolioSnapshots,
    positions,
  } as const
  const counts: Record<string, number> = {}
  for (const [name, table] of Object.entries(tables)) {
    const [row] = await db.select({ n: count() }).from(table)
    counts[name] = row?.n ?? 0
  }
  return counts
}
