import { and, asc, desc, eq, gt, lte } from 'drizzle-orm'
import type { Column, SQL } from 'drizzle-orm'
import { accountStatements, cashFlows, dividendPayments, portfolioSnapshots, positions, trades } from '~/db/schema'
import type { AccountStatement, CashFlowType, Position } from '~/db/schema'
import type { Database } from '~/db/types'
import type { ToleranceBands } from './config'
import { Decimal, ZERO, toDecimal } from './decimal'
import { resolveRate } from './fx'
import type { FxOptions } from './fx'

// ─── Types ────────────────────────────────────────────────────────────────────

export type Verdict = 'pass' | 'warning' | 'fail'

export type CalloutCode =
  | 'unconverted_amounts'
  | 'untracked_fx_cash'
  | 'missing_opening_unrealized'
  | 'missing_reported_value'

/** A delta the check cannot account for. Reported next to the verdict, never folded into it. */
export interface BalanceCallout {
  code: CalloutCode
  message: string
  /** Native amounts per currency, where the callout is about money */
  amounts: Record<string, string>
  count: number
}

export interface BalanceInputs {
  from: string | null
  to: string | null
  openingValue: Decimal
  deposits: Decimal
  withdrawals: Decimal
  realizedPnl: Decimal
  dividends: Decimal
  costs: Decimal
  unrealizedDelta: Decimal
  /** Independently reported ending value; null when nothing reports one */
  reportedValue: Decimal | null
  margin: boolean
  callouts: BalanceCallout[]
}

export interface BalanceBands {
  standard: ToleranceBands
  margin: ToleranceBands
}

export interface BalanceCheck {
  status: Verdict | 'skipped'
  expected: string
  reported: string | null
  difference: string | null
  differencePct: string | null
  band: ToleranceBands
  margin: boolean
  components: Record<
    'openingValue' | 'deposits' | 'withdrawals' | 'realizedPnl' | 'dividends' | 'costs' | 'unrealizedDelta',
    string
  >
  callouts: BalanceCallout[]
}

// ─── Check ────────────────────────────────────────────────────────────────────

const HUNDRED = new Decimal(100)

export function expectedValue(inputs: BalanceInputs): Decimal {
  return inputs.openingValue
    .plus(inputs.deposits)
    .minus(inputs.withdrawals)
    .plus(inputs.realizedPnl)
    .plus(inputs.dividends)
    .minus(inputs.costs)
    .plus(inputs.unrealizedDelta)
}

/** |difference| as a percentage of |reported|. A zero report only matches a zero difference. */
export function differencePercent(difference: Decimal, reported: Decimal): Decimal {
  if (reported.isZero()) return difference.isZero() ? ZERO : HUNDRED
  return difference.abs().div(reported.abs()).times(HUNDRED)
}

export function classifyDifference(pct: Decimal, band: ToleranceBands): Verdict {
  if (pct.lt(band.warnPct)) return 'pass'
  if (pct.lt(band.failPct)) return 'warning'
  return 'fail'
}

/**
 * Compare the value the ledger implies with the reported one:
 * opening + deposits − withdrawals + realized + dividends − costs + Δunrealized.
 */
export function checkBalance(inputs: BalanceInputs, bands: BalanceBands): BalanceCheck {
  const band = inputs.margin ? bands.margin : bands.standard
  const expected = expectedValue(inputs)
  const components = {
    openingValue: inputs.openingValue.toFixed(2),
    deposits: inputs.deposits.toFixed(2),
    withdrawals: inputs.withdrawals.toFixed(2),
    realizedPnl: inputs.realizedPnl.toFixed(2),
    dividends: inputs.dividends.toFixed(2),
    costs: inputs.costs.toFixed(2),
    unrealizedDelta: inputs.unrealizedDelta.toFixed(2),
  }

  if (inputs.reportedValue === null) {
    return {
      status: 'skipped',
      expected: expected.toFixed(2),
      reported: null,
      difference: null,
      differencePct: null,
      band,
      margin: inputs.margin,
      components,
      callouts: inputs.callouts,
    }
  }

  const difference = inputs.reportedValue.minus(expected)
  const pct = differencePercent(difference, inputs.reportedValue)
  return {
    status: classifyDifference(pct, band),
    expected: expected.toFixed(2),
    reported: inputs.reportedValue.toFixed(2),
    difference: difference.toFixed(2),
    differencePct: pct.toDecimalPlaces(2).toFixed(2),
    band,
    margin: inputs.margin,
    components,
    callouts: inputs.callouts,
  }
}

// ─── Loading from the ledger ──────────────────────────────────────────────────

export interface BalanceLoadOptions {
  /** Opening date: the latest snapshot on or before it is the opening value */
  from?: string | null
  /** Closing date: the latest snapshot on or before it is the reported value */
  to?: string | null
  fx: FxOptions
  /** Treat the account as a margin account regardless of its cash */
  margin?: boolean
}

class CalloutCollector {
  private readonly callouts = new Map<CalloutCode, { message: string; amounts: Map<string, Decimal>; count: number }>()

  add(code: CalloutCode, message: string, amount?: { currency: string; value: Decimal }) {
    const entry = this.callouts.get(code) ?? { message, amounts: new Map<string, Decimal>(), count: 0 }
    entry.count++
    if (amount) {
      entry.amounts.set(amount.currency, (entry.amounts.get(amount.currency) ?? ZERO).plus(amount.value))
    }
    this.callouts.set(code, entry)
  }

  list(): BalanceCallout[] {
    return [...this.callouts.entries()].map(([code, entry]) => ({
      code,
      message: entry.message,
      amounts: Object.fromEntries([...entry.amounts.entries()].map(([ccy, value]) => [ccy, value.toFixed()])),
      count: entry.count,
    }))
  }
}

interface SnapshotTotals {
  value: Decimal
  unrealized: Decimal
  unrealizedKnown: boolean
}

async function snapshotOnOrBefore(db: Database, date: string | null) {
  const [snapshot] = await db
    .select()
    .from(portfolioSnapshots)
    .where(date ? lte(portfolioSnapshots.reportDate, date) : undefined)
    .orderBy(desc(portfolioSnapshots.reportDate))
    .limit(1)
  return snapshot ?? null
}

async function positionRate(db: Database, position: Position, fx: FxOptions): Promise<Decimal | null> {
  const resolution = await resolveRate(
    db,
    {
      currency: position.currency,
      date: position.date,
      explicitRate: toDecimal(position.fxRate),
      instrumentId: position.instrumentId,
    },
    fx,
  )
  return resolution.rate
}

async function valueSnapshot(
  db: Database,
  snapshotId: string,
  fx: FxOptions,
  callouts: CalloutCollector,
): Promise<SnapshotTotals> {
  const rows = await db.select().from(positions).where(eq(positions.snapshotId, snapshotId))
  const totals: SnapshotTotals = { value: ZERO, unrealized: ZERO, unrealizedKnown: rows.length === 0 }

  for (const position of rows) {
    const value = toDecimal(position.value) ?? ZERO
    const unrealized = toDecimal(position.unrealizedPnl)
    const rate = await positionRate(db, position, fx)
    if (rate === null) {
      callouts.add('unconverted_amounts', 'Amounts without a base-currency rate', {
        currency: position.currency,
        value,
      })
      continue
    }
    totals.value = totals.value.plus(value.times(rate))
    if (unrealized !== null) {
      totals.unrealized = totals.unrealized.plus(unrealized.times(rate))
      totals.unrealizedKnown = true
    }
  }
  return totals
}

/**
 * Cash per account at the edge of the period: the base-converted summary row
 * when the report has one, else the base-currency row. Non-base rows of an
 * account without a summary are cash the ledger cannot value.
 */
function statementCash(
  statements: AccountStatement[],
  edge: 'opening' | 'closing',
  baseCurrency: string,
  callouts: CalloutCollector,
): { cash: Decimal; negativeBase: boolean } {
  const byAccount = new Map<string, AccountStatement[]>()
  for (const statement of statements) {
    const list = byAccount.get(statement.accountId) ?? []
    list.push(statement)
    byAccount.set(statement.accountId, list)
  }

  let cash = ZERO
  let negativeBase = false
  for (const list of byAccount.values()) {
    const edgeDate =
      edge === 'opening'
        ? list.reduce((min, s) => (s.fromDate < min ? s.fromDate : min), list[0].fromDate)
        : list.reduce((max, s) => (s.toDate > max ? s.toDate : max), list[0].toDate)
    const atEdge = list.filter((s) => (edge === 'opening' ? s.fromDate : s.toDate) === edgeDate)
    const amountOf = (s: AccountStatement) => new Decimal(edge === 'opening' ? s.startingCash : s.endingCash)

    const summary = atEdge.find((s) => s.currency === 'BASE_SUMMARY')
    const base = atEdge.find((s) => s.currency === baseCurrency)
    const chosen = summary ?? base
    if (chosen) {
      const amount = amountOf(chosen)
      cash = cash.plus(amount)
      if (amount.isNegative()) negativeBase = true
    }
    if (summary) continue

    for (const statement of atEdge) {
      if (statement.currency === baseCurrency || statement.currency === 'BASE_SUMMARY') continue
      const amount = amountOf(statement)
      if (amount.isZero()) continue
      callouts.add('untracked_fx_cash', 'Foreign-currency cash balances outside the base-currency ledger', {
        currency: statement.currency,
        value: amount,
      })
    }
  }
  return { cash, negativeBase }
}

function inPeriod(column: Column, from: string | null, to: string | null): SQL | undefined {
  return and(from ? gt(column, from) : undefined, to ? lte(column, to) : undefined)
}

/** Build every component of the balance identity in base currency. */
export async function loadBalanceInputs(db: Database, options: BalanceLoadOptions): Promise<BalanceInputs> {
  const { fx } = options
  const callouts = new CalloutCollector()

  const closing = await snapshotOnOrBefore(db, options.to ?? null)
  const to = options.to ?? closing?.reportDate ?? null
  const opening = options.from ? await snapshotOnOrBefore(db, options.from) : null
  const from = options.from ?? null

  // ── Snapshots ──
  const openingTotals = opening ? await valueSnapshot(db, opening.id, fx, callouts) : null
  const closingTotals = closing ? await valueSnapshot(db, closing.id, fx, callouts) : null
  if (from && (!openingTotals || !openingTotals.unrealizedKnown)) {
    callouts.add(
      'missing_opening_unrealized',
      opening
        ? `Opening snapshot ${opening.reportDate} carries no unrealized P&L`
        : `No snapshot on or before ${from} to open the period with`,
    )
  }
  if (!closingTotals) {
    callouts.add('missing_reported_value', 'No snapshot reports a value for the end of the period')
  }

  // ── Cash flows ──
  const flows = await db.select().from(cashFlows).where(inPeriod(cashFlows.date, from, to))
  const byType = new Map<CashFlowType, Decimal>()
  for (const flow of flows) {
    const base = toDecimal(flow.baseAmount)
    if (base === null) {
      callouts.add('unconverted_amounts', 'Amounts without a base-currency rate', {
        currency: flow.currency,
        value: new Decimal(flow.amount),
      })
      continue
    }
    byType.set(flow.flowType, (byType.get(flow.flowType) ?? ZERO).plus(base))
  }
  const flowTotal = (type: CashFlowType) => byType.get(type) ?? ZERO

  // ── Trades ──
  let realizedPnl = ZERO
  let commissions = ZERO
  const tradeRows = await db.select().from(trades).where(inPeriod(trades.tradeDate, from, to))
  for (const trade of tradeRows) {
    const realized = toDecimal(trade.realizedPnl)
    const commission = new Decimal(trade.commission)
    if ((realized === null || realized.isZero()) && commission.isZero()) continue
    const resolution = await resolveRate(
      db,
      {
        currency: trade.currency,
        date: trade.tradeDate,
        explicitRate: toDecimal(trade.fxRate),
        instrumentId: trade.instrumentId,
      },
      fx,
    )
    if (resolution.rate === null) {
      callouts.add('unconverted_amounts', 'Amounts without a base-currency rate', {
        currency: trade.currency,
        value: (realized ?? ZERO).plus(commission),
      })
      continue
    }
    if (realized) realizedPnl = realizedPnl.plus(realized.times(resolution.rate))
    commissions = commissions.plus(commission.times(resolution.rate))
  }

  // ── Dividends ──
  let dividends = ZERO
  const dividendRows = await db
    .select()
    .from(dividendPayments)
    .where(inPeriod(dividendPayments.payDate, from, to))
  for (const dividend of dividendRows) {
    const base = toDecimal(dividend.baseAmount)
    if (base === null) {
      callouts.add('unconverted_amounts', 'Amounts without a base-currency rate', {
        currency: dividend.currency,
        value: new Decimal(dividend.netAmount),
      })
      continue
    }
    dividends = dividends.plus(base)
  }

  // ── Reported cash ──
  const statements = await db
    .select()
    .from(accountStatements)
    .where(
      and(
        from ? gt(accountStatements.toDate, from) : undefined,
        to ? lte(accountStatements.fromDate, to) : undefined,
      ),
    )
    .orderBy(asc(accountStatements.fromDate))
  // Foreign cash is called out once, at the closing edge
  const openingCash = from ? statementCash(statements, 'opening', fx.baseCurrency, new CalloutCollector()) : null
  const closingCash = statementCash(statements, 'closing', fx.baseCurrency, callouts)

  // Signed netting: costs are the money interest, fees, commissions and
  // unclassified flows took out of the account
  const costs = commissions
    .plus(flowTotal('fee'))
    .plus(flowTotal('interest'))
    .plus(flowTotal('other'))
    .negated()

  const openingValue = (openingTotals?.value ?? ZERO).plus(openingCash?.cash ?? ZERO)
  const reportedValue = closingTotals ? closingTotals.value.plus(closingCash.cash) : null
  const unrealizedDelta = (closingTotals?.unrealized ?? ZERO).minus(openingTotals?.unrealized ?? ZERO)

  return {
    from,
    to,
    openingValue,
    deposits: flowTotal('deposit'),
    withdrawals: flowTotal('withdrawal').abs(),
    realizedPnl,
    dividends,
    costs,
    unrealizedDelta,
    reportedValue,
    margin: options.margin === true || closingCash.negativeBase,
    callouts: callouts.list(),
  }
}
