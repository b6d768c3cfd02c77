import { ZERO } from '~/lib/decimal'
import { createExternalIdFactory, instrumentLabel } from '~/lib/dedupe'
import { errorMessage } from '~/lib/errors'
import type { CashFlowType } from '~/db/schema'
import {
  extractIsin,
  extractPerShare,
  normalizeCurrency,
  normalizeIsin,
  parseDecimal,
  pick,
  rawPayload,
  readTable,
  requireDate,
  requireDecimal,
} from './csv'
import type { TableRow } from './csv'
import { pairDividends } from './dividend-pairing'
import type { DividendLeg } from './dividend-pairing'
import { emptyResult } from './types'
import type { InstrumentKey, ParseResult } from './types'

/**
 * Statement of funds (Flex "Activity" query): one row per cash movement,
 * classified by `ActivityCode` and identified by `TransactionID`.
 */

const SOURCE = 'ibkr_flex_activity'

const COLUMNS = {
  code: ['ActivityCode'],
  transactionId: ['TransactionID'],
  date: ['Date', 'SettleDate', 'ReportDate'],
  currency: ['CurrencyPrimary', 'Currency'],
  fxRate: ['FXRateToBase'],
  symbol: ['Symbol'],
  isin: ['ISIN'],
  exchange: ['ListingExchange'],
  description: ['ActivityDescription', 'Description'],
  quantity: ['TradeQuantity', 'Quantity'],
  price: ['TradePrice'],
  amount: ['Amount'],
  commission: ['TradeCommission'],
  level: ['LevelOfDetail'],
} as const

type Activity =
  | { kind: 'dividend'; role: 'gross' | 'withholding' }
  | { kind: 'cash'; flowType: CashFlowType }
  | { kind: 'trade' }
  | { kind: 'skip' }

const ACTIVITY_CODES: Record<string, Activity> = {
  DIV: { kind: 'dividend', role: 'gross' },
  PIL: { kind: 'dividend', role: 'gross' },
  FRTAX: { kind: 'dividend', role: 'withholding' },
  WHT: { kind: 'dividend', role: 'withholding' },
  DEP: { kind: 'cash', flowType: 'deposit' },
  WITH: { kind: 'cash', flowType: 'withdrawal' },
  CINT: { kind: 'cash', flowType: 'interest' },
  DINT: { kind: 'cash', flowType: 'interest' },
  INTR: { kind: 'cash', flowType: 'interest' },
  INTP: { kind: 'cash', flowType: 'interest' },
  OFEE: { kind: 'cash', flowType: 'fee' },
  FEE: { kind: 'cash', flowType: 'fee' },
  OTHFEE: { kind: 'cash', flowType: 'fee' },
  COMM: { kind: 'cash', flowType: 'fee' },
  BUY: { kind: 'trade' },
  SELL: { kind: 'trade' },
  ADJ: { kind: 'skip' },
}

function instrumentOf(fields: Record<string, string>, description: string): InstrumentKey {
  const isin = normalizeIsin(pick(fields, COLUMNS.isin)) ?? extractIsin(description)
  return {
    isin,
    symbol: pick(fields, COLUMNS.symbol) || null,
    venue: pick(fields, COLUMNS.exchange) || null,
  }
}

export function parseActivityActions(content: string): ParseResult {
  const result = emptyResult('activity_actions')
  const { rows } = readTable(content)
  const externalId = createExternalIdFactory(SOURCE)
  const legs: DividendLeg[] = []

  const parseRow = (row: TableRow) => {
    const { fields } = row
    const code = pick(fields, COLUMNS.code).toUpperCase()
    const rawCurrency = pick(fields, COLUMNS.currency)

    // Base-currency summary rows restate the per-currency rows
    if (rawCurrency === 'BASE_SUMMARY' || pick(fields, COLUMNS.level) === 'BaseCurrency') {
      result.ignored++
      return
    }
    const activity: Activity | null =
      ACTIVITY_CODES[code] ?? (code ? { kind: 'cash', flowType: 'other' } : null)
    if (!activity || activity.kind === 'skip') {
      result.ignored++
      return
    }

    const currency = normalizeCurrency(rawCurrency)
    if (!currency) throw new Error(`Invalid currency "${rawCurrency}"`)
    const date = requireDate(pick(fields, COLUMNS.date), 'Date')
    const amount = requireDecimal(pick(fields, COLUMNS.amount), 'Amount')
    const description = pick(fields, COLUMNS.description) || null
    const nativeId = pick(fields, COLUMNS.transactionId) || null
    const fxRate = parseDecimal(pick(fields, COLUMNS.fxRate))
    const raw = rawPayload('activity_actions', [row])

    switch (activity.kind) {
      case 'dividend': {
        const instrument = instrumentOf(fields, description ?? '')
        if (!instrument.isin && !instrument.symbol) {
          throw new Error('Dividend row names no instrument')
        }
        legs.push({
          role: activity.role,
          row,
          instrument,
          date,
          currency,
          amount,
          description,
          nativeId,
          perShare: activity.role === 'gross' ? (extractPerShare(description ?? '')?.amount ?? null) : null,
          fxRate,
        })
        return
      }
      case 'trade': {
        const instrument = instrumentOf(fields, description ?? '')
        if (!instrument.isin && !instrument.symbol) throw new Error('Trade row names no instrument')
        let quantity = requireDecimal(pick(fields, COLUMNS.quantity), 'TradeQuantity')
        if (code === 'SELL' && quantity.isPositive()) quantity = quantity.negated()
        result.records.push({
          kind: 'trade',
          externalId: externalId({
            nativeId,
            kind: 'trade',
            date,
            instrument: instrumentLabel(instrument),
            amount,
            currency,
            rowType: code,
            description,
          }),
          source: SOURCE,
          instrument,
          tradeDate: date,
          settlementDate: null,
          quantity,
          price: parseDecimal(pick(fields, COLUMNS.price)) ?? ZERO,
          amount,
          commission: parseDecimal(pick(fields, COLUMNS.commission)) ?? ZERO,
          currency,
          fxRate,
          realizedPnl: null,
          description,
          raw,
        })
        return
      }
      case 'cash': {
        result.records.push({
          kind: 'cash_flow',
          externalId: externalId({
            nativeId,
            kind: 'cash_flow',
            date,
            instrument: '',
            amount,
            currency,
            rowType: code,
            description,
          }),
          source: SOURCE,
          flowType: activity.flowType,
          date,
          amount,
          currency,
          fxRate,
          description,
          raw,
        })
        return
      }
    }
  }

  for (const row of rows) {
    try {
      parseRow(row)
    } catch (err) {
      result.errors.push({ line: row.line, message: errorMessage(err) })
    }
  }

  const paired = pairDividends(legs, { format: 'activity_actions', source: SOURCE, externalId })
  result.records.push(...paired.dividends, ...paired.unmatched)
  result.warnings.push(...paired.warnings)
  result.ignored += paired.reversed

  return result
}
