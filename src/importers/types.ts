import type Decimal from 'decimal.js'
import type { RawPayload, RawRow } from '~/db/schema'
import type { CashFlowType, CorporateActionType } from '~/db/schema'

export type { RawPayload, RawRow }

export type FormatTag =
  | 'multi_section_statement'
  | 'holdings_snapshot'
  | 'dividend_report'
  | 'cash_summary'
  | 'activity_actions'
  | 'trade_report'
  | 'transaction_export'
  | 'unrecognized'

export type ParsableFormat = Exclude<FormatTag, 'unrecognized'>

// ─── Instrument references ────────────────────────────────────────────────────

/**
 * How a record points at its instrument before resolution. ISIN wins when
 * present; otherwise the symbol (and venue, if known) go through the alias table.
 */
export interface InstrumentKey {
  isin: string | null
  symbol: string | null
  venue: string | null
}

export interface InstrumentHint {
  isin: string
  symbol: string | null
  venue: string | null
  name: string | null
  cusip: string | null
  conid: string | null
  figi: string | null
  assetCategory: string | null
  currency: string | null
  multiplier: Decimal | null
  source: string
  line: number
}

// ─── Record drafts ────────────────────────────────────────────────────────────

interface DraftBase {
  externalId: string
  source: string
  description: string | null
  raw: RawPayload
}

export interface TradeDraft extends DraftBase {
  kind: 'trade'
  instrument: InstrumentKey
  tradeDate: string
  settlementDate: string | null
  quantity: Decimal
  price: Decimal
  amount: Decimal
  commission: Decimal
  currency: string
  fxRate: Decimal | null
  realizedPnl: Decimal | null
}

export interface DividendDraft extends DraftBase {
  kind: 'dividend'
  instrument: InstrumentKey
  payDate: string
  exDate: string | null
  grossAmount: Decimal
  withholdingTax: Decimal
  netAmount: Decimal
  currency: string
  quantity: Decimal | null
  perShare: Decimal | null
  amountType: 'per_share' | 'total_net'
  fxRate: Decimal | null
}

export interface CashFlowDraft extends DraftBase {
  kind: 'cash_flow'
  flowType: CashFlowType
  date: string
  amount: Decimal
  currency: string
  fxRate: Decimal | null
}

export interface CorporateActionDraft extends DraftBase {
  kind: 'corporate_action'
  instrument: InstrumentKey | null
  actionType: CorporateActionType
  date: string
  quantity: Decimal | null
  amount: Decimal | null
  proceeds: Decimal | null
  currency: string | null
}

export type RecordDraft = TradeDraft | DividendDraft | CashFlowDraft | CorporateActionDraft

// ─── Snapshots & statements ───────────────────────────────────────────────────

export interface PositionDraft {
  symbol: string
  isin: string | null
  name: string | null
  assetClass: string | null
  exchange: string | null
  quantity: Decimal
  price: Decimal | null
  value: Decimal | null
  costBasis: Decimal | null
  currency: string
  fxRate: Decimal | null
  unrealizedPnl: Decimal | null
  raw: RawPayload
}

export interface SnapshotDraft {
  reportDate: string
  source: string
  positions: PositionDraft[]
  raw: RawPayload
}

export interface StatementDraft {
  externalId: string
  accountId: string
  currency: string
  fromDate: string
  toDate: string
  startingCash: Decimal
  endingCash: Decimal
  deposits: Decimal | null
  withdrawals: Decimal | null
  dividends: Decimal | null
  commissions: Decimal | null
  source: string
  raw: RawPayload
}

// ─── Parse results ────────────────────────────────────────────────────────────

export interface ParseError {
  line: number
  message: string
}

export interface ParseWarning {
  line: number
  message: string
}

export interface ParseResult {
  format: FormatTag
  instruments: InstrumentHint[]
  records: RecordDraft[]
  snapshots: SnapshotDraft[]
  statements: StatementDraft[]
  errors: ParseError[]
  warnings: ParseWarning[]
  /** Rows recognised but deliberately not imported (FX conversions, adjustments, summaries). */
  ignored: number
}

export type Parser = (content: string) => ParseResult

export function emptyResult(format: FormatTag): ParseResult {
  return {
    format,
    instruments: [],
    records: [],
    snapshots: [],
    statements: [],
    errors: [],
    warnings: [],
    ignored: 0,
  }
}
