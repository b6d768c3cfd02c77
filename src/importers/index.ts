import { parseActivityActions } from './activity-actions'
import { parseActivityStatement } from './activity-statement'
import { parseCashSummary } from './cash-summary'
import { parseFlexDividends } from './flex-dividends'
import { parseFlexTrades } from './flex-trades'
import { parseHoldingsSnapshot } from './holdings-snapshot'
import { parseTransactionExport } from './transaction-export'
import type { ParsableFormat, Parser } from './types'

export { classifyAndClean, detectFormat, stripDuplicateHeaders } from './router'
export { splitSections } from './sections'
export type * from './types'

export const PARSERS: Record<ParsableFormat, Parser> = {
  multi_section_statement: parseActivityStatement,
  holdings_snapshot: parseHoldingsSnapshot,
  dividend_report: parseFlexDividends,
  cash_summary: parseCashSummary,
  activity_actions: parseActivityActions,
  trade_report: parseFlexTrades,
  transaction_export: parseTransactionExport,
}
