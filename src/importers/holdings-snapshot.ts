import {
  normalizeCurrency,
  normalizeIsin,
  parseDate,
  parseDecimal,
  pick,
  rawPayload,
  readTable,
  requireDecimal,
} from './csv'
import { errorMessage } from '~/lib/errors'
import { emptyResult } from './types'
import type { ParseResult, PositionDraft, SnapshotDraft } from './types'

/**
 * Holdings snapshot (Flex "Open Positions" query).
 *
 * One row per position. Two generations exist: the older one carries
 * `HoldingPeriodDateTime`, the newer one `Description`; both name the
 * columns below. Every report date found in the file becomes one snapshot.
 */

const SOURCE = 'ibkr_flex_portfolio'

const COLUMNS = {
  reportDate: ['ReportDate', 'Date'],
  currency: ['CurrencyPrimary', 'Currency'],
  symbol: ['Symbol'],
  name: ['Description'],
  quantity: ['Quantity', 'Position'],
  markPrice: ['MarkPrice'],
  value: ['PositionValue'],
  costBasis: ['CostBasisMoney'],
  unrealized: ['FifoPnlUnrealized'],
  exchange: ['ListingExchange'],
  assetClass: ['AssetClass'],
  fxRate: ['FXRateToBase'],
  isin: ['ISIN'],
  figi: ['FIGI'],
  conid: ['Conid'],
  multiplier: ['Multiplier'],
} as const

export function parseHoldingsSnapshot(content: string): ParseResult {
  const result = emptyResult('holdings_snapshot')
  const { rows } = readTable(content)
  const byDate = new Map<string, SnapshotDraft>()

  for (const row of rows) {
    try {
      const { fields } = row
      const symbol = pick(fields, COLUMNS.symbol)
      if (!symbol) throw new Error('Symbol is required')
      const currency = normalizeCurrency(pick(fields, COLUMNS.currency))
      if (!currency) throw new Error(`Invalid currency "${pick(fields, COLUMNS.currency)}"`)

      const reportDate = parseDate(pick(fields, COLUMNS.reportDate))
      if (!reportDate) throw new Error('ReportDate is required')

      const isin = normalizeIsin(pick(fields, COLUMNS.isin))
      const exchange = pick(fields, COLUMNS.exchange) || null
      const assetClass = pick(fields, COLUMNS.assetClass) || null
      const name = pick(fields, COLUMNS.name) || null

      const position: PositionDraft = {
        symbol,
        isin,
        name,
        assetClass,
        exchange,
        quantity: requireDecimal(pick(fields, COLUMNS.quantity), 'Quantity'),
        price: parseDecimal(pick(fields, COLUMNS.markPrice)),
        value: parseDecimal(pick(fields, COLUMNS.value)),
        costBasis: parseDecimal(pick(fields, COLUMNS.costBasis)),
        currency,
        fxRate: parseDecimal(pick(fields, COLUMNS.fxRate)),
        unrealizedPnl: parseDecimal(pick(fields, COLUMNS.unrealized)),
        raw: rawPayload('holdings_snapshot', [row]),
      }

      let snapshot = byDate.get(reportDate)
      if (!snapshot) {
        snapshot = {
          reportDate,
          source: SOURCE,
          positions: [],
          raw: { format: 'holdings_snapshot', rows: [] },
        }
        byDate.set(reportDate, snapshot)
      }
      snapshot.positions.push(position)
      snapshot.raw.rows.push(...position.raw.rows)

      if (isin) {
        result.instruments.push({
          isin,
          symbol,
          venue: exchange,
          name,
          cusip: null,
          conid: pick(fields, COLUMNS.conid) || null,
          figi: pick(fields, COLUMNS.figi) || null,
          assetCategory: assetClass,
          currency,
          multiplier: parseDecimal(pick(fields, COLUMNS.multiplier)),
          source: SOURCE,
          line: row.line,
        })
      }
    } catch (err) {
      result.errors.push({ line: row.line, message: errorMessage(err) })
    }
  }

  result.snapshots = [...byDate.values()]
  return result
}
