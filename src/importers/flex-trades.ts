import { ZERO } from '~/lib/decimal'
import { createExternalIdFactory, instrumentLabel } from '~/lib/dedupe'
import { errorMessage } from '~/lib/errors'
import {
  normalizeCurrency,
  normalizeIsin,
  parseDate,
  parseDecimal,
  pick,
  rawPayload,
  readTable,
  requireDate,
  requireDecimal,
} from './csv'
import { emptyResult } from './types'
import type { InstrumentKey, ParseResult } from './types'

/**
 * Trade report (Flex "Trades" query). `TradeID` is the broker's own id.
 *
 * Currency conversions show up as trades of a pair symbol such as `EUR.USD`
 * without an ISIN; they move cash, not holdings, and are not imported.
 */

const SOURCE = 'ibkr_flex_trades'

const COLUMNS = {
  isin: ['ISIN'],
  figi: ['FIGI'],
  cusip: ['CUSIP'],
  conid: ['Conid'],
  symbol: ['Symbol'],
  name: ['Description'],
  assetClass: ['AssetClass'],
  currency: ['CurrencyPrimary', 'Currency'],
  fxRate: ['FXRateToBase'],
  tradeId: ['TradeID'],
  tradeDate: ['TradeDate', 'DateTime'],
  settleDate: ['SettleDateTarget', 'SettleDate'],
  quantity: ['Quantity'],
  price: ['TradePrice'],
  proceeds: ['Proceeds'],
  commission: ['IBCommission', 'Commission'],
  taxes: ['Taxes'],
  side: ['Buy/Sell'],
  exchange: ['ListingExchange'],
  realized: ['FifoPnlRealized'],
  multiplier: ['Multiplier'],
} as const

function isCurrencyConversion(symbol: string, isin: string | null, assetClass: string): boolean {
  return assetClass === 'CASH' || (!isin && /^[A-Z]{3}\.[A-Z]{3}$/.test(symbol))
}

export function parseFlexTrades(content: string): ParseResult {
  const result = emptyResult('trade_report')
  const { rows } = readTable(content)
  const externalId = createExternalIdFactory(SOURCE)

  for (const row of rows) {
    try {
      const { fields } = row
      const symbol = pick(fields, COLUMNS.symbol)
      const isin = normalizeIsin(pick(fields, COLUMNS.isin))
      const assetClass = pick(fields, COLUMNS.assetClass)
      if (isCurrencyConversion(symbol, isin, assetClass)) {
        result.ignored++
        continue
      }
      if (!isin && !symbol) throw new Error('ISIN or Symbol is required')

      const currency = normalizeCurrency(pick(fields, COLUMNS.currency))
      if (!currency) throw new Error(`Invalid currency "${pick(fields, COLUMNS.currency)}"`)

      const side = pick(fields, COLUMNS.side).toUpperCase()
      let quantity = requireDecimal(pick(fields, COLUMNS.quantity), 'Quantity')
      if (side.startsWith('SELL') && quantity.isPositive()) quantity = quantity.negated()
      if (side.startsWith('BUY') && quantity.isNegative()) quantity = quantity.negated()

      const price = requireDecimal(pick(fields, COLUMNS.price), 'TradePrice')
      const multiplier = parseDecimal(pick(fields, COLUMNS.multiplier))
      const amount =
        parseDecimal(pick(fields, COLUMNS.proceeds)) ??
        quantity.times(price).times(multiplier ?? 1).negated()
      const commission = (parseDecimal(pick(fields, COLUMNS.commission)) ?? ZERO).plus(
        parseDecimal(pick(fields, COLUMNS.taxes)) ?? ZERO,
      )
      const tradeDate = requireDate(pick(fields, COLUMNS.tradeDate), 'TradeDate')
      const venue = pick(fields, COLUMNS.exchange) || null
      const instrument: InstrumentKey = { isin, symbol: symbol || null, venue }

      result.records.push({
        kind: 'trade',
        externalId: externalId({
          nativeId: pick(fields, COLUMNS.tradeId) || null,
          kind: 'trade',
          date: tradeDate,
          instrument: instrumentLabel(instrument),
          amount,
          currency,
          rowType: side || 'trade',
        }),
        source: SOURCE,
        instrument,
        tradeDate,
        settlementDate: parseDate(pick(fields, COLUMNS.settleDate)),
        quantity,
        price,
        amount,
        commission,
        currency,
        fxRate: parseDecimal(pick(fields, COLUMNS.fxRate)),
        realizedPnl: parseDecimal(pick(fields, COLUMNS.realized)),
        description: pick(fields, COLUMNS.name) || null,
        raw: rawPayload('trade_report', [row]),
      })

      if (isin) {
        result.instruments.push({
          isin,
          symbol: symbol || null,
          venue,
          name: pick(fields, COLUMNS.name) || null,
          cusip: pick(fields, COLUMNS.cusip) || null,
          conid: pick(fields, COLUMNS.conid) || null,
          figi: pick(fields, COLUMNS.figi) || null,
          assetCategory: assetClass || null,
          currency,
          multiplier,
          source: SOURCE,
          line: row.line,
        })
      }
    } catch (err) {
      result.errors.push({ line: row.line, message: errorMessage(err) })
    }
  }

  return result
}
