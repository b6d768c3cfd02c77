import { ZERO } from '~/lib/decimal'
import { createExternalIdFactory, instrumentLabel } from '~/lib/dedupe'
import { errorMessage } from '~/lib/errors'
import {
  currencyFromIsin,
  normalizeCurrency,
  normalizeIsin,
  parseDate,
  parseDecimal,
  pick,
  rawPayload,
  readTable,
} from './csv'
import { emptyResult } from './types'
import type { InstrumentKey, ParseResult } from './types'

/**
 * Dividend report (Flex "Change in Dividend Accruals" style query).
 *
 * Each row already nets withholding into `NetAmount`. When the per-share rate
 * and the quantity are both given, gross = quantity × rate and the difference
 * to net is the withholding.
 */

const SOURCE = 'ibkr_flex_dividends'

const COLUMNS = {
  symbol: ['Symbol'],
  isin: ['ISIN'],
  figi: ['FIGI'],
  conid: ['Conid'],
  assetClass: ['AssetClass'],
  currency: ['CurrencyPrimary', 'Currency'],
  fxRate: ['FXRateToBase'],
  exDate: ['ExDate'],
  payDate: ['PayDate'],
  quantity: ['Quantity'],
  grossRate: ['GrossRate'],
  net: ['NetAmount'],
  exchange: ['ListingExchange'],
  description: ['Description'],
  actionId: ['ActionID'],
} as const

export function parseFlexDividends(content: string): ParseResult {
  const result = emptyResult('dividend_report')
  const { rows } = readTable(content)
  const externalId = createExternalIdFactory(SOURCE)

  for (const row of rows) {
    try {
      const { fields } = row
      const net = parseDecimal(pick(fields, COLUMNS.net))
      if (net === null || net.isZero()) {
        result.ignored++
        continue
      }

      const isin = normalizeIsin(pick(fields, COLUMNS.isin))
      const symbol = pick(fields, COLUMNS.symbol) || null
      if (!isin && !symbol) throw new Error('ISIN or Symbol is required')
      const venue = pick(fields, COLUMNS.exchange) || null
      const instrument: InstrumentKey = { isin, symbol, venue }

      const currency =
        normalizeCurrency(pick(fields, COLUMNS.currency)) ?? currencyFromIsin(isin)
      if (!currency) throw new Error('Currency is missing and cannot be derived from the ISIN')

      const payDate = parseDate(pick(fields, COLUMNS.payDate)) ?? parseDate(pick(fields, COLUMNS.exDate))
      if (!payDate) throw new Error('PayDate is required')

      const netAmount = net.abs()
      const quantity = parseDecimal(pick(fields, COLUMNS.quantity))
      const perShare = parseDecimal(pick(fields, COLUMNS.grossRate))
      const computedGross =
        quantity && perShare && !perShare.isZero() ? quantity.abs().times(perShare) : null
      const grossAmount =
        computedGross && computedGross.greaterThanOrEqualTo(netAmount) ? computedGross : netAmount
      const withholdingTax = netAmount.minus(grossAmount)
      const description = pick(fields, COLUMNS.description) || null

      result.records.push({
        kind: 'dividend',
        externalId: externalId({
          nativeId: pick(fields, COLUMNS.actionId) || null,
          kind: 'dividend',
          date: payDate,
          instrument: instrumentLabel(instrument),
          amount: netAmount,
          currency,
          rowType: 'flex_dividend',
        }),
        source: SOURCE,
        instrument,
        payDate,
        exDate: parseDate(pick(fields, COLUMNS.exDate)),
        grossAmount,
        withholdingTax: withholdingTax.isZero() ? ZERO : withholdingTax,
        netAmount,
        currency,
        quantity,
        perShare: perShare && !perShare.isZero() ? perShare : null,
        amountType: perShare && !perShare.isZero() ? 'per_share' : 'total_net',
        fxRate: parseDecimal(pick(fields, COLUMNS.fxRate)),
        description,
        raw: rawPayload('dividend_report', [row]),
      })

      if (isin) {
        result.instruments.push({
          isin,
          symbol,
          venue,
          name: null,
          cusip: null,
          conid: pick(fields, COLUMNS.conid) || null,
          figi: pick(fields, COLUMNS.figi) || null,
          assetCategory: pick(fields, COLUMNS.assetClass) || null,
          currency: null,
          multiplier: null,
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
