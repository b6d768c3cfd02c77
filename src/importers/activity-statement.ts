import { ZERO } from '~/lib/decimal'
import { createExternalIdFactory, instrumentLabel } from '~/lib/dedupe'
import { errorMessage } from '~/lib/errors'
import type { CashFlowType, CorporateActionType } from '~/db/schema'
import {
  extractIsin,
  extractPerShare,
  extractSymbol,
  normalizeCurrency,
  normalizeIsin,
  parseDecimal,
  pick,
  rawPayload,
  requireDate,
  requireDecimal,
} from './csv'
import { pairDividends } from './dividend-pairing'
import type { DividendLeg } from './dividend-pairing'
import { sectionRows, splitSections } from './sections'
import type { SectionRow, Sections } from './sections'
import { emptyResult } from './types'
import type { InstrumentKey, ParseResult } from './types'

/**
 * Activity statement: the multi-section CSV (also what PDF statements turn
 * into once their text is extracted). Consolidated statements for several
 * accounts add an `Account` column to most sections.
 */

const SOURCE = 'ibkr_activity_statement'
const FORMAT = 'multi_section_statement'

const COLUMNS = {
  account: ['Account'],
  assetCategory: ['Asset Category'],
  currency: ['Currency'],
  symbol: ['Symbol'],
  description: ['Description'],
  conid: ['Conid'],
  securityId: ['Security ID'],
  exchange: ['Listing Exch', 'Exchange'],
  multiplier: ['Multiplier'],
  discriminator: ['DataDiscriminator'],
  dateTime: ['Date/Time'],
  date: ['Date', 'Settle Date', 'Report Date', 'Date/Time'],
  quantity: ['Quantity'],
  price: ['T. Price', 'Trade Price'],
  proceeds: ['Proceeds'],
  commission: ['Comm/Fee', 'Comm in EUR'],
  realized: ['Realized P/L'],
  amount: ['Amount'],
  reportDate: ['Report Date'],
  value: ['Value'],
} as const

const INSTRUMENT_SECTION = 'Financial Instrument Information'
const TRADE_SECTION = 'Trades'
const DIVIDEND_SECTIONS = ['Dividends', 'Payment In Lieu Of Dividends']
const WITHHOLDING_SECTION = 'Withholding Tax'
const CORPORATE_ACTION_SECTION = 'Corporate Actions'

const CASH_SECTIONS: ReadonlyArray<{ section: string; flowType: CashFlowType | 'signed' }> = [
  { section: 'Deposits & Withdrawals', flowType: 'signed' },
  { section: 'Interest', flowType: 'interest' },
  { section: 'Broker Interest Paid', flowType: 'interest' },
  { section: 'Broker Interest Received', flowType: 'interest' },
  { section: 'Fees', flowType: 'fee' },
  { section: 'Other Fees', flowType: 'fee' },
  { section: 'Transaction Fees', flowType: 'fee' },
]

function corporateActionType(description: string): CorporateActionType {
  if (/split/i.test(description)) return 'split'
  if (/spin-?off/i.test(description)) return 'spinoff'
  if (/merge|acquisition|tender/i.test(description)) return 'merger'
  if (/symbol change|name change|cusip\/isin change|isin change/i.test(description)) {
    return 'symbol_change'
  }
  return 'other'
}

// ─── Instrument catalogue of the statement ───────────────────────────────────

interface KnownInstrument {
  isin: string
  venue: string | null
}

function collectInstruments(sections: Sections, result: ParseResult): Map<string, KnownInstrument> {
  const bySymbol = new Map<string, KnownInstrument>()

  for (const row of sectionRows(sections, INSTRUMENT_SECTION)) {
    const { fields } = row
    const isin = normalizeIsin(pick(fields, COLUMNS.securityId))
    if (!isin) continue
    const venue = pick(fields, COLUMNS.exchange) || null
    // Renamed listings are given as "OLD, NEW"; each spelling is an alias
    const symbols = pick(fields, COLUMNS.symbol)
      .split(',')
      .map((symbol) => symbol.trim())
      .filter((symbol) => symbol !== '')

    for (const symbol of symbols.length > 0 ? symbols : [null]) {
      if (symbol) bySymbol.set(symbol, { isin, venue })
      result.instruments.push({
        isin,
        symbol,
        venue,
        name: pick(fields, COLUMNS.description) || null,
        cusip: null,
        conid: pick(fields, COLUMNS.conid) || null,
        figi: null,
        assetCategory: pick(fields, COLUMNS.assetCategory) || null,
        currency: null,
        multiplier: parseDecimal(pick(fields, COLUMNS.multiplier)),
        source: SOURCE,
        line: row.line,
      })
    }
  }

  return bySymbol
}

function keyForSymbol(symbol: string, known: Map<string, KnownInstrument>): InstrumentKey {
  const hit = known.get(symbol)
  return hit ? { isin: hit.isin, symbol, venue: hit.venue } : { isin: null, symbol, venue: null }
}

function keyForDescription(
  description: string,
  known: Map<string, KnownInstrument>,
): InstrumentKey | null {
  const isin = extractIsin(description)
  const symbol = extractSymbol(description)
  if (isin) return { isin, symbol, venue: symbol ? (known.get(symbol)?.venue ?? null) : null }
  return symbol ? keyForSymbol(symbol, known) : null
}

// ─── Parser ───────────────────────────────────────────────────────────────────

export function parseActivityStatement(content: string): ParseResult {
  const result = emptyResult(FORMAT)
  const sections = splitSections(content)
  const externalId = createExternalIdFactory(SOURCE)
  const known = collectInstruments(sections, result)

  const each = (rows: SectionRow[], fn: (row: SectionRow) => void) => {
    for (const row of rows) {
      try {
        fn(row)
      } catch (err) {
        result.errors.push({ line: row.line, message: `${row.section}: ${errorMessage(err)}` })
      }
    }
  }

  const currencyOf = (row: SectionRow): string => {
    const currency = normalizeCurrency(pick(row.fields, COLUMNS.currency))
    if (!currency) throw new Error(`Invalid currency "${pick(row.fields, COLUMNS.currency)}"`)
    return currency
  }

  // Trades: execution rows; statements without them only list orders
  const tradeRows = sectionRows(sections, TRADE_SECTION)
  const hasTradeRows = tradeRows.some((row) => pick(row.fields, COLUMNS.discriminator) === 'Trade')
  each(tradeRows, (row) => {
    const { fields } = row
    const discriminator = pick(fields, COLUMNS.discriminator)
    const wanted = hasTradeRows ? 'Trade' : 'Order'
    if ((discriminator && discriminator !== wanted) || /forex/i.test(pick(fields, COLUMNS.assetCategory))) {
      result.ignored++
      return
    }
    const symbol = pick(fields, COLUMNS.symbol)
    if (!symbol) throw new Error('Symbol is required')
    const currency = currencyOf(row)
    const dateTime = pick(fields, COLUMNS.dateTime)
    const tradeDate = requireDate(dateTime, 'Date/Time')
    const quantity = requireDecimal(pick(fields, COLUMNS.quantity), 'Quantity')
    const price = requireDecimal(pick(fields, COLUMNS.price), 'T. Price')
    const amount =
      parseDecimal(pick(fields, COLUMNS.proceeds)) ?? quantity.times(price).negated()
    const instrument = keyForSymbol(symbol, known)
    const account = pick(fields, COLUMNS.account) || null

    result.records.push({
      kind: 'trade',
      externalId: externalId({
        kind: 'trade',
        date: tradeDate,
        instrument: instrumentLabel(instrument),
        amount,
        currency,
        rowType: discriminator || 'Trade',
        account,
        description: `${dateTime} ${quantity.toFixed()} @ ${price.toFixed()}`,
      }),
      source: SOURCE,
      instrument,
      tradeDate,
      settlementDate: null,
      quantity,
      price,
      amount,
      commission: parseDecimal(pick(fields, COLUMNS.commission)) ?? ZERO,
      currency,
      fxRate: null,
      realizedPnl: parseDecimal(pick(fields, COLUMNS.realized)),
      description: null,
      raw: rawPayload(FORMAT, [row]),
    })
  })

  // Dividends and the tax withheld from them
  const legs: DividendLeg[] = []
  const dividendLeg = (role: DividendLeg['role']) => (row: SectionRow) => {
    const description = pick(row.fields, COLUMNS.description)
    const instrument = keyForDescription(description, known)
    if (!instrument) throw new Error(`Cannot identify the instrument in "${description}"`)
    const perShare = role === 'gross' ? extractPerShare(description) : null
    legs.push({
      role,
      row,
      instrument,
      date: requireDate(pick(row.fields, COLUMNS.date), 'Date'),
      currency: currencyOf(row),
      amount: requireDecimal(pick(row.fields, COLUMNS.amount), 'Amount'),
      description,
      nativeId: null,
      perShare: perShare?.amount ?? null,
    })
  }
  each(sectionRows(sections, ...DIVIDEND_SECTIONS), dividendLeg('gross'))
  each(sectionRows(sections, WITHHOLDING_SECTION), dividendLeg('withholding'))

  const paired = pairDividends(legs, { format: FORMAT, source: SOURCE, externalId })
  result.records.push(...paired.dividends, ...paired.unmatched)
  result.warnings.push(...paired.warnings)
  result.ignored += paired.reversed

  // Cash movements
  for (const { section, flowType } of CASH_SECTIONS) {
    each(sectionRows(sections, section), (row) => {
      const { fields } = row
      const amount = requireDecimal(pick(fields, COLUMNS.amount), 'Amount')
      const currency = currencyOf(row)
      const date = requireDate(pick(fields, COLUMNS.date), 'Date')
      const description = pick(fields, COLUMNS.description) || null
      const resolvedType: CashFlowType =
        flowType === 'signed' ? (amount.isNegative() ? 'withdrawal' : 'deposit') : flowType

      result.records.push({
        kind: 'cash_flow',
        externalId: externalId({
          kind: 'cash_flow',
          date,
          instrument: pick(fields, COLUMNS.symbol),
          amount,
          currency,
          rowType: section,
          account: pick(fields, COLUMNS.account) || null,
          description,
        }),
        source: SOURCE,
        flowType: resolvedType,
        date,
        amount,
        currency,
        fxRate: null,
        description,
        raw: rawPayload(FORMAT, [row]),
      })
    })
  }

  // Corporate actions
  each(sectionRows(sections, CORPORATE_ACTION_SECTION), (row) => {
    const { fields } = row
    const description = pick(fields, COLUMNS.description)
    const date = requireDate(pick(fields, COLUMNS.reportDate) || pick(fields, COLUMNS.dateTime), 'Report Date')
    const instrument = keyForDescription(description, known)
    const quantity = parseDecimal(pick(fields, COLUMNS.quantity))
    const proceeds = parseDecimal(pick(fields, COLUMNS.proceeds))

    result.records.push({
      kind: 'corporate_action',
      externalId: externalId({
        kind: 'corporate_action',
        date,
        instrument: instrument ? instrumentLabel(instrument) : '',
        amount: quantity ?? ZERO,
        currency: pick(fields, COLUMNS.currency),
        rowType: CORPORATE_ACTION_SECTION,
        account: pick(fields, COLUMNS.account) || null,
        description,
      }),
      source: SOURCE,
      instrument,
      actionType: corporateActionType(description),
      date,
      quantity,
      amount: parseDecimal(pick(fields, COLUMNS.value)),
      proceeds,
      currency: normalizeCurrency(pick(fields, COLUMNS.currency)),
      description: description || null,
      raw: rawPayload(FORMAT, [row]),
    })
  })

  return result
}
