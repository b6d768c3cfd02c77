import { ZERO } from '~/lib/decimal'
import { createExternalIdFactory, instrumentLabel } from '~/lib/dedupe'
import { errorMessage } from '~/lib/errors'
import type { CashFlowType, CorporateActionType } from '~/db/schema'
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
import type { TableRow } from './csv'
import { pairDividends } from './dividend-pairing'
import type { DividendLeg } from './dividend-pairing'
import { emptyResult } from './types'
import type { InstrumentKey, ParseResult } from './types'

/**
 * Transaction export of a Finnish-language brokerage: tab separated, decimal
 * comma, usually UTF-16LE. `Valuutta` repeats after every amount column, so
 * the currency of `Summa` is the second `Valuutta`.
 */

const SOURCE = 'nordnet'
const FORMAT = 'transaction_export'
const NUMBERS = { decimalComma: true }

const COLUMNS = {
  id: ['Id'],
  entryDate: ['Kirjauspäivä'],
  tradeDate: ['Kauppapäivä'],
  paymentDate: ['Maksupäivä'],
  type: ['Tapahtumatyyppi'],
  name: ['Arvopaperi'],
  isin: ['ISIN'],
  quantity: ['Määrä'],
  price: ['Kurssi'],
  costs: ['Kokonaiskulut'],
  amount: ['Summa'],
  currency: ['Valuutta#2', 'Valuutta'],
  fxRate: ['Vaihtokurssi'],
  text: ['Tapahtumateksti'],
  cancelled: ['Mitätöintipäivä'],
  commission: ['Välityspalkkio'],
} as const

type Transaction =
  | { kind: 'trade'; side: 'buy' | 'sell' }
  | { kind: 'dividend'; role: 'gross' | 'withholding' }
  | { kind: 'cash'; flowType: CashFlowType }
  | { kind: 'corporate_action'; actionType: CorporateActionType }
  | { kind: 'skip' }

const TRANSACTION_TYPES: Record<string, Transaction> = {
  OSTO: { kind: 'trade', side: 'buy' },
  MYYNTI: { kind: 'trade', side: 'sell' },
  OSINKO: { kind: 'dividend', role: 'gross' },
  ENNAKKOPIDÄTYS: { kind: 'dividend', role: 'withholding' },
  'ULKOM. KUPONKIVERO': { kind: 'dividend', role: 'withholding' },
  TALLETUS: { kind: 'cash', flowType: 'deposit' },
  NOSTO: { kind: 'cash', flowType: 'withdrawal' },
  LAINAKORKO: { kind: 'cash', flowType: 'interest' },
  'PÄÄOMIT YLIT.KORKO': { kind: 'cash', flowType: 'interest' },
  'DEBET KORON KORJ.': { kind: 'cash', flowType: 'interest' },
  'VAIHTO AP-JÄTTÖ': { kind: 'corporate_action', actionType: 'symbol_change' },
  'VAIHTO AP-OTTO': { kind: 'corporate_action', actionType: 'symbol_change' },
  'SPLIT AP-JÄTTÖ': { kind: 'corporate_action', actionType: 'split' },
  'SPLIT AP-OTTO': { kind: 'corporate_action', actionType: 'split' },
  'FUUSIO AP-JÄTTÖ': { kind: 'corporate_action', actionType: 'merger' },
  'FUUSIO AP-OTTO': { kind: 'corporate_action', actionType: 'merger' },
  'VALUUTAN OSTO': { kind: 'skip' },
  'VALUUTAN MYYNTI': { kind: 'skip' },
}

export function parseTransactionExport(content: string): ParseResult {
  const result = emptyResult(FORMAT)
  const { rows } = readTable(content, '\t')
  const externalId = createExternalIdFactory(SOURCE)
  const legs: DividendLeg[] = []

  const parseRow = (row: TableRow) => {
    const { fields } = row
    const type = pick(fields, COLUMNS.type).toUpperCase()
    const transaction = TRANSACTION_TYPES[type]
    if (!transaction) {
      result.warnings.push({ line: row.line, message: `Unknown transaction type "${type}"` })
      result.ignored++
      return
    }
    if (transaction.kind === 'skip' || pick(fields, COLUMNS.cancelled)) {
      result.ignored++
      return
    }

    const nativeId = pick(fields, COLUMNS.id) || null
    const currency = normalizeCurrency(pick(fields, COLUMNS.currency))
    if (!currency) throw new Error(`Invalid currency "${pick(fields, COLUMNS.currency)}"`)
    const amount = requireDecimal(pick(fields, COLUMNS.amount), 'Summa', NUMBERS)
    const exchangeRate = parseDecimal(pick(fields, COLUMNS.fxRate), NUMBERS)
    const fxRate = exchangeRate && !exchangeRate.eq(1) && exchangeRate.isPositive() ? exchangeRate : null
    const description = pick(fields, COLUMNS.text) || pick(fields, COLUMNS.name) || null
    const isin = normalizeIsin(pick(fields, COLUMNS.isin))
    const instrument: InstrumentKey = { isin, symbol: null, venue: null }
    const raw = rawPayload(FORMAT, [row])

    switch (transaction.kind) {
      case 'trade': {
        if (!isin) throw new Error('ISIN is required for trades')
        const tradeDate = requireDate(pick(fields, COLUMNS.tradeDate), 'Kauppapäivä')
        let quantity = requireDecimal(pick(fields, COLUMNS.quantity), 'Määrä', NUMBERS).abs()
        if (transaction.side === 'sell') quantity = quantity.negated()
        const commission =
          parseDecimal(pick(fields, COLUMNS.commission), NUMBERS) ??
          parseDecimal(pick(fields, COLUMNS.costs), NUMBERS) ??
          ZERO
        result.records.push({
          kind: 'trade',
          externalId: externalId({
            nativeId,
            kind: 'trade',
            date: tradeDate,
            instrument: isin,
            amount,
            currency,
            rowType: type,
          }),
          source: SOURCE,
          instrument,
          tradeDate,
          settlementDate: parseDate(pick(fields, COLUMNS.paymentDate)),
          quantity,
          price: requireDecimal(pick(fields, COLUMNS.price), 'Kurssi', NUMBERS),
          amount,
          commission: commission.abs().negated(),
          currency,
          fxRate,
          realizedPnl: null,
          description,
          raw,
        })
        result.instruments.push({
          isin,
          symbol: null,
          venue: null,
          name: pick(fields, COLUMNS.name) || null,
          cusip: null,
          conid: null,
          figi: null,
          assetCategory: null,
          currency: null,
          multiplier: null,
          source: SOURCE,
          line: row.line,
        })
        return
      }
      case 'dividend': {
        if (!isin) throw new Error('ISIN is required for dividends')
        const date =
          parseDate(pick(fields, COLUMNS.paymentDate)) ??
          requireDate(pick(fields, COLUMNS.entryDate), 'Kirjauspäivä')
        legs.push({
          role: transaction.role,
          row,
          instrument,
          date,
          currency,
          amount,
          description,
          nativeId,
          quantity: parseDecimal(pick(fields, COLUMNS.quantity), NUMBERS),
          perShare:
            transaction.role === 'gross'
              ? parseDecimal(pick(fields, COLUMNS.price), NUMBERS)
              : null,
          fxRate,
        })
        return
      }
      case 'cash': {
        const date = requireDate(pick(fields, COLUMNS.entryDate), 'Kirjauspäivä')
        result.records.push({
          kind: 'cash_flow',
          externalId: externalId({
            nativeId,
            kind: 'cash_flow',
            date,
            instrument: '',
            amount,
            currency,
            rowType: type,
          }),
          source: SOURCE,
          flowType: transaction.flowType,
          date,
          amount,
          currency,
          fxRate,
          description,
          raw,
        })
        return
      }
      case 'corporate_action': {
        const date = requireDate(pick(fields, COLUMNS.tradeDate) || pick(fields, COLUMNS.entryDate), 'Kauppapäivä')
        result.records.push({
          kind: 'corporate_action',
          externalId: externalId({
            nativeId,
            kind: 'corporate_action',
            date,
            instrument: instrumentLabel(instrument),
            amount,
            currency,
            rowType: type,
          }),
          source: SOURCE,
          instrument: isin ? instrument : null,
          actionType: transaction.actionType,
          date,
          quantity: parseDecimal(pick(fields, COLUMNS.quantity), NUMBERS),
          amount: amount.isZero() ? null : amount,
          proceeds: null,
          currency,
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

  const paired = pairDividends(legs, { format: FORMAT, source: SOURCE, externalId })
  result.records.push(...paired.dividends, ...paired.unmatched)
  result.warnings.push(...paired.warnings)
  result.ignored += paired.reversed

  return result
}
