import { errorMessage } from '~/lib/errors'
import { parseDecimal, pick, rawPayload, readTable, requireDate, requireDecimal } from './csv'
import { emptyResult } from './types'
import type { ParseResult } from './types'

// Cash report (Flex "Cash Report" query): the broker's own opening and
// closing cash per account and currency, plus `BASE_SUMMARY` totals.

const SOURCE = 'ibkr_flex_cash_report'

const COLUMNS = {
  account: ['ClientAccountID'],
  currency: ['CurrencyPrimary', 'Currency'],
  from: ['FromDate'],
  to: ['ToDate'],
  starting: ['StartingCash'],
  ending: ['EndingCash'],
  deposits: ['Deposits'],
  withdrawals: ['Withdrawals'],
  dividends: ['Dividends'],
  commissions: ['Commissions'],
} as const

export function parseCashSummary(content: string): ParseResult {
  const result = emptyResult('cash_summary')
  const { rows } = readTable(content)

  for (const row of rows) {
    try {
      const { fields } = row
      const accountId = pick(fields, COLUMNS.account)
      if (!accountId) throw new Error('ClientAccountID is required')
      const currency = pick(fields, COLUMNS.currency).toUpperCase()
      if (currency !== 'BASE_SUMMARY' && !/^[A-Z]{3}$/.test(currency)) {
        throw new Error(`Invalid currency "${currency}"`)
      }
      const fromDate = requireDate(pick(fields, COLUMNS.from), 'FromDate')
      const toDate = requireDate(pick(fields, COLUMNS.to), 'ToDate')

      result.statements.push({
        externalId: `${SOURCE}:${accountId}:${currency}:${fromDate}:${toDate}`,
        accountId,
        currency,
        fromDate,
        toDate,
        startingCash: requireDecimal(pick(fields, COLUMNS.starting), 'StartingCash'),
        endingCash: requireDecimal(pick(fields, COLUMNS.ending), 'EndingCash'),
        deposits: parseDecimal(pick(fields, COLUMNS.deposits)),
        withdrawals: parseDecimal(pick(fields, COLUMNS.withdrawals)),
        dividends: parseDecimal(pick(fields, COLUMNS.dividends)),
        commissions: parseDecimal(pick(fields, COLUMNS.commissions)),
        source: SOURCE,
        raw: rawPayload('cash_summary', [row]),
      })
    } catch (err) {
      result.errors.push({ line: row.line, message: errorMessage(err) })
    }
  }

  return result
}
