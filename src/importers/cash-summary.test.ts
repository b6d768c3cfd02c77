import { describe, it, expect } from 'vitest'
import { parseCashSummary } from './cash-summary'

const header = 'ClientAccountID,CurrencyPrimary,FromDate,ToDate,StartingCash,EndingCash,Deposits,Withdrawals,Dividends,Commissions'

describe('parseCashSummary', () => {
  it('reads one statement per account and currency', () => {
    const result = parseCashSummary(
      [
        header,
        'U0000001,BASE_SUMMARY,20250101,20250331,1000,1250.5,500,0,143,-3.5',
        'U0000001,EUR,20250101,20250331,1000,1200,500,,143,-3.5',
        'U0000001,usd,20250101,20250331,0,55.5,,,,',
      ].join('\n'),
    )

    expect(result.errors).toEqual([])
    expect(result.statements.map((s) => s.externalId)).toEqual([
      'ibkr_flex_cash_report:U0000001:BASE_SUMMARY:2025-01-01:2025-03-31',
      'ibkr_flex_cash_report:U0000001:EUR:2025-01-01:2025-03-31',
      'ibkr_flex_cash_report:U0000001:USD:2025-01-01:2025-03-31',
    ])
    const [summary, eur, usd] = result.statements
    expect(summary.endingCash.toFixed()).toBe('1250.5')
    expect(summary.commissions?.toFixed()).toBe('-3.5')
    expect(eur.withdrawals).toBeNull()
    expect(usd.startingCash.toFixed()).toBe('0')
    expect(usd.deposits).toBeNull()
  })

  it('reports rows with a bad currency or no account', () => {
    const result = parseCashSummary(
      [
        header,
        'U0000001,EURO,20250101,20250331,1,1,,,,',
        ',EUR,20250101,20250331,1,1,,,,',
      ].join('\n'),
    )
    expect(result.statements).toEqual([])
    expect(result.errors).toEqual([
      { line: 2, message: 'Invalid currency "EURO"' },
      { line: 3, message: 'ClientAccountID is required' },
    ])
  })
})
