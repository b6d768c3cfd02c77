import { describe, it, expect } from 'vitest'
import { classifyAndClean, detectFormat, stripDuplicateHeaders } from './router'

describe('detectFormat', () => {
  it.each([
    ['"ReportDate","Symbol","Quantity","MarkPrice","PositionValue","CurrencyPrimary"', 'holdings_snapshot'],
    ['Symbol,ISIN,PayDate,Quantity,GrossRate,NetAmount', 'dividend_report'],
    ['ClientAccountID,CurrencyPrimary,FromDate,ToDate,StartingCash,EndingCash', 'cash_summary'],
    ['ClientAccountID,Date,ActivityCode,Description,Amount,TransactionID', 'activity_actions'],
    ['TradeID,TradeDate,Symbol,ISIN,Quantity,TradePrice,Buy/Sell', 'trade_report'],
    ['Id\tKirjauspäivä\tTapahtumatyyppi\tArvopaperi\tISIN\tSumma\tValuutta', 'transaction_export'],
    ['Statement,Header,Field Name,Field Value', 'multi_section_statement'],
  ] as const)('recognises %s', (header, format) => {
    expect(detectFormat(`${header}\n`)).toBe(format)
  })

  it('ignores the filename and leading blank lines', () => {
    expect(detectFormat('\n\nSymbol,ISIN,PayDate,GrossRate,NetAmount\n')).toBe('dividend_report')
  })

  it('prefers the more specific signature', () => {
    // A portfolio export that also carries dividend columns is still a portfolio
    expect(detectFormat('Symbol,MarkPrice,PositionValue,GrossRate,NetAmount\n')).toBe('holdings_snapshot')
  })

  it('reads a header behind a byte order mark', () => {
    expect(detectFormat('\uFEFFStatement,Header,Field Name,Field Value\n')).toBe('multi_section_statement')
  })

  it('gives up on anything else', () => {
    expect(detectFormat('Date,Description,Debit,Credit\n')).toBe('unrecognized')
    expect(detectFormat('')).toBe('unrecognized')
    expect(detectFormat('%PDF-1.7 binary')).toBe('unrecognized')
  })
})

describe('stripDuplicateHeaders', () => {
  it('blanks repeated header lines and keeps line numbering', () => {
    const content = 'Symbol,NetAmount\nA,1\nSymbol,NetAmount\nB,2\n'
    expect(stripDuplicateHeaders(content)).toBe('Symbol,NetAmount\nA,1\n\nB,2\n')
  })

  it('keeps CRLF line breaks', () => {
    expect(stripDuplicateHeaders('H\r\n1\r\nH\r\n2')).toBe('H\r\n1\r\n\r\n2')
  })
})

describe('classifyAndClean', () => {
  it('returns the detected format with parser-ready content', () => {
    const { format, content } = classifyAndClean('\uFEFFSymbol,GrossRate,NetAmount\nA,1,1\nSymbol,GrossRate,NetAmount\n')
    expect(format).toBe('dividend_report')
    expect(content).toBe('Symbol,GrossRate,NetAmount\nA,1,1\n\n')
  })
})
