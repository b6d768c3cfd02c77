import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { stripBom } from './csv'
import type { FormatTag } from './types'

/**
 * Content-based format detection.
 *
 * Each export is recognised by a combination of header columns that no other
 * format carries. Signatures are tested from most to least specific and the
 * first match wins; the filename is never consulted.
 */

interface Signature {
  format: Exclude<FormatTag, 'unrecognized' | 'multi_section_statement'>
  columns: readonly string[]
}

const SIGNATURES: readonly Signature[] = [
  { format: 'holdings_snapshot', columns: ['MarkPrice', 'PositionValue'] },
  { format: 'dividend_report', columns: ['GrossRate', 'NetAmount'] },
  { format: 'cash_summary', columns: ['ClientAccountID', 'StartingCash', 'EndingCash'] },
  { format: 'activity_actions', columns: ['ActivityCode', 'TransactionID'] },
  { format: 'trade_report', columns: ['TradeID', 'Buy/Sell'] },
  { format: 'transaction_export', columns: ['Tapahtumatyyppi', 'ISIN'] },
]

const headerCellsSchema = z.array(z.array(z.string()))

function firstLine(content: string): string | null {
  for (const line of stripBom(content).split(/\r?\n/)) {
    if (line.trim() !== '') return line
  }
  return null
}

function headerColumns(line: string): Set<string> {
  const delimiter = line.split('\t').length > line.split(',').length ? '\t' : ','
  let cells: string[]
  try {
    const output: unknown = parse(line, { delimiter, relax_quotes: true, relax_column_count: true })
    cells = headerCellsSchema.parse(output)[0] ?? []
  } catch {
    cells = line.split(delimiter).map((cell) => cell.replace(/^"|"$/g, ''))
  }
  return new Set(cells.map((cell) => cell.trim()))
}

/** Classify raw export content. Never throws; anything unreadable is `unrecognized`. */
export function detectFormat(content: string): FormatTag {
  const header = firstLine(content)
  if (header === null) return 'unrecognized'
  if (header.startsWith('Statement,')) return 'multi_section_statement'

  const columns = headerColumns(header)
  for (const signature of SIGNATURES) {
    if (signature.columns.every((column) => columns.has(column))) return signature.format
  }
  return 'unrecognized'
}

/**
 * Blank out header lines that export tools re-insert mid-file: every later
 * line identical to the first one (ignoring surrounding whitespace). Line
 * breaks stay, so row line numbers still point into the original file.
 */
export function stripDuplicateHeaders(content: string): string {
  const source = stripBom(content)
  const header = firstLine(source)
  if (header === null) return source

  const wanted = header.trim()
  let seen = false
  return source
    .split(/(?<=\n)/)
    .map((line) => {
      if (line.trim() !== wanted) return line
      if (!seen) {
        seen = true
        return line
      }
      return line.endsWith('\r\n') ? '\r\n' : line.endsWith('\n') ? '\n' : ''
    })
    .join('')
}

/** Detect the format and return the content ready for its parser. */
export function classifyAndClean(content: string): { format: FormatTag; content: string } {
  const format = detectFormat(content)
  if (format === 'unrecognized' || format === 'multi_section_statement') {
    return { format, content: stripBom(content) }
  }
  return { format, content: stripDuplicateHeaders(content) }
}
