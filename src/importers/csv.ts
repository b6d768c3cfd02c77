import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { Decimal } from '~/lib/decimal'
import { isIsoDate } from '~/lib/dates'
import type { FormatTag, RawPayload } from './types'

// ─── Tokenising ───────────────────────────────────────────────────────────────

export interface CsvRow {
  /** 1-based line of the row's first character in the source */
  line: number
  /** The row exactly as it appears in the source, without its line break */
  text: string
  cells: string[]
}

export type Delimiter = ',' | '\t'

const csvRecordSchema = z.object({
  record: z.array(z.string()),
  raw: z.string(),
  info: z.object({ lines: z.number() }),
})

export function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content
}

/**
 * Tokenise delimited text. Quoted fields may carry delimiters, doubled quotes
 * and line breaks; blank lines are dropped.
 */
export function readCsvRows(content: string, delimiter: Delimiter = ','): CsvRow[] {
  const source = stripBom(content)
  const output: unknown = parse(source, {
    delimiter,
    raw: true,
    info: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  })
  const records = z.array(csvRecordSchema).parse(output)

  const rows: CsvRow[] = []
  let cursor = 0
  let line = 1
  for (const { record, raw, info } of records) {
    // Skipped blank lines stay in front of the next record's raw text
    const text = raw.replace(/^(?:\r?\n)+/, '').replace(/\r?\n$/, '')
    if (record.every((cell) => cell.trim() === '')) continue

    const at = source.indexOf(text, cursor)
    if (at === -1) {
      rows.push({ line: info.lines, text, cells: record })
      continue
    }
    line += countLineBreaks(source, cursor, at)
    rows.push({ line, text, cells: record })
    line += countLineBreaks(source, at, at + text.length)
    cursor = at + text.length
  }
  return rows
}

function countLineBreaks(source: string, from: number, to: number): number {
  let n = 0
  for (let i = from; i < to; i++) if (source.charCodeAt(i) === 10) n++
  return n
}

// ─── Header-mapped tables ─────────────────────────────────────────────────────

export interface TableRow extends CsvRow {
  /** Every header → value pair, including columns no parser reads */
  fields: Record<string, string>
}

/** Make header names unique: a repeated `Currency` becomes `Currency#2`, `Currency#3`… */
export function uniqueHeaders(cells: string[]): string[] {
  const seen = new Map<string, number>()
  return cells.map((cell, i) => {
    const name = cell.trim() || `#col${i + 1}`
    const count = (seen.get(name) ?? 0) + 1
    seen.set(name, count)
    return count === 1 ? name : `${name}#${count}`
  })
}

export function toFields(header: string[], cells: string[]): Record<string, string> {
  const fields: Record<string, string> = {}
  cells.forEach((cell, i) => {
    fields[header[i] ?? `#col${i + 1}`] = cell
  })
  return fields
}

export function readTable(
  content: string,
  delimiter: Delimiter = ',',
): { header: string[]; rows: TableRow[] } {
  const [first, ...rest] = readCsvRows(content, delimiter)
  if (!first) return { header: [], rows: [] }
  const header = uniqueHeaders(first.cells)
  return {
    header,
    rows: rest.map((row) => ({ ...row, fields: toFields(header, row.cells) })),
  }
}

/** First non-empty value among the candidate column names. */
export function pick(fields: Record<string, string>, names: readonly string[]): string {
  for (const name of names) {
    const value = fields[name]?.trim()
    if (value) return value
  }
  return ''
}

export function hasColumns(header: string[], names: readonly string[]): boolean {
  return names.every((name) => header.includes(name))
}

export function rawPayload(format: FormatTag, rows: Array<Pick<TableRow, 'line' | 'text' | 'fields'>>): RawPayload {
  return {
    format,
    rows: rows.map(({ line, text, fields }) => ({ line, text, fields: { ...fields } })),
  }
}

// ─── Values ───────────────────────────────────────────────────────────────────

const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Parse a decimal cell. Empty, `-` and `--` are absent values. Thousands
 * separators are dropped; with `decimalComma` the comma is the decimal mark.
 */
export function parseDecimal(
  raw: string | undefined,
  opts: { decimalComma?: boolean } = {},
): Decimal | null {
  let value = (raw ?? '').trim().replace(/\s/g, '')
  if (value === '' || value === '-' || value === '--') return null
  value = opts.decimalComma ? value.replace(/\./g, '').replace(',', '.') : value.replace(/,/g, '')
  if (!NUMBER.test(value)) throw new Error(`Invalid number "${raw}"`)
  return new Decimal(value)
}

export function requireDecimal(
  raw: string | undefined,
  label: string,
  opts: { decimalComma?: boolean } = {},
): Decimal {
  const value = parseDecimal(raw, opts)
  if (value === null) throw new Error(`${label} is required`)
  return value
}

/**
 * Accepts `YYYY-MM-DD`, `YYYYMMDD`, and either followed by a time part
 * (`2025-03-14, 09:30:00`, `20250314;093000`, `2025-03-14T09:30:00`).
 */
export function parseDate(raw: string | undefined): string | null {
  const value = (raw ?? '').trim()
  if (value === '' || value === '--') return null

  const m = /^(\d{4})-?(\d{2})-?(\d{2})(?:[,;T ]\s*\d{1,2}:?\d{2}:?\d{2}.*)?$/.exec(value)
  const iso = m ? `${m[1]}-${m[2]}-${m[3]}` : null
  if (!iso || !isIsoDate(iso)) throw new Error(`Invalid date "${raw}"`)
  return iso
}

export function requireDate(raw: string | undefined, label: string): string {
  const value = parseDate(raw)
  if (value === null) throw new Error(`${label} is required`)
  return value
}

export function normalizeCurrency(raw: string | undefined): string | null {
  const value = (raw ?? '').trim().toUpperCase()
  return /^[A-Z]{3}$/.test(value) ? value : null
}

// ─── Instrument identifiers ───────────────────────────────────────────────────

const ISIN = /^[A-Z]{2}[A-Z0-9]{9}[0-9]$/
const ISIN_IN_PARENS = /\(([A-Z]{2}[A-Z0-9]{9}[0-9])\)/

export function isValidIsin(value: string | null | undefined): value is string {
  return typeof value === 'string' && ISIN.test(value)
}

export function normalizeIsin(raw: string | undefined): string | null {
  const value = (raw ?? '').trim().toUpperCase()
  return isValidIsin(value) ? value : null
}

/** `KESKOB(FI0009000202) Cash Dividend …` → `FI0009000202` */
export function extractIsin(text: string): string | null {
  return ISIN_IN_PARENS.exec(text)?.[1] ?? null
}

/** `KESKOB(FI0009000202) Cash Dividend …` → `KESKOB` */
export function extractSymbol(text: string): string | null {
  const m = /^\s*([A-Z0-9][A-Z0-9.\- ]*?)\s*\(/.exec(text)
  return m ? m[1] : null
}

export interface PerShare {
  currency: string | null
  amount: Decimal
}

const PER_SHARE_PATTERNS = [
  /(?:Cash Dividend|Payment in Lieu of Dividend)\s+([A-Z]{3})\s+(\d+(?:\.\d+)?)/i,
  // Text pulled out of PDF statements interleaves the words: "Cash USD Dividend 0.0825"
  /\bCash\b\D*?\b([A-Z]{3})\b\D*?(\d+\.\d+)/,
]

/** Per-share amount stated in a dividend description, if there is one. */
export function extractPerShare(description: string): PerShare | null {
  const text = description.replace(ISIN_IN_PARENS, '')
  for (const pattern of PER_SHARE_PATTERNS) {
    const m = pattern.exec(text)
    if (m) return { currency: m[1].toUpperCase(), amount: new Decimal(m[2]) }
  }
  return null
}

const ISIN_COUNTRY_CURRENCY: Record<string, string> = {
  US: 'USD',
  CA: 'CAD',
  SE: 'SEK',
  FI: 'EUR',
  DE: 'EUR',
  FR: 'EUR',
  NL: 'EUR',
  BE: 'EUR',
  IE: 'EUR',
  JP: 'JPY',
  GB: 'GBP',
  HK: 'HKD',
  IL: 'ILS',
  NO: 'NOK',
  DK: 'DKK',
  AU: 'AUD',
  CH: 'CHF',
}

/** Trading currency implied by the ISIN's country prefix, when it is unambiguous. */
export function currencyFromIsin(isin: string | null): string | null {
  if (!isin) return null
  return ISIN_COUNTRY_CURRENCY[isin.slice(0, 2)] ?? null
}
