import { readCsvRows, toFields, uniqueHeaders } from './csv'
import type { TableRow } from './csv'

/**
 * Multi-section statements put every table in one file:
 *
 *   Dividends,Header,Currency,Date,Description,Amount
 *   Dividends,Data,EUR,2025-04-10,KESKOB(FI0009000202) Cash Dividend …,220
 *   Dividends,Data,Total,,,220
 *
 * Column 1 names the section, column 2 the row kind. A `Header` row names the
 * columns of the data rows that follow it, until the section declares a new one.
 */

export interface SectionRow extends TableRow {
  section: string
  /** Column-2 marker: `Data` in practice, kept for sections that use others */
  kind: string
}

export type Sections = Map<string, SectionRow[]>

const SKIPPED_KINDS = new Set(['Header', 'Total', 'SubTotal', 'Notes'])

function isTotalRow(cells: string[]): boolean {
  return /^Total\b/.test((cells[0] ?? '').trim())
}

export function splitSections(content: string): Sections {
  const sections: Sections = new Map()
  const headers = new Map<string, string[]>()

  for (const row of readCsvRows(content)) {
    const [rawSection, rawKind, ...cells] = row.cells
    const section = (rawSection ?? '').trim()
    const kind = (rawKind ?? '').trim()
    if (!section) continue

    if (kind === 'Header') {
      headers.set(section, uniqueHeaders(cells))
      continue
    }
    if (SKIPPED_KINDS.has(kind) || isTotalRow(cells)) continue

    const header = headers.get(section) ?? []
    const rows = sections.get(section) ?? []
    rows.push({ ...row, section, kind, fields: toFields(header, cells) })
    sections.set(section, rows)
  }

  return sections
}

/** Rows of each named section in turn, each in file order. */
export function sectionRows(sections: Sections, ...names: string[]): SectionRow[] {
  return names.flatMap((name) => sections.get(name) ?? [])
}
