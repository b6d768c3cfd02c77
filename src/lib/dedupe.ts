import { createHash } from 'node:crypto'
import type Decimal from 'decimal.js'

function normalizeDescription(desc: string): string {
  return desc.trim().toLowerCase().replace(/\s+/g, ' ')
}

export interface ExternalIdParams {
  /** The source's own transaction id, when it has one */
  nativeId?: string | null
  kind: string
  date: string
  instrument: string
  amount: Decimal
  currency: string
  rowType: string
  account?: string | null
  description?: string | null
}

/**
 * Deterministic external id for a ledger record.
 *
 * With a native transaction id: `{source}:{nativeId}`.
 *
 * Otherwise the stable business fields are hashed:
 *   `{source}:` + sha256(kind|date|instrument|amount|currency|rowType|account|description|occurrence)
 *
 * `occurrence` counts identical tuples within one file, so two genuinely equal
 * rows stay distinct while re-importing the same file reproduces the same ids.
 */
export function createExternalIdFactory(source: string): (params: ExternalIdParams) => string {
  const occurrences = new Map<string, number>()

  return (params) => {
    if (params.nativeId) return `${source}:${params.nativeId.trim()}`

    const tuple = [
      params.kind,
      params.date,
      params.instrument.toUpperCase(),
      params.amount.toFixed(),
      params.currency,
      params.rowType,
      params.account ?? '',
      normalizeDescription(params.description ?? ''),
    ].join('|')
    const occurrence = (occurrences.get(tuple) ?? 0) + 1
    occurrences.set(tuple, occurrence)

    const digest = createHash('sha256').update(`${tuple}|${occurrence}`).digest('hex')
    return `${source}:${digest.slice(0, 32)}`
  }
}

/** Key used to talk about an instrument reference before it is resolved. */
export function instrumentLabel(key: {
  isin: string | null
  symbol: string | null
  venue: string | null
}): string {
  if (key.isin) return key.isin
  return key.venue ? `${key.symbol ?? ''}@${key.venue}` : (key.symbol ?? '')
}
