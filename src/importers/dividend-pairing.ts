import type Decimal from 'decimal.js'
import { sum } from '~/lib/decimal'
import { instrumentLabel } from '~/lib/dedupe'
import type { ExternalIdParams } from '~/lib/dedupe'
import { rawPayload } from './csv'
import type { TableRow } from './csv'
import type {
  CashFlowDraft,
  DividendDraft,
  FormatTag,
  InstrumentKey,
  ParseWarning,
} from './types'

/**
 * Brokers report a dividend and the tax withheld from it as separate rows.
 * Rows for the same instrument, date and currency merge into one payment:
 * net = gross + Σ withholding (withholding is negative).
 */

export interface DividendLeg {
  role: 'gross' | 'withholding'
  row: Pick<TableRow, 'line' | 'text' | 'fields'>
  instrument: InstrumentKey
  date: string
  currency: string
  amount: Decimal
  description: string | null
  nativeId: string | null
  exDate?: string | null
  quantity?: Decimal | null
  perShare?: Decimal | null
  fxRate?: Decimal | null
}

export interface PairingContext {
  format: FormatTag
  source: string
  externalId: (params: ExternalIdParams) => string
}

export interface PairingResult {
  dividends: DividendDraft[]
  unmatched: CashFlowDraft[]
  warnings: ParseWarning[]
  /** Groups whose gross rows cancel out (reported and then reversed) */
  reversed: number
}

function firstOf<T>(legs: DividendLeg[], get: (leg: DividendLeg) => T | null | undefined): T | null {
  for (const leg of legs) {
    const value = get(leg)
    if (value !== null && value !== undefined) return value
  }
  return null
}

export function pairDividends(legs: DividendLeg[], ctx: PairingContext): PairingResult {
  const groups = new Map<string, DividendLeg[]>()
  for (const leg of legs) {
    const key = [instrumentLabel(leg.instrument), leg.date, leg.currency].join('|')
    const group = groups.get(key) ?? []
    group.push(leg)
    groups.set(key, group)
  }

  const result: PairingResult = { dividends: [], unmatched: [], warnings: [], reversed: 0 }

  for (const group of groups.values()) {
    const gross = group.filter((leg) => leg.role === 'gross')
    const withholding = group.filter((leg) => leg.role === 'withholding')

    if (gross.length === 0) {
      for (const leg of withholding) {
        const label = instrumentLabel(leg.instrument)
        result.warnings.push({
          line: leg.row.line,
          message: `Withholding tax for ${label} on ${leg.date} has no matching dividend`,
        })
        result.unmatched.push({
          kind: 'cash_flow',
          externalId: ctx.externalId({
            nativeId: leg.nativeId,
            kind: 'cash_flow',
            date: leg.date,
            instrument: label,
            amount: leg.amount,
            currency: leg.currency,
            rowType: 'unmatched_withholding',
            description: leg.description,
          }),
          source: ctx.source,
          flowType: 'other',
          date: leg.date,
          amount: leg.amount,
          currency: leg.currency,
          fxRate: leg.fxRate ?? null,
          description: `Unmatched withholding tax: ${leg.description ?? label}`,
          raw: rawPayload(ctx.format, [leg.row]),
        })
      }
      continue
    }

    const grossAmount = sum(gross.map((leg) => leg.amount))
    if (grossAmount.isZero()) {
      result.reversed++
      continue
    }
    const withholdingTax = sum(withholding.map((leg) => leg.amount))
    const netAmount = grossAmount.plus(withholdingTax)
    const head = gross[0]
    const perShare = firstOf(gross, (leg) => leg.perShare)
    const contributing = [...group].sort((a, b) => a.row.line - b.row.line)

    result.dividends.push({
      kind: 'dividend',
      externalId: ctx.externalId({
        nativeId: head.nativeId,
        kind: 'dividend',
        date: head.date,
        instrument: instrumentLabel(head.instrument),
        amount: grossAmount,
        currency: head.currency,
        rowType: 'dividend',
        description: head.description,
      }),
      source: ctx.source,
      instrument: head.instrument,
      payDate: head.date,
      exDate: firstOf(gross, (leg) => leg.exDate),
      grossAmount,
      withholdingTax,
      netAmount,
      currency: head.currency,
      quantity: firstOf(gross, (leg) => leg.quantity),
      perShare,
      amountType: perShare ? 'per_share' : 'total_net',
      fxRate: firstOf(group, (leg) => leg.fxRate),
      description: head.description,
      raw: rawPayload(ctx.format, contributing.map((leg) => leg.row)),
    })
  }

  return result
}
