import { and, asc, desc, eq, isNull, lte, or, gte, sql } from 'drizzle-orm'
import { instrumentAliases, instruments } from '~/db/schema'
import type { Instrument, InstrumentAlias, InstrumentMetadata } from '~/db/schema'
import type { Database } from '~/db/types'
import { isValidIsin } from '~/importers/csv'
import type { InstrumentHint } from '~/importers/types'
import { toNumeric } from './decimal'
import { errorMessage } from './errors'
import { createLogger } from './logger'

const log = createLogger('instruments')

// ─── Types ────────────────────────────────────────────────────────────────────

/** A hint that disagrees with what the catalog already holds. Never applied. */
export interface ResolutionConflict {
  isin: string
  field: 'assetCategory' | 'currency' | 'multiplier'
  existing: string
  incoming: string
  source: string
  line: number
}

export interface ResolveResult {
  instrument: Instrument
  created: boolean
  conflicts: ResolutionConflict[]
}

export interface AliasInput {
  symbol: string
  venue?: string | null
  source: string
  validFrom?: string | null
  validTo?: string | null
}

// ─── Resolve or create ────────────────────────────────────────────────────────

type HintPatch = Partial<
  Pick<Instrument, 'cusip' | 'conid' | 'figi' | 'name' | 'assetCategory' | 'listingExchange' | 'currency'>
>

const FILLABLE = ['cusip', 'conid', 'figi', 'name', 'assetCategory', 'listingExchange', 'currency'] as const
const CONFLICTING = ['assetCategory', 'currency'] as const

function hintValues(hint: InstrumentHint): HintPatch {
  return {
    cusip: hint.cusip,
    conid: hint.conid,
    figi: hint.figi,
    name: hint.name,
    assetCategory: hint.assetCategory,
    listingExchange: hint.venue,
    currency: hint.currency,
  }
}

/**
 * Return the instrument for the hint's ISIN, creating it when unseen.
 *
 * Creation is an `INSERT … ON CONFLICT DO NOTHING` followed by a read, so two
 * imports racing on the same ISIN end with one row. Hint fields only fill
 * empty columns; a differing asset category, currency or multiplier comes
 * back as a conflict.
 */
export async function resolveInstrument(db: Database, hint: InstrumentHint): Promise<ResolveResult> {
  if (!isValidIsin(hint.isin)) throw new Error(`Invalid ISIN "${hint.isin}"`)

  const values = hintValues(hint)
  const [inserted] = await db
    .insert(instruments)
    .values({
      isin: hint.isin,
      ...values,
      ...(hint.multiplier ? { multiplier: toNumeric(hint.multiplier) } : {}),
    })
    .onConflictDoNothing({ target: instruments.isin })
    .returning()

  let instrument: Instrument
  let created = false
  const conflicts: ResolutionConflict[] = []

  if (inserted) {
    instrument = inserted
    created = true
    log.debug(`Created instrument ${hint.isin}`)
  } else {
    const [existing] = await db.select().from(instruments).where(eq(instruments.isin, hint.isin))
    if (!existing) throw new Error(`Instrument ${hint.isin} vanished during resolution`)
    instrument = existing

    const patch: HintPatch = {}
    for (const field of FILLABLE) {
      const incoming = values[field]
      if (incoming && existing[field] === null) patch[field] = incoming
    }
    for (const field of CONFLICTING) {
      const incoming = values[field]
      const current = existing[field]
      if (incoming && current && incoming !== current) {
        conflicts.push({ isin: hint.isin, field, existing: current, incoming, source: hint.source, line: hint.line })
      }
    }
    if (hint.multiplier && !hint.multiplier.eq(existing.multiplier)) {
      conflicts.push({
        isin: hint.isin,
        field: 'multiplier',
        existing: existing.multiplier,
        incoming: toNumeric(hint.multiplier),
        source: hint.source,
        line: hint.line,
      })
    }

    if (Object.keys(patch).length > 0) {
      const [updated] = await db
        .update(instruments)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(instruments.id, existing.id))
        .returning()
      if (updated) instrument = updated
    }
  }

  for (const conflict of conflicts) {
    log.warn(
      `Conflicting ${conflict.field} for ${conflict.isin}: catalog has "${conflict.existing}", ${conflict.source} says "${conflict.incoming}"`,
    )
  }

  if (hint.symbol) {
    await recordAlias(db, instrument.id, { symbol: hint.symbol, venue: hint.venue, source: hint.source })
  }

  return { instrument, created, conflicts }
}

export async function findByIsin(db: Database, isin: string): Promise<Instrument | null> {
  const [row] = await db.select().from(instruments).where(eq(instruments.isin, isin))
  return row ?? null
}

// ─── Aliases ──────────────────────────────────────────────────────────────────

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase().replace(/\s+/g, ' ')
}

/**
 * Idempotent: the same (instrument, symbol, venue, valid_from) is stored once.
 * A different venue or validity start adds a new alias. Re-selects the primary.
 */
export async function recordAlias(
  db: Database,
  instrumentId: string,
  alias: AliasInput,
): Promise<{ created: boolean }> {
  const symbol = normalizeSymbol(alias.symbol)
  if (!symbol) throw new Error('Alias symbol is empty')

  const inserted = await db
    .insert(instrumentAliases)
    .values({
      instrumentId,
      symbol,
      venue: alias.venue?.trim().toUpperCase() ?? '',
      source: alias.source,
      validFrom: alias.validFrom ?? null,
      validTo: alias.validTo ?? null,
    })
    .onConflictDoNothing()
    .returning({ id: instrumentAliases.id })

  await selectPrimaryAlias(db, instrumentId)
  return { created: inserted.length > 0 }
}

// Enrichment data beats broker exports, which beat anything derived.
const SOURCE_PRIORITY: Record<string, number> = {
  enrichment: 3,
  manual: 3,
  derived: 1,
  legacy: 1,
}

export function aliasSourcePriority(source: string): number {
  return SOURCE_PRIORITY[source] ?? 2
}

/** Deterministic ordering: the first alias is the one that should be primary. */
export function rankAliases(aliases: InstrumentAlias[]): InstrumentAlias[] {
  return [...aliases].sort((a, b) => {
    const bySource = aliasSourcePriority(b.source) - aliasSourcePriority(a.source)
    if (bySource !== 0) return bySource
    const byCurrent = Number(a.validTo !== null) - Number(b.validTo !== null)
    if (byCurrent !== 0) return byCurrent
    const byValidFrom = (b.validFrom ?? '').localeCompare(a.validFrom ?? '')
    if (byValidFrom !== 0) return byValidFrom
    const byCreated = a.createdAt.getTime() - b.createdAt.getTime()
    if (byCreated !== 0) return byCreated
    return a.id.localeCompare(b.id)
  })
}

/**
 * Flag exactly one alias as primary. Demotion and promotion run in one
 * transaction, so readers never see two primaries or a half-applied switch.
 */
export async function selectPrimaryAlias(
  db: Database,
  instrumentId: string,
): Promise<InstrumentAlias | null> {
  return db.transaction(async (tx) => {
    const aliases = await tx
      .select()
      .from(instrumentAliases)
      .where(eq(instrumentAliases.instrumentId, instrumentId))
      .for('update')
    const [winner] = rankAliases(aliases)
    if (!winner) return null

    const primaries = aliases.filter((alias) => alias.isPrimary)
    if (primaries.length === 1 && primaries[0].id === winner.id) return winner

    await tx
      .update(instrumentAliases)
      .set({ isPrimary: false })
      .where(and(eq(instrumentAliases.instrumentId, instrumentId), eq(instrumentAliases.isPrimary, true)))
    await tx
      .update(instrumentAliases)
      .set({ isPrimary: true })
      .where(eq(instrumentAliases.id, winner.id))

    return { ...winner, isPrimary: true }
  })
}

export async function getPrimarySymbol(db: Database, instrumentId: string): Promise<string | null> {
  const [row] = await db
    .select({ symbol: instrumentAliases.symbol })
    .from(instrumentAliases)
    .where(and(eq(instrumentAliases.instrumentId, instrumentId), eq(instrumentAliases.isPrimary, true)))
  return row?.symbol ?? null
}

/**
 * Find the instrument a symbol referred to on a date. A venue narrows the
 * search; aliases without a venue still match. When several instruments
 * carry the symbol, a primary alias decides; otherwise it is ambiguous.
 */
export async function resolveBySymbol(
  db: Database,
  symbol: string,
  { venue, onDate }: { venue?: string | null; onDate?: string | null } = {},
): Promise<Instrument | null> {
  const wanted = normalizeSymbol(symbol)
  const conditions = [eq(instrumentAliases.symbol, wanted)]
  if (venue) {
    conditions.push(
      or(eq(instrumentAliases.venue, venue.trim().toUpperCase()), eq(instrumentAliases.venue, '')) ??
        sql`true`,
    )
  }
  if (onDate) {
    conditions.push(
      or(isNull(instrumentAliases.validFrom), lte(instrumentAliases.validFrom, onDate)) ?? sql`true`,
      or(isNull(instrumentAliases.validTo), gte(instrumentAliases.validTo, onDate)) ?? sql`true`,
    )
  }

  const candidates = await db
    .select({ instrument: instruments, isPrimary: instrumentAliases.isPrimary })
    .from(instrumentAliases)
    .innerJoin(instruments, eq(instrumentAliases.instrumentId, instruments.id))
    .where(and(...conditions))
    .orderBy(desc(instrumentAliases.isPrimary), asc(instruments.isin))

  const distinct = new Map(candidates.map((c) => [c.instrument.id, c.instrument]))
  if (distinct.size <= 1) return candidates[0]?.instrument ?? null

  const primaries = new Map(
    candidates.filter((c) => c.isPrimary).map((c) => [c.instrument.id, c.instrument]),
  )
  if (primaries.size === 1) return [...primaries.values()][0]
  throw new Error(
    `Symbol "${wanted}" is ambiguous: ${[...distinct.values()].map((i) => i.isin).join(', ')}`,
  )
}

// ─── Enrichment ───────────────────────────────────────────────────────────────

export interface EnrichmentData {
  symbol?: string
  venue?: string
  name?: string
  currency?: string
  sector?: string
  industry?: string
  country?: string
  dividendRate?: string
  dividendFrequency?: string
}

/** External reference-data lookup, e.g. a market-data API client. */
export type EnrichmentLookup = (isin: string, signal: AbortSignal) => Promise<EnrichmentData | null>

export interface EnrichmentOutcome {
  enriched: string[]
  unresolved: Array<{ isin: string; reason: string }>
}

async function withTimeout<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new Error(`timed out after ${timeoutMs}ms`))
    }, timeoutMs)
  })
  try {
    return await Promise.race([fn(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Ask the lookup about every instrument not enriched yet (or all, with
 * `force`). A failure or timeout leaves that instrument as it was.
 */
export async function enrichInstruments(
  db: Database,
  lookup: EnrichmentLookup,
  { timeoutMs, force = false }: { timeoutMs: number; force?: boolean },
): Promise<EnrichmentOutcome> {
  const outcome: EnrichmentOutcome = { enriched: [], unresolved: [] }
  const pending = await db
    .select()
    .from(instruments)
    .where(force ? undefined : sql`${instruments.metadata}->>'enrichedAt' IS NULL`)
    .orderBy(asc(instruments.isin))

  for (const instrument of pending) {
    let data: EnrichmentData | null
    try {
      data = await withTimeout(timeoutMs, (signal) => lookup(instrument.isin, signal))
    } catch (err) {
      log.warn(`Enrichment of ${instrument.isin} failed: ${errorMessage(err)}`)
      outcome.unresolved.push({ isin: instrument.isin, reason: errorMessage(err) })
      continue
    }
    if (!data) {
      outcome.unresolved.push({ isin: instrument.isin, reason: 'not found' })
      continue
    }

    const metadata: InstrumentMetadata = {
      ...instrument.metadata,
      ...(data.sector ? { sector: data.sector } : {}),
      ...(data.industry ? { industry: data.industry } : {}),
      ...(data.country ? { country: data.country } : {}),
      ...(data.dividendRate ? { dividendRate: data.dividendRate } : {}),
      ...(data.dividendFrequency ? { dividendFrequency: data.dividendFrequency } : {}),
      enrichmentSource: 'enrichment',
      enrichedAt: new Date().toISOString(),
    }
    await db
      .update(instruments)
      .set({
        metadata,
        name: instrument.name ?? data.name ?? null,
        currency: instrument.currency ?? data.currency ?? null,
        updatedAt: new Date(),
      })
      .where(eq(instruments.id, instrument.id))

    if (data.symbol) {
      await recordAlias(db, instrument.id, { symbol: data.symbol, venue: data.venue, source: 'enrichment' })
    }
    outcome.enriched.push(instrument.isin)
  }

  log.info(`Enriched ${outcome.enriched.length} instruments, ${outcome.unresolved.length} unresolved`)
  return outcome
}
