import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { importFiles as importFilesTable } from '~/db/schema'
import type { ImportErrorRecord } from '~/db/schema'
import type { Database } from '~/db/types'
import { PARSERS, classifyAndClean } from '~/importers'
import type { FormatTag, InstrumentKey, ParseResult, ParseWarning, RecordDraft } from '~/importers'
import { StorageError, errorMessage, isStorageFailure } from './errors'
import type { FxOptions } from './fx'
import { resolveBySymbol, resolveInstrument } from './instrument-resolver'
import type { ResolutionConflict } from './instrument-resolver'
import { writeRecord, writeSnapshot, writeStatement } from './ledger-writer'
import { createLogger } from './logger'

const log = createLogger('import')

// ─── Types ────────────────────────────────────────────────────────────────────

export type ImportInput = string | { filename: string; content: string | Uint8Array }

export type ImportPhase = 'detect' | 'parse' | 'resolve' | 'write' | 'io'

export interface ImportOptions {
  fx: FxOptions
  /** Files processed at the same time */
  concurrency?: number
}

export interface FileSummary {
  filename: string
  format: FormatTag
  created: number
  skipped: number
  failed: number
  ignored: number
  errors: ImportErrorRecord[]
  warnings: ParseWarning[]
  conflicts: ResolutionConflict[]
}

export interface ImportSummary {
  files: FileSummary[]
  totals: { created: number; skipped: number; failed: number }
}

function emptySummary(filename: string, format: FormatTag): FileSummary {
  return {
    filename,
    format,
    created: 0,
    skipped: 0,
    failed: 0,
    ignored: 0,
    errors: [],
    warnings: [],
    conflicts: [],
  }
}

function failedFile(filename: string, format: FormatTag, phase: ImportPhase, message: string): FileSummary {
  const summary = emptySummary(filename, format)
  summary.failed = 1
  summary.errors.push({ line: 0, message, phase })
  return summary
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Bytes to text. A BOM decides the encoding; without one, zero bytes in odd
 * positions mean UTF-16LE. Anything else must be valid UTF-8.
 */
export function decodeContent(bytes: Uint8Array): string {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return new TextDecoder('utf-16le').decode(bytes)
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return new TextDecoder('utf-16be').decode(bytes)

  const sample = bytes.subarray(0, 512)
  let oddZeros = 0
  for (let i = 1; i < sample.length; i += 2) if (sample[i] === 0) oddZeros++
  if (sample.length >= 4 && oddZeros >= sample.length / 4) {
    return new TextDecoder('utf-16le').decode(bytes)
  }

  return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
}

async function load(input: ImportInput): Promise<{ filename: string; content: string }> {
  if (typeof input === 'string') {
    return { filename: basename(input), content: decodeContent(await readFile(input)) }
  }
  const content = typeof input.content === 'string' ? input.content : decodeContent(input.content)
  return { filename: input.filename, content }
}

// ─── Per-file import ──────────────────────────────────────────────────────────

function lineOf(draft: RecordDraft): number {
  return draft.raw.rows[0]?.line ?? 0
}

function recordDate(draft: RecordDraft): string {
  switch (draft.kind) {
    case 'trade':
      return draft.tradeDate
    case 'dividend':
      return draft.payDate
    case 'cash_flow':
    case 'corporate_action':
      return draft.date
  }
}

function instrumentOf(draft: RecordDraft): InstrumentKey | null {
  return draft.kind === 'cash_flow' ? null : draft.instrument
}

class FileImport {
  readonly summary: FileSummary
  private readonly byIsin = new Map<string, string>()
  private readonly bySymbol = new Map<string, string>()

  constructor(
    private readonly tx: Database,
    private readonly parsed: ParseResult,
    filename: string,
    private readonly options: ImportOptions,
  ) {
    this.summary = emptySummary(filename, parsed.format)
    this.summary.ignored = parsed.ignored
    this.summary.warnings.push(...parsed.warnings)
    for (const error of parsed.errors) this.fail(error.line, error.message, 'parse')
  }

  private fail(line: number, message: string, phase: ImportPhase) {
    this.summary.failed++
    this.summary.errors.push({ line, message, phase })
  }

  /** Run one step in its own savepoint; a rejected step rolls back alone. */
  private async step<T>(line: number, phase: ImportPhase, fn: (sp: Database) => Promise<T>): Promise<T | null> {
    try {
      return await this.tx.transaction((sp) => fn(sp))
    } catch (err) {
      if (isStorageFailure(err)) throw err
      this.fail(line, errorMessage(err), phase)
      return null
    }
  }

  async run(): Promise<FileSummary> {
    const { parsed } = this

    for (const hint of parsed.instruments) {
      const resolved = await this.step(hint.line, 'resolve', (sp) => resolveInstrument(sp, hint))
      if (!resolved) continue
      this.byIsin.set(hint.isin, resolved.instrument.id)
      this.summary.conflicts.push(...resolved.conflicts)
    }

    for (const draft of parsed.records) {
      const line = lineOf(draft)
      const key = instrumentOf(draft)
      let instrumentId: string | null = null
      if (key) {
        const resolved = await this.step(line, 'resolve', (sp) => this.instrumentFor(sp, key, draft))
        if (resolved === null) continue
        instrumentId = resolved.id
      }
      const outcome = await this.step(line, 'write', (sp) =>
        writeRecord(sp, draft, { instrumentId, fx: this.options.fx }),
      )
      if (outcome === 'created') this.summary.created++
      if (outcome === 'skipped') this.summary.skipped++
    }

    for (const snapshot of parsed.snapshots) {
      const written = await this.step(snapshot.raw.rows[0]?.line ?? 0, 'write', (sp) =>
        writeSnapshot(sp, snapshot, { baseCurrency: this.options.fx.baseCurrency }),
      )
      if (!written) continue
      this.summary.created += written.positionsCreated
      this.summary.skipped += written.positionsSkipped
    }

    for (const statement of parsed.statements) {
      const outcome = await this.step(statement.raw.rows[0]?.line ?? 0, 'write', (sp) =>
        writeStatement(sp, statement),
      )
      if (outcome === 'created') this.summary.created++
      if (outcome === 'skipped') this.summary.skipped++
    }

    await this.tx.insert(importFilesTable).values({
      filename: this.summary.filename,
      format: this.summary.format,
      createdCount: this.summary.created,
      skippedCount: this.summary.skipped,
      failedCount: this.summary.failed,
      errors: this.summary.errors,
    })
    return this.summary
  }

  /**
   * A corporate action may name a security the catalog has never seen; it is
   * stored without an instrument. Every other record needs one.
   */
  private async instrumentFor(
    sp: Database,
    key: InstrumentKey,
    draft: RecordDraft,
  ): Promise<{ id: string | null }> {
    if (key.isin) {
      const cached = this.byIsin.get(key.isin)
      if (cached) return { id: cached }
      const { instrument, conflicts } = await resolveInstrument(sp, {
        isin: key.isin,
        symbol: key.symbol,
        venue: key.venue,
        name: null,
        cusip: null,
        conid: null,
        figi: null,
        assetCategory: null,
        currency: null,
        multiplier: null,
        source: draft.source,
        line: lineOf(draft),
      })
      this.summary.conflicts.push(...conflicts)
      this.byIsin.set(key.isin, instrument.id)
      return { id: instrument.id }
    }

    if (!key.symbol) throw new Error('Record names no instrument')
    const date = recordDate(draft)
    const cacheKey = `${key.symbol}|${key.venue ?? ''}|${date}`
    const cached = this.bySymbol.get(cacheKey)
    if (cached) return { id: cached }
    const instrument = await resolveBySymbol(sp, key.symbol, { venue: key.venue, onDate: date })
    if (!instrument) {
      if (draft.kind !== 'corporate_action') throw new Error(`Unknown instrument symbol "${key.symbol}"`)
      this.summary.warnings.push({
        line: lineOf(draft),
        message: `Unknown instrument symbol "${key.symbol}"; corporate action stored without an instrument`,
      })
      return { id: null }
    }
    this.bySymbol.set(cacheKey, instrument.id)
    return { id: instrument.id }
  }
}

/**
 * Import one file inside one transaction. Rows that fail are reported with
 * their line and phase; the rest of the file is kept. Throws only
 * `StorageError`.
 */
export async function importFile(db: Database, input: ImportInput, options: ImportOptions): Promise<FileSummary> {
  const label = typeof input === 'string' ? basename(input) : input.filename

  let loaded: { filename: string; content: string }
  try {
    loaded = await load(input)
  } catch (err) {
    log.warn(`Cannot read ${label}: ${errorMessage(err)}`)
    return failedFile(label, 'unrecognized', 'io', `Cannot read file: ${errorMessage(err)}`)
  }

  const { format, content } = classifyAndClean(loaded.content)
  if (format === 'unrecognized') {
    log.warn(`Unrecognized format: ${loaded.filename}`)
    return failedFile(loaded.filename, format, 'detect', 'Unrecognized file format')
  }

  let parsed: ParseResult
  try {
    parsed = PARSERS[format](content)
  } catch (err) {
    return failedFile(loaded.filename, format, 'parse', errorMessage(err))
  }

  try {
    const summary = await db.transaction((tx) => new FileImport(tx, parsed, loaded.filename, options).run())
    log.info(
      `${summary.filename} (${summary.format}): ${summary.created} created, ${summary.skipped} skipped, ${summary.failed} failed`,
    )
    for (const error of summary.errors) {
      log.warn(`${summary.filename}:${error.line} [${error.phase}] ${error.message}`)
    }
    return summary
  } catch (err) {
    if (isStorageFailure(err)) throw new StorageError(loaded.filename, err)
    log.error(`Import of ${loaded.filename} rolled back: ${errorMessage(err)}`)
    return failedFile(loaded.filename, format, 'write', errorMessage(err))
  }
}

// ─── Batch ────────────────────────────────────────────────────────────────────

async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0
  const worker = async () => {
    while (next < items.length) {
      const index = next++
      results[index] = await fn(items[index])
    }
  }
  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker))
  return results
}

/** Import a batch. A bad file never stops the others; a storage failure does. */
export async function importFiles(
  db: Database,
  inputs: ImportInput[],
  options: ImportOptions,
): Promise<ImportSummary> {
  const files = await mapWithConcurrency(inputs, options.concurrency ?? 1, (input) =>
    importFile(db, input, options),
  )
  const totals = { created: 0, skipped: 0, failed: 0 }
  for (const file of files) {
    totals.created += file.created
    totals.skipped += file.skipped
    totals.failed += file.failed
  }
  log.info(`Imported ${files.length} files: ${totals.created} created, ${totals.skipped} skipped, ${totals.failed} failed`)
  return { files, totals }
}
