import {
  pgTable,
  pgEnum,
  text,
  integer,
  numeric,
  boolean,
  date,
  timestamp,
  jsonb,
  unique,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core'
import { relations, sql } from 'drizzle-orm'
import { uuidv7 } from 'uuidv7'

// ─── Helpers ──────────────────────────────────────────────────────────────────

const id = () => text('id').primaryKey().$defaultFn(() => uuidv7())
const createdAt = () =>
  timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
const updatedAt = () =>
  timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
const externalId = () => text('external_id').notNull().unique()
const source = () => text('source').notNull()
const money = (name: string) => numeric(name)
const day = (name: string) => date(name, { mode: 'string' })

// Provenance: every source row that produced the record, verbatim.
export interface RawRow {
  line: number
  text: string
  fields: Record<string, string>
}

export interface RawPayload {
  format: string
  rows: RawRow[]
}

const rawData = () =>
  jsonb('raw_data').$type<RawPayload>().notNull().default({ format: 'unknown', rows: [] })

// ─── Enums ────────────────────────────────────────────────────────────────────

export const cashFlowTypeEnum = pgEnum('cash_flow_type', [
  'deposit',
  'withdrawal',
  'interest',
  'fee',
  'other',
])

export const corporateActionTypeEnum = pgEnum('corporate_action_type', [
  'split',
  'merger',
  'symbol_change',
  'spinoff',
  'other',
])

export const dividendAmountTypeEnum = pgEnum('dividend_amount_type', ['per_share', 'total_net'])

// ─── Instruments ──────────────────────────────────────────────────────────────

export interface InstrumentMetadata {
  sector?: string
  industry?: string
  country?: string
  dividendRate?: string
  dividendFrequency?: string
  enrichmentSource?: string
  enrichedAt?: string
}

export const instruments = pgTable('instruments', {
  id: id(),
  isin: text('isin').notNull().unique(),
  cusip: text('cusip'),
  conid: text('conid'),
  figi: text('figi'),
  name: text('name'),
  assetCategory: text('asset_category'),
  listingExchange: text('listing_exchange'),
  currency: text('currency'),
  multiplier: numeric('multiplier').notNull().default('1'),
  metadata: jsonb('metadata').$type<InstrumentMetadata>().notNull().default({}),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
})

// ─── Instrument aliases ───────────────────────────────────────────────────────

export const instrumentAliases = pgTable(
  'instrument_aliases',
  {
    id: id(),
    instrumentId: text('instrument_id')
      .notNull()
      .references(() => instruments.id),
    symbol: text('symbol').notNull(),
    // Empty string when the venue is unknown, so it takes part in the unique key.
    venue: text('venue').notNull().default(''),
    validFrom: day('valid_from'),
    validTo: day('valid_to'),
    source: source(),
    isPrimary: boolean('is_primary').notNull().default(false),
    createdAt: createdAt(),
  },
  (t) => [
    unique('instrument_aliases_identity_key')
      .on(t.instrumentId, t.symbol, t.venue, t.validFrom)
      .nullsNotDistinct(),
    uniqueIndex('instrument_aliases_one_primary_idx')
      .on(t.instrumentId)
      .where(sql`${t.isPrimary} = true`),
    index('instrument_aliases_symbol_idx').on(t.symbol),
  ],
)

// ─── Trades ───────────────────────────────────────────────────────────────────

export const trades = pgTable('trades', {
  id: id(),
  externalId: externalId(),
  instrumentId: text('instrument_id')
    .notNull()
    .references(() => instruments.id),
  tradeDate: day('trade_date').notNull(),
  settlementDate: day('settlement_date'),
  // Signed: positive = buy, negative = sell
  quantity: money('quantity').notNull(),
  price: money('price').notNull(),
  // Signed cash effect of the trade before costs
  amount: money('amount').notNull(),
  // Signed cash effect of commissions and taxes (zero or negative)
  commission: money('commission').notNull().default('0'),
  currency: text('currency').notNull(),
  fxRate: money('fx_rate'),
  realizedPnl: money('realized_pnl'),
  description: text('description'),
  source: source(),
  rawData: rawData(),
  createdAt: createdAt(),
})

// ─── Dividend payments ────────────────────────────────────────────────────────

export const dividendPayments = pgTable(
  'dividend_payments',
  {
    id: id(),
    externalId: externalId(),
    instrumentId: text('instrument_id')
      .notNull()
      .references(() => instruments.id),
    payDate: day('pay_date').notNull(),
    exDate: day('ex_date'),
    grossAmount: money('gross_amount').notNull(),
    // Zero or negative
    withholdingTax: money('withholding_tax').notNull().default('0'),
    netAmount: money('net_amount').notNull(),
    currency: text('currency').notNull(),
    quantity: money('quantity'),
    perShare: money('per_share'),
    amountType: dividendAmountTypeEnum('amount_type').notNull(),
    fxRate: money('fx_rate'),
    fxSource: text('fx_source'),
    // NULL = unconverted, excluded from base-currency totals
    baseAmount: money('base_amount'),
    description: text('description'),
    source: source(),
    rawData: rawData(),
    createdAt: createdAt(),
  },
  (t) => [index('dividend_payments_instrument_date_idx').on(t.instrumentId, t.payDate)],
)

// ─── Cash flows ───────────────────────────────────────────────────────────────

export const cashFlows = pgTable('cash_flows', {
  id: id(),
  externalId: externalId(),
  flowType: cashFlowTypeEnum('flow_type').notNull(),
  date: day('date').notNull(),
  // Signed: negative = money leaving the account
  amount: money('amount').notNull(),
  currency: text('currency').notNull(),
  fxRate: money('fx_rate'),
  fxSource: text('fx_source'),
  baseAmount: money('base_amount'),
  description: text('description'),
  source: source(),
  rawData: rawData(),
  createdAt: createdAt(),
})

// ─── Corporate actions ────────────────────────────────────────────────────────

export const corporateActions = pgTable('corporate_actions', {
  id: id(),
  externalId: externalId(),
  instrumentId: text('instrument_id').references(() => instruments.id),
  actionType: corporateActionTypeEnum('action_type').notNull(),
  date: day('date').notNull(),
  quantity: money('quantity'),
  amount: money('amount'),
  proceeds: money('proceeds'),
  currency: text('currency'),
  description: text('description'),
  source: source(),
  rawData: rawData(),
  createdAt: createdAt(),
})

// ─── FX rates ─────────────────────────────────────────────────────────────────

export const fxRates = pgTable(
  'fx_rates',
  {
    id: id(),
    date: day('date').notNull(),
    currency: text('currency').notNull(),
    // Multiply an amount in `currency` by `rate` to get base currency
    rate: money('rate').notNull(),
    source: source(),
    createdAt: createdAt(),
  },
  (t) => [unique('fx_rates_date_currency_key').on(t.date, t.currency)],
)

// ─── Portfolio snapshots ──────────────────────────────────────────────────────

export const portfolioSnapshots = pgTable('portfolio_snapshots', {
  id: id(),
  reportDate: day('report_date').notNull().unique(),
  source: source(),
  rawData: rawData(),
  createdAt: createdAt(),
})

// Soft link to instruments: positions may predate the catalog, so no foreign key.
export const positions = pgTable(
  'positions',
  {
    id: id(),
    snapshotId: text('snapshot_id')
      .notNull()
      .references(() => portfolioSnapshots.id),
    date: day('date').notNull(),
    isin: text('isin'),
    instrumentId: text('instrument_id'),
    symbol: text('symbol').notNull(),
    name: text('name'),
    assetClass: text('asset_class'),
    exchange: text('exchange'),
    quantity: money('quantity').notNull(),
    price: money('price'),
    value: money('value'),
    costBasis: money('cost_basis'),
    currency: text('currency').notNull(),
    fxRate: money('fx_rate'),
    unrealizedPnl: money('unrealized_pnl'),
    rawData: rawData(),
    createdAt: createdAt(),
  },
  (t) => [
    unique('positions_snapshot_symbol_key').on(t.snapshotId, t.symbol),
    index('positions_currency_date_idx').on(t.currency, t.date),
  ],
)

// ─── Account statements (broker-reported cash totals) ─────────────────────────

export const accountStatements = pgTable('account_statements', {
  id: id(),
  externalId: externalId(),
  accountId: text('account_id').notNull(),
  currency: text('currency').notNull(),
  fromDate: day('from_date').notNull(),
  toDate: day('to_date').notNull(),
  startingCash: money('starting_cash').notNull(),
  endingCash: money('ending_cash').notNull(),
  deposits: money('deposits'),
  withdrawals: money('withdrawals'),
  dividends: money('dividends'),
  commissions: money('commissions'),
  source: source(),
  rawData: rawData(),
  createdAt: createdAt(),
})

// ─── Import files ─────────────────────────────────────────────────────────────

export interface ImportErrorRecord {
  line: number
  message: string
  phase: string
}

export const importFiles = pgTable('import_files', {
  id: id(),
  filename: text('filename').notNull(),
  format: text('format').notNull(),
  createdCount: integer('created_count').notNull().default(0),
  skippedCount: integer('skipped_count').notNull().default(0),
  failedCount: integer('failed_count').notNull().default(0),
  errors: jsonb('errors').$type<ImportErrorRecord[]>().notNull().default([]),
  createdAt: createdAt(),
})

// ─── Relations ────────────────────────────────────────────────────────────────

export const instrumentsRelations = relations(instruments, ({ many }) => ({
  aliases: many(instrumentAliases),
  trades: many(trades),
  dividends: many(dividendPayments),
  corporateActions: many(corporateActions),
}))

export const instrumentAliasesRelations = relations(instrumentAliases, ({ one }) => ({
  instrument: one(instruments, {
    fields: [instrumentAliases.instrumentId],
    references: [instruments.id],
  }),
}))

export const tradesRelations = relations(trades, ({ one }) => ({
  instrument: one(instruments, { fields: [trades.instrumentId], references: [instruments.id] }),
}))

export const dividendPaymentsRelations = relations(dividendPayments, ({ one }) => ({
  instrument: one(instruments, {
    fields: [dividendPayments.instrumentId],
    references: [instruments.id],
  }),
}))

export const corporateActionsRelations = relations(corporateActions, ({ one }) => ({
  instrument: one(instruments, {
    fields: [corporateActions.instrumentId],
    references: [instruments.id],
  }),
}))

export const portfolioSnapshotsRelations = relations(portfolioSnapshots, ({ many }) => ({
  positions: many(positions),
}))

export const positionsRelations = relations(positions, ({ one }) => ({
  snapshot: one(portfolioSnapshots, {
    fields: [positions.snapshotId],
    references: [portfolioSnapshots.id],
  }),
}))

// ─── Type exports ─────────────────────────────────────────────────────────────

export type Instrument = typeof instruments.$inferSelect
export type InstrumentAlias = typeof instrumentAliases.$inferSelect
export type Trade = typeof trades.$inferSelect
export type DividendPayment = typeof dividendPayments.$inferSelect
export type CashFlow = typeof cashFlows.$inferSelect
export type CashFlowType = (typeof cashFlowTypeEnum.enumValues)[number]
export type CorporateAction = typeof corporateActions.$inferSelect
export type CorporateActionType = (typeof corporateActionTypeEnum.enumValues)[number]
export type FxRate = typeof fxRates.$inferSelect
export type PortfolioSnapshot = typeof portfolioSnapshots.$inferSelect
export type Position = typeof positions.$inferSelect
export type AccountStatement = typeof accountStatements.$inferSelect
export type ImportFile = typeof importFiles.$inferSelect
