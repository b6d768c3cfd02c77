import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import type * as schema from './schema'

export type {
  Instrument,
  InstrumentAlias,
  Trade,
  DividendPayment,
  CashFlow,
  CorporateAction,
  FxRate,
  PortfolioSnapshot,
  Position,
  AccountStatement,
  ImportFile,
  RawPayload,
  RawRow,
} from './schema'

// Any drizzle Postgres handle over this schema: a node-postgres pool, an
// in-process PGlite, or an open transaction on either.
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>
