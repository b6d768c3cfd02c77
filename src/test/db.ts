import { PGlite } from '@electric-sql/pglite'
import { drizzle } from 'drizzle-orm/pglite'
import * as schema from '~/db/schema'
import { instruments } from '~/db/schema'
import { migrate } from '~/db/migrate'
import type { Database } from '~/db/types'
import type { FxOptions } from '~/lib/fx'

export interface TestDb {
  db: Database
  close: () => Promise<void>
}

/** Fresh in-process Postgres with the schema applied. */
export async function createTestDb(): Promise<TestDb> {
  const client = new PGlite()
  const db = drizzle(client, { schema })
  await migrate(db)
  return { db, close: () => client.close() }
}

export const testFx: FxOptions = {
  baseCurrency: 'EUR',
  lookbackDays: 7,
  positionWindowDays: 31,
}

export async function insertInstrument(db: Database, isin: string, currency: string | null = null): Promise<string> {
  const [row] = await db.insert(instruments).values({ isin, currency }).returning({ id: instruments.id })
  return row.id
}
