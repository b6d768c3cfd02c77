import { drizzle } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'
import * as schema from './schema'
import { config } from '~/lib/config'
import type { Database } from './types'

export interface DbHandle {
  db: Database
  close: () => Promise<void>
}

export function createDb(databaseUrl: string | null = config.databaseUrl): DbHandle {
  if (!databaseUrl) throw new Error('DATABASE_URL is not set')
  const pool = new Pool({ connectionString: databaseUrl })
  const db = drizzle(pool, { schema })
  return { db, close: () => pool.end() }
}
