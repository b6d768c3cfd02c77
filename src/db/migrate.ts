import { readdir, readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { sql } from 'drizzle-orm'
import type { Database } from './types'
import { createLogger } from '~/lib/logger'

const log = createLogger('migrate')

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations/', import.meta.url))

export function splitStatements(migrationSql: string): string[] {
  return migrationSql
    .split('--> statement-breakpoint')
    .map((statement) => statement.trim())
    .filter((statement) => statement !== '')
}

/** Apply every pending migration under src/db/migrations, each in its own transaction. */
export async function migrate(db: Database, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await db.execute(
    sql.raw(
      'CREATE TABLE IF NOT EXISTS "__ledger_migrations" ("name" text PRIMARY KEY NOT NULL, "applied_at" timestamp with time zone DEFAULT now() NOT NULL)',
    ),
  )

  const files = (await readdir(dir)).filter((name) => name.endsWith('.sql')).sort()
  const applied: string[] = []

  for (const name of files) {
    const done = await db.execute(
      sql`SELECT 1 FROM "__ledger_migrations" WHERE "name" = ${name}`,
    )
    if (rowCount(done) > 0) continue

    const statements = splitStatements(await readFile(`${dir}${name}`, 'utf8'))
    await db.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement))
      }
      await tx.execute(sql`INSERT INTO "__ledger_migrations" ("name") VALUES (${name})`)
    })
    log.info(`Applied migration ${name} (${statements.length} statements)`)
    applied.push(name)
  }

  return applied
}

// node-postgres and PGlite both report result rows under `rows`.
function rowCount(result: unknown): number {
  if (typeof result === 'object' && result !== null && 'rows' in result && Array.isArray(result.rows)) {
    return result.rows.length
  }
  return 0
}
