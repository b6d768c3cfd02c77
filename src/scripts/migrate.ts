import { createDb } from '~/db'
import { migrate } from '~/db/migrate'
import { errorMessage } from '~/lib/errors'
import { logger } from '~/lib/logger'

async function main() {
  const { db, close } = createDb()
  try {
    const applied = await migrate(db)
    logger.info(applied.length > 0 ? `Applied ${applied.join(', ')}` : 'Schema is up to date')
  } finally {
    await close()
  }
}

main().catch((err: unknown) => {
  logger.error(`Migration failed: ${errorMessage(err)}`)
  process.exitCode = 1
})
