import { z } from 'zod'
import { createDb } from '~/db'
import { config } from '~/lib/config'
import { errorMessage } from '~/lib/errors'
import { backfillConversions } from '~/lib/fx'
import { importFiles } from '~/lib/import-runner'
import { logger } from '~/lib/logger'
import { parseArgs } from './args'

// Usage: npm run import -- [--concurrency=N] [--no-backfill] <file…>

const optionsSchema = z.object({
  concurrency: z.coerce.number().int().min(1).max(16).default(1),
  'no-backfill': z.boolean().default(false),
})

async function main() {
  const { flags, positional } = parseArgs(process.argv.slice(2))
  const options = optionsSchema.parse(flags)
  if (positional.length === 0) {
    logger.error('Usage: npm run import -- [--concurrency=N] [--no-backfill] <file…>')
    process.exitCode = 2
    return
  }

  const { db, close } = createDb()
  try {
    const summary = await importFiles(db, positional, { fx: config.fx, concurrency: options.concurrency })
    for (const file of summary.files) {
      for (const conflict of file.conflicts) {
        logger.warn(
          `${file.filename}:${conflict.line} ${conflict.isin} ${conflict.field}: "${conflict.existing}" kept, "${conflict.incoming}" ignored`,
        )
      }
    }
    // Snapshots may have brought rates that earlier records were missing
    if (!options['no-backfill']) await backfillConversions(db, config.fx)
    if (summary.totals.failed > 0) process.exitCode = 1
  } finally {
    await close()
  }
}

main().catch((err: unknown) => {
  logger.error(errorMessage(err))
  process.exitCode = 1
})
