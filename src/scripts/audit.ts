import { readFile, writeFile } from 'node:fs/promises'
import { z } from 'zod'
import { createDb } from '~/db'
import { compareAudits, parseSnapshot, toSnapshot } from '~/lib/audit-trend'
import { config } from '~/lib/config'
import { isIsoDate } from '~/lib/dates'
import { errorMessage } from '~/lib/errors'
import { CHECKS, ledgerCounts, runAudit } from '~/lib/integrity'
import type { CheckName } from '~/lib/integrity'
import { logger } from '~/lib/logger'
import { parseArgs } from './args'

// Usage: npm run audit -- [--from D --to D] [--checks a,b] [--margin] [--export path] [--compare path]

const isoDate = z.string().refine(isIsoDate, 'expected YYYY-MM-DD')
const checkName = z.enum(CHECKS)

const optionsSchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
  checks: z
    .string()
    .transform((value) => value.split(',').map((part) => part.trim()))
    .pipe(z.array(checkName))
    .optional(),
  margin: z.boolean().default(false),
  export: z.string().optional(),
  compare: z.string().optional(),
})

async function main() {
  const options = optionsSchema.parse(parseArgs(process.argv.slice(2)).flags)
  const checks: readonly CheckName[] | undefined = options.checks

  const { db, close } = createDb()
  try {
    const counts = await ledgerCounts(db)
    logger.info(
      `Ledger: ${Object.entries(counts)
        .map(([table, n]) => `${table}=${n}`)
        .join(' ')}`,
    )

    const report = await runAudit(db, {
      fx: config.fx,
      bands: config.balance,
      checks,
      from: options.from,
      to: options.to,
      margin: options.margin,
    })
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`)

    if (options.compare) {
      const previous = parseSnapshot(JSON.parse(await readFile(options.compare, 'utf8')))
      const trend = compareAudits(previous, toSnapshot(report))
      logger.info(
        `Since ${previous.generatedAt}: ${trend.added.length} new, ${trend.resolved.length} resolved, ${trend.changed.length} changed`,
      )
      for (const finding of trend.added) logger.warn(`new: [${finding.check}] ${finding.message}`)
      for (const change of trend.changed) logger.info(`changed: ${change.key} ${change.previous} → ${change.current}`)
    }

    if (options.export) {
      await writeFile(options.export, `${JSON.stringify(toSnapshot(report), null, 2)}\n`)
      logger.info(`Audit written to ${options.export}`)
    }
  } finally {
    await close()
  }
}

main().catch((err: unknown) => {
  logger.error(errorMessage(err))
  process.exitCode = 1
})
