import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

// ─── Environment ──────────────────────────────────────────────────────────────

const percent = z.coerce.number().min(0)

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    DATABASE_URL: z.string().min(1).optional(),
    BASE_CURRENCY: z
      .string()
      .trim()
      .toUpperCase()
      .regex(/^[A-Z]{3}$/, 'BASE_CURRENCY must be a three-letter currency code')
      .default('EUR'),
    FX_LOOKBACK_DAYS: z.coerce.number().int().min(0).default(7),
    FX_POSITION_WINDOW_DAYS: z.coerce.number().int().min(0).default(31),
    BALANCE_WARN_PCT: percent.default(1),
    BALANCE_FAIL_PCT: percent.default(5),
    BALANCE_MARGIN_WARN_PCT: percent.default(3),
    BALANCE_MARGIN_FAIL_PCT: percent.default(10),
    ENRICHMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  })
  .refine((env) => env.BALANCE_WARN_PCT <= env.BALANCE_FAIL_PCT, {
    message: 'BALANCE_WARN_PCT must not exceed BALANCE_FAIL_PCT',
    path: ['BALANCE_WARN_PCT'],
  })
  .refine((env) => env.BALANCE_MARGIN_WARN_PCT <= env.BALANCE_MARGIN_FAIL_PCT, {
    message: 'BALANCE_MARGIN_WARN_PCT must not exceed BALANCE_MARGIN_FAIL_PCT',
    path: ['BALANCE_MARGIN_WARN_PCT'],
  })

export interface ToleranceBands {
  warnPct: number
  failPct: number
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test'
  databaseUrl: string | null
  baseCurrency: string
  fx: {
    baseCurrency: string
    lookbackDays: number
    positionWindowDays: number
  }
  balance: {
    standard: ToleranceBands
    margin: ToleranceBands
  }
  enrichmentTimeoutMs: number
  logLevel: 'error' | 'warn' | 'info' | 'debug'
}

/** Validate an environment map and shape it into the application config. */
export function loadConfig(source: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(source)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid environment configuration: ${issues}`)
  }
  const env = result.data

  return {
    nodeEnv: env.NODE_ENV,
    databaseUrl: env.DATABASE_URL ?? null,
    baseCurrency: env.BASE_CURRENCY,
    fx: {
      baseCurrency: env.BASE_CURRENCY,
      lookbackDays: env.FX_LOOKBACK_DAYS,
      positionWindowDays: env.FX_POSITION_WINDOW_DAYS,
    },
    balance: {
      standard: { warnPct: env.BALANCE_WARN_PCT, failPct: env.BALANCE_FAIL_PCT },
      margin: { warnPct: env.BALANCE_MARGIN_WARN_PCT, failPct: env.BALANCE_MARGIN_FAIL_PCT },
    },
    enrichmentTimeoutMs: env.ENRICHMENT_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  }
}

export const config = loadConfig(process.env)
