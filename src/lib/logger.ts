import winston from 'winston'
import { config } from './config'

// ─── Logger ───────────────────────────────────────────────────────────────────
// One root logger; components take a child tagged with their module name.

const { combine, timestamp, printf, colorize, errors } = winston.format

const logFormat = printf(({ level, message, timestamp, stack, module }) => {
  const scope = typeof module === 'string' ? ` [${module}]` : ''
  return `${String(timestamp)} [${level}]${scope} ${String(stack ?? message)}`
})

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: combine(errors({ stack: true }), timestamp(), logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), errors({ stack: true }), timestamp(), logFormat),
    }),
  ],
})

export function createLogger(module: string): winston.Logger {
  return logger.child({ module })
}
