import Decimal from 'decimal.js'

export { Decimal }

export const ZERO = new Decimal(0)
export const ONE = new Decimal(1)

/** Read a numeric column value. Drivers return numeric as string; NULL stays null. */
export function toDecimal(value: string | number | null | undefined): Decimal | null {
  if (value === null || value === undefined || value === '') return null
  return new Decimal(value)
}

/** Serialize for a numeric column without exponent notation. */
export function toNumeric(value: Decimal): string
export function toNumeric(value: Decimal | null): string | null
export function toNumeric(value: Decimal | null): string | null {
  return value === null ? null : value.toFixed()
}

export function sum(values: Iterable<Decimal>): Decimal {
  let total = ZERO
  for (const value of values) total = total.plus(value)
  return total
}
