import { describe, expect, it } from 'vitest'
import { addDays, daysBetween, isIsoDate, monthOf } from './dates'

describe('dates', () => {
  it('validates calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true)
    expect(isIsoDate('2025-02-29')).toBe(false)
    expect(isIsoDate('20250228')).toBe(false)
  })

  it('shifts across month and year ends', () => {
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01')
    expect(addDays('2025-03-01', -1)).toBe('2025-02-28')
  })

  it('counts days between dates', () => {
    expect(daysBetween('2025-12-28', '2026-01-28')).toBe(31)
    expect(daysBetween('2026-01-28', '2025-12-28')).toBe(-31)
  })

  it('names the month of a date', () => {
    expect(monthOf('2025-04-10')).toBe('2025-04')
  })
})
