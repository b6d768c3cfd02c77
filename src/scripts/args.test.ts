import { describe, expect, it } from 'vitest'
import { parseArgs } from './args'

describe('parseArgs', () => {
  it('separates flags from file arguments', () => {
    expect(parseArgs(['--concurrency=4', 'a.csv', '--no-backfill', 'b.csv'])).toEqual({
      flags: { concurrency: '4', 'no-backfill': true },
      positional: ['a.csv', 'b.csv'],
    })
  })

  it('takes the next word as the value of a value flag only', () => {
    expect(parseArgs(['--from', '2025-01-01', '--margin', 'report.json'])).toEqual({
      flags: { from: '2025-01-01', margin: true },
      positional: ['report.json'],
    })
  })

  it('never takes another flag as a value', () => {
    expect(parseArgs(['--export', '--margin'])).toEqual({
      flags: { export: true, margin: true },
      positional: [],
    })
  })

  it('reads explicit switch values as booleans', () => {
    expect(parseArgs(['--margin=false', '--no-backfill=true', '--export=true'])).toEqual({
      flags: { margin: false, 'no-backfill': true, export: 'true' },
      positional: [],
    })
  })
})
