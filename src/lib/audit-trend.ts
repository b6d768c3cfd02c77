import { z } from 'zod'
import type { AuditReport } from './integrity'

// ─── Stored audits ────────────────────────────────────────────────────────────

// The part of a report a later run compares against. Written by `audit --export`.
export const auditSnapshotSchema = z.object({
  generatedAt: z.string(),
  findings: z.array(
    z.object({
      check: z.string(),
      code: z.string(),
      severity: z.enum(['info', 'warning']),
      count: z.number().int().nonnegative(),
      message: z.string(),
    }),
  ),
})

export type AuditSnapshot = z.infer<typeof auditSnapshotSchema>
type SnapshotFinding = AuditSnapshot['findings'][number]

export function toSnapshot(report: AuditReport): AuditSnapshot {
  return {
    generatedAt: report.generatedAt,
    findings: report.findings.map(({ check, code, severity, count, message }) => ({
      check,
      code,
      severity,
      count,
      message,
    })),
  }
}

/** Parse a previously exported audit. Throws when the file is not one. */
export function parseSnapshot(json: unknown): AuditSnapshot {
  const result = auditSnapshotSchema.safeParse(json)
  if (!result.success) {
    throw new Error(`Not an exported audit: ${result.error.issues[0]?.message ?? 'invalid shape'}`)
  }
  return result.data
}

// ─── Comparison ───────────────────────────────────────────────────────────────

export interface CountChange {
  key: string
  severity: SnapshotFinding['severity']
  previous: number
  current: number
}

export interface AuditTrend {
  added: SnapshotFinding[]
  resolved: SnapshotFinding[]
  changed: CountChange[]
}

const keyOf = (finding: { check: string; code: string }) => `${finding.check}:${finding.code}`

/** Findings that appeared, disappeared or changed count between two audits. */
export function compareAudits(previous: AuditSnapshot, current: AuditSnapshot): AuditTrend {
  const before = new Map(previous.findings.map((f) => [keyOf(f), f]))
  const after = new Map(current.findings.map((f) => [keyOf(f), f]))
  const trend: AuditTrend = { added: [], resolved: [], changed: [] }

  for (const [key, finding] of after) {
    const old = before.get(key)
    if (!old) trend.added.push(finding)
    else if (old.count !== finding.count) {
      trend.changed.push({ key, severity: finding.severity, previous: old.count, current: finding.count })
    }
  }
  for (const [key, finding] of before) {
    if (!after.has(key)) trend.resolved.push(finding)
  }
  return trend
}
