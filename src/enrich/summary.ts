/**
 * summary.ts
 *
 * End-of-run report: totals, per-column fill counts and the outcome of every
 * processed row, written as enrichment_summary_<ts>.json next to the backups.
 */

import fs from 'fs'
import path from 'path'
import {
  ENRICHMENT_COLUMNS,
  type BatchSummary,
  type EnrichmentColumn,
  type NavMode,
  type RecordOutcome,
} from '../shared-types'
import type { Row } from './record-store'
import { fileTimestamp, type Log } from '../logger'

export interface SummaryInput {
  inputPath: string
  startedAt: Date
  completedAt: Date
  totalRows: number
  outcomes: RecordOutcome[]
  manualPrompts: number
  gatesSeen: number
  finalMode: NavMode
  rows: Row[]
}

export function countFilledColumns(rows: Row[]): Partial<Record<EnrichmentColumn, number>> {
  const counts: Partial<Record<EnrichmentColumn, number>> = {}
  for (const col of ENRICHMENT_COLUMNS) {
    const n = rows.filter(r => (r[col] ?? '').trim() !== '').length
    if (n > 0) counts[col] = n
  }
  return counts
}

export function buildSummary(input: SummaryInput): BatchSummary {
  const enriched = input.outcomes.filter(o => o.state === 'merged').length
  const processed = input.outcomes.length
  return {
    inputPath: input.inputPath,
    startedAt: input.startedAt.toISOString(),
    completedAt: input.completedAt.toISOString(),
    durationMs: input.completedAt.getTime() - input.startedAt.getTime(),
    totalRows: input.totalRows,
    processed,
    enriched,
    skipped: processed - enriched,
    manualPrompts: input.manualPrompts,
    gatesSeen: input.gatesSeen,
    finalMode: input.finalMode,
    enrichmentRate: processed === 0 ? 0 : Math.round((enriched / processed) * 1000) / 10,
    columnsWithData: countFilledColumns(input.rows),
    outcomes: input.outcomes,
  }
}

export async function writeSummary(summary: BatchSummary, outputDir: string, now: Date = new Date()): Promise<string> {
  await fs.promises.mkdir(outputDir, { recursive: true })
  const file = path.join(outputDir, `enrichment_summary_${fileTimestamp(now)}.json`)
  await fs.promises.writeFile(file, JSON.stringify(summary, null, 2))
  return file
}

export function logSummary(summary: BatchSummary, log: Log): void {
  const tag = '[summary]'
  log(`${tag} ═══ ENRICHMENT DONE in ${(summary.durationMs / 1000).toFixed(1)}s ═══`)
  log(`${tag}   Processed:        ${summary.processed} of ${summary.totalRows}`)
  log(`${tag}   Enriched:         ${summary.enriched} (${summary.enrichmentRate}%)`)
  log(`${tag}   Skipped:          ${summary.skipped}`)
  log(`${tag}   Manual prompts:   ${summary.manualPrompts}`)
  log(`${tag}   Gates seen:       ${summary.gatesSeen}`)
  log(`${tag}   Final mode:       ${summary.finalMode}`)
}
