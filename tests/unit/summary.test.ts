import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, it, expect } from 'vitest'
import { buildSummary, countFilledColumns, logSummary, writeSummary, type SummaryInput } from '../../src/enrich/summary'
import type { RecordOutcome } from '../../src/shared-types'

const OUTCOMES: RecordOutcome[] = [
  { rowIndex: 0, name: 'John Smith', state: 'merged', path: 'auto' },
  { rowIndex: 1, name: 'Jane Doe', state: 'skipped', path: 'manual', reason: 'OPERATOR_SKIP' },
  { rowIndex: 2, name: 'Bob Roe', state: 'merged', path: 'manual' },
]

const input = (outcomes: RecordOutcome[]): SummaryInput => ({
  inputPath: '/tmp/leads.csv',
  startedAt: new Date('2024-05-01T10:00:00.000Z'),
  completedAt: new Date('2024-05-01T10:01:30.000Z'),
  totalRows: 5,
  outcomes,
  manualPrompts: 2,
  gatesSeen: 1,
  finalMode: 'auto' as const,
  rows: [
    { Phone1: '(212) 555-0101', Age: '' },
    { Phone1: '(646) 555-0102', Age: '30', Relatives: ' ' },
  ],
})

describe('summary', () => {
  it('counts only columns with data', () => {
    expect(countFilledColumns(input([]).rows)).toEqual({ Phone1: 2, Age: 1 })
  })

  it('derives totals and the enrichment rate', () => {
    const summary = buildSummary(input(OUTCOMES))
    expect(summary).toMatchObject({
      startedAt: '2024-05-01T10:00:00.000Z',
      completedAt: '2024-05-01T10:01:30.000Z',
      durationMs: 90_000,
      totalRows: 5,
      processed: 3,
      enriched: 2,
      skipped: 1,
      manualPrompts: 2,
      gatesSeen: 1,
      finalMode: 'auto',
      enrichmentRate: 66.7,
    })
    expect(summary.outcomes).toEqual(OUTCOMES)
  })

  it('reports a zero rate for an empty run', () => {
    expect(buildSummary(input([])).enrichmentRate).toBe(0)
  })

  it('writes the summary as JSON', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'summary-'))
    const summary = buildSummary(input(OUTCOMES))
    const file = await writeSummary(summary, dir, new Date(2024, 4, 1, 10, 1, 30))
    expect(path.basename(file)).toBe('enrichment_summary_20240501_100130.json')
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(summary)
  })

  it('logs one line per total', () => {
    const lines: string[] = []
    logSummary(buildSummary(input(OUTCOMES)), line => lines.push(line))
    expect(lines[0]).toBe('[summary] ═══ ENRICHMENT DONE in 90.0s ═══')
    expect(lines).toContain('[summary]   Enriched:         2 (66.7%)')
    expect(lines).toHaveLength(7)
  })
})
