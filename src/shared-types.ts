/**
 * shared-types.ts
 *
 * Type definitions shared by the crawler, the batch runner and the job API.
 */

// ── Records ───────────────────────────────────────────────────────────────────

/** One row of the source table, keyed by its position. */
export interface InputRecord {
  rowIndex: number
  firstName: string
  lastName: string
  address?: string
  postalCode?: string
  /** Every column of the row as read, untouched */
  columns: Readonly<Record<string, string>>
}

export interface EnrichedFields {
  homeAddress?: string
  phones: string[]
  age?: string
  relatives: string[]
  associates: string[]
  emails: string[]
  previousAddresses: string[]
  maritalStatus?: string
  currentAddressDetails?: string
  backgroundSummary?: string
  faqText?: string
  sourceUrl: string
}

/** Columns the runner appends to / overwrites in each row */
export const ENRICHMENT_COLUMNS = [
  'Full Address',
  'Phone1',
  'Phone2',
  'Phone3',
  'Phone4',
  'Phone5',
  'Age',
  'Relatives',
  'Emails',
  'Marital Status',
  'Associates',
  'Previous Addresses',
  'Current Address Details',
  'Background Report Summary',
  'FAQs',
  'Page URL',
] as const

export type EnrichmentColumn = typeof ENRICHMENT_COLUMNS[number]

// ── Gate handling ─────────────────────────────────────────────────────────────

export type NavMode = 'auto' | 'manual'

export interface GateState {
  gatesSeenCount: number
  mode: NavMode
}

export type PageClass =
  | { kind: 'normal' }
  | { kind: 'challenge'; signal: string }
  | { kind: 'blocked'; signal: string }
  | { kind: 'unknown' }


// ── Candidate selection ───────────────────────────────────────────────────────

export type ClickRole = 'button' | 'link'

export interface CandidateLink {
  /** Absolute detail URL, or null for a client-side navigated control */
  href: string | null
  displayText: string
  score: number
  /** Position in document order */
  order: number
  /** How to reach an href-less candidate: nth "view details" control of that role */
  clickTarget?: { role: ClickRole; nth: number }
}

// ── Per-record outcome ────────────────────────────────────────────────────────

export type RecordState =
  | 'pending'
  | 'searching'
  | 'gate_cleared'
  | 'gate_failed'
  | 'candidate_found'
  | 'no_candidate'
  | 'detail_loaded'
  | 'detail_failed'
  | 'merged'
  | 'skipped'

export type RecordPath = 'auto' | 'manual' | 'none'

export interface RecordOutcome {
  rowIndex: number
  name: string
  state: RecordState
  path: RecordPath
  /** Machine code of the last error or reason, when the row was not merged */
  reason?: string
}

export interface BatchSummary {
  inputPath: string
  startedAt: string
  completedAt: string
  durationMs: number
  totalRows: number
  processed: number
  enriched: number
  skipped: number
  manualPrompts: number
  gatesSeen: number
  finalMode: NavMode
  enrichmentRate: number
  columnsWithData: Partial<Record<EnrichmentColumn, number>>
  outcomes: RecordOutcome[]
}

// ── Manual mode ───────────────────────────────────────────────────────────────

export interface OperatorPrompt {
  rowIndex: number
  total: number
  name: string
  url: string
  /** 1 for the initial prompt, incremented on each retry */
  attempt: number
  lastError?: string
  remainingMs?: number
}

export type OperatorReply = 'skip' | 'retry'

// ── Jobs (HTTP API) ───────────────────────────────────────────────────────────

export type JobStatus = 'pending' | 'running' | 'done' | 'failed'

export interface EnrichJob {
  jobId: string
  inputPath: string
  status: JobStatus
  startedAt: string
  completedAt?: string
  error?: string
  logs: string[]
  pendingPrompt?: OperatorPrompt
  summary?: BatchSummary
}
