/**
 * enrichment-runner.ts
 *
 * Sequential batch over the input table, one browser session per run.
 *
 * Per record:
 *   auto path:   search URL → gate → results → best candidate → gate → detail
 *   manual path: load the search page, then wait for the operator to put the
 *                browser on the detail page and answer "retry" (or "skip")
 *
 * Every auto-path failure (slow page, uncleared challenge, no candidate,
 * unconfirmed detail page) hands the record to the manual path. Once
 * MAX_GATES_BEFORE_MANUAL challenges have been seen the run stays manual.
 *
 * Progress is checkpointed into the input file every CHECKPOINT_EVERY records.
 * A fatal error writes an emergency CSV before the error is rethrown.
 */

import path from 'path'
import type { BrowserSession } from '../crawler/browser-session'
import {
  buildSearchUrl,
  looksLikeCompositeName,
  recordStub,
  sanitizeNamePart,
} from '../crawler/target-builder'
import { GateTracker, openWithGate, siteMarkerFor, type GateWaitOptions } from '../crawler/gate-monitor'
import { openCandidate, selectBestDetailLink, waitForResults } from '../crawler/candidate-selector'
import { scrapeCurrentPage } from '../crawler/detail-extractor'
import { acquireSession, captureDiagnostics, checkExitIp } from '../crawler/session-driver'
import type { EnrichConfig } from '../config'
import {
  DetailNotConfirmedError,
  FatalBatchError,
  NavigationTimeoutError,
  NoCandidateFoundError,
  RecordProcessingError,
  errorMessage,
  isManualEscalation,
  type EnrichError,
} from '../errors'
import type { Log } from '../logger'
import type { OperatorResponder } from './operator'
import {
  checkpoint,
  ensureEnrichmentColumns,
  loadTable,
  mergeIntoRow,
  toInputRecord,
  writeBackups,
  writeEmergencyBackup,
  type RecordTable,
} from './record-store'
import { buildSummary, logSummary, writeSummary } from './summary'
import type {
  BatchSummary,
  EnrichedFields,
  InputRecord,
  NavMode,
  RecordOutcome,
  RecordState,
} from '../shared-types'

const TAG = '[enrichment-runner]'

// ── Types ─────────────────────────────────────────────────────────────────────

export interface RunOptions {
  inputPath: string
  config: EnrichConfig
  log: Log
  /** Overrides config.navMode */
  navMode?: NavMode
  /** Overrides config.limitRows */
  limitRows?: number
}

export interface RunDeps {
  operator: OperatorResponder
  /** Defaults to attaching to / launching the real browser */
  openSession?: (config: EnrichConfig, log: Log) => Promise<BrowserSession>
  /** Deadline clock (default Date.now) */
  clock?: () => number
  /** Wall clock for timestamps and file names */
  now?: () => Date
  /** Source for the inter-record delay (default Math.random) */
  random?: () => number
}

interface RunContext {
  config: EnrichConfig
  log: Log
  session: BrowserSession
  operator: OperatorResponder
  tracker: GateTracker
  table: RecordTable
  total: number
  siteMarker: string
  clock: () => number
  debugDir: string
  manualPrompts: number
}

type AttemptResult =
  | { fields: EnrichedFields; state: RecordState }
  | { fields: null; state: RecordState; reason: string }

// ── Helpers ───────────────────────────────────────────────────────────────────

function gateOptions(ctx: RunContext, firstWaitMs: number): GateWaitOptions {
  return {
    firstWaitMs,
    gateWaitMs: ctx.config.gate.gateWaitMs,
    pollIntervalMs: ctx.config.gate.pollIntervalMs,
    siteMarker: ctx.siteMarker,
    clock: ctx.clock,
    log: ctx.log,
    onChallenge: (url, signal) => {
      ctx.operator.notify(`Verification page (${signal}) at ${url}: please solve it in the browser window.`)
      if (ctx.tracker.recordGate()) {
        ctx.log(`${TAG} ⚠ ${ctx.tracker.gatesSeenCount} gates seen, switching to manual mode for the rest of the run`)
      }
    },
  }
}

async function diagnostics(ctx: RunContext, stub: string, phase: string): Promise<void> {
  if (!ctx.config.debugDumps) return
  await captureDiagnostics(ctx.session, ctx.debugDir, stub, phase, ctx.log)
}

function escalate(ctx: RunContext, state: RecordState, err: EnrichError): AttemptResult {
  ctx.log(`${TAG} ⚠ ${err.code}: ${err.message}, needs manual`)
  return { fields: null, state, reason: err.code }
}

function interRecordDelay(config: EnrichConfig, random: () => number): number {
  const { minMs, maxMs } = config.delay
  return minMs + Math.floor(random() * (maxMs - minMs + 1))
}

// ── Auto path ─────────────────────────────────────────────────────────────────

async function runAuto(ctx: RunContext, rec: InputRecord, first: string, last: string, url: string, stub: string): Promise<AttemptResult> {
  const { session, config } = ctx
  try {
    await openWithGate(session, url, gateOptions(ctx, config.gate.firstWaitMs))

    if (!(await waitForResults(session, config.resultsWaitMs, ctx.clock))) {
      await diagnostics(ctx, stub, 'results')
      return escalate(ctx, 'gate_cleared', new NavigationTimeoutError(url, 'no results list'))
    }

    const candidate = await selectBestDetailLink(session, first, last, { log: ctx.log })
    if (!candidate) {
      await diagnostics(ctx, stub, 'results')
      return escalate(ctx, 'no_candidate', new NoCandidateFoundError(url))
    }

    const opened = await openCandidate(session, candidate, gateOptions(ctx, config.gate.detailFirstWaitMs))
    if (!opened) {
      await diagnostics(ctx, stub, 'results')
      return escalate(ctx, 'no_candidate', new NoCandidateFoundError(url))
    }

    const scraped = await scrapeCurrentPage(session, {
      detailWaitMs: config.detailWaitMs,
      minSignals: config.detailMinSignals,
      clock: ctx.clock,
      log: ctx.log,
    })
    await diagnostics(ctx, stub, 'detail')
    if (!scraped.ok) {
      return escalate(ctx, 'detail_failed', new DetailNotConfirmedError(scraped.reason))
    }

    ctx.log(`${TAG} record ${rec.rowIndex + 1}: detail page ${opened.url}`)
    return { fields: scraped.fields, state: 'detail_loaded' }
  } catch (err) {
    if (!isManualEscalation(err)) throw err
    const state: RecordState = err.code === 'CHALLENGE_NOT_CLEARED' ? 'gate_failed' : 'searching'
    return escalate(ctx, state, err)
  }
}

// ── Manual path ───────────────────────────────────────────────────────────────

async function runManual(ctx: RunContext, rec: InputRecord, name: string, url: string, stub: string): Promise<AttemptResult> {
  const { session, config } = ctx
  await session.navigate(url)

  const deadline = ctx.clock() + config.gate.gateWaitMs
  let attempt = 1
  let lastError: string | undefined

  for (;;) {
    const remaining = deadline - ctx.clock()
    if (attempt > 1 && remaining <= 0) {
      ctx.log(`${TAG} ✖ record ${rec.rowIndex + 1}: manual time budget used up`)
      return { fields: null, state: 'detail_failed', reason: 'MANUAL_TIMEOUT' }
    }

    ctx.manualPrompts++
    const reply = await ctx.operator.ask({
      rowIndex: rec.rowIndex,
      total: ctx.total,
      name,
      url,
      attempt,
      lastError,
      remainingMs: attempt > 1 ? remaining : undefined,
    })
    if (reply === 'skip') {
      ctx.log(`${TAG} record ${rec.rowIndex + 1}: skipped by operator`)
      return { fields: null, state: 'skipped', reason: 'OPERATOR_SKIP' }
    }

    const scraped = await scrapeCurrentPage(session, {
      detailWaitMs: config.detailWaitMs,
      minSignals: config.detailMinSignals,
      clock: ctx.clock,
      log: ctx.log,
    })
    await diagnostics(ctx, stub, 'manual_detail')
    if (scraped.ok) return { fields: scraped.fields, state: 'detail_loaded' }

    lastError = scraped.reason
    ctx.log(`${TAG} ⚠ record ${rec.rowIndex + 1}: ${scraped.reason}`)
    attempt++
  }
}

// ── Per record ────────────────────────────────────────────────────────────────

async function processRecord(ctx: RunContext, rowIndex: number): Promise<RecordOutcome> {
  const row = ctx.table.rows[rowIndex]
  const rec = toInputRecord(row, rowIndex)
  const first = sanitizeNamePart(rec.firstName)
  const last = sanitizeNamePart(rec.lastName)
  const name = `${first} ${last}`.trim() || `${rec.firstName} ${rec.lastName}`.trim()

  if (!first || !last) {
    ctx.log(`${TAG} ⚠ skipping record ${rowIndex + 1}: invalid name`)
    return { rowIndex, name, state: 'skipped', path: 'none', reason: 'INVALID_NAME' }
  }
  if (looksLikeCompositeName(rec.firstName) || looksLikeCompositeName(rec.lastName)) {
    ctx.log(`${TAG} ⚠ skipping record ${rowIndex + 1}: composite / organisation name "${name}"`)
    return { rowIndex, name, state: 'skipped', path: 'none', reason: 'COMPOSITE_NAME' }
  }

  const url = buildSearchUrl(first, last, rec.address, rec.postalCode, ctx.config.searchBaseUrl)
  const stub = recordStub(first, last, rowIndex)
  ctx.log(`${TAG} ── Record ${rowIndex + 1}/${ctx.total}: ${name} (${ctx.tracker.mode}) ──`)
  ctx.log(`${TAG} search URL: ${url}`)

  try {
    let result: AttemptResult | null = null
    let recordPath: RecordOutcome['path'] = 'auto'

    if (ctx.tracker.mode === 'auto') {
      result = await runAuto(ctx, rec, first, last, url, stub)
    }
    if (!result || result.fields === null) {
      recordPath = 'manual'
      result = await runManual(ctx, rec, name, url, stub)
    }

    if (result.fields === null) {
      return { rowIndex, name, state: result.state, path: recordPath, reason: result.reason }
    }

    mergeIntoRow(row, result.fields)
    ctx.log(`${TAG} ✓ record ${rowIndex + 1}: ${result.fields.phones.length} phone(s), age ${result.fields.age ?? '?'}`)
    return { rowIndex, name, state: 'merged', path: recordPath }
  } catch (err) {
    const wrapped = new RecordProcessingError(rowIndex, err)
    ctx.log(`${TAG} ✖ ${wrapped.message}`)
    return { rowIndex, name, state: 'skipped', path: 'none', reason: wrapped.code }
  }
}

// ── Public entry point ────────────────────────────────────────────────────────

export async function runEnrichment(opts: RunOptions, deps: RunDeps): Promise<BatchSummary> {
  const { config, log } = opts
  const clock = deps.clock ?? Date.now
  const now = deps.now ?? (() => new Date())
  const random = deps.random ?? Math.random
  const openSession = deps.openSession ?? acquireSession

  const startedAt = now()
  const table = await loadTable(opts.inputPath)
  ensureEnrichmentColumns(table)

  const limit = opts.limitRows ?? config.limitRows
  const total = limit ? Math.min(limit, table.rows.length) : table.rows.length
  const navMode = opts.navMode ?? config.navMode
  const tracker = new GateTracker(config.maxGatesBeforeManual, navMode)

  log(`${TAG} ═══ ENRICHMENT START: ${path.basename(opts.inputPath)} ═══`)
  log(`${TAG} ${total} record(s) of ${table.rows.length}, mode ${navMode}`)

  let session: BrowserSession | null = null
  const outcomes: RecordOutcome[] = []

  try {
    session = await openSession(config, log)
    if (config.ipCheck) await checkExitIp(session, log)

    const ctx: RunContext = {
      config, log, session, operator: deps.operator, tracker, table, total,
      siteMarker: siteMarkerFor(config.searchBaseUrl),
      clock,
      debugDir: path.join(config.outputDir, 'debug'),
      manualPrompts: 0,
    }

    for (let i = 0; i < total; i++) {
      outcomes.push(await processRecord(ctx, i))

      if ((i + 1) % config.checkpointEvery === 0) {
        log(`${TAG} checkpoint after ${i + 1} record(s)`)
        await checkpoint(table).catch(err => log(`${TAG} ⚠ checkpoint failed, continuing: ${errorMessage(err)}`))
      }
      if (i < total - 1) await session.wait(interRecordDelay(config, random))
    }

    await checkpoint(table)
    const backups = await writeBackups(table, config.outputDir, now())
    log(`${TAG} backups: ${backups.join(', ')}`)

    const summary = buildSummary({
      inputPath: opts.inputPath,
      startedAt,
      completedAt: now(),
      totalRows: table.rows.length,
      outcomes,
      manualPrompts: ctx.manualPrompts,
      gatesSeen: tracker.gatesSeenCount,
      finalMode: tracker.mode,
      rows: table.rows.slice(0, total),
    })
    const summaryFile = await writeSummary(summary, config.outputDir, now())
    logSummary(summary, log)
    log(`${TAG} summary: ${summaryFile}`)
    return summary
  } catch (err) {
    log(`${TAG} ✖ ENRICHMENT FAILED: ${errorMessage(err)}`)
    let backupPath: string | null = null
    try {
      backupPath = await writeEmergencyBackup(table, config.outputDir, now())
      log(`${TAG} emergency backup: ${backupPath}`)
    } catch (backupErr) {
      log(`${TAG} ✖ emergency backup failed: ${errorMessage(backupErr)}`)
    }
    throw new FatalBatchError(err, backupPath)
  } finally {
    if (session) {
      log(`${TAG} closing browser session`)
      await session.close().catch(err => log(`${TAG} ⚠ session close failed: ${errorMessage(err)}`))
    }
  }
}
