/**
 * gate-monitor.ts
 *
 * Classifies a captured page as normal content, an anti-bot challenge, a hard
 * block or unknown, and drives the wait-and-retry protocol around navigation:
 *
 *  1. navigate
 *  2. poll for a normal-content signal up to firstWaitMs → no gate
 *  3. if the page is a challenge: notify the operator, then re-check every
 *     pollIntervalMs for up to gateWaitMs → gate seen, or ChallengeNotCleared
 *  4. otherwise → NavigationTimeout
 *
 * All signal lists live here so classification can be tested on plain markup.
 */

import type { BrowserSession } from './browser-session'
import { loadHtml, visibleText, type Doc } from './dom-utils'
import type { GateState, NavMode, PageClass } from '../shared-types'
import { ChallengeNotClearedError, NavigationTimeoutError } from '../errors'
import { silentLog, type Log } from '../logger'

const TAG = '[gate-monitor]'

// ── Signal catalog ────────────────────────────────────────────────────────────

/** Human-verification phrases, matched against visible text */
export const CHALLENGE_PHRASES = [
  'checking your browser',
  'please wait while we check your browser',
  'verifying you are human',
  'just a moment',
  'cloudflare',
  'cf-challenge',
  'turnstile',
  'captcha',
]

/** Vendor challenge widgets, matched against markup */
export const CHALLENGE_SELECTORS = [
  '#challenge-running',
  '#cf-challenge-running',
  '#challenge-form',
  '.cf-turnstile',
  '[id^="cf-chl"]',
  'iframe[src*="challenges.cloudflare.com"]',
]

/** Access-denial phrases; only consulted when nothing else matched */
export const BLOCK_PHRASES = [
  'access denied',
  'unusual traffic',
  'are you a human',
  'verify you are human',
  'security check',
  'please enable cookies',
]

const RESULTS_CONTAINER = '#results, [class*="results"]'
const DETAIL_LINK = 'a[href*="/person"], a[href*="/people"], a[href*="/details"]'
const HEADER_NAVBAR = 'header [class*="navbar"], header.navbar'

/** Interval for the quick "is normal content there yet" poll */
const NORMAL_POLL_MS = 500

// ── Classification ────────────────────────────────────────────────────────────

/** "https://www.fastpeoplesearch.com" → "fastpeoplesearch" */
export function siteMarkerFor(baseUrl: string): string {
  try {
    const host = new URL(baseUrl).hostname.replace(/^www\./, '')
    return host.split('.')[0] ?? host
  } catch {
    return ''
  }
}

function hasNormalSignalIn($: Doc, siteMarker: string): boolean {
  if ($(RESULTS_CONTAINER).length > 0) return true
  if ($(DETAIL_LINK).length > 0) return true
  if ($(HEADER_NAVBAR).length > 0) return true
  if (siteMarker) {
    const header = $('header').text().toLowerCase().replace(/\s+/g, '')
    if (header.includes(siteMarker.toLowerCase())) return true
  }
  return false
}

/** Positive "page rendered real content" check, ignoring challenge phrases */
export function hasNormalSignal(html: string, siteMarker = ''): boolean {
  return hasNormalSignalIn(loadHtml(html), siteMarker)
}

/**
 * Precedence: challenge widget > normal > challenge phrase > blocked > unknown.
 * A widget wins even inside a results-like container; a phrase alone (a
 * "protected by reCAPTCHA" footer) does not outrank real content.
 */
export function classifyContent(html: string, siteMarker = ''): PageClass {
  const $ = loadHtml(html)
  const text = visibleText($).toLowerCase()
  const phrase = CHALLENGE_PHRASES.find(p => text.includes(p))

  const widget = CHALLENGE_SELECTORS.find(sel => $(sel).length > 0)
  if (widget) return { kind: 'challenge', signal: phrase ?? widget }

  if (hasNormalSignalIn($, siteMarker)) return { kind: 'normal' }
  if (phrase) return { kind: 'challenge', signal: phrase }

  const block = BLOCK_PHRASES.find(p => text.includes(p))
  if (block) return { kind: 'blocked', signal: block }
  return { kind: 'unknown' }
}

// ── Waiting ───────────────────────────────────────────────────────────────────

export interface GateWaitOptions {
  firstWaitMs: number
  gateWaitMs: number
  pollIntervalMs: number
  siteMarker?: string
  /** Clock used for deadlines (default Date.now) */
  clock?: () => number
  /** Operator-facing notice when a challenge needs clearing */
  onChallenge?: (url: string, signal: string) => void
  log?: Log
}

/**
 * Poll the current page until it classifies as normal or `timeoutMs` elapses.
 * Returns the last classification.
 */
export async function waitForNormalContent(
  session: BrowserSession,
  timeoutMs: number,
  opts: Pick<GateWaitOptions, 'siteMarker' | 'clock'> = {},
): Promise<PageClass> {
  const clock = opts.clock ?? Date.now
  const deadline = clock() + timeoutMs

  for (;;) {
    const { html } = await session.snapshot()
    const cls = classifyContent(html, opts.siteMarker)
    if (cls.kind === 'normal') return cls

    const remaining = deadline - clock()
    if (remaining <= 0) return cls
    await session.wait(Math.min(NORMAL_POLL_MS, remaining))
  }
}

export interface GateResult {
  gateSeen: boolean
}

export async function openWithGate(
  session: BrowserSession,
  url: string,
  opts: GateWaitOptions,
): Promise<GateResult> {
  await session.navigate(url)
  return passGate(session, url, opts)
}

/**
 * Steps 2-4 of the protocol for a page that is already loading (after a
 * navigation or a click).
 */
export async function passGate(
  session: BrowserSession,
  url: string,
  opts: GateWaitOptions,
): Promise<GateResult> {
  const log = opts.log ?? silentLog
  const clock = opts.clock ?? Date.now

  const first = await waitForNormalContent(session, opts.firstWaitMs, opts)
  if (first.kind === 'normal') return { gateSeen: false }

  const { html } = await session.snapshot()
  const cls = classifyContent(html, opts.siteMarker)

  if (cls.kind === 'challenge') {
    log(`${TAG} ⚠ challenge detected (${cls.signal}) — waiting up to ${Math.round(opts.gateWaitMs / 1000)}s for it to clear`)
    opts.onChallenge?.(url, cls.signal)

    const deadline = clock() + opts.gateWaitMs
    while (clock() < deadline) {
      await session.wait(Math.min(opts.pollIntervalMs, Math.max(deadline - clock(), 0)))
      const current = await session.snapshot()
      if (classifyContent(current.html, opts.siteMarker).kind === 'normal') {
        log(`${TAG} challenge cleared`)
        return { gateSeen: true }
      }
    }
    log(`${TAG} ✖ challenge not cleared in time: ${url}`)
    throw new ChallengeNotClearedError(url, opts.gateWaitMs)
  }

  const detail = cls.kind === 'blocked' ? `blocked: ${cls.signal}` : cls.kind
  log(`${TAG} ⚠ no normal content after ${Math.round(opts.firstWaitMs / 1000)}s (${detail})`)
  throw new NavigationTimeoutError(url, detail)
}

// ── Gate accounting ───────────────────────────────────────────────────────────

/**
 * Per-run gate counter. Once the threshold is reached the run stays in manual
 * mode; nothing resets it.
 */
export class GateTracker {
  private count = 0
  private current: NavMode

  constructor(
    private readonly maxGatesBeforeManual: number,
    initialMode: NavMode = 'auto',
  ) {
    this.current = initialMode
  }

  get mode(): NavMode {
    return this.current
  }

  get gatesSeenCount(): number {
    return this.count
  }

  get state(): GateState {
    return { gatesSeenCount: this.count, mode: this.current }
  }

  /** Count one observed gate; returns true when this call switched to manual */
  recordGate(): boolean {
    this.count++
    if (this.current === 'auto' && this.count >= this.maxGatesBeforeManual) {
      this.current = 'manual'
      return true
    }
    return false
  }
}
