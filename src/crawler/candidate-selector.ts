/**
 * candidate-selector.ts
 *
 * Picks the best "person detail" link on a search results page. Collection and
 * scoring are pure functions over captured markup; selectBestDetailLink and
 * openCandidate are the thin session-driving wrappers the runner calls.
 */

import type { BrowserSession } from './browser-session'
import { cleanText, loadHtml, resolveHref } from './dom-utils'
import { openWithGate, passGate, type GateWaitOptions } from './gate-monitor'
import type { CandidateLink, ClickRole } from '../shared-types'
import { silentLog, type Log } from '../logger'

const TAG = '[candidate-selector]'

const DETAIL_HREF_MARKERS = ['/person', '/people', '/details']
export const RESULTS_CONTAINER = '#results, [class*="results"]'
const RESULTS_POLL_MS = 500

/** "View Details", "view full detail", "Details - View"... */
export const VIEW_DETAILS_PATTERN = /view[\s\S]*detail|detail[\s\S]*view/i

// ── Collection ────────────────────────────────────────────────────────────────

function isViewDetailsText(text: string): boolean {
  const t = text.toLowerCase()
  return t.includes('view') && t.includes('detail')
}

/**
 * Every plausible detail control on the page, in document order. Anchors
 * qualify by href marker or by "view … details" text; buttons by text only.
 * Controls without a usable href carry a clickTarget instead.
 */
export function collectCandidates(html: string, pageUrl: string): CandidateLink[] {
  const $ = loadHtml(html)
  const out: CandidateLink[] = []
  const seenHrefs = new Set<string>()
  const ordinals: Record<ClickRole, number> = { button: 0, link: 0 }

  $('a, button').each((_, el) => {
    const node = $(el)
    const role: ClickRole = el.tagName.toLowerCase() === 'button' ? 'button' : 'link'
    const text = cleanText(node.text())
    const rawHref = node.attr('href') ?? node.attr('data-href') ?? ''

    const textMatch = isViewDetailsText(text)
    // Ordinals mirror how the live page is queried by role + accessible name
    const ordinal = textMatch ? ordinals[role]++ : -1

    const hrefMatch = role === 'link' && DETAIL_HREF_MARKERS.some(m => rawHref.includes(m))
    if (!textMatch && !hrefMatch) return

    const href = resolveHref(rawHref, pageUrl)
    if (href) {
      if (seenHrefs.has(href)) return
      seenHrefs.add(href)
      out.push({ href, displayText: text, score: 0, order: out.length })
      return
    }
    if (!textMatch) return
    out.push({ href: null, displayText: text, score: 0, order: out.length, clickTarget: { role, nth: ordinal } })
  })

  return out
}

/** A results list (possibly empty) or any detail control is on the page */
export function hasResultsSignal(html: string, pageUrl = 'https://localhost/'): boolean {
  const $ = loadHtml(html)
  if ($(RESULTS_CONTAINER).length > 0) return true
  return collectCandidates(html, pageUrl).length > 0
}

// ── Scoring ───────────────────────────────────────────────────────────────────

/** Lower-case, letters and spaces only, whitespace collapsed */
export function normalizeName(s: string | null | undefined): string {
  return (s ?? '')
    .toLowerCase()
    .replace(/[^a-z\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

function containsName(haystack: Set<string>, name: string): boolean {
  const parts = normalizeName(name).split(' ').filter(Boolean)
  return parts.length > 0 && parts.every(p => haystack.has(p))
}

function tokenSet(s: string | null | undefined): Set<string> {
  return new Set(normalizeName(s).split(' ').filter(Boolean))
}

export function scoreCandidate(candidate: CandidateLink, first: string, last: string): number {
  const text = tokenSet(candidate.displayText)
  const href = tokenSet(candidate.href)

  let score = 0
  const firstInText = containsName(text, first)
  const lastInText = containsName(text, last)
  if (firstInText && lastInText) score += 2
  else if (firstInText || lastInText) score += 1

  if (containsName(href, first) && containsName(href, last)) score += 1
  return score
}

/** Highest score wins; ties go to the earliest candidate */
export function pickBestCandidate(candidates: CandidateLink[], first: string, last: string): CandidateLink | null {
  let best: CandidateLink | null = null
  for (const c of candidates) {
    const scored = { ...c, score: scoreCandidate(c, first, last) }
    if (!best || scored.score > best.score) best = scored
  }
  return best
}

// ── Session wrappers ──────────────────────────────────────────────────────────

export interface SelectOptions {
  /** Settle delay after scrolling, before reading the page */
  settleMs?: number
  scrollSteps?: number
  log?: Log
}

/**
 * Scroll to reveal lazy rows, then pick the best candidate on the current page.
 * Null means the runner should hand the record to the operator.
 */
export async function selectBestDetailLink(
  session: BrowserSession,
  first: string,
  last: string,
  opts: SelectOptions = {},
): Promise<CandidateLink | null> {
  const log = opts.log ?? silentLog

  await session.scrollToBottom(opts.scrollSteps ?? 3)
  await session.wait(opts.settleMs ?? 800)

  const { html, url } = await session.snapshot()
  const candidates = collectCandidates(html, url)
  if (candidates.length === 0) {
    log(`${TAG} ⚠ no detail links on ${url}`)
    return null
  }

  const best = pickBestCandidate(candidates, first, last)
  if (best) {
    log(`${TAG} ${candidates.length} candidate(s); chose "${best.displayText || best.href}" (score ${best.score})`)
  }
  return best
}

/** Poll the current page for a results signal; false once `timeoutMs` has passed */
export async function waitForResults(
  session: BrowserSession,
  timeoutMs: number,
  clock: () => number = Date.now,
): Promise<boolean> {
  const deadline = clock() + timeoutMs
  for (;;) {
    const { html, url } = await session.snapshot()
    if (hasResultsSignal(html, url)) return true
    const remaining = deadline - clock()
    if (remaining <= 0) return false
    await session.wait(Math.min(RESULTS_POLL_MS, remaining))
  }
}

export interface OpenedCandidate {
  url: string
  gateSeen: boolean
}

/**
 * Follow a chosen candidate: navigate to its href through the gate protocol,
 * or click it when it only exists as a script-driven control.
 * Returns null when the click found nothing to press.
 */
export async function openCandidate(
  session: BrowserSession,
  candidate: CandidateLink,
  opts: GateWaitOptions,
): Promise<OpenedCandidate | null> {
  const log = opts.log ?? silentLog

  if (candidate.href) {
    const { gateSeen } = await openWithGate(session, candidate.href, opts)
    return { url: candidate.href, gateSeen }
  }

  if (!candidate.clickTarget) return null
  const { role, nth } = candidate.clickTarget
  const clicked = await session.clickNthByText(role, VIEW_DETAILS_PATTERN, nth)
  if (!clicked) {
    log(`${TAG} ⚠ could not click ${role} #${nth + 1} "${candidate.displayText}"`)
    return null
  }

  const { url } = await session.snapshot()
  const { gateSeen } = await passGate(session, url, opts)
  const after = await session.snapshot()
  return { url: after.url, gateSeen }
}
