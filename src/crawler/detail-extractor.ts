/**
 * detail-extractor.ts
 *
 * Confirms that the current page is a person detail page and pulls the
 * enrichment fields out of it.
 *
 * Each field is an ordered list of strategies over the captured markup. A
 * strategy returns a value or undefined; the first non-empty answer wins
 * (emails merge every source). A strategy that throws is logged and counted
 * as empty, so one odd page section never loses the rest of the record.
 */

import type { Element } from 'domhandler'
import type { BrowserSession } from './browser-session'
import { cleanText, dedupePreserveOrder, loadHtml, visibleLines, visibleText, type Doc, type Nodes } from './dom-utils'
import { RESULTS_CONTAINER, VIEW_DETAILS_PATTERN } from './candidate-selector'
import { classifyContent } from './gate-monitor'
import type { ClickRole, EnrichedFields } from '../shared-types'
import { silentLog, type Log } from '../logger'

const TAG = '[detail-extractor]'

const MAX_PHONES = 5

const SEP = '[\\s\\-.\\u2011-\\u2014]?'
const PHONE_SOURCE = `(?<!\\d)(?:\\+?1${SEP})?\\(?\\d{3}\\)?${SEP}\\d{3}${SEP}\\d{4}(?!\\d)`
const EMAIL_SOURCE = '[A-Z0-9._%+-]+@[A-Z0-9.-]+\\.[A-Z]{2,}'

const phoneRe = () => new RegExp(PHONE_SOURCE, 'g')
const emailRe = () => new RegExp(EMAIL_SOURCE, 'gi')

// Site markup: title-marked anchors and id'd boxes
const AGE_HEADER = '#age-header'
const TITLED_PHONE_LINKS = 'a[title*="phone number"]'
const PHONE_LINKS = `${TITLED_PHONE_LINKS}, a[href^="tel:"], a[href*="/phone/"]`
const HOME_ADDRESS_LINKS = 'a[title*="Search people living at"]'
const PREVIOUS_ADDRESS_LINKS = '#previous-addresses a'
const ADDRESS_LINKS = 'a[href*="/address/"]'
const TITLED_PERSON_LINKS = 'a[title*="Details for"]'
const RELATIVE_BOX = '#relative-links'
const ASSOCIATE_BOX = '#associate-links'
const REPORT_SECTIONS = '#background-report, #faqs'

/** "/jane-doe_id_G-111", "/name/jane-doe", "/people/..." */
const PERSON_HREF = /_id_|\/(?:name|person|people)\//i
const SECTION_CONTAINERS = new Set(['div', 'section', 'ul', 'ol'])

const RELATIVE_KEYWORDS = ['possible relatives', 'relatives']
const ASSOCIATE_KEYWORDS = ['associated people', 'associates']
const BACKGROUND_KEYWORDS = ['background report', 'background check']

// ── Normalisers ───────────────────────────────────────────────────────────────

/**
 * 10-digit North American numbers as "(NNN) NNN-NNNN"; a leading country 1 is
 * dropped. Anything else is rejected.
 */
export function normalizePhone(raw: string | null | undefined): string | null {
  let digits = (raw ?? '').replace(/\D/g, '')
  if (digits.length === 11 && digits.startsWith('1')) digits = digits.slice(1)
  if (digits.length !== 10) return null
  return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`
}

/**
 * Decode an obfuscated address of the form <key><byte>..., every byte XORed
 * with the leading key byte.
 */
export function decodeProtectedEmail(hex: string | null | undefined): string | null {
  const h = (hex ?? '').trim()
  if (h.length < 4 || h.length % 2 !== 0 || !/^[0-9a-f]+$/i.test(h)) return null
  const key = parseInt(h.slice(0, 2), 16)
  let out = ''
  for (let i = 2; i < h.length; i += 2) {
    out += String.fromCharCode(parseInt(h.slice(i, i + 2), 16) ^ key)
  }
  return out
}

// ── Confirmation ──────────────────────────────────────────────────────────────

/** A results container listing more than one detail link */
function isResultsListing($: Doc): boolean {
  const links = $(RESULTS_CONTAINER).find('a').filter((_, a) => {
    const node = $(a)
    return VIEW_DETAILS_PATTERN.test(cleanText(node.text())) || PERSON_HREF.test(node.attr('href') ?? '')
  })
  return links.length > 1
}

/** One signal per entry, whatever the number of matches */
const DETAIL_MARKERS = [
  AGE_HEADER,
  `${RELATIVE_BOX} ${TITLED_PERSON_LINKS}, ${ASSOCIATE_BOX} ${TITLED_PERSON_LINKS}`,
  TITLED_PHONE_LINKS,
  HOME_ADDRESS_LINKS,
  REPORT_SECTIONS,
]

/**
 * A detail page carries at least `minSignals` of the structural markers.
 * Challenge, block and results-list pages never qualify.
 */
export function confirmDetailPage(html: string, minSignals = 2): boolean {
  const cls = classifyContent(html)
  if (cls.kind === 'challenge' || cls.kind === 'blocked') return false

  const $ = loadHtml(html)
  if (isResultsListing($)) return false

  const signals = DETAIL_MARKERS.filter(sel => $(sel).length > 0).length
  return signals >= Math.max(1, minSignals)
}

// ── Strategy plumbing ─────────────────────────────────────────────────────────

interface PageView {
  $: Doc
  text: string
  lines: string[]
  url: string
}

interface Strategy<T> {
  name: string
  run: (page: PageView) => T | undefined
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return true
  if (typeof value === 'string') return value.trim().length === 0
  if (Array.isArray(value)) return value.length === 0
  return false
}

function attempt<T>(field: string, strategy: Strategy<T>, page: PageView, log: Log): T | undefined {
  try {
    return strategy.run(page)
  } catch (err) {
    log(`${TAG} ${field}/${strategy.name} failed: ${(err as Error).message}`)
    return undefined
  }
}

function firstOf<T>(field: string, strategies: Strategy<T>[], page: PageView, log: Log): T | undefined {
  for (const strategy of strategies) {
    const value = attempt(field, strategy, page, log)
    if (!isEmpty(value)) return value
  }
  return undefined
}

function mergeOf(field: string, strategies: Strategy<string[]>[], page: PageView, log: Log): string[] {
  return strategies.flatMap(s => attempt(field, s, page, log) ?? [])
}

// ── Section helpers ───────────────────────────────────────────────────────────

/** First div/section/ul/ol after `heading` in document order, outside the heading itself */
function containerAfter($: Doc, heading: Nodes): Nodes | null {
  const all = $<Element, string>('*').toArray()
  const headEl = heading.get(0)
  if (!headEl) return null
  const start = all.indexOf(headEl)
  for (let i = start + 1; i < all.length; i++) {
    const el = all[i]
    if (!SECTION_CONTAINERS.has(el.tagName.toLowerCase())) continue
    if (heading.find(el).length > 0) continue
    return $(el)
  }
  return null
}

function sectionsFor($: Doc, keywords: string[]): Nodes[] {
  const out: Nodes[] = []
  $('h1, h2, h3, h4, h5, h6').each((_, el) => {
    const heading = $(el)
    const text = cleanText(heading.text()).toLowerCase()
    if (!keywords.some(k => text.includes(k))) return
    const container = containerAfter($, heading)
    if (container) out.push(container)
  })
  return out
}

function personNames($: Doc, links: Nodes): string[] {
  const names: string[] = []
  links.each((_, a) => {
    const text = cleanText($(a).text())
    if (text && !text.toLowerCase().includes('detail')) names.push(text)
  })
  return dedupePreserveOrder(names)
}

function peopleInSections($: Doc, keywords: string[]): string[] {
  return dedupePreserveOrder(sectionsFor($, keywords).flatMap(container =>
    personNames($, container.find('a').filter((_, a) => PERSON_HREF.test($(a).attr('href') ?? ''))),
  ))
}

function peopleStrategies(box: string, keywords: string[]): Strategy<string[]>[] {
  return [
    { name: 'titled-links', run: ({ $ }) => personNames($, $(box).find(TITLED_PERSON_LINKS)) },
    { name: 'box-links', run: ({ $ }) => personNames($, $(box).find('a').filter((_, a) => PERSON_HREF.test($(a).attr('href') ?? ''))) },
    { name: 'heading-sections', run: ({ $ }) => peopleInSections($, keywords) },
  ]
}

function linkTexts($: Doc, selector: string): string[] {
  return dedupePreserveOrder($(selector).toArray().map(a => $(a).text()))
}

function textOf($: Doc, selector: string): string | undefined {
  const node = $(selector).first()
  if (node.length === 0) return undefined
  return cleanText(node.text()) || undefined
}

function phonesIn(s: string): string[] {
  return s.match(phoneRe()) ?? []
}

function canonicalPhones(raw: string[]): string[] {
  return dedupePreserveOrder(raw.map(normalizePhone))
}

// ── Field strategies ──────────────────────────────────────────────────────────

const phoneStrategies: Strategy<string[]>[] = [
  {
    name: 'phone-links',
    run: ({ $ }) => {
      const raw: string[] = []
      $(PHONE_LINKS).each((_, a) => {
        const node = $(a)
        const text = cleanText(node.text())
        const href = node.attr('href') ?? ''
        const found = phonesIn(text || href)
        if (found.length > 0) raw.push(...found)
        else if (href.toLowerCase().startsWith('tel:')) raw.push(href.slice(4))
      })
      return canonicalPhones(raw)
    },
  },
  { name: 'text-pattern', run: ({ text }) => canonicalPhones(phonesIn(text)) },
]

const emailStrategies: Strategy<string[]>[] = [
  {
    name: 'protected-markup',
    run: ({ $ }) => {
      const hexes: string[] = []
      $('[data-cfemail]').each((_, el) => {
        hexes.push($(el).attr('data-cfemail') ?? '')
      })
      $('a[href*="/cdn-cgi/l/email-protection#"]').each((_, el) => {
        hexes.push(($(el).attr('href') ?? '').split('#')[1] ?? '')
      })
      return hexes
        .map(decodeProtectedEmail)
        .filter((e): e is string => e !== null && e.includes('@'))
    },
  },
  {
    name: 'mailto',
    run: ({ $ }) => {
      const out: string[] = []
      $('a[href^="mailto:" i]').each((_, a) => {
        const target = ($(a).attr('href') ?? '').slice('mailto:'.length).split('?')[0] ?? ''
        try {
          out.push(decodeURIComponent(target))
        } catch {
          out.push(target)
        }
      })
      return out
    },
  },
  { name: 'text-pattern', run: ({ text }) => text.match(emailRe()) ?? [] },
]

const homeAddressStrategies: Strategy<string>[] = [
  { name: 'home-address-link', run: ({ $ }) => textOf($, HOME_ADDRESS_LINKS) },
  { name: 'address-links', run: ({ $ }) => linkTexts($, ADDRESS_LINKS)[0] },
  {
    name: 'current-address-label',
    run: ({ lines }) => {
      for (let i = 0; i < lines.length; i++) {
        const m = lines[i].match(/current address\s*:?\s*(.*)$/i)
        if (!m) continue
        const rest = cleanText(m[1])
        if (rest) return rest
        return lines[i + 1]
      }
      return undefined
    },
  },
]

const previousAddressStrategies: Strategy<string[]>[] = [
  { name: 'previous-box', run: ({ $ }) => linkTexts($, PREVIOUS_ADDRESS_LINKS) },
  { name: 'address-links', run: ({ $ }) => linkTexts($, ADDRESS_LINKS).slice(1) },
]

const relativeStrategies = peopleStrategies(RELATIVE_BOX, RELATIVE_KEYWORDS)
const associateStrategies = peopleStrategies(ASSOCIATE_BOX, ASSOCIATE_KEYWORDS)

const ageStrategies: Strategy<string>[] = [
  { name: 'age-header', run: ({ $ }) => textOf($, AGE_HEADER)?.match(/\d{1,3}/)?.[0] },
  { name: 'age-label', run: ({ text }) => text.match(/\bage\s*:?\s*(\d{1,3})\b/i)?.[1] },
]

const maritalStrategies: Strategy<string>[] = [
  { name: 'marital-section', run: ({ $ }) => textOf($, '#marital_status_section p') },
  { name: 'marital-label', run: ({ text }) => text.match(/marital status\s*:?\s*([A-Za-z]+)/i)?.[1] },
]

const currentDetailsStrategies: Strategy<string>[] = [
  { name: 'current-details-section', run: ({ $ }) => textOf($, '#current-address-details') },
]

const backgroundStrategies: Strategy<string>[] = [
  { name: 'background-section', run: ({ $ }) => textOf($, '#background-report') },
  {
    name: 'background-heading',
    run: ({ $ }) => {
      const [container] = sectionsFor($, BACKGROUND_KEYWORDS)
      return container ? cleanText(container.text()) || undefined : undefined
    },
  },
  {
    name: 'background-line',
    run: ({ lines }) => lines.find(l => BACKGROUND_KEYWORDS.some(k => l.toLowerCase().includes(k))),
  },
]

const faqStrategies: Strategy<string>[] = [
  {
    name: 'faq-section',
    run: ({ $ }) => {
      const node = $('#faqs').first()
      if (node.length === 0) return undefined
      return visibleLines(loadHtml(node.html() ?? '')).join('\n') || undefined
    },
  },
  {
    name: 'faq-tail',
    run: ({ lines }) => {
      const start = lines.findIndex(l => /\bfaqs?\b|frequently asked questions/i.test(l))
      return start < 0 ? undefined : lines.slice(start).join('\n')
    },
  },
]

// ── Extraction ────────────────────────────────────────────────────────────────

export function extractDetail(html: string, url: string, log: Log = silentLog): EnrichedFields {
  const $ = loadHtml(html)
  const page: PageView = { $, text: visibleText($), lines: visibleLines($), url }

  const phones = (firstOf('phones', phoneStrategies, page, log) ?? []).slice(0, MAX_PHONES)

  const emails = dedupePreserveOrder(mergeOf('emails', emailStrategies, page, log), e => e.toLowerCase())

  const homeAddress = firstOf('homeAddress', homeAddressStrategies, page, log)
  const previousAddresses = (firstOf('previousAddresses', previousAddressStrategies, page, log) ?? [])
    .filter(a => a !== homeAddress)

  const fields: EnrichedFields = {
    homeAddress,
    phones,
    age: firstOf('age', ageStrategies, page, log),
    relatives: firstOf('relatives', relativeStrategies, page, log) ?? [],
    associates: firstOf('associates', associateStrategies, page, log) ?? [],
    emails,
    previousAddresses,
    maritalStatus: firstOf('maritalStatus', maritalStrategies, page, log),
    currentAddressDetails: firstOf('currentAddressDetails', currentDetailsStrategies, page, log),
    backgroundSummary: firstOf('backgroundSummary', backgroundStrategies, page, log),
    faqText: firstOf('faqText', faqStrategies, page, log),
    sourceUrl: url,
  }

  log(`${TAG} extracted ${fields.phones.length} phone(s), ${fields.emails.length} email(s), ` +
    `${fields.relatives.length} relative(s), ${fields.associates.length} associate(s)`)
  return fields
}

// ── Page driving ──────────────────────────────────────────────────────────────

/** Controls that reveal collapsed sections in place */
const EXPANDERS: { role: ClickRole; pattern: RegExp }[] = [
  { role: 'button', pattern: /show more/i },
  { role: 'link', pattern: /show more/i },
  { role: 'button', pattern: /expand/i },
  { role: 'link', pattern: /view full/i },
]

export async function expandHiddenSections(session: BrowserSession, log: Log = silentLog): Promise<number> {
  let clicked = 0
  for (const { role, pattern } of EXPANDERS) {
    clicked += await session.clickAllByText(role, pattern)
  }
  if (clicked > 0) {
    log(`${TAG} expanded ${clicked} section(s)`)
    await session.wait(600)
  }
  return clicked
}

export interface ScrapeOptions {
  detailWaitMs: number
  minSignals: number
  clock?: () => number
  log?: Log
}

export type ScrapeOutcome =
  | { ok: true; fields: EnrichedFields }
  | { ok: false; reason: string }

const CONFIRM_POLL_MS = 500

/**
 * Wait for the current page to look like a detail page, reveal collapsed
 * sections, then extract. An unconfirmed page is reported, not thrown.
 */
export async function scrapeCurrentPage(session: BrowserSession, opts: ScrapeOptions): Promise<ScrapeOutcome> {
  const log = opts.log ?? silentLog
  const clock = opts.clock ?? Date.now
  const deadline = clock() + opts.detailWaitMs

  for (;;) {
    const snap = await session.snapshot()
    if (confirmDetailPage(snap.html, opts.minSignals)) break
    const remaining = deadline - clock()
    if (remaining <= 0) {
      return { ok: false, reason: `Detail content not detected after waiting (URL: ${snap.url})` }
    }
    await session.wait(Math.min(CONFIRM_POLL_MS, remaining))
  }

  await session.dismissPopups()
  await expandHiddenSections(session, log)
  await session.scrollToBottom(2)
  await session.wait(CONFIRM_POLL_MS)

  const final = await session.snapshot()
  const cls = classifyContent(final.html)
  if (cls.kind === 'challenge') return { ok: false, reason: `Challenge appeared on detail page (${cls.signal})` }
  if (cls.kind === 'blocked') return { ok: false, reason: `Blocked on detail page (${cls.signal})` }
  if (!confirmDetailPage(final.html, opts.minSignals)) {
    return { ok: false, reason: `Detail content lost after expanding sections (URL: ${final.url})` }
  }

  return { ok: true, fields: extractDetail(final.html, final.url, log) }
}
