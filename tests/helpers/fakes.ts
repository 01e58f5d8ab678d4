import type { BrowserSession, ClickRole, PageSnapshot } from '../../src/crawler/browser-session'
import type { OperatorResponder } from '../../src/enrich/operator'
import type { OperatorPrompt, OperatorReply } from '../../src/shared-types'

/** Markup for a URL; functions see how long the page has been open (virtual ms) */
export type FakePage = string | ((openForMs: number) => string)

const NOT_FOUND = '<html><body><p>404</p></body></html>'

/**
 * In-process BrowserSession over scripted markup. Time is virtual: wait()
 * advances `now`, and `clock` reads it.
 */
export class FakeSession implements BrowserSession {
  now = 0
  readonly clock = () => this.now

  readonly visits: string[] = []
  /** URLs whose navigation throws, the way a dropped connection does */
  readonly failingUrls = new Set<string>()
  readonly captures: string[] = []
  closed = false

  private url = 'about:blank'
  private page: FakePage = '<html><body></body></html>'
  private openedAt = 0

  constructor(
    private readonly pages: Record<string, FakePage> = {},
    /** "button:0" → URL the click navigates to */
    private readonly clickTargets: Record<string, string> = {},
  ) {}

  async navigate(url: string): Promise<void> {
    this.visits.push(url)
    if (this.failingUrls.has(url)) throw new Error(`net::ERR_CONNECTION_RESET at ${url}`)
    this.show(url, this.pages[url] ?? NOT_FOUND)
  }

  /** Put a page in front of the session, the way an operator would by hand */
  show(url: string, page: FakePage): void {
    this.url = url
    this.page = page
    this.openedAt = this.now
  }

  async snapshot(): Promise<PageSnapshot> {
    const html = typeof this.page === 'string' ? this.page : this.page(this.now - this.openedAt)
    return { html, url: this.url }
  }

  async scrollToBottom(): Promise<void> {}

  async clickAllByText(): Promise<number> {
    return 0
  }

  async clickNthByText(role: ClickRole, _pattern: RegExp, nth: number): Promise<boolean> {
    const target = this.clickTargets[`${role}:${nth}`]
    if (!target) return false
    await this.navigate(target)
    return true
  }

  async dismissPopups(): Promise<number> {
    return 0
  }

  async screenshot(filePath: string): Promise<void> {
    this.captures.push(filePath)
  }

  async dumpHtml(filePath: string): Promise<void> {
    this.captures.push(filePath)
  }

  async wait(ms: number): Promise<void> {
    this.now += ms
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

export type ScriptedReply = OperatorReply | ((prompt: OperatorPrompt) => OperatorReply)

/** Answers prompts from a fixed script; 'skip' once the script runs out */
export class ScriptedOperator implements OperatorResponder {
  readonly prompts: OperatorPrompt[] = []
  readonly notices: string[] = []

  constructor(private readonly replies: ScriptedReply[] = []) {}

  async ask(prompt: OperatorPrompt): Promise<OperatorReply> {
    this.prompts.push(prompt)
    const next = this.replies.shift() ?? 'skip'
    return typeof next === 'function' ? next(prompt) : next
  }

  notify(message: string): void {
    this.notices.push(message)
  }
}

// ── Page fixtures ─────────────────────────────────────────────────────────────

export const CHALLENGE_PAGE = `<html><head><title>Just a moment...</title></head>
<body><div id="challenge-running">Checking your browser before accessing the site.</div></body></html>`

export const BLOCKED_PAGE = `<html><head><title>Denied</title></head>
<body><h1>Access Denied</h1><p>You don't have permission to access this server.</p></body></html>`

export function resultsPage(cards: Array<{ name: string; href: string }>): string {
  const items = cards
    .map(c => `<div class="card"><h2>${c.name}</h2><a href="${c.href}">View Free Details</a></div>`)
    .join('\n')
  return `<html><body><header class="navbar">PeopleSearch</header>
<div id="results">${items || '<p>We could not find any records for that search.</p>'}</div>
</body></html>`
}

const slug = (s: string) => s.toLowerCase().replace(/\W+/g, '-')

/** Detail page in the site's own markup: id'd boxes and title-marked anchors */
export function detailPage(opts: { name: string; age: number; phones: string[]; address: string; relatives?: string[] }): string {
  const phones = opts.phones
    .map(p => `<a href="/${p.replace(/\D/g, '')}" title="Search people associated with the phone number ${p}">${p}</a>`)
    .join('<br>')
  const relatives = (opts.relatives ?? [])
    .map((r, i) => `<a href="/${slug(r)}_id_G-${i + 1}" title="Details for ${r}">${r}</a>`)
    .join('')
  return `<html><body><header class="navbar">PeopleSearch</header>
<h1>${opts.name}</h1>
<h2 id="age-header">Age ${opts.age}</h2>
<div id="current_address_section"><h3>Current Address</h3>
<a href="/address/${slug(opts.address)}" title="Search people living at ${opts.address}">${opts.address}</a></div>
<div id="phone_number_section"><h3>Phone Numbers</h3>${phones}</div>
<div id="relative-links"><h3>Possible Relatives</h3>${relatives}</div>
</body></html>`
}
