/**
 * session-driver.ts
 *
 * Playwright-backed BrowserSession.
 *
 * acquireSession first attaches over CDP to a browser already listening on the
 * debug port (normally the operator's own profile) and only spawns one, with
 * that port open, when nothing answers.
 */

import { spawn, type ChildProcess } from 'child_process'
import { mkdir, writeFile } from 'fs/promises'
import path from 'path'
import { setTimeout as delay } from 'timers/promises'
import { chromium, errors, type Browser, type Locator, type Page } from 'playwright'
import { z } from 'zod'
import type { BrowserSession, ClickRole, PageSnapshot } from './browser-session'
import { dismissPopups } from './popup-handler'
import { scrollToBottom } from './scroll-trigger'
import { loadHtml } from './dom-utils'
import type { EnrichConfig } from '../config'
import { SessionInitError } from '../errors'
import { silentLog, type Log } from '../logger'

const TAG = '[session-driver]'

const ATTACH_TIMEOUT_MS = 10_000
const ATTACH_ATTEMPTS = 6
const ATTACH_RETRY_DELAY_MS = 1_500
const SNAPSHOT_ATTEMPTS = 3
const CLICK_TIMEOUT_MS = 2_000

// ── Session ───────────────────────────────────────────────────────────────────

export class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly spawned: ChildProcess | null,
    private readonly log: Log = silentLog,
  ) {}

  async navigate(url: string): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded' })
    } catch (err) {
      // Challenge interstitials often never fire DOMContentLoaded; content polling decides
      if (!(err instanceof errors.TimeoutError)) throw err
      this.log(`${TAG} ⚠ load timeout for ${url}, continuing with partial page`)
    }
  }

  async snapshot(): Promise<PageSnapshot> {
    let lastErr: unknown
    for (let i = 0; i < SNAPSHOT_ATTEMPTS; i++) {
      try {
        return { html: await this.page.content(), url: this.page.url() }
      } catch (err) {
        // "Execution context was destroyed" while a navigation commits
        lastErr = err
        await this.page.waitForTimeout(300)
      }
    }
    throw lastErr
  }

  scrollToBottom(steps: number): Promise<void> {
    return scrollToBottom(this.page, steps, this.log)
  }

  async clickAllByText(role: ClickRole, pattern: RegExp): Promise<number> {
    const matches = this.page.getByRole(role, { name: pattern })
    const count = await matches.count()
    let clicked = 0
    for (let i = 0; i < count; i++) {
      if (await clickWithFallback(matches.nth(i))) clicked++
    }
    return clicked
  }

  async clickNthByText(role: ClickRole, pattern: RegExp, nth: number): Promise<boolean> {
    const matches = this.page.getByRole(role, { name: pattern })
    if ((await matches.count()) <= nth) return false
    return clickWithFallback(matches.nth(nth))
  }

  dismissPopups(): Promise<number> {
    return dismissPopups(this.page, this.log)
  }

  async screenshot(filePath: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true })
    await this.page.screenshot({ path: filePath, fullPage: true })
  }

  async dumpHtml(filePath: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true })
    await writeFile(filePath, await this.page.content(), 'utf-8')
  }

  wait(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms)
  }

  async close(): Promise<void> {
    // On an attached browser this only disconnects; the operator's window stays open
    await this.browser.close().catch(err => {
      this.log(`${TAG} ⚠ browser close failed: ${(err as Error).message}`)
    })
    if (this.spawned && this.spawned.exitCode === null) {
      this.spawned.kill()
    }
  }
}

/** Native click first, then a script-dispatched click for controls covered by overlays */
async function clickWithFallback(target: Locator): Promise<boolean> {
  const visible = await target.isVisible().catch(() => false)
  if (!visible) return false
  await target.scrollIntoViewIfNeeded({ timeout: CLICK_TIMEOUT_MS }).catch(() => undefined)
  try {
    await target.click({ timeout: CLICK_TIMEOUT_MS })
    return true
  } catch {
    return target.dispatchEvent('click').then(() => true, () => false)
  }
}

// ── Acquisition ───────────────────────────────────────────────────────────────

async function attach(config: EnrichConfig, spawned: ChildProcess | null, log: Log): Promise<PlaywrightSession> {
  const endpoint = `http://127.0.0.1:${config.browser.remoteDebugPort}`
  const browser = await chromium.connectOverCDP(endpoint, { timeout: ATTACH_TIMEOUT_MS })
  const context = browser.contexts()[0] ?? await browser.newContext()
  const page = context.pages()[0] ?? await context.newPage()
  page.setDefaultNavigationTimeout(config.browser.pageLoadTimeoutMs)
  log(`${TAG} attached to browser at ${endpoint}`)
  return new PlaywrightSession(browser, page, spawned, log)
}

function spawnBrowser(config: EnrichConfig, log: Log): ChildProcess {
  const executable = config.browser.executablePath ?? chromium.executablePath()
  const args = [
    `--remote-debugging-port=${config.browser.remoteDebugPort}`,
    `--user-data-dir=${config.browser.userDataDir}`,
    `--profile-directory=${config.browser.profileDir}`,
    '--no-first-run',
    '--no-default-browser-check',
    '--new-window',
  ]
  log(`${TAG} launching ${executable}`)
  const child = spawn(executable, args, { stdio: 'ignore' })
  child.on('error', err => log(`${TAG} ✖ browser process error: ${err.message}`))
  return child
}

/**
 * Attach to a running browser, or spawn one on the debug port and attach.
 * Throws SessionInitError when neither works.
 */
export async function acquireSession(config: EnrichConfig, log: Log = silentLog): Promise<PlaywrightSession> {
  try {
    return await attach(config, null, log)
  } catch (err) {
    log(`${TAG} no browser on port ${config.browser.remoteDebugPort} (${(err as Error).message.split('\n')[0]})`)
  }

  let child: ChildProcess
  try {
    child = spawnBrowser(config, log)
  } catch (err) {
    throw new SessionInitError('Could not launch the browser', err)
  }

  let lastErr: unknown
  for (let i = 1; i <= ATTACH_ATTEMPTS; i++) {
    await delay(ATTACH_RETRY_DELAY_MS)
    if (child.exitCode !== null) break
    try {
      return await attach(config, child, log)
    } catch (err) {
      lastErr = err
      log(`${TAG} attach attempt ${i}/${ATTACH_ATTEMPTS} failed`)
    }
  }

  if (child.exitCode === null) child.kill()
  throw new SessionInitError(
    `Could not attach to a browser on port ${config.browser.remoteDebugPort}`,
    lastErr,
  )
}

// ── Diagnostics ───────────────────────────────────────────────────────────────

const IP_INFO_URL = 'https://ipinfo.io/json'

const IpInfoSchema = z.object({
  ip: z.string(),
  city: z.string().optional(),
  region: z.string().optional(),
  country: z.string().optional(),
})

/** Log the exit IP the browser presents to sites. Never throws. */
export async function checkExitIp(session: BrowserSession, log: Log): Promise<void> {
  try {
    await session.navigate(IP_INFO_URL)
    const { html } = await session.snapshot()
    const $ = loadHtml(html)
    const body = ($('pre').first().text() || $('body').text()).trim()
    const info = IpInfoSchema.parse(JSON.parse(body))
    const where = [info.city, info.region, info.country].filter(Boolean).join(', ')
    log(`${TAG} exit IP ${info.ip}${where ? ` (${where})` : ''}`)
  } catch (err) {
    log(`${TAG} ⚠ IP check failed: ${(err as Error).message}`)
  }
}

/**
 * Write `<stub>_<phase>.html` and `.png` under `dir`. Failures are logged
 * and ignored.
 */
export async function captureDiagnostics(
  session: BrowserSession,
  dir: string,
  stub: string,
  phase: string,
  log: Log,
): Promise<void> {
  const base = path.join(dir, `${stub}_${phase}`)
  try {
    await session.dumpHtml(`${base}.html`)
  } catch (err) {
    log(`${TAG} ⚠ html capture failed (${phase}): ${(err as Error).message}`)
  }
  try {
    await session.screenshot(`${base}.png`)
  } catch (err) {
    log(`${TAG} ⚠ screenshot failed (${phase}): ${(err as Error).message}`)
  }
}
