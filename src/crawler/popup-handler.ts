/**
 * popup-handler.ts
 *
 * Closes the overlays people-search pages put over a detail card:
 *  - cookie / privacy consent banners
 *  - "get the full report" upsell modals
 *  - app download prompts
 *
 * Called once the detail page is confirmed, before sections are expanded.
 */

import type { Page } from 'playwright'
import type { Log } from '../logger'

const TAG = '[popup-handler]'

// ── Selector catalog ──────────────────────────────────────────────────────────

/** Accept / close controls, tried in order */
const DISMISS_SELECTORS = [
  // Consent managers
  '#onetrust-accept-btn-handler',
  '#CybotCookiebotDialogBodyLevelButtonLevelOptinAllowAll',
  '.fc-cta-consent',
  '.qc-cmp2-summary-buttons button[mode="primary"]',
  'button[class*="cookie"][class*="accept" i]',
  'button[class*="consent"][class*="accept" i]',
  'button[id*="accept-cookie" i]',

  // Upsell / report modals
  '[class*="modal"] button[class*="close"]',
  '[class*="modal"] [aria-label="Close"]',
  '[class*="upsell"] [class*="close"]',
  '[data-dismiss="modal"]',

  // App banners
  '[class*="smart-banner"] [class*="close"]',
]

/** Wrappers that mean an overlay is still up */
const OVERLAY_SELECTORS = [
  '#onetrust-banner-sdk',
  '#CybotCookiebotDialog',
  '.fc-consent-root',
  '[class*="cookie-banner"]',
  '[class*="consent-banner"]',
  '.modal.show',
  '[class*="modal-backdrop"]',
]

const CLOSE_TEXTS = /^(accept|accept all|agree|i agree|ok|got it|no thanks|close|×|✕)$/i

// ── Helpers ───────────────────────────────────────────────────────────────────

async function clickIfVisible(page: Page, selector: string): Promise<boolean> {
  const el = page.locator(selector).first()
  const visible = await el.isVisible().catch(() => false)
  if (!visible) return false
  return el.click({ timeout: 2_000, force: true }).then(() => true, () => false)
}

async function overlayStillUp(page: Page): Promise<boolean> {
  for (const sel of OVERLAY_SELECTORS) {
    if (await page.locator(sel).first().isVisible().catch(() => false)) return true
  }
  return false
}

async function clickCloseText(page: Page): Promise<boolean> {
  const buttons = await page.getByRole('button', { name: CLOSE_TEXTS }).all()
  for (const btn of buttons) {
    if (!(await btn.isVisible().catch(() => false))) continue
    if (await btn.click({ timeout: 2_000 }).then(() => true, () => false)) return true
  }
  return false
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Dismiss whatever overlays are showing. Safe to call on any page.
 * @returns number of overlays closed
 */
export async function dismissPopups(page: Page, log: Log): Promise<number> {
  let dismissed = 0

  for (const sel of DISMISS_SELECTORS) {
    if (await clickIfVisible(page, sel)) {
      dismissed++
      log(`${TAG} dismissed overlay via: ${sel}`)
      await page.waitForTimeout(300)
    }
  }

  if (await overlayStillUp(page)) {
    if (await clickCloseText(page)) {
      dismissed++
      log(`${TAG} dismissed overlay via close text`)
    } else {
      await page.keyboard.press('Escape').catch(() => undefined)
      log(`${TAG} ⚠ overlay still visible, sent Escape`)
    }
  }

  return dismissed
}
