/**
 * scroll-trigger.ts
 *
 * Scrolls a Playwright page to the bottom so lazily rendered result cards and
 * detail sections mount before the page is captured. Stops early once the
 * document height stops growing.
 */

import type { Page } from 'playwright'
import type { Log } from '../logger'

const TAG = '[scroll-trigger]'

/** ms to wait after each jump for lazy loaders */
const STEP_DELAY_MS = 600

export async function scrollToBottom(page: Page, steps: number, log: Log): Promise<void> {
  try {
    let prevHeight = await page.evaluate(() => document.documentElement.scrollHeight)

    for (let step = 1; step <= steps; step++) {
      await page.evaluate(() => window.scrollTo(0, document.documentElement.scrollHeight))
      await page.waitForTimeout(STEP_DELAY_MS)

      const height = await page.evaluate(() => document.documentElement.scrollHeight)
      if (height <= prevHeight) {
        log(`${TAG} height settled at ${height} after ${step} step(s)`)
        break
      }
      log(`${TAG} step ${step}: height grew ${prevHeight} → ${height}`)
      prevHeight = height
    }
  } catch (err) {
    log(`${TAG} ⚠ scroll failed: ${(err as Error).message}`)
  }
}
