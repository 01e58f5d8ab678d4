/**
 * browser-session.ts
 *
 * The only browser I/O the crawler components use. The Playwright-backed
 * implementation lives in session-driver.ts; tests substitute an in-process
 * fake that serves scripted markup.
 */

import type { ClickRole } from '../shared-types'

export type { ClickRole }

export interface PageSnapshot {
  html: string
  url: string
}

export interface BrowserSession {
  /** Load `url`. Slow loads are not an error; callers poll content instead. */
  navigate(url: string): Promise<void>
  snapshot(): Promise<PageSnapshot>
  /** Scroll to the bottom up to `steps` times, stopping once the height settles */
  scrollToBottom(steps: number): Promise<void>
  /**
   * Click every visible control of `role` whose text matches `pattern`.
   * Each click falls back to a script-dispatched click. Returns how many clicks landed.
   */
  clickAllByText(role: ClickRole, pattern: RegExp): Promise<number>
  /** Click the nth (0-based, document order) control of `role` matching `pattern` */
  clickNthByText(role: ClickRole, pattern: RegExp, nth: number): Promise<boolean>
  /** Dismiss cookie / consent overlays; returns how many were closed */
  dismissPopups(): Promise<number>
  screenshot(filePath: string): Promise<void>
  dumpHtml(filePath: string): Promise<void>
  wait(ms: number): Promise<void>
  close(): Promise<void>
}
