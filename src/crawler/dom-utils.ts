/**
 * dom-utils.ts
 *
 * Shared cheerio helpers for working on captured page markup. Classification,
 * candidate selection and extraction all run on a static HTML snapshot so they
 * can be exercised without a browser.
 */

import * as cheerio from 'cheerio'
import type { Cheerio } from 'cheerio'
import type { Element } from 'domhandler'

export type Doc = cheerio.CheerioAPI
export type Nodes = Cheerio<Element>

export function loadHtml(html: string): Doc {
  return cheerio.load(html ?? '')
}

/** Collapse runs of whitespace into single spaces */
export function cleanText(s: string | null | undefined): string {
  return (s ?? '').replace(/\s+/g, ' ').trim()
}

/**
 * Visible text of the document: title + body, scripts and styles removed.
 * Block elements get a trailing space so words from adjacent elements do not
 * run together.
 */
export function visibleText($: Doc): string {
  const clone = cheerio.load($.html())
  clone('script, style, noscript, template, svg').remove()
  clone('br, p, div, li, tr, h1, h2, h3, h4, h5, h6, section, dd, dt').each((_, el) => {
    clone(el).append(' ')
  })
  const title = clone('title').text()
  const body = clone('body').length > 0 ? clone('body').text() : clone.root().text()
  return cleanText(`${title} ${body}`)
}

/** Same as visibleText but keeps line structure (one line per block element) */
export function visibleLines($: Doc): string[] {
  const clone = cheerio.load($.html())
  clone('script, style, noscript, template, svg').remove()
  clone('br, p, div, li, tr, h1, h2, h3, h4, h5, h6, section, dd, dt').each((_, el) => {
    clone(el).append('\n')
  })
  const body = clone('body').length > 0 ? clone('body').text() : clone.root().text()
  return body
    .split('\n')
    .map(line => cleanText(line))
    .filter(line => line.length > 0)
}

/** Resolve an href against the page URL; null for javascript:, #fragments and junk */
export function resolveHref(href: string | undefined, pageUrl: string): string | null {
  const raw = (href ?? '').trim()
  if (!raw || raw.startsWith('#') || /^javascript:/i.test(raw)) return null
  try {
    return new URL(raw, pageUrl).toString()
  } catch {
    return null
  }
}

/** Order-preserving dedupe of trimmed, non-empty strings */
export function dedupePreserveOrder(items: Iterable<string | null | undefined>, key: (s: string) => string = s => s): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const item of items) {
    const value = cleanText(item)
    if (!value) continue
    const k = key(value)
    if (seen.has(k)) continue
    seen.add(k)
    out.push(value)
  }
  return out
}
