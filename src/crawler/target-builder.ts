/**
 * target-builder.ts
 *
 * Turns a (first, last, address, postal code) tuple into the people-search
 * URL for that name, plus the small name helpers the runner needs before a
 * record is worth searching at all.
 *
 * URL shape: <base>/name/<first>-<last>_<location>
 *   location = 5-digit postal code, else "City-ST" from the address, else ''
 */

export const DEFAULT_SEARCH_BASE = 'https://www.fastpeoplesearch.com'

// Trailing ", City, ST" or ", City, ST, 12345"
const CITY_STATE_RE = /,\s*([^,]+),\s*([A-Z]{2})(?:,\s*\d{5})?$/i

const COMPOSITE_MARKERS = [
  ' & ',
  ' and ',
  ' revocable trust',
  ' trust of ',
  ' trustees',
  ' survivors',
  ' llc',
  ' inc',
]

/** Keep letters, spaces and hyphens only */
export function sanitizeNamePart(raw: string | null | undefined): string {
  return (raw ?? '').replace(/[^A-Za-z\- ]/g, '').trim()
}

function nameSegment(raw: string): string {
  return encodeURIComponent(sanitizeNamePart(raw).replace(/\s+/g, '-'))
}

/** "123 Main St, Kansas City, mo" -> "Kansas-City-MO" */
export function toCityStateSlug(address: string | null | undefined): string | null {
  if (typeof address !== 'string') return null
  const m = address.trim().match(CITY_STATE_RE)
  if (!m) return null
  const city = m[1].trim().replace(/\s+/g, '-')
  return `${city}-${m[2].toUpperCase()}`
}

/**
 * Spreadsheet cells often hand ZIPs back as numbers ("10001.0") or ZIP+4.
 * Returns undefined for blanks.
 */
export function normalizePostalCode(raw: string | number | null | undefined): string | undefined {
  if (raw === null || raw === undefined) return undefined
  let s = String(raw).trim()
  if (!s || s.toLowerCase() === 'nan') return undefined
  if (/^\d+\.0+$/.test(s)) s = s.replace(/\.0+$/, '')
  return s
}

export function buildSearchUrl(
  first: string,
  last: string,
  address?: string | null,
  postalCode?: string | null,
  baseUrl: string = DEFAULT_SEARCH_BASE,
): string {
  let where: string | null = null
  if (typeof postalCode === 'string' && postalCode.trim()) {
    where = postalCode.trim().slice(0, 5)
  }
  if (!where) where = toCityStateSlug(address)

  const base = baseUrl.replace(/\/+$/, '')
  return `${base}/name/${nameSegment(first)}-${nameSegment(last)}_${encodeURIComponent(where ?? '')}`
}

/** Trust / organisation / couple names that never map to a single person card */
export function looksLikeCompositeName(name: string | null | undefined): boolean {
  const s = (name ?? '').toLowerCase()
  return COMPOSITE_MARKERS.some(marker => s.includes(marker))
}

function stubPart(s: string): string {
  return s.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '')
}

/** Stable per-record file stub for diagnostic captures, e.g. 00042_john_smith */
export function recordStub(first: string, last: string, rowIndex: number): string {
  return `${String(rowIndex).padStart(5, '0')}_${stubPart(first)}_${stubPart(last)}`
}
