/**
 * record-store.ts
 *
 * The in-memory record table and everything that touches disk for it:
 * loading CSV/XLSX input, checkpointing back to the input file, end-of-run
 * backups, and the emergency dump written when a batch dies.
 *
 * Every write goes to `<path>.tmp` first and is renamed into place, so an
 * interrupted run never leaves a half-written file behind.
 */

import fs from 'fs'
import path from 'path'
import ExcelJS from 'exceljs'
import Papa from 'papaparse'
import { ENRICHMENT_COLUMNS, type EnrichedFields, type InputRecord } from '../shared-types'
import { normalizePostalCode } from '../crawler/target-builder'
import { fileTimestamp } from '../logger'

export type TableFormat = 'csv' | 'xlsx'

export type Row = Record<string, string>

export interface RecordTable {
  format: TableFormat
  sourcePath: string
  headers: string[]
  rows: Row[]
}

export const REQUIRED_COLUMNS = ['First Name', 'Last Name']

/** Address column variants, first non-empty wins */
export const ADDRESS_COLUMNS = ['address', 'Address', 'Home Address', 'Mailing Address', 'Property Address', 'Full Address']

export const POSTAL_COLUMNS = ['ZIP', 'Zip', 'Zip Code', 'Postal Code']

const SHEET_NAME = 'Records'

// ── Format detection ──────────────────────────────────────────────────────────

export function formatOf(filePath: string): TableFormat {
  const ext = path.extname(filePath).toLowerCase()
  if (ext === '.csv') return 'csv'
  if (ext === '.xlsx') return 'xlsx'
  throw new Error(`Unsupported input format "${ext || '(none)'}": expected .csv or .xlsx`)
}

// ── Loading ───────────────────────────────────────────────────────────────────

function parseCsv(text: string): { headers: string[]; rows: Row[] } {
  const result = Papa.parse<Row>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: 'greedy',
  })
  const fatal = result.errors.find(e => e.type === 'Delimiter' || e.type === 'Quotes')
  if (fatal) throw new Error(`CSV parse error at row ${fatal.row ?? '?'}: ${fatal.message}`)

  const headers = result.meta.fields ?? []
  const rows = result.data.map(raw => {
    const row: Row = {}
    for (const h of headers) row[h] = raw[h] ?? ''
    return row
  })
  return { headers, rows }
}

async function readXlsx(filePath: string): Promise<{ headers: string[]; rows: Row[] }> {
  const workbook = new ExcelJS.Workbook()
  await workbook.xlsx.readFile(filePath)
  const sheet = workbook.worksheets[0]
  if (!sheet) return { headers: [], rows: [] }

  const headers: string[] = []
  sheet.getRow(1).eachCell({ includeEmpty: false }, (cell, col) => {
    headers[col - 1] = cell.text.trim()
  })

  const rows: Row[] = []
  for (let r = 2; r <= sheet.rowCount; r++) {
    const sheetRow = sheet.getRow(r)
    const row: Row = {}
    let filled = false
    headers.forEach((h, i) => {
      if (!h) return
      const value = sheetRow.getCell(i + 1).text
      row[h] = value
      if (value.trim()) filled = true
    })
    if (filled) rows.push(row)
  }
  return { headers: headers.filter(h => h), rows }
}

export async function loadTable(filePath: string): Promise<RecordTable> {
  const format = formatOf(filePath)
  const { headers, rows } = format === 'csv'
    ? parseCsv(await fs.promises.readFile(filePath, 'utf-8'))
    : await readXlsx(filePath)

  const missing = REQUIRED_COLUMNS.filter(c => !headers.includes(c))
  if (missing.length > 0) {
    throw new Error(`Input ${path.basename(filePath)} is missing column(s): ${missing.join(', ')}`)
  }
  return { format, sourcePath: filePath, headers, rows }
}

/** Append any missing enrichment columns (blank in every row) */
export function ensureEnrichmentColumns(table: RecordTable): void {
  for (const col of ENRICHMENT_COLUMNS) {
    if (!table.headers.includes(col)) table.headers.push(col)
    for (const row of table.rows) row[col] ??= ''
  }
}

// ── Record view ───────────────────────────────────────────────────────────────

function firstFilled(row: Row, columns: string[]): string | undefined {
  for (const col of columns) {
    const v = row[col]?.trim()
    if (v && v.toLowerCase() !== 'nan') return v
  }
  return undefined
}

export function toInputRecord(row: Row, rowIndex: number): InputRecord {
  return {
    rowIndex,
    firstName: (row['First Name'] ?? '').trim(),
    lastName: (row['Last Name'] ?? '').trim(),
    address: firstFilled(row, ADDRESS_COLUMNS),
    postalCode: normalizePostalCode(firstFilled(row, POSTAL_COLUMNS)),
    columns: { ...row },
  }
}

const joinList = (items: string[]) => items.join(', ')

/** Overwrite the enrichment columns of `row` with freshly extracted fields */
export function mergeIntoRow(row: Row, fields: EnrichedFields): void {
  for (let i = 0; i < 5; i++) row[`Phone${i + 1}`] = fields.phones[i] ?? ''

  row['Full Address'] = fields.homeAddress ?? fields.currentAddressDetails ?? ''
  row['Current Address Details'] = fields.currentAddressDetails ?? ''

  row['Age'] = fields.age ?? ''
  row['Relatives'] = joinList(fields.relatives)
  row['Emails'] = joinList(fields.emails)
  row['Associates'] = joinList(fields.associates)
  row['Previous Addresses'] = joinList(fields.previousAddresses)
  row['Marital Status'] = fields.maritalStatus ?? ''
  row['Background Report Summary'] = fields.backgroundSummary ?? ''
  row['FAQs'] = fields.faqText ?? ''
  row['Page URL'] = fields.sourceUrl
}

// ── Writing ───────────────────────────────────────────────────────────────────

export function toCsv(table: Pick<RecordTable, 'headers' | 'rows'>): string {
  return Papa.unparse({
    fields: table.headers,
    data: table.rows.map(row => table.headers.map(h => row[h] ?? '')),
  }, { newline: '\n' })
}

async function writeXlsx(table: Pick<RecordTable, 'headers' | 'rows'>, filePath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook()
  const sheet = workbook.addWorksheet(SHEET_NAME)
  sheet.addRow(table.headers)
  for (const row of table.rows) sheet.addRow(table.headers.map(h => row[h] ?? ''))
  await workbook.xlsx.writeFile(filePath)
}

async function writeAtomic(filePath: string, write: (tmp: string) => Promise<void>): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  const tmp = `${filePath}.tmp`
  try {
    await write(tmp)
    await fs.promises.rename(tmp, filePath)
  } catch (err) {
    // keep the write error, not a cleanup one
    await fs.promises.rm(tmp, { force: true }).catch(() => {})
    throw err
  }
}

export async function writeTable(
  table: Pick<RecordTable, 'headers' | 'rows'>,
  filePath: string,
  format: TableFormat = formatOf(filePath),
): Promise<void> {
  await writeAtomic(filePath, tmp =>
    format === 'csv' ? fs.promises.writeFile(tmp, toCsv(table), 'utf-8') : writeXlsx(table, tmp),
  )
}

/** Rewrite the input file in place, in its own format */
export function checkpoint(table: RecordTable): Promise<void> {
  return writeTable(table, table.sourcePath, table.format)
}

/** scraped_results_<ts>.csv + .xlsx under `outputDir`; returns both paths */
export async function writeBackups(table: RecordTable, outputDir: string, now: Date = new Date()): Promise<string[]> {
  const stem = path.join(outputDir, `scraped_results_${fileTimestamp(now)}`)
  const files = [`${stem}.csv`, `${stem}.xlsx`]
  await writeTable(table, files[0], 'csv')
  await writeTable(table, files[1], 'xlsx')
  return files
}

/** Last-resort CSV dump of whatever is in memory */
export async function writeEmergencyBackup(table: RecordTable, outputDir: string, now: Date = new Date()): Promise<string> {
  const file = path.join(outputDir, `error_backup_${Math.floor(now.getTime() / 1000)}.csv`)
  await writeTable(table, file, 'csv')
  return file
}
