/**
 * logger.ts
 *
 * Every module logs through a plain `(msg) => void` callback with a `[tag]`
 * prefix. The run logger fans each line out to the console, a durable log
 * file under LOG_DIR, and an optional listener (the job store).
 */

import fs from 'fs'
import path from 'path'

export type Log = (msg: string) => void

export interface RunLogger {
  log: Log
  /** Absolute path of the durable log file, null when file logging is off */
  file: string | null
  lines: string[]
}

export interface RunLoggerOptions {
  logDir?: string
  /** Echo to stdout/stderr (default true) */
  echo?: boolean
  onLine?: (line: string) => void
  now?: () => Date
}

export function fileTimestamp(d: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  )
}

export function createRunLogger(opts: RunLoggerOptions = {}): RunLogger {
  const now = opts.now ?? (() => new Date())
  const echo = opts.echo ?? true
  const lines: string[] = []

  let file: string | null = null
  if (opts.logDir) {
    fs.mkdirSync(opts.logDir, { recursive: true })
    file = path.join(opts.logDir, `enrichment_${fileTimestamp(now())}.log`)
  }

  const log: Log = (msg: string) => {
    lines.push(msg)
    if (echo) {
      if (msg.includes('✖')) console.error(msg)
      else console.log(msg)
    }
    if (file) {
      try {
        fs.appendFileSync(file, `${now().toISOString()} ${msg}\n`)
      } catch (err) {
        console.error(`[logger] could not write ${file}: ${(err as Error).message}`)
      }
    }
    opts.onLine?.(msg)
  }

  return { log, file, lines }
}

/** Logger that drops everything; default for library calls without a log */
export const silentLog: Log = () => {}
