/**
 * config.ts
 *
 * Runtime configuration read from the environment (.env is loaded by the
 * entry points through `dotenv/config`). Everything is validated up front so
 * a bad value stops the run before a browser is opened.
 */

import path from 'path'
import { z } from 'zod'

const flag = z
  .union([z.boolean(), z.string()])
  .transform(v => (typeof v === 'boolean' ? v : ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase())))

const ms = (fallback: number) => z.coerce.number().int().min(0).default(fallback)

const EnvSchema = z
  .object({
    SEARCH_BASE_URL:              z.string().url().default('https://www.fastpeoplesearch.com'),
    NAV_MODE:                     z.enum(['auto', 'manual']).default('auto'),

    REMOTE_DEBUG_PORT:            z.coerce.number().int().min(1).max(65_535).default(9222),
    BROWSER_PATH:                 z.string().min(1).optional(),
    BROWSER_USER_DATA_DIR:        z.string().min(1).default('.browser-profile'),
    BROWSER_PROFILE_DIR:          z.string().min(1).default('Default'),

    PAGE_LOAD_TIMEOUT_MS:         ms(60_000),
    FIRST_WAIT_TIMEOUT_MS:        ms(20_000),
    DETAIL_FIRST_WAIT_TIMEOUT_MS: ms(15_000),
    RESULTS_WAIT_TIMEOUT_MS:      ms(15_000),
    DETAIL_WAIT_TIMEOUT_MS:       ms(30_000),
    GATE_WAIT_TIMEOUT_MS:         ms(240_000),
    GATE_POLL_INTERVAL_MS:        z.coerce.number().int().min(100).default(3_000),

    MAX_GATES_BEFORE_MANUAL:      z.coerce.number().int().min(1).default(3),
    DETAIL_MIN_SIGNALS:           z.coerce.number().int().min(1).max(5).default(2),
    CHECKPOINT_EVERY:             z.coerce.number().int().min(1).default(10),
    MIN_DELAY_MS:                 ms(500),
    MAX_DELAY_MS:                 ms(1_600),

    DEBUG_DUMPS:                  flag.default(false),
    IP_CHECK:                     flag.default(false),
    LIMIT_ROWS:                   z.coerce.number().int().min(1).optional(),

    OUTPUT_DIR:                   z.string().min(1).default(path.join('data', 'scraped_data')),
    LOG_DIR:                      z.string().min(1).default('logs'),
    DATA_DIR:                     z.string().min(1).default('data'),
    PORT:                         z.coerce.number().int().min(1).max(65_535).default(3001),
  })
  .refine(env => env.MAX_DELAY_MS >= env.MIN_DELAY_MS, {
    message: 'MAX_DELAY_MS must be >= MIN_DELAY_MS',
    path: ['MAX_DELAY_MS'],
  })

export interface GateTimeouts {
  /** First wait for normal content on a search page */
  firstWaitMs: number
  /** First wait for normal content on a detail page */
  detailFirstWaitMs: number
  /** Budget for a challenge to be cleared (and for a manual record) */
  gateWaitMs: number
  pollIntervalMs: number
}

export interface EnrichConfig {
  searchBaseUrl: string
  navMode: 'auto' | 'manual'
  browser: {
    remoteDebugPort: number
    executablePath?: string
    userDataDir: string
    profileDir: string
    pageLoadTimeoutMs: number
  }
  gate: GateTimeouts
  resultsWaitMs: number
  detailWaitMs: number
  maxGatesBeforeManual: number
  detailMinSignals: number
  checkpointEvery: number
  delay: { minMs: number; maxMs: number }
  debugDumps: boolean
  ipCheck: boolean
  limitRows?: number
  outputDir: string
  logDir: string
  dataDir: string
  port: number
}

/** Drop empty strings so `FOO=` in .env means "use the default" */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value
  }
  return out
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnrichConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `  ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n')
    throw new Error(`Invalid configuration:\n${issues}`)
  }
  const e = parsed.data

  return {
    searchBaseUrl: e.SEARCH_BASE_URL.replace(/\/+$/, ''),
    navMode: e.NAV_MODE,
    browser: {
      remoteDebugPort: e.REMOTE_DEBUG_PORT,
      executablePath: e.BROWSER_PATH,
      userDataDir: path.resolve(e.BROWSER_USER_DATA_DIR),
      profileDir: e.BROWSER_PROFILE_DIR,
      pageLoadTimeoutMs: e.PAGE_LOAD_TIMEOUT_MS,
    },
    gate: {
      firstWaitMs: e.FIRST_WAIT_TIMEOUT_MS,
      detailFirstWaitMs: e.DETAIL_FIRST_WAIT_TIMEOUT_MS,
      gateWaitMs: e.GATE_WAIT_TIMEOUT_MS,
      pollIntervalMs: e.GATE_POLL_INTERVAL_MS,
    },
    resultsWaitMs: e.RESULTS_WAIT_TIMEOUT_MS,
    detailWaitMs: e.DETAIL_WAIT_TIMEOUT_MS,
    maxGatesBeforeManual: e.MAX_GATES_BEFORE_MANUAL,
    detailMinSignals: e.DETAIL_MIN_SIGNALS,
    checkpointEvery: e.CHECKPOINT_EVERY,
    delay: { minMs: e.MIN_DELAY_MS, maxMs: e.MAX_DELAY_MS },
    debugDumps: e.DEBUG_DUMPS,
    ipCheck: e.IP_CHECK,
    limitRows: e.LIMIT_ROWS,
    outputDir: path.resolve(e.OUTPUT_DIR),
    logDir: path.resolve(e.LOG_DIR),
    dataDir: path.resolve(e.DATA_DIR),
    port: e.PORT,
  }
}
