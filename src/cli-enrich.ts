/**
 * CLI entry point to enrich a lead file without starting the HTTP server.
 * Manual-mode prompts are answered in this terminal.
 *
 * Usage:
 *   npx tsx src/cli-enrich.ts <input.csv|input.xlsx> [--manual] [--limit N]
 *
 * Everything else (timeouts, debug port, output directory...) comes from the
 * environment or a .env file; see .env.example.
 */
import 'dotenv/config'
import path from 'path'
import { loadConfig, type EnrichConfig } from './config'
import { runEnrichment } from './enrich/enrichment-runner'
import { ConsoleOperator } from './enrich/operator'
import { FatalBatchError, errorMessage } from './errors'
import { createRunLogger } from './logger'

const USAGE = 'Usage: npx tsx src/cli-enrich.ts <input.csv|input.xlsx> [--manual] [--limit N]'

interface CliArgs {
  inputArg?: string
  manual: boolean
  limitRows?: number
}

function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { manual: false }
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--manual') out.manual = true
    else if (arg === '--limit') out.limitRows = Number(argv[++i])
    else if (!out.inputArg) out.inputArg = arg
  }
  return out
}

function configOrExit(): EnrichConfig {
  try {
    return loadConfig()
  } catch (err) {
    console.error(`[cli-enrich] ❌ ${errorMessage(err)}`)
    process.exit(1)
  }
}

const { inputArg, manual, limitRows } = parseArgs(process.argv.slice(2))

if (!inputArg || (limitRows !== undefined && (!Number.isInteger(limitRows) || limitRows < 1))) {
  console.error(USAGE)
  process.exit(1)
}

const config = configOrExit()
const inputPath = path.resolve(inputArg)
const logger = createRunLogger({ logDir: config.logDir })

console.log(`\n[cli-enrich] Enriching: ${inputPath}`)
console.log(`[cli-enrich] Mode: ${manual ? 'manual' : config.navMode}`)
console.log(`[cli-enrich] Log file: ${logger.file}\n`)

runEnrichment(
  { inputPath, config, log: logger.log, navMode: manual ? 'manual' : undefined, limitRows },
  { operator: new ConsoleOperator() },
)
  .then(summary => {
    console.log('\n[cli-enrich] ✅ Done!')
    console.log(`[cli-enrich] Enriched:   ${summary.enriched}/${summary.processed} (${summary.enrichmentRate}%)`)
    console.log(`[cli-enrich] Gates seen: ${summary.gatesSeen}`)
    for (const [col, n] of Object.entries(summary.columnsWithData)) {
      console.log(`[cli-enrich]   ${col.padEnd(26)} ${n}`)
    }
  })
  .catch((err: unknown) => {
    console.error(`[cli-enrich] ❌ Enrichment failed: ${errorMessage(err)}`)
    if (err instanceof FatalBatchError && err.backupPath) {
      console.error(`[cli-enrich] Emergency backup: ${err.backupPath}`)
    }
    process.exit(1)
  })
