/**
 * operator.ts
 *
 * Manual mode suspends the run on OperatorResponder.ask() until a human has
 * put the browser on the right detail page (or gives up on the record).
 * The CLI answers from the terminal; the job API answers over HTTP.
 */

import { createInterface } from 'readline/promises'
import type { OperatorPrompt, OperatorReply } from '../shared-types'

export interface OperatorResponder {
  ask(prompt: OperatorPrompt): Promise<OperatorReply>
  /** One-way notice, e.g. "solve the challenge in the browser window" */
  notify(message: string): void
}

/** "skip" (any case, surrounding blanks ignored) skips; anything else retries */
export function parseReply(input: string | null | undefined): OperatorReply {
  return (input ?? '').trim().toLowerCase() === 'skip' ? 'skip' : 'retry'
}

export function describePrompt(p: OperatorPrompt): string[] {
  const lines = [
    '='.repeat(72),
    `Record ${p.rowIndex + 1}/${p.total}: ${p.name}`,
    `Search URL: ${p.url}`,
    'In the browser: open the matching person detail page, solve any challenge,',
    "then press Enter here. Type 'skip' to leave this record empty.",
  ]
  if (p.attempt > 1 && p.lastError) lines.push(`Attempt ${p.attempt}, last problem: ${p.lastError}`)
  if (p.remainingMs !== undefined) lines.push(`Time left for this record: ${Math.ceil(p.remainingMs / 1000)}s`)
  lines.push('='.repeat(72))
  return lines
}

// ── Terminal ──────────────────────────────────────────────────────────────────

export class ConsoleOperator implements OperatorResponder {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  async ask(prompt: OperatorPrompt): Promise<OperatorReply> {
    for (const line of describePrompt(prompt)) this.output.write(`${line}\n`)
    const rl = createInterface({ input: this.input, output: this.output })
    try {
      return parseReply(await rl.question('> '))
    } finally {
      rl.close()
    }
  }

  notify(message: string): void {
    this.output.write(`\n>>> ${message}\n`)
  }
}

// ── HTTP ──────────────────────────────────────────────────────────────────────

interface Pending {
  prompt: OperatorPrompt
  resolve: (reply: OperatorReply) => void
}

/**
 * Parks each prompt until answer() is called from outside (the job API).
 * At most one prompt is pending at a time since the runner is sequential.
 */
export class QueuedOperator implements OperatorResponder {
  private pending: Pending | null = null

  constructor(
    private readonly onPrompt: (prompt: OperatorPrompt | null) => void = () => {},
    private readonly onNotice: (message: string) => void = () => {},
  ) {}

  get pendingPrompt(): OperatorPrompt | null {
    return this.pending?.prompt ?? null
  }

  ask(prompt: OperatorPrompt): Promise<OperatorReply> {
    // A stale prompt left unanswered is treated as skipped
    this.pending?.resolve('skip')
    return new Promise<OperatorReply>(resolve => {
      this.pending = { prompt, resolve }
      this.onPrompt(prompt)
    })
  }

  /** Returns false when nothing is waiting for an answer */
  answer(reply: OperatorReply): boolean {
    const current = this.pending
    if (!current) return false
    this.pending = null
    this.onPrompt(null)
    current.resolve(reply)
    return true
  }

  notify(message: string): void {
    this.onNotice(message)
  }

  /** Release a waiting run, e.g. on shutdown */
  cancel(): void {
    this.answer('skip')
  }
}
