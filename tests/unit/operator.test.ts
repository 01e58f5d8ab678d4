import { PassThrough } from 'stream'
import { describe, it, expect, vi } from 'vitest'
import { ConsoleOperator, QueuedOperator, describePrompt, parseReply } from '../../src/enrich/operator'
import type { OperatorPrompt } from '../../src/shared-types'

const PROMPT: OperatorPrompt = {
  rowIndex: 2,
  total: 10,
  name: 'John Smith',
  url: 'https://example.com/name/John-Smith_10001',
  attempt: 1,
}

describe('parseReply', () => {
  it('only "skip" skips', () => {
    expect(parseReply(' SKIP ')).toBe('skip')
    expect(parseReply('')).toBe('retry')
    expect(parseReply(null)).toBe('retry')
    expect(parseReply('skipped')).toBe('retry')
  })
})

describe('describePrompt', () => {
  it('names the record and the search URL', () => {
    const lines = describePrompt(PROMPT)
    expect(lines).toHaveLength(6)
    expect(lines[1]).toBe('Record 3/10: John Smith')
    expect(lines[2]).toBe('Search URL: https://example.com/name/John-Smith_10001')
  })

  it('adds the last problem and the time left on a retry', () => {
    const lines = describePrompt({ ...PROMPT, attempt: 2, lastError: 'Detail content not detected', remainingMs: 61_500 })
    expect(lines).toContain('Attempt 2, last problem: Detail content not detected')
    expect(lines).toContain('Time left for this record: 62s')
  })
})

describe('QueuedOperator', () => {
  it('parks a prompt until it is answered', async () => {
    const onPrompt = vi.fn()
    const op = new QueuedOperator(onPrompt)

    const reply = op.ask(PROMPT)
    expect(op.pendingPrompt).toEqual(PROMPT)
    expect(onPrompt).toHaveBeenLastCalledWith(PROMPT)

    expect(op.answer('retry')).toBe(true)
    await expect(reply).resolves.toBe('retry')
    expect(op.pendingPrompt).toBeNull()
    expect(onPrompt).toHaveBeenLastCalledWith(null)
  })

  it('refuses an answer when nothing is pending', () => {
    expect(new QueuedOperator().answer('skip')).toBe(false)
  })

  it('skips a stale prompt when a new one arrives', async () => {
    const op = new QueuedOperator()
    const stale = op.ask(PROMPT)
    const fresh = op.ask({ ...PROMPT, rowIndex: 3 })
    await expect(stale).resolves.toBe('skip')
    expect(op.pendingPrompt?.rowIndex).toBe(3)

    op.cancel()
    await expect(fresh).resolves.toBe('skip')
  })

  it('forwards notices', () => {
    const onNotice = vi.fn()
    new QueuedOperator(undefined, onNotice).notify('solve the challenge')
    expect(onNotice).toHaveBeenCalledWith('solve the challenge')
  })
})

describe('ConsoleOperator', () => {
  it('prints the prompt and reads one line', async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    let written = ''
    output.on('data', (chunk: Buffer) => { written += chunk.toString() })

    const op = new ConsoleOperator(input, output)
    const reply = op.ask(PROMPT)
    input.write('skip\n')

    await expect(reply).resolves.toBe('skip')
    expect(written).toContain('Record 3/10: John Smith\n')
  })
})
