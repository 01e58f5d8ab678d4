import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, it, expect } from 'vitest'
import { createRunLogger, fileTimestamp } from '../../src/logger'

describe('logger', () => {
  it('formats file timestamps in local time', () => {
    expect(fileTimestamp(new Date(2024, 10, 3, 9, 8, 7))).toBe('20241103_090807')
  })

  it('writes every line to the run log and the listener', () => {
    const logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-'))
    const seen: string[] = []
    const at = new Date('2024-11-03T09:08:07.000Z')
    const logger = createRunLogger({ logDir, echo: false, onLine: l => seen.push(l), now: () => at })

    logger.log('[test] one')
    logger.log('[test] two')

    expect(logger.file).toBe(path.join(logDir, `enrichment_${fileTimestamp(at)}.log`))
    expect(logger.lines).toEqual(['[test] one', '[test] two'])
    expect(seen).toEqual(['[test] one', '[test] two'])
    expect(fs.readFileSync(logger.file ?? '', 'utf-8')).toBe(
      '2024-11-03T09:08:07.000Z [test] one\n2024-11-03T09:08:07.000Z [test] two\n',
    )
  })

  it('keeps lines in memory only without a log directory', () => {
    const logger = createRunLogger({ echo: false })
    logger.log('[test] only')
    expect(logger.file).toBeNull()
    expect(logger.lines).toEqual(['[test] only'])
  })
})
