import fs from 'fs'
import path from 'path'
import { Router, type Request, type Response } from 'express'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import type { EnrichConfig } from '../config'
import { runEnrichment, type RunDeps } from '../enrich/enrichment-runner'
import { QueuedOperator } from '../enrich/operator'
import { errorMessage } from '../errors'
import { createRunLogger } from '../logger'
import type { JobStore } from '../store/job-store'

const TAG = '[enrich-route]'

const StartBody = z.object({
  inputPath: z.string().min(1),
  navMode: z.enum(['auto', 'manual']).optional(),
  limitRows: z.number().int().positive().optional(),
})

const OperatorBody = z.object({
  reply: z.enum(['skip', 'retry']),
})

function issuesOf(err: z.ZodError): string[] {
  return err.issues.map(i => `${i.path.join('.') || '(body)'}: ${i.message}`)
}

export interface EnrichRouterDeps {
  store: JobStore
  config: EnrichConfig
  run?: typeof runEnrichment
  openSession?: RunDeps['openSession']
}

export function createEnrichRouter(deps: EnrichRouterDeps): Router {
  const { store, config } = deps
  const run = deps.run ?? runEnrichment
  const router = Router()

  /** One job at a time: the browser session is shared with the operator */
  let active: { jobId: string; operator: QueuedOperator } | null = null

  /**
   * POST /enrich
   * Body: { inputPath: string, navMode?: 'auto' | 'manual', limitRows?: number }
   * Starts an enrichment job asynchronously.
   */
  router.post('/', (req: Request, res: Response) => {
    const parsed = StartBody.safeParse(req.body)
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', issues: issuesOf(parsed.error) })
      return
    }
    if (active) {
      res.status(409).json({ error: 'An enrichment job is already running', jobId: active.jobId })
      return
    }

    const { navMode, limitRows } = parsed.data
    const inputPath = path.resolve(parsed.data.inputPath)
    if (!fs.existsSync(inputPath)) {
      res.status(400).json({ error: `Input file not found: ${inputPath}` })
      return
    }

    const jobId = uuidv4()
    store.create(jobId, inputPath)

    const logger = createRunLogger({
      logDir: config.logDir,
      onLine: line => store.appendLog(jobId, line),
    })
    const operator = new QueuedOperator(
      prompt => store.update(jobId, { pendingPrompt: prompt ?? undefined }),
      message => logger.log(`[operator] ${message}`),
    )
    active = { jobId, operator }

    const execute = async () => {
      store.setStatus(jobId, 'running')
      try {
        const summary = await run(
          { inputPath, config, log: logger.log, navMode, limitRows },
          { operator, openSession: deps.openSession },
        )
        store.setStatus(jobId, 'done', { summary })
      } catch (err) {
        store.setStatus(jobId, 'failed', { error: errorMessage(err) })
      } finally {
        active = null
      }
    }

    // Fire-and-forget; execute records the outcome on the job
    execute().catch(err => {
      console.error(`${TAG} unhandled job error:`, err)
    })

    res.json({ jobId, status: 'running' })
  })

  /**
   * GET /enrich/jobs
   * All jobs, most recent first.
   */
  router.get('/jobs', (_req: Request, res: Response) => {
    res.json(store.list())
  })

  /**
   * GET /enrich/jobs/:jobId
   * Status, logs, pending operator prompt and summary of one job.
   */
  router.get('/jobs/:jobId', (req: Request, res: Response) => {
    const job = store.get(req.params.jobId)
    if (!job) {
      res.status(404).json({ error: 'Job not found' })
      return
    }
    res.json(job)
  })

  /**
   * POST /enrich/jobs/:jobId/operator
   * Body: { reply: 'skip' | 'retry' }
   * Answers the manual-mode prompt the job is waiting on.
   */
  router.post('/jobs/:jobId/operator', (req: Request, res: Response) => {
    const parsed = OperatorBody.safeParse(req.body)
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', issues: issuesOf(parsed.error) })
      return
    }
    if (!store.get(req.params.jobId)) {
      res.status(404).json({ error: 'Job not found' })
      return
    }
    if (!active || active.jobId !== req.params.jobId || !active.operator.answer(parsed.data.reply)) {
      res.status(409).json({ error: 'No operator prompt is pending for this job' })
      return
    }
    res.json({ ok: true, reply: parsed.data.reply })
  })

  /**
   * GET /enrich/jobs/:jobId/stream
   * Server-Sent Events: log lines, status and operator prompts.
   */
  router.get('/jobs/:jobId/stream', (req: Request, res: Response) => {
    const jobId = req.params.jobId
    if (!store.get(jobId)) {
      res.status(404).end()
      return
    }

    res.setHeader('Content-Type', 'text/event-stream')
    res.setHeader('Cache-Control', 'no-cache')
    res.setHeader('Connection', 'keep-alive')
    res.flushHeaders()

    let lastIndex = 0
    let lastPrompt = ''
    const interval = setInterval(() => {
      const current = store.get(jobId)
      if (!current) {
        clearInterval(interval)
        res.end()
        return
      }

      for (const line of current.logs.slice(lastIndex)) {
        res.write(`data: ${JSON.stringify({ log: line })}\n\n`)
      }
      lastIndex = current.logs.length

      const prompt = JSON.stringify(current.pendingPrompt ?? null)
      if (prompt !== lastPrompt) {
        res.write(`data: ${JSON.stringify({ prompt: current.pendingPrompt ?? null })}\n\n`)
        lastPrompt = prompt
      }
      res.write(`data: ${JSON.stringify({ status: current.status })}\n\n`)

      if (current.status === 'done' || current.status === 'failed') {
        res.write(`data: ${JSON.stringify({ done: true, status: current.status })}\n\n`)
        clearInterval(interval)
        res.end()
      }
    }, 500)

    req.on('close', () => clearInterval(interval))
  })

  return router
}
