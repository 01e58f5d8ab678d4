import fs from 'fs'
import path from 'path'
import type { EnrichJob, JobStatus } from '../shared-types'

/**
 * Enrichment jobs persisted as one JSON map under DATA_DIR/jobs.json.
 * Writes go through a temp file and a rename.
 */
export class JobStore {
  private readonly jobsFile: string

  constructor(private readonly dataDir: string) {
    this.jobsFile = path.join(dataDir, 'jobs.json')
  }

  // ── Persistence ─────────────────────────────────────────────────────────────

  private read(): Record<string, EnrichJob> {
    try {
      return JSON.parse(fs.readFileSync(this.jobsFile, 'utf-8'))
    } catch {
      return {}
    }
  }

  private write(jobs: Record<string, EnrichJob>): void {
    fs.mkdirSync(this.dataDir, { recursive: true })
    const tmp = `${this.jobsFile}.tmp`
    fs.writeFileSync(tmp, JSON.stringify(jobs, null, 2))
    fs.renameSync(tmp, this.jobsFile)
  }

  private mutate(jobId: string, fn: (job: EnrichJob) => EnrichJob): EnrichJob | null {
    const jobs = this.read()
    const job = jobs[jobId]
    if (!job) return null
    jobs[jobId] = fn(job)
    this.write(jobs)
    return jobs[jobId]
  }

  // ── Jobs ────────────────────────────────────────────────────────────────────

  create(jobId: string, inputPath: string): EnrichJob {
    const job: EnrichJob = {
      jobId,
      inputPath,
      status: 'pending',
      startedAt: new Date().toISOString(),
      logs: [],
    }
    const jobs = this.read()
    jobs[jobId] = job
    this.write(jobs)
    return job
  }

  get(jobId: string): EnrichJob | null {
    return this.read()[jobId] ?? null
  }

  /** Most recent first */
  list(): EnrichJob[] {
    return Object.values(this.read()).sort(
      (a, b) => new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime(),
    )
  }

  update(jobId: string, updates: Partial<Omit<EnrichJob, 'jobId'>>): EnrichJob | null {
    return this.mutate(jobId, job => ({ ...job, ...updates }))
  }

  setStatus(jobId: string, status: JobStatus, extra: Partial<Omit<EnrichJob, 'jobId' | 'status'>> = {}): EnrichJob | null {
    return this.mutate(jobId, job => {
      const next: EnrichJob = { ...job, ...extra, status }
      if (status === 'done' || status === 'failed') {
        next.completedAt = new Date().toISOString()
        delete next.pendingPrompt
      }
      return next
    })
  }

  appendLog(jobId: string, line: string): void {
    this.mutate(jobId, job => ({ ...job, logs: [...job.logs, line] }))
  }

  /** Jobs left pending/running by a previous server process can never finish */
  failInterrupted(): number {
    const jobs = this.read()
    let count = 0
    for (const job of Object.values(jobs)) {
      if (job.status !== 'pending' && job.status !== 'running') continue
      job.status = 'failed'
      job.error = 'Interrupted: the server stopped while the job was running'
      job.completedAt = new Date().toISOString()
      delete job.pendingPrompt
      count++
    }
    if (count > 0) this.write(jobs)
    return count
  }
}
