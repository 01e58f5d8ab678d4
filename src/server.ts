import 'dotenv/config'
import express from 'express'
import cors from 'cors'
import { loadConfig } from './config'
import { createEnrichRouter } from './routes/enrich'
import { JobStore } from './store/job-store'

const config = loadConfig()
const store = new JobStore(config.dataDir)
const app = express()

const interrupted = store.failInterrupted()
if (interrupted > 0) {
  console.log(`[server] marked ${interrupted} interrupted job(s) as failed`)
}

// ── Middleware ────────────────────────────────────────────────────────────────

app.use(cors({
  origin: [
    'http://localhost:3000',    // Admin UI dev
    'http://localhost:5173',    // Vite dev
    /^http:\/\/127\.0\.0\.1(:\d+)?$/,
  ],
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
  credentials: false,
}))

app.use(express.json({ limit: '1mb' }))

// ── Health check & root ───────────────────────────────────────────────────────

app.get('/', (_req, res) => {
  res.redirect(302, '/health')
})

app.get('/health', (_req, res) => {
  res.json({ ok: true, ts: new Date().toISOString() })
})

// ── Routes ────────────────────────────────────────────────────────────────────

app.use('/enrich', createEnrichRouter({ store, config }))

// ── 404 handler ───────────────────────────────────────────────────────────────

app.use((_req, res) => {
  res.status(404).json({ error: 'Not found' })
})

// ── Start ─────────────────────────────────────────────────────────────────────

app.listen(config.port, '127.0.0.1', () => {
  console.log(`[server] 🚀 Enrichment API running on http://127.0.0.1:${config.port}`)
  console.log(`[server]    POST /enrich                      — start a job`)
  console.log(`[server]    GET  /enrich/jobs                 — list jobs`)
  console.log(`[server]    POST /enrich/jobs/:id/operator    — answer a manual prompt`)
})

export default app
