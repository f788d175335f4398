import express from 'express'
import cors from 'cors'
import { createDashboardRouter } from './routes/dashboard.js'
import type { DashboardContext } from './services/dashboardContext.js'

export function createApp(context: DashboardContext) {
  const app = express()

  app.use(cors())
  app.use(express.json())

  app.use('/api/dashboard', createDashboardRouter(context))

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', aggregates: context.store.size })
  })

  return app
}
