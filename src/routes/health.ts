// src/routes/health.ts
import express from 'express'
import { FORMATS } from '../formats'
import { TickerEngine } from '../services/tickerEngine'

// Health check used by load balancers and monitoring: source reachability plus cache state.
export function healthRouter(engine: TickerEngine) {
  const router = express.Router()

  router.get('/', async (_req, res) => {
    try {
      const report = await engine.health()
      return res.status(report.status === 'healthy' ? 200 : 503).json({
        ...report,
        service: 'dex-ticker-service',
        uptime_seconds: Math.floor(process.uptime()),
        endpoints: {
          cached: FORMATS.map((f) => `/${f}`),
          live: FORMATS.map((f) => `/${f}_live`)
        }
      })
    } catch (e) {
      // eslint-disable-next-line no-console
      console.error('health route error', e)
      return res.status(503).json({ status: 'unhealthy', error: 'health check failed' })
    }
  })

  return router
}
