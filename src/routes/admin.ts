// src/routes/admin.ts
import express, { Request, Response } from 'express'
import debug from 'debug'
import { errorCode } from '../errors'
import { TickerEngine } from '../services/tickerEngine'

const log = debug('app:admin')

export function adminRouter(engine: TickerEngine) {
  const router = express.Router()

  // POST /admin/refresh
  router.post('/refresh', async (_req: Request, res: Response) => {
    try {
      const outcome = await engine.refresh('manual')
      if (outcome.status === 'already-refreshing') {
        return res.status(409).json({ ok: false, status: outcome.status })
      }
      if (outcome.status === 'failed') {
        return res.status(502).json({ ok: false, error: outcome.error.message, code: errorCode(outcome.error) })
      }
      log('manual refresh published %d tickers', outcome.snapshot.tickers.length)
      return res.json({ ok: true, count: outcome.snapshot.tickers.length, block_height: outcome.snapshot.blockHeight })
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('admin refresh error', err)
      return res.status(500).json({ error: 'refresh failed' })
    }
  })

  return router
}
