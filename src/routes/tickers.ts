// src/routes/tickers.ts
import express, { Request, Response } from 'express'
import debug from 'debug'
import { FORMATS, FormatTag } from '../formats'
import { TickerEngine } from '../services/tickerEngine'
import { errorCode, LiveRefreshError, toError } from '../errors'

const log = debug('app:routes')

export interface TickersRouterOptions {
  liveEnabled: boolean
}

function liveDisabled(format: FormatTag) {
  return {
    error: 'Live endpoints are disabled',
    message: 'This endpoint makes fresh RPC calls and is disabled for production use',
    alternatives: { cached_endpoint: `/${format}` },
    enable_instructions: 'Set ENABLE_LIVE_ENDPOINTS=true to enable live endpoints'
  }
}

// GET /<format> serves the cache; GET /<format>_live forces a refresh first
export function tickersRouter(engine: TickerEngine, options: TickersRouterOptions) {
  const router = express.Router()

  for (const format of FORMATS) {
    router.get(`/${format}`, (_req: Request, res: Response) => {
      const body = engine.readCached(format)
      if (body === null) {
        return res.status(503).json({ error: 'No cached data available' })
      }
      return res.json(body)
    })

    router.get(`/${format}_live`, async (_req: Request, res: Response) => {
      if (!options.liveEnabled) return res.status(503).json(liveDisabled(format))
      try {
        const body = await engine.readLive(format)
        log('served live %s', format)
        return res.json(body)
      } catch (e: unknown) {
        const err = toError(e)
        if (err instanceof LiveRefreshError) {
          return res.status(503).json({ error: err.message, code: errorCode(err.cause) })
        }
        // eslint-disable-next-line no-console
        console.error(`${format}_live route error`, err)
        return res.status(500).json({ error: 'Internal server error' })
      }
    })
  }

  return router
}
