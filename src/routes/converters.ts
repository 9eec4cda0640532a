// src/routes/converters.ts
import express, { Request, Response } from 'express'
import { errorCode, toError } from '../errors'
import { ConverterDirectory, TrackedConverter } from '../types'

function view(c: TrackedConverter) {
  return {
    name: c.name,
    currency_id: c.currencyId,
    native_reserve: c.nativeReserve,
    currencies: c.currencies.map((cur) => ({ symbol: cur.symbol, reserve: cur.reserve }))
  }
}

// GET /converters[?chain=VRSC]
export function convertersRouter(directory: ConverterDirectory, chain: string) {
  const router = express.Router()

  router.get('/', async (req: Request, res: Response) => {
    const requested = typeof req.query.chain === 'string' ? req.query.chain.toUpperCase() : chain
    if (requested !== chain) {
      return res.status(400).json({ error: `Invalid chain '${req.query.chain}'. Valid chains: ["${chain}"]` })
    }
    try {
      const listing = await directory.listConverters()
      return res.json({
        chain: listing.chain,
        min_native_reserve: listing.minNativeReserve,
        active_count: listing.active.length,
        excluded_count: listing.belowThreshold.length,
        active_converters: listing.active.map(view),
        excluded_converters: listing.belowThreshold.map(view)
      })
    } catch (e: unknown) {
      const err = toError(e)
      // eslint-disable-next-line no-console
      console.error('converter discovery failed', err.message)
      return res.status(503).json({ error: err.message, code: errorCode(err) })
    }
  })

  return router
}
