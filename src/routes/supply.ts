// src/routes/supply.ts
import express from 'express'
import { errorCode, toError } from '../errors'
import { SupplyReporter } from '../services/supply'

export function supplyRouter(reporter: SupplyReporter) {
  const router = express.Router()

  router.get('/', async (_req, res) => {
    try {
      return res.json(await reporter.report())
    } catch (e: unknown) {
      const err = toError(e)
      // eslint-disable-next-line no-console
      console.error('supply lookup failed', err.message)
      return res.status(503).json({ error: err.message, code: errorCode(err) })
    }
  })

  return router
}
