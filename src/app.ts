// src/app.ts
import express, { NextFunction, Request, Response } from 'express'
import http from 'http'
import cors from 'cors'
import morgan from 'morgan'
import { tickersRouter } from './routes/tickers'
import { healthRouter } from './routes/health'
import { adminRouter } from './routes/admin'
import { convertersRouter } from './routes/converters'
import { supplyRouter } from './routes/supply'
import { SupplyReporter } from './services/supply'
import { TickerEngine } from './services/tickerEngine'
import { ConverterDirectory } from './types'

export interface ServerOptions {
  liveEnabled: boolean
  accessLog?: boolean
  // mounts GET /converters
  converters?: { directory: ConverterDirectory; chain: string }
  // mounts GET /verussupply
  supply?: SupplyReporter
}

// the engine is passed in; nothing here owns ticker state
export function createApp(engine: TickerEngine, options: ServerOptions) {
  const app = express()
  app.use(cors())
  app.use(express.json())
  if (options.accessLog !== false) app.use(morgan('tiny'))
  app.set('json spaces', 2)

  app.use('/', tickersRouter(engine, { liveEnabled: options.liveEnabled }))
  app.use('/health', healthRouter(engine))
  app.use('/admin', adminRouter(engine))
  if (options.converters) app.use('/converters', convertersRouter(options.converters.directory, options.converters.chain))
  if (options.supply) app.use('/verussupply', supplyRouter(options.supply))

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    // eslint-disable-next-line no-console
    console.error('unhandled route error', err)
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}

export function createServer(engine: TickerEngine, options: ServerOptions) {
  const app = createApp(engine, options)
  const httpServer = http.createServer(app)
  return { app, httpServer }
}
