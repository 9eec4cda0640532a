// src/index.ts
import debug from 'debug'
import { createServer } from './app'
import {
  BLOCK_POLL_INTERVAL_SECONDS,
  BLOCKS_PER_DAY,
  CACHE_TTL_SECONDS,
  CHAIN,
  CURRENCY_MAPPINGS_PATH,
  ENABLE_LIVE_ENDPOINTS,
  MIN_NATIVE_RESERVE,
  PORT,
  QUOTE_PRIORITY,
  RPC_MAX_CONCURRENCY,
  RPC_PASSWORD,
  RPC_RETRIES,
  RPC_TIMEOUT_SECONDS,
  RPC_URL,
  RPC_USER,
  SOURCE_TIMEOUT_SECONDS,
  SUPPLY_CACHE_SECONDS,
  TRACKED_CONVERTERS
} from './config'
import { TickerCache } from './cache/tickerCache'
import { createRpcHttpClient } from './http/axiosClient'
import { VerusConverterSource } from './services/converterSource'
import { HealthReporter } from './services/health'
import { RefreshScheduler } from './services/scheduler'
import { SupplyReporter } from './services/supply'
import { TickerEngine } from './services/tickerEngine'
import { VerusRpcClient } from './services/verusRpc'
import { loadSymbolTable } from './symbols/currencyMappings'

const log = debug('app:main')

const symbols = loadSymbolTable(CURRENCY_MAPPINGS_PATH)
const rpc = new VerusRpcClient(
  createRpcHttpClient({
    baseURL: RPC_URL,
    username: RPC_USER,
    password: RPC_PASSWORD,
    timeoutMs: RPC_TIMEOUT_SECONDS * 1000,
    retries: RPC_RETRIES
  })
)
const source = new VerusConverterSource(rpc, symbols, {
  chain: CHAIN,
  blocksPerDay: BLOCKS_PER_DAY,
  maxConcurrency: RPC_MAX_CONCURRENCY,
  trackedConverters: TRACKED_CONVERTERS,
  minNativeReserve: MIN_NATIVE_RESERVE
})
const cache = new TickerCache({
  ttlMs: CACHE_TTL_SECONDS * 1000,
  timeoutMs: SOURCE_TIMEOUT_SECONDS * 1000,
  quotePriority: QUOTE_PRIORITY
})
const scheduler = new RefreshScheduler(cache, source, {
  intervalMs: CACHE_TTL_SECONDS * 1000,
  pollIntervalMs: BLOCK_POLL_INTERVAL_SECONDS * 1000,
  probeTimeoutMs: RPC_TIMEOUT_SECONDS * 1000
})
const health = new HealthReporter(cache, source, { probeTimeoutMs: RPC_TIMEOUT_SECONDS * 1000 })
const engine = new TickerEngine({ cache, scheduler, health, symbols })

const supply = new SupplyReporter(rpc, source, { chain: CHAIN, ttlMs: SUPPLY_CACHE_SECONDS * 1000 })

const { httpServer } = createServer(engine, {
  liveEnabled: ENABLE_LIVE_ENDPOINTS,
  converters: { directory: source, chain: CHAIN },
  supply
})

httpServer.listen(PORT, () => {
  // eslint-disable-next-line no-console
  console.log(`Server listening on port ${PORT} (chain ${CHAIN}, live endpoints ${ENABLE_LIVE_ENDPOINTS ? 'on' : 'off'})`)
  scheduler.start()
  log('Server started')
})

function shutdown(signal: string) {
  log('%s received, shutting down', signal)
  scheduler.stop()
  httpServer.close(() => process.exit(0))
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
