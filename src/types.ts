// src/types.ts

// one directional pool quote as reported by a converter (ephemeral, never mutated)
export interface RawPoolRecord {
  converter: string
  poolId: string
  baseCurrency: string
  targetCurrency: string
  baseReserve: number
  targetReserve: number
  baseVolume: number
  targetVolume: number
  lastPrice: number
}

// unordered pair of symbols, canonicalized as "<a>/<b>" with a < b
export type CurrencyPairKey = string

export interface AggregatedTicker {
  key: CurrencyPairKey
  baseCurrency: string
  targetCurrency: string
  lastPrice: number
  baseVolume: number
  targetVolume: number
  high: number
  low: number
  open: number
  contributors: number
  poolId: string
  poolIds: readonly string[]
}

export interface TickerSet {
  readonly tickers: readonly Readonly<AggregatedTicker>[]
  readonly timestamp: number // epoch ms
  readonly blockHeight: number
}

export interface SourceSnapshot {
  records: RawPoolRecord[]
  height: number
}

// opaque data source backed by the chain daemon
export interface ConverterSnapshotSource {
  fetchSnapshot(signal?: AbortSignal): Promise<SourceSnapshot>
  getHeight(signal?: AbortSignal): Promise<number>
}

export interface RefreshError {
  code: string
  message: string
  at: number
}

export interface CacheMetadata {
  lastRefreshAt: number | null
  lastAttemptAt: number | null
  blockHeight: number | null
  refreshing: boolean
  lastError: RefreshError | null
  ageMs: number | null
  stale: boolean
  tickerCount: number
}

export type RefreshOutcome =
  | { status: 'refreshed'; snapshot: TickerSet }
  | { status: 'already-refreshing' }
  | { status: 'failed'; error: Error }

export type RefreshTrigger = 'startup' | 'timer' | 'block' | 'manual' | 'live'

export interface HealthReport {
  status: 'healthy' | 'degraded'
  reachable: boolean
  current_block: number | null
  block_height: number | null
  last_refresh_age_seconds: number | null
  last_error: RefreshError | null
  stale: boolean
  refreshing: boolean
  ticker_count: number
  timestamp: string
}

export interface ConverterCurrency {
  symbol: string
  reserve: number
}

export interface TrackedConverter {
  name: string
  currencyId: string
  // reserve of the chain's own currency; 0 when the converter holds none
  nativeReserve: number
  currencies: ConverterCurrency[]
}

export interface ConverterListing {
  chain: string
  minNativeReserve: number
  active: TrackedConverter[]
  belowThreshold: TrackedConverter[]
}

// converter discovery, as served by /converters
export interface ConverterDirectory {
  listConverters(signal?: AbortSignal): Promise<ConverterListing>
}

export interface SupplyReport {
  chain: string
  total_supply: number
  circulating_supply: number
  locked_supply: {
    in_converters: number
    converter_count: number
    converter_details: { converter: string; reserve: number }[]
  }
  timestamp: string
}
