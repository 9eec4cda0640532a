// src/cache/tickerCache.ts
import debug from 'debug'
import { aggregateTickers } from '../services/aggregator'
import { errorCode, toError } from '../errors'
import { withTimeout } from '../utils/timeout'
import { CacheMetadata, RefreshError, RefreshOutcome, SourceSnapshot, TickerSet } from '../types'

const log = debug('app:cache')

export type SnapshotFetcher = (signal: AbortSignal) => Promise<SourceSnapshot>

export interface TickerCacheOptions {
  ttlMs: number
  timeoutMs: number
  quotePriority?: readonly string[]
  now?: () => number
}

/**
 * In-memory holder of the latest published TickerSet for one chain.
 *
 * Reads return the current reference and never wait on a refresh. At most one
 * refresh runs at a time; a new snapshot replaces the old one in a single
 * assignment, and a failed or timed-out refresh leaves the old one in place.
 */
export class TickerCache {
  private snapshot: TickerSet | null = null
  private lastRefreshAt: number | null = null
  private lastAttemptAt: number | null = null
  private lastError: RefreshError | null = null
  private inFlight: Promise<RefreshOutcome> | null = null
  private readonly now: () => number

  constructor(private readonly options: TickerCacheOptions) {
    this.now = options.now ?? Date.now
  }

  read(): TickerSet | null {
    return this.snapshot
  }

  pending(): Promise<RefreshOutcome> | null {
    return this.inFlight
  }

  refresh(fetchFn: SnapshotFetcher): Promise<RefreshOutcome> {
    if (this.inFlight) {
      log('refresh requested while one is in flight')
      return Promise.resolve({ status: 'already-refreshing' })
    }
    const run = this.runRefresh(fetchFn).finally(() => {
      this.inFlight = null
    })
    this.inFlight = run
    return run
  }

  metadata(): CacheMetadata {
    const ageMs = this.snapshot ? Math.max(0, this.now() - this.snapshot.timestamp) : null
    return {
      lastRefreshAt: this.lastRefreshAt,
      lastAttemptAt: this.lastAttemptAt,
      blockHeight: this.snapshot ? this.snapshot.blockHeight : null,
      refreshing: this.inFlight !== null,
      lastError: this.lastError,
      ageMs,
      stale: ageMs === null || ageMs > this.options.ttlMs,
      tickerCount: this.snapshot ? this.snapshot.tickers.length : 0
    }
  }

  private async runRefresh(fetchFn: SnapshotFetcher): Promise<RefreshOutcome> {
    this.lastAttemptAt = this.now()
    try {
      // the network round trip is the only suspension point
      const { records, height } = await withTimeout(fetchFn, this.options.timeoutMs, 'converter snapshot')
      const next = aggregateTickers(records, {
        blockHeight: height,
        now: this.now(),
        quotePriority: this.options.quotePriority
      })
      this.snapshot = next
      this.lastRefreshAt = next.timestamp
      this.lastError = null
      log('published %d tickers at height %d', next.tickers.length, next.blockHeight)
      return { status: 'refreshed', snapshot: next }
    } catch (e: unknown) {
      const error = toError(e)
      this.lastError = { code: errorCode(error), message: error.message, at: this.now() }
      // eslint-disable-next-line no-console
      console.error('ticker refresh failed, keeping previous snapshot:', error.message)
      return { status: 'failed', error }
    }
  }
}
