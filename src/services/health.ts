// src/services/health.ts
import debug from 'debug'
import { TickerCache } from '../cache/tickerCache'
import { toError } from '../errors'
import { withTimeout } from '../utils/timeout'
import { ConverterSnapshotSource, HealthReport } from '../types'

const log = debug('app:health')

export interface HealthOptions {
  probeTimeoutMs: number
  now?: () => number
}

// read-only view over cache metadata plus an optional liveness probe of the source
export class HealthReporter {
  private readonly now: () => number

  constructor(
    private readonly cache: TickerCache,
    private readonly source: ConverterSnapshotSource,
    private readonly options: HealthOptions
  ) {
    this.now = options.now ?? Date.now
  }

  async report({ probe = true }: { probe?: boolean } = {}): Promise<HealthReport> {
    const meta = this.cache.metadata()

    let reachable = meta.lastRefreshAt !== null && meta.lastError === null
    let currentBlock: number | null = null
    if (probe) {
      try {
        currentBlock = await withTimeout((signal) => this.source.getHeight(signal), this.options.probeTimeoutMs, 'health probe')
        reachable = true
      } catch (e: unknown) {
        log('health probe failed: %s', toError(e).message)
        reachable = false
      }
    }

    return {
      status: reachable && !meta.stale ? 'healthy' : 'degraded',
      reachable,
      current_block: currentBlock,
      block_height: meta.blockHeight,
      last_refresh_age_seconds: meta.ageMs === null ? null : Math.floor(meta.ageMs / 1000),
      last_error: meta.lastError,
      stale: meta.stale,
      refreshing: meta.refreshing,
      ticker_count: meta.tickerCount,
      timestamp: new Date(this.now()).toISOString()
    }
  }
}
