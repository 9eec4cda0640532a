// src/services/scheduler.ts
import debug from 'debug'
import { TickerCache } from '../cache/tickerCache'
import { toError } from '../errors'
import { withTimeout } from '../utils/timeout'
import { ConverterSnapshotSource, RefreshOutcome, RefreshTrigger } from '../types'

const log = debug('app:scheduler')

export interface SchedulerOptions {
  intervalMs: number
  pollIntervalMs: number
  probeTimeoutMs: number
  now?: () => number
}

// two triggers (wall clock and chain height) feeding the cache's single refresh entry point
export class RefreshScheduler {
  private timer: NodeJS.Timeout | null = null
  private poller: NodeJS.Timeout | null = null
  private readonly now: () => number

  constructor(
    private readonly cache: TickerCache,
    private readonly source: ConverterSnapshotSource,
    private readonly options: SchedulerOptions
  ) {
    this.now = options.now ?? Date.now
  }

  get running(): boolean {
    return this.timer !== null
  }

  async trigger(reason: RefreshTrigger): Promise<RefreshOutcome> {
    log('refresh triggered by %s', reason)
    const outcome = await this.cache.refresh((signal) => this.source.fetchSnapshot(signal))
    if (outcome.status === 'refreshed') {
      log('%s refresh published %d tickers at height %d', reason, outcome.snapshot.tickers.length, outcome.snapshot.blockHeight)
    } else if (outcome.status === 'already-refreshing') {
      log('%s refresh collapsed into the one in flight', reason)
    }
    return outcome
  }

  /**
   * Refresh when the chain advanced past the cached height, or when the interval
   * has elapsed since the last attempt. Otherwise nothing is fetched.
   */
  async check(): Promise<RefreshTrigger | null> {
    const meta = this.cache.metadata()
    if (meta.refreshing) return null

    let height: number | null = null
    try {
      height = await withTimeout((signal) => this.source.getHeight(signal), this.options.probeTimeoutMs, 'height probe')
    } catch (e: unknown) {
      log('height probe failed: %s', toError(e).message)
    }

    let reason: RefreshTrigger | null = null
    if (height !== null && (meta.blockHeight === null || height > meta.blockHeight)) {
      reason = 'block'
    } else if (meta.lastAttemptAt === null || this.now() - meta.lastAttemptAt >= this.options.intervalMs) {
      reason = 'timer'
    }
    if (reason !== null) {
      // a refresh that started during the probe already covers this one
      const outcome = await this.trigger(reason)
      return outcome.status === 'already-refreshing' ? null : reason
    }

    return null
  }

  // start both triggers (idempotent)
  start(): void {
    if (this.timer) return

    this.trigger('startup').catch((e: unknown) => {
      log('startup refresh error', toError(e).message)
    })

    this.timer = setInterval(() => {
      this.trigger('timer').catch((e: unknown) => {
        log('timer refresh error', toError(e).message)
      })
    }, this.options.intervalMs)

    this.poller = setInterval(() => {
      this.check().catch((e: unknown) => {
        log('block check error', toError(e).message)
      })
    }, this.options.pollIntervalMs)

    log('scheduler started, intervalMs=%d pollIntervalMs=%d', this.options.intervalMs, this.options.pollIntervalMs)
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    if (this.poller) {
      clearInterval(this.poller)
      this.poller = null
    }
    log('scheduler stopped')
  }
}
