// src/services/tickerEngine.ts
import { TickerCache } from '../cache/tickerCache'
import { LiveRefreshError } from '../errors'
import { ExternalShape, FormatTag, renderFormat } from '../formats'
import { SymbolTable } from '../symbols/currencyMappings'
import { HealthReport, RefreshOutcome, RefreshTrigger } from '../types'
import { HealthReporter } from './health'
import { RefreshScheduler } from './scheduler'

const LIVE_ATTEMPTS = 3

export interface TickerEngineDeps {
  cache: TickerCache
  scheduler: RefreshScheduler
  health: HealthReporter
  symbols: SymbolTable
}

// what the HTTP layer sees of one tracked chain
export class TickerEngine {
  readonly cache: TickerCache
  readonly scheduler: RefreshScheduler
  private readonly reporter: HealthReporter
  private readonly symbols: SymbolTable

  constructor(deps: TickerEngineDeps) {
    this.cache = deps.cache
    this.scheduler = deps.scheduler
    this.reporter = deps.health
    this.symbols = deps.symbols
  }

  // never refreshes; null while nothing has been published yet
  readCached(format: FormatTag): ExternalShape | null {
    const set = this.cache.read()
    return set ? renderFormat(format, set, this.symbols) : null
  }

  async readLive(format: FormatTag): Promise<ExternalShape> {
    const outcome = await this.settledRefresh()
    if (outcome.status !== 'refreshed') throw new LiveRefreshError(outcome.error)
    return renderFormat(format, outcome.snapshot, this.symbols)
  }

  // the outcome of a refresh this call started or joined; a collision whose refresh already settled starts another
  private async settledRefresh(): Promise<Exclude<RefreshOutcome, { status: 'already-refreshing' }>> {
    for (let attempt = 0; attempt < LIVE_ATTEMPTS; attempt++) {
      const outcome = await this.scheduler.trigger('live')
      if (outcome.status !== 'already-refreshing') return outcome
      const pending = this.cache.pending()
      if (pending) {
        const joined = await pending
        if (joined.status !== 'already-refreshing') return joined
      }
    }
    return { status: 'failed', error: new Error(`no refresh settled after ${LIVE_ATTEMPTS} attempts`) }
  }

  refresh(reason: RefreshTrigger = 'manual'): Promise<RefreshOutcome> {
    return this.scheduler.trigger(reason)
  }

  health(options?: { probe?: boolean }): Promise<HealthReport> {
    return this.reporter.report(options)
  }
}
