// tests/helpers.ts
import { TickerCache } from '../src/cache/tickerCache'
import { HealthReporter } from '../src/services/health'
import { RefreshScheduler } from '../src/services/scheduler'
import { TickerEngine } from '../src/services/tickerEngine'
import { createSymbolTable } from '../src/symbols/currencyMappings'
import { ConverterSnapshotSource, RawPoolRecord, SourceSnapshot } from '../src/types'

export function record(overrides: Partial<RawPoolRecord> = {}): RawPoolRecord {
  return {
    converter: 'Bridge.vETH',
    poolId: 'pool-a',
    baseCurrency: 'VRSC',
    targetCurrency: 'DAI',
    baseReserve: 1000,
    targetReserve: 2000,
    baseVolume: 50,
    targetVolume: 100,
    lastPrice: 2,
    ...overrides
  }
}

export const testSymbols = () =>
  createSymbolTable({
    currencies: {
      VRSC: { currencyId: 'iVRSC' },
      DAI: { currencyId: 'iDAI', ethSymbol: 'DAI', ethAddress: '0xdai' },
      'tBTC.vETH': { currencyId: 'iTBTC', ethSymbol: 'tBTC', ethAddress: '0xtbtc' },
      'Bridge.vETH': { currencyId: 'iBRIDGE' }
    },
    excluded: ['Bridge.vETH']
  })

// in-process stand-in for the daemon-backed source
export class FakeSource implements ConverterSnapshotSource {
  height = 100
  records: RawPoolRecord[] = [record()]
  fail: Error | null = null
  heightFail: Error | null = null
  fetches = 0
  probes = 0

  async fetchSnapshot(): Promise<SourceSnapshot> {
    this.fetches++
    if (this.fail) throw this.fail
    return { records: this.records, height: this.height }
  }

  async getHeight(): Promise<number> {
    this.probes++
    if (this.heightFail) throw this.heightFail
    return this.height
  }
}

export function deferred<T>() {
  let resolve: (v: T) => void = () => undefined
  let reject: (e: Error) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

export const FIXED_NOW = 1_700_000_000_000

// full engine over a fake source, with a frozen clock
export function buildEngine(source: ConverterSnapshotSource, now = () => FIXED_NOW) {
  const cache = new TickerCache({ ttlMs: 60_000, timeoutMs: 1000, quotePriority: ['DAI'], now })
  const scheduler = new RefreshScheduler(cache, source, {
    intervalMs: 60_000,
    pollIntervalMs: 15_000,
    probeTimeoutMs: 1000,
    now
  })
  const health = new HealthReporter(cache, source, { probeTimeoutMs: 1000, now })
  return new TickerEngine({ cache, scheduler, health, symbols: testSymbols() })
}
