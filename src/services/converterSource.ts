// src/services/converterSource.ts
import pLimit from 'p-limit'
import debug from 'debug'
import { converterSchema, definitionNamesSchema, RpcConverter, VerusRpcClient, VolumePair } from './verusRpc'
import { symbolForCurrencyId, SymbolTable } from '../symbols/currencyMappings'
import {
  ConverterCurrency,
  ConverterDirectory,
  ConverterListing,
  ConverterSnapshotSource,
  RawPoolRecord,
  SourceSnapshot,
  TrackedConverter
} from '../types'

const log = debug('app:source')

export interface ConverterSourceOptions {
  chain: string
  blocksPerDay: number
  maxConcurrency: number
  // empty means every converter the daemon reports
  trackedConverters?: readonly string[]
  // converters holding less of the chain's own currency are left out
  minNativeReserve?: number
}

function findPair(pairs: VolumePair[] | undefined, from: string, to: string): VolumePair | undefined {
  return pairs?.find((p) => p.currency === from && p.convertto === to)
}

// builds pool records from getcurrencyconverters + getcurrencystate over the last day of blocks
export class VerusConverterSource implements ConverterSnapshotSource, ConverterDirectory {
  constructor(
    private readonly rpc: VerusRpcClient,
    private readonly symbols: SymbolTable,
    private readonly options: ConverterSourceOptions
  ) {}

  getHeight(signal?: AbortSignal): Promise<number> {
    return this.rpc.getBlockCount(signal)
  }

  async fetchSnapshot(signal?: AbortSignal): Promise<SourceSnapshot> {
    const height = await this.getHeight(signal)
    const converters = await this.discoverConverters(signal)
    const limit = pLimit(Math.max(1, this.options.maxConcurrency))

    const perConverter = await Promise.all(converters.map((c) => limit(() => this.poolRecords(c, height, signal))))
    const records = perConverter.flat()
    log('fetched %d pool records from %d converters at height %d', records.length, converters.length, height)
    return { records, height }
  }

  async discoverConverters(signal?: AbortSignal): Promise<TrackedConverter[]> {
    const listing = await this.listConverters(signal)
    return listing.active
  }

  async listConverters(signal?: AbortSignal): Promise<ConverterListing> {
    const raw = await this.rpc.getCurrencyConverters(this.options.chain, signal)
    const tracked = this.options.trackedConverters ?? []
    const minNativeReserve = this.options.minNativeReserve ?? 0
    const active: TrackedConverter[] = []
    const belowThreshold: TrackedConverter[] = []

    for (const entry of raw) {
      const parsed = converterSchema.safeParse(entry)
      if (!parsed.success) {
        // eslint-disable-next-line no-console
        console.warn('skipping malformed converter entry:', parsed.error.issues[0]?.message ?? 'invalid')
        continue
      }
      const c = parsed.data
      if (tracked.length > 0 && !tracked.includes(c.fullyqualifiedname)) continue

      const described = this.describe(c)
      if (described.nativeReserve < minNativeReserve) {
        log('excluding %s: %d %s below %d', described.name, described.nativeReserve, this.options.chain, minNativeReserve)
        belowThreshold.push(described)
      } else {
        active.push(described)
      }
    }
    return { chain: this.options.chain, minNativeReserve, active, belowThreshold }
  }

  private describe(c: RpcConverter): TrackedConverter {
    const state = c.lastnotarization.currencystate
    const definition = definitionNamesSchema.safeParse(c[state.currencyid])
    const names = definition.success ? definition.data.currencynames ?? {} : {}

    const currencies: ConverterCurrency[] = [{ symbol: c.fullyqualifiedname, reserve: state.supply }]
    let nativeReserve = 0
    for (const rc of state.reservecurrencies) {
      const symbol = symbolForCurrencyId(this.symbols, rc.currencyid) ?? names[rc.currencyid] ?? rc.currencyid
      if (symbol === this.options.chain) nativeReserve += rc.reserves
      currencies.push({ symbol, reserve: rc.reserves })
    }
    return { name: c.fullyqualifiedname, currencyId: state.currencyid, nativeReserve, currencies }
  }

  // any failed volume call fails the whole snapshot; an empty answer only means no trades
  private async poolRecords(c: TrackedConverter, height: number, signal?: AbortSignal): Promise<RawPoolRecord[]> {
    const from = height - this.options.blocksPerDay
    const volumes = new Map<string, VolumePair[]>()

    for (const cur of c.currencies) {
      const pairs = await this.rpc.getVolumePairs(c.name, from, height, this.options.blocksPerDay, cur.symbol, signal)
      volumes.set(cur.symbol, pairs)
    }

    const records: RawPoolRecord[] = []
    for (const base of c.currencies) {
      for (const target of c.currencies) {
        if (base.symbol === target.symbol) continue
        const baseVolume = findPair(volumes.get(base.symbol), base.symbol, target.symbol)?.volume ?? 0
        const quote = findPair(volumes.get(target.symbol), base.symbol, target.symbol)
        const targetVolume = quote?.volume ?? 0
        if (baseVolume <= 0 && targetVolume <= 0) continue

        // the chain reports the rate as base per target; tickers quote target per base
        const close = quote?.close ?? 0
        records.push({
          converter: c.name,
          poolId: c.currencyId,
          baseCurrency: base.symbol,
          targetCurrency: target.symbol,
          baseReserve: base.reserve,
          targetReserve: target.reserve,
          baseVolume,
          targetVolume,
          lastPrice: close > 0 ? 1 / close : 0
        })
      }
    }
    return records
  }
}
