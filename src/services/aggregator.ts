// src/services/aggregator.ts
import debug from 'debug'
import { AggregatedTicker, CurrencyPairKey, RawPoolRecord, TickerSet } from '../types'

const log = debug('app:aggregator')

export interface AggregateOptions {
  blockHeight: number
  now?: number
  // symbols that take the target side of a pair; earlier entries win
  quotePriority?: readonly string[]
}

interface PairAccumulator {
  key: CurrencyPairKey
  base: string
  target: string
  weightedSum: number
  baseVolume: number
  targetVolume: number
  high: number
  low: number
  open: number
  contributors: number
  poolVolumes: Map<string, number>
}

function compare(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function positive(n: number): boolean {
  return Number.isFinite(n) && n > 0
}

// reason the record cannot contribute, or null when usable
export function malformedReason(r: RawPoolRecord): string | null {
  if (r.baseCurrency === r.targetCurrency) return 'base equals target'
  if (!positive(r.baseReserve) || !positive(r.targetReserve)) return 'non-positive reserve'
  if (!positive(r.baseVolume) || !positive(r.targetVolume)) return 'non-positive volume'
  if (!positive(r.lastPrice)) return 'non-positive price'
  return null
}

export function pairKey(a: string, b: string): CurrencyPairKey {
  return compare(a, b) <= 0 ? `${a}/${b}` : `${b}/${a}`
}

// canonical [base, target]: a prioritized quote currency is the target, otherwise lexicographic
export function orientPair(a: string, b: string, quotePriority: readonly string[] = []): [string, string] {
  const ra = quotePriority.indexOf(a)
  const rb = quotePriority.indexOf(b)
  if (ra >= 0 && (rb < 0 || ra < rb)) return [b, a]
  if (rb >= 0) return [a, b]
  return compare(a, b) <= 0 ? [a, b] : [b, a]
}

function stableOrder(records: readonly RawPoolRecord[]): RawPoolRecord[] {
  return [...records].sort(
    (x, y) =>
      compare(x.poolId, y.poolId) ||
      compare(x.converter, y.converter) ||
      compare(x.baseCurrency, y.baseCurrency) ||
      compare(x.targetCurrency, y.targetCurrency)
  )
}

function primaryPool(poolVolumes: Map<string, number>): string {
  let best = ''
  let bestVolume = -Infinity
  // Map iteration follows insertion (stable) order, so the first pool wins ties
  for (const [pool, volume] of poolVolumes) {
    if (volume > bestVolume) {
      best = pool
      bestVolume = volume
    }
  }
  return best
}

/**
 * Merge pool quotes into one volume-weighted ticker per currency pair.
 *
 * Malformed records are filtered and logged. Quotes for B/A are inverted into the
 * canonical A/B orientation before weighting. A pair whose summed target volume
 * is zero is dropped.
 */
export function aggregateTickers(records: readonly RawPoolRecord[], options: AggregateOptions): TickerSet {
  const quotePriority = options.quotePriority ?? []
  const groups = new Map<CurrencyPairKey, PairAccumulator>()
  let malformed = 0

  for (const r of stableOrder(records)) {
    const reason = malformedReason(r)
    if (reason) {
      malformed++
      log('skipping malformed record %s %s/%s: %s', r.poolId, r.baseCurrency, r.targetCurrency, reason)
      continue
    }

    const key = pairKey(r.baseCurrency, r.targetCurrency)
    let acc = groups.get(key)
    if (!acc) {
      const [base, target] = orientPair(r.baseCurrency, r.targetCurrency, quotePriority)
      acc = {
        key,
        base,
        target,
        weightedSum: 0,
        baseVolume: 0,
        targetVolume: 0,
        high: -Infinity,
        low: Infinity,
        open: 0,
        contributors: 0,
        poolVolumes: new Map()
      }
      groups.set(key, acc)
    }

    const inverted = r.baseCurrency !== acc.base
    const price = inverted ? 1 / r.lastPrice : r.lastPrice
    const baseVolume = inverted ? r.targetVolume : r.baseVolume
    const targetVolume = inverted ? r.baseVolume : r.targetVolume

    if (acc.contributors === 0) acc.open = price
    acc.weightedSum += price * targetVolume
    acc.baseVolume += baseVolume
    acc.targetVolume += targetVolume
    acc.high = Math.max(acc.high, price)
    acc.low = Math.min(acc.low, price)
    acc.contributors++
    acc.poolVolumes.set(r.poolId, (acc.poolVolumes.get(r.poolId) ?? 0) + targetVolume)
  }

  const tickers: AggregatedTicker[] = []
  for (const acc of groups.values()) {
    if (!(acc.targetVolume > 0)) {
      log('dropping zero-volume pair %s', acc.key)
      continue
    }
    const weighted = acc.weightedSum / acc.targetVolume
    tickers.push(
      Object.freeze({
        key: acc.key,
        baseCurrency: acc.base,
        targetCurrency: acc.target,
        // float error can push the mean a hair outside the contributing range
        lastPrice: Math.min(acc.high, Math.max(acc.low, weighted)),
        baseVolume: acc.baseVolume,
        targetVolume: acc.targetVolume,
        high: acc.high,
        low: acc.low,
        open: acc.open,
        contributors: acc.contributors,
        poolId: primaryPool(acc.poolVolumes),
        poolIds: Object.freeze(Array.from(acc.poolVolumes.keys()))
      })
    )
  }
  tickers.sort((a, b) => compare(a.key, b.key))

  log('aggregated %d records into %d pairs (%d malformed)', records.length, tickers.length, malformed)

  return Object.freeze({
    tickers: Object.freeze(tickers),
    timestamp: options.now ?? Date.now(),
    blockHeight: options.blockHeight
  })
}
