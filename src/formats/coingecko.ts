// src/formats/coingecko.ts
import { formatDecimal } from '../utils/decimal'
import { displaySymbol, isExcluded, SymbolTable } from '../symbols/currencyMappings'
import { TickerSet } from '../types'

export interface CoinGeckoTicker {
  ticker_id: string
  pool_id: string
  base_currency: string
  target_currency: string
  last_price: string
  base_volume: string
  target_volume: string
}

export function renderCoinGecko(set: TickerSet, symbols: SymbolTable): CoinGeckoTicker[] {
  const out: CoinGeckoTicker[] = []
  for (const t of set.tickers) {
    if (isExcluded(symbols, t.baseCurrency) || isExcluded(symbols, t.targetCurrency)) continue
    const base = displaySymbol(symbols, t.baseCurrency)
    const target = displaySymbol(symbols, t.targetCurrency)
    out.push({
      ticker_id: `${base}-${target}`,
      pool_id: t.poolId,
      base_currency: base,
      target_currency: target,
      last_price: formatDecimal(t.lastPrice),
      base_volume: formatDecimal(t.baseVolume),
      target_volume: formatDecimal(t.targetVolume)
    })
  }
  return out
}
