// src/formats/coinmarketcap.ts
import debug from 'debug'
import { formatDecimal } from '../utils/decimal'
import { displaySymbol, externalId, isExcluded, nativeId, SymbolTable } from '../symbols/currencyMappings'
import { AggregatedTicker, TickerSet } from '../types'

const log = debug('app:formats')

export interface CoinMarketCapTicker {
  base_id: string
  base_name: string
  base_symbol: string
  quote_id: string
  quote_name: string
  quote_symbol: string
  last_price: string
  base_volume: string
  quote_volume: string
}

// keyed by stringified index: "0", "1", ...
export type CoinMarketCapSummary = Record<string, CoinMarketCapTicker>

function entry(
  t: Readonly<AggregatedTicker>,
  base: { id: string; symbol: string },
  quote: { id: string; symbol: string }
): CoinMarketCapTicker {
  return {
    base_id: base.id,
    base_name: base.symbol,
    base_symbol: base.symbol,
    quote_id: quote.id,
    quote_name: quote.symbol,
    quote_symbol: quote.symbol,
    last_price: formatDecimal(t.lastPrice),
    base_volume: formatDecimal(t.baseVolume),
    quote_volume: formatDecimal(t.targetVolume)
  }
}

export function renderCoinMarketCap(set: TickerSet, symbols: SymbolTable): CoinMarketCapSummary {
  const out: CoinMarketCapSummary = {}
  let i = 0
  for (const t of set.tickers) {
    if (isExcluded(symbols, t.baseCurrency) || isExcluded(symbols, t.targetCurrency)) continue
    out[String(i++)] = entry(
      t,
      { id: externalId(symbols, t.baseCurrency), symbol: displaySymbol(symbols, t.baseCurrency) },
      { id: externalId(symbols, t.targetCurrency), symbol: displaySymbol(symbols, t.targetCurrency) }
    )
  }
  return out
}

/**
 * CoinMarketCap shape with native chain identifiers (i-addresses) as ids.
 *
 * Converter currencies are kept here. A pair with a currency missing from the
 * symbol table is omitted, and the remaining keys stay consecutive.
 */
export function renderCoinMarketCapIAddress(set: TickerSet, symbols: SymbolTable): CoinMarketCapSummary {
  const out: CoinMarketCapSummary = {}
  let i = 0
  for (const t of set.tickers) {
    const baseId = nativeId(symbols, t.baseCurrency)
    const quoteId = nativeId(symbols, t.targetCurrency)
    if (baseId === undefined || quoteId === undefined) {
      log('omitting %s from i-address output: no native id mapped', t.key)
      continue
    }
    out[String(i++)] = entry(t, { id: baseId, symbol: t.baseCurrency }, { id: quoteId, symbol: t.targetCurrency })
  }
  return out
}
