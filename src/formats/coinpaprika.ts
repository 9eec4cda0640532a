// src/formats/coinpaprika.ts
import { formatDecimal } from '../utils/decimal'
import { displaySymbol, isExcluded, SymbolTable } from '../symbols/currencyMappings'
import { TickerSet } from '../types'

export interface CoinpaprikaTicker {
  symbol: string
  symbolName: string
  volume: string
  last: string
  high: string
  low: string
  open: string
}

export interface CoinpaprikaResponse {
  code: '200000'
  data: {
    time: number
    ticker: CoinpaprikaTicker[]
  }
}

export function renderCoinpaprika(set: TickerSet, symbols: SymbolTable): CoinpaprikaResponse {
  const rows = set.tickers
    .filter((t) => !isExcluded(symbols, t.baseCurrency) && !isExcluded(symbols, t.targetCurrency))
    // Array.prototype.sort is stable, so equal volumes keep pair-key order
    .sort((a, b) => b.baseVolume - a.baseVolume)

  const ticker = rows.map((t): CoinpaprikaTicker => {
    const symbol = `${displaySymbol(symbols, t.baseCurrency)}-${displaySymbol(symbols, t.targetCurrency)}`
    return {
      symbol,
      symbolName: symbol,
      volume: formatDecimal(t.baseVolume),
      last: formatDecimal(t.lastPrice),
      high: formatDecimal(t.high),
      low: formatDecimal(t.low),
      open: formatDecimal(t.open)
    }
  })

  return { code: '200000', data: { time: set.timestamp, ticker } }
}
