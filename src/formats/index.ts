// src/formats/index.ts
import { SymbolTable } from '../symbols/currencyMappings'
import { TickerSet } from '../types'
import { CoinGeckoTicker, renderCoinGecko } from './coingecko'
import { CoinMarketCapSummary, renderCoinMarketCap, renderCoinMarketCapIAddress } from './coinmarketcap'
import { CoinpaprikaResponse, renderCoinpaprika } from './coinpaprika'

export const FORMATS = ['coingecko', 'coinmarketcap', 'coinmarketcap_iaddress', 'coinpaprika'] as const

export type FormatTag = (typeof FORMATS)[number]

export interface FormatShapes {
  coingecko: CoinGeckoTicker[]
  coinmarketcap: CoinMarketCapSummary
  coinmarketcap_iaddress: CoinMarketCapSummary
  coinpaprika: CoinpaprikaResponse
}

export type ExternalShape = FormatShapes[FormatTag]

type Renderers = { [F in FormatTag]: (set: TickerSet, symbols: SymbolTable) => FormatShapes[F] }

const renderers: Renderers = {
  coingecko: renderCoinGecko,
  coinmarketcap: renderCoinMarketCap,
  coinmarketcap_iaddress: renderCoinMarketCapIAddress,
  coinpaprika: renderCoinpaprika
}

export function isFormatTag(v: string): v is FormatTag {
  return FORMATS.some((f) => f === v)
}

export function renderFormat(tag: FormatTag, set: TickerSet, symbols: SymbolTable): ExternalShape {
  return renderers[tag](set, symbols)
}

export { renderCoinGecko, renderCoinMarketCap, renderCoinMarketCapIAddress, renderCoinpaprika }
export type { CoinGeckoTicker, CoinMarketCapSummary, CoinpaprikaResponse }
