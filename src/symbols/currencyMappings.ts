// src/symbols/currencyMappings.ts
import fs from 'fs'
import { z } from 'zod'
import debug from 'debug'

const log = debug('app:symbols')

const mappingSchema = z.object({
  currencyId: z.string().min(1),
  ethSymbol: z.string().min(1).optional(),
  ethAddress: z.string().min(1).optional()
})

const fileSchema = z.object({
  currencies: z.record(mappingSchema),
  excluded: z.array(z.string()).default([])
})

export type CurrencyMapping = z.infer<typeof mappingSchema>

// static lookup keyed by native symbol; byId is the reverse index
export interface SymbolTable {
  currencies: ReadonlyMap<string, CurrencyMapping>
  byId: ReadonlyMap<string, string>
  excluded: ReadonlySet<string>
}

export function createSymbolTable(input: unknown): SymbolTable {
  const parsed = fileSchema.parse(input)
  const currencies = new Map<string, CurrencyMapping>(Object.entries(parsed.currencies))
  const byId = new Map<string, string>()
  for (const [symbol, m] of currencies) byId.set(m.currencyId, symbol)
  return { currencies, byId, excluded: new Set(parsed.excluded) }
}

export function loadSymbolTable(file: string): SymbolTable {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
  const table = createSymbolTable(raw)
  log('loaded %d currency mappings (%d excluded) from %s', table.currencies.size, table.excluded.size, file)
  return table
}

// ERC20 symbol for currencies bridged to Ethereum, native symbol otherwise
export function displaySymbol(table: SymbolTable, symbol: string): string {
  const m = table.currencies.get(symbol)
  if (m && m.ethAddress && m.ethSymbol) return m.ethSymbol
  return symbol
}

// contract address when bridged, then native id, then the symbol itself
export function externalId(table: SymbolTable, symbol: string): string {
  const m = table.currencies.get(symbol)
  if (!m) return symbol
  return m.ethAddress ?? m.currencyId
}

export function nativeId(table: SymbolTable, symbol: string): string | undefined {
  return table.currencies.get(symbol)?.currencyId
}

export function symbolForCurrencyId(table: SymbolTable, currencyId: string): string | undefined {
  return table.byId.get(currencyId)
}

export function isExcluded(table: SymbolTable, symbol: string): boolean {
  return table.excluded.has(symbol)
}
