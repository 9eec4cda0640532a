// tests/currency-mappings.test.ts
import path from 'path'
import {
  createSymbolTable,
  displaySymbol,
  externalId,
  isExcluded,
  loadSymbolTable,
  nativeId,
  symbolForCurrencyId
} from '../src/symbols/currencyMappings'
import { testSymbols } from './helpers'

describe('symbol table', () => {
  const table = testSymbols()

  test('bridged currencies display their ERC20 symbol and address', () => {
    expect(displaySymbol(table, 'tBTC.vETH')).toBe('tBTC')
    expect(externalId(table, 'tBTC.vETH')).toBe('0xtbtc')
  })

  test('native currencies keep their symbol and i-address', () => {
    expect(displaySymbol(table, 'VRSC')).toBe('VRSC')
    expect(externalId(table, 'VRSC')).toBe('iVRSC')
    expect(nativeId(table, 'VRSC')).toBe('iVRSC')
  })

  test('unmapped currencies fall back to the symbol', () => {
    expect(displaySymbol(table, 'MYSTERY')).toBe('MYSTERY')
    expect(externalId(table, 'MYSTERY')).toBe('MYSTERY')
    expect(nativeId(table, 'MYSTERY')).toBeUndefined()
  })

  test('reverse lookup and exclusion', () => {
    expect(symbolForCurrencyId(table, 'iDAI')).toBe('DAI')
    expect(symbolForCurrencyId(table, 'iNOPE')).toBeUndefined()
    expect(isExcluded(table, 'Bridge.vETH')).toBe(true)
    expect(isExcluded(table, 'VRSC')).toBe(false)
  })

  test('an ethSymbol without an address is not used for display', () => {
    const t = createSymbolTable({ currencies: { 'X.vETH': { currencyId: 'iX', ethSymbol: 'X' } } })
    expect(displaySymbol(t, 'X.vETH')).toBe('X.vETH')
    expect(t.excluded.size).toBe(0)
  })

  test('rejects a mapping without a currency id', () => {
    expect(() => createSymbolTable({ currencies: { BAD: { ethSymbol: 'B' } } })).toThrow()
  })

  test('the shipped mapping file loads', () => {
    const shipped = loadSymbolTable(path.join(__dirname, '..', 'data', 'currency-mappings.json'))
    expect(nativeId(shipped, 'VRSC')).toBe('i5w5MuNik5NtLcYmNzcvaoixooEebB6MGV')
    expect(displaySymbol(shipped, 'DAI.vETH')).toBe('DAI')
    expect(isExcluded(shipped, 'Bridge.vETH')).toBe(true)
  })
})
