// tests/discovery-endpoints.test.ts
jest.setTimeout(20000)

import request from 'supertest'
import { createServer } from '../src/app'
import { SourceUnavailableError } from '../src/errors'
import { SupplyReporter } from '../src/services/supply'
import { ConverterListing } from '../src/types'
import { buildEngine, FakeSource } from './helpers'

const listing: ConverterListing = {
  chain: 'VRSC',
  minNativeReserve: 100,
  active: [
    {
      name: 'PoolA',
      currencyId: 'iPoolA',
      nativeReserve: 1000,
      currencies: [
        { symbol: 'PoolA', reserve: 500 },
        { symbol: 'VRSC', reserve: 1000 }
      ]
    }
  ],
  belowThreshold: [{ name: 'Tiny', currencyId: 'iTiny', nativeReserve: 5, currencies: [{ symbol: 'VRSC', reserve: 5 }] }]
}

function serve(fail: Error | null = null) {
  const directory = {
    listConverters: jest.fn(async (): Promise<ConverterListing> => {
      if (fail) throw fail
      return listing
    })
  }
  const supply = new SupplyReporter({ getCurrencySupply: async () => 20_000 }, directory, {
    chain: 'VRSC',
    ttlMs: 60_000,
    now: () => 0
  })
  const { httpServer } = createServer(buildEngine(new FakeSource()), {
    liveEnabled: false,
    accessLog: false,
    converters: { directory, chain: 'VRSC' },
    supply
  })
  return { server: httpServer, directory }
}

describe('converter discovery endpoint', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  test('GET /converters lists active and excluded converters', async () => {
    const { server } = serve()
    const res = await request(server).get('/converters')

    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      chain: 'VRSC',
      min_native_reserve: 100,
      active_count: 1,
      excluded_count: 1,
      active_converters: [
        {
          name: 'PoolA',
          currency_id: 'iPoolA',
          native_reserve: 1000,
          currencies: [
            { symbol: 'PoolA', reserve: 500 },
            { symbol: 'VRSC', reserve: 1000 }
          ]
        }
      ],
      excluded_converters: [
        { name: 'Tiny', currency_id: 'iTiny', native_reserve: 5, currencies: [{ symbol: 'VRSC', reserve: 5 }] }
      ]
    })
  })

  test('the chain parameter is case-insensitive and limited to the tracked chain', async () => {
    const { server, directory } = serve()

    expect((await request(server).get('/converters?chain=vrsc')).status).toBe(200)

    const res = await request(server).get('/converters?chain=CHIPS')
    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: 'Invalid chain \'CHIPS\'. Valid chains: ["VRSC"]' })
    expect(directory.listConverters).toHaveBeenCalledTimes(1)
  })

  test('a daemon failure answers 503 with its code', async () => {
    const { server } = serve(new SourceUnavailableError('getcurrencyconverters: connection refused'))
    const res = await request(server).get('/converters')

    expect(res.status).toBe(503)
    expect(res.body).toEqual({ error: 'getcurrencyconverters: connection refused', code: 'SOURCE_UNAVAILABLE' })
  })
})

describe('supply endpoint', () => {
  test('GET /verussupply reports locked and circulating supply', async () => {
    const { server } = serve()
    const res = await request(server).get('/verussupply')

    expect(res.status).toBe(200)
    expect(res.body.total_supply).toBe(20_000)
    expect(res.body.circulating_supply).toBe(19_000)
    expect(res.body.locked_supply).toEqual({
      in_converters: 1000,
      converter_count: 1,
      converter_details: [{ converter: 'PoolA', reserve: 1000 }]
    })
  })

  test('is not mounted unless configured', async () => {
    const { httpServer } = createServer(buildEngine(new FakeSource()), { liveEnabled: false, accessLog: false })
    expect((await request(httpServer).get('/verussupply')).status).toBe(404)
    expect((await request(httpServer).get('/converters')).status).toBe(404)
  })
})
