// tests/ticker-cache.test.ts
import { TickerCache } from '../src/cache/tickerCache'
import { SourceTimeoutError, SourceUnavailableError } from '../src/errors'
import { SourceSnapshot } from '../src/types'
import { deferred, record } from './helpers'

let clock = 1000
const now = () => clock

function makeCache(timeoutMs = 1000) {
  return new TickerCache({ ttlMs: 60_000, timeoutMs, quotePriority: ['DAI'], now })
}

const snapshot = (height = 100) => async (): Promise<SourceSnapshot> => ({ records: [record()], height })

describe('TickerCache', () => {
  beforeEach(() => {
    clock = 1000
    jest.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  test('starts empty and stale', () => {
    const cache = makeCache()
    expect(cache.read()).toBeNull()
    expect(cache.metadata()).toEqual({
      lastRefreshAt: null,
      lastAttemptAt: null,
      blockHeight: null,
      refreshing: false,
      lastError: null,
      ageMs: null,
      stale: true,
      tickerCount: 0
    })
  })

  test('refresh publishes the aggregated snapshot', async () => {
    const cache = makeCache()
    const outcome = await cache.refresh(snapshot())

    if (outcome.status !== 'refreshed') throw new Error(`unexpected outcome ${outcome.status}`)
    expect(cache.read()).toBe(outcome.snapshot)
    expect(outcome.snapshot.tickers.map((t) => t.key)).toEqual(['DAI/VRSC'])

    const meta = cache.metadata()
    expect(meta.lastRefreshAt).toBe(1000)
    expect(meta.blockHeight).toBe(100)
    expect(meta.tickerCount).toBe(1)
    expect(meta.ageMs).toBe(0)
    expect(meta.stale).toBe(false)
  })

  test('a second refresh while one is in flight is a no-op', async () => {
    const cache = makeCache()
    const d = deferred<SourceSnapshot>()
    const fetch = jest.fn(() => d.promise)

    const first = cache.refresh(fetch)
    const second = await cache.refresh(fetch)

    expect(second).toEqual({ status: 'already-refreshing' })
    expect(fetch).toHaveBeenCalledTimes(1)
    expect(cache.metadata().refreshing).toBe(true)
    expect(cache.pending()).toBe(first)
    // readers never wait on the writer
    expect(cache.read()).toBeNull()

    d.resolve({ records: [record()], height: 7 })
    expect((await first).status).toBe('refreshed')
    expect(cache.pending()).toBeNull()
    expect(cache.metadata().refreshing).toBe(false)
    expect(cache.metadata().blockHeight).toBe(7)
  })

  test('a failed refresh keeps the previous snapshot and records the error', async () => {
    const cache = makeCache()
    await cache.refresh(snapshot(100))
    const before = cache.read()

    clock = 2000
    const outcome = await cache.refresh(async () => {
      throw new SourceUnavailableError('daemon down')
    })

    expect(outcome.status).toBe('failed')
    expect(cache.read()).toBe(before)
    const meta = cache.metadata()
    expect(meta.lastError).toEqual({ code: 'SOURCE_UNAVAILABLE', message: 'daemon down', at: 2000 })
    expect(meta.lastAttemptAt).toBe(2000)
    expect(meta.lastRefreshAt).toBe(1000)

    clock = 3000
    await cache.refresh(snapshot(101))
    expect(cache.metadata().lastError).toBeNull()
    expect(cache.metadata().blockHeight).toBe(101)
  })

  test('non-error throws are recorded as internal failures', async () => {
    const cache = makeCache()
    await cache.refresh(async () => {
      throw 'boom'
    })
    expect(cache.metadata().lastError).toEqual({ code: 'INTERNAL', message: 'boom', at: 1000 })
  })

  test('a slow source times out and its request is aborted', async () => {
    const cache = makeCache(20)
    const signals: AbortSignal[] = []

    const outcome = await cache.refresh((signal) => {
      signals.push(signal)
      return new Promise<SourceSnapshot>(() => undefined)
    })

    if (outcome.status !== 'failed') throw new Error(`unexpected outcome ${outcome.status}`)
    expect(outcome.error).toBeInstanceOf(SourceTimeoutError)
    expect(outcome.error.message).toBe('converter snapshot timed out after 20ms')
    expect(signals).toHaveLength(1)
    expect(signals[0].aborted).toBe(true)
    expect(cache.read()).toBeNull()
  })

  test('snapshots older than the ttl are served but flagged stale', async () => {
    const cache = makeCache()
    await cache.refresh(snapshot())

    clock = 61_000
    expect(cache.metadata().stale).toBe(false)
    expect(cache.metadata().ageMs).toBe(60_000)

    clock = 61_001
    expect(cache.metadata().stale).toBe(true)
    expect(cache.read()).not.toBeNull()
  })
})
