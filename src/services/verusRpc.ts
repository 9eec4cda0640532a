// src/services/verusRpc.ts
import axios, { AxiosInstance } from 'axios'
import { z } from 'zod'
import debug from 'debug'
import { SourceTimeoutError, SourceUnavailableError } from '../errors'

const log = debug('app:source')

const envelopeSchema = z.object({
  result: z.unknown(),
  error: z.object({ code: z.number(), message: z.string() }).nullable().optional()
})

const infoSchema = z.object({ blocks: z.number().int().nonnegative() }).passthrough()

const currencySupplySchema = z.object({ supply: z.number().nonnegative() }).passthrough()

const reserveCurrencySchema = z.object({
  currencyid: z.string(),
  weight: z.number().optional(),
  reserves: z.number(),
  priceinreserve: z.number().optional()
})

export const converterSchema = z
  .object({
    fullyqualifiedname: z.string(),
    lastnotarization: z.object({
      currencystate: z.object({
        currencyid: z.string(),
        supply: z.number(),
        reservecurrencies: z.array(reserveCurrencySchema)
      })
    })
  })
  .passthrough()

// the converter's own definition sits under its currency id and may carry id -> name
export const definitionNamesSchema = z.object({ currencynames: z.record(z.string()).optional() }).passthrough()

const volumePairSchema = z.object({
  currency: z.string(),
  convertto: z.string(),
  volume: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number()
})

const currencyStateSchema = z.array(
  z
    .object({
      conversiondata: z.object({ volumepairs: z.array(volumePairSchema) }).passthrough().optional()
    })
    .passthrough()
)

export type RpcConverter = z.infer<typeof converterSchema>
export type VolumePair = z.infer<typeof volumePairSchema>

function rpcErrorMessage(data: unknown): string | undefined {
  const parsed = envelopeSchema.safeParse(data)
  return parsed.success && parsed.data.error ? parsed.data.error.message : undefined
}

function toSourceError(method: string, e: unknown): Error {
  if (axios.isCancel(e)) return new SourceTimeoutError(`${method}: request aborted`)
  if (axios.isAxiosError(e)) {
    if (e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT') return new SourceTimeoutError(`${method}: ${e.message}`)
    const rpcMessage = e.response ? rpcErrorMessage(e.response.data) : undefined
    return new SourceUnavailableError(`${method}: ${rpcMessage ?? e.message}`)
  }
  return new SourceUnavailableError(`${method}: ${e instanceof Error ? e.message : String(e)}`)
}

// thin JSON-RPC 1.0 client; every result is validated before it leaves this module
export class VerusRpcClient {
  constructor(private readonly http: AxiosInstance) {}

  async call<T>(method: string, params: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T> {
    let data: unknown
    try {
      const res = await this.http.post('/', { jsonrpc: '1.0', id: method, method, params }, { signal })
      data = res.data
    } catch (e: unknown) {
      throw toSourceError(method, e)
    }

    const envelope = envelopeSchema.safeParse(data)
    if (!envelope.success) throw new SourceUnavailableError(`${method}: unexpected response envelope`)
    if (envelope.data.error) throw new SourceUnavailableError(`${method}: ${envelope.data.error.message}`)

    const result = schema.safeParse(envelope.data.result)
    if (!result.success) {
      log('%s returned an unexpected result: %s', method, result.error.message)
      throw new SourceUnavailableError(`${method}: unexpected result shape`)
    }
    return result.data
  }

  async getBlockCount(signal?: AbortSignal): Promise<number> {
    const info = await this.call('getinfo', [], infoSchema, signal)
    return info.blocks
  }

  async getCurrencySupply(currency: string, signal?: AbortSignal): Promise<number> {
    const definition = await this.call('getcurrency', [currency], currencySupplySchema, signal)
    return definition.supply
  }

  // raw entries; callers validate each converter on its own so one bad entry does not sink the batch
  getCurrencyConverters(systemId: string, signal?: AbortSignal): Promise<unknown[]> {
    return this.call('getcurrencyconverters', [systemId], z.array(z.unknown()), signal)
  }

  async getVolumePairs(
    converter: string,
    fromBlock: number,
    toBlock: number,
    interval: number,
    volumeCurrency: string,
    signal?: AbortSignal
  ): Promise<VolumePair[]> {
    const states = await this.call(
      'getcurrencystate',
      [converter, `${fromBlock}, ${toBlock}, ${interval}`, volumeCurrency],
      currencyStateSchema,
      signal
    )
    for (const s of states) {
      if (s.conversiondata) return s.conversiondata.volumepairs
    }
    return []
  }
}
