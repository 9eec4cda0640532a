// src/config.ts
import dotenv from 'dotenv'
import path from 'path'
import { z } from 'zod'
dotenv.config()

// unset and empty variables both take the default
const blankAsUnset = (v: unknown) => (v === '' ? undefined : v)

const positiveInt = (fallback: number) => z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback))
const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback))
const text = (fallback: string) => z.preprocess(blankAsUnset, z.string().default(fallback))
const list = (fallback: string[]) =>
  z.preprocess(
    (v) =>
      typeof v === 'string' && v.trim() !== ''
        ? v.split(',').map((s) => s.trim()).filter((s) => s.length > 0)
        : blankAsUnset(v),
    z.array(z.string()).default(fallback)
  )

const envSchema = z.object({
  PORT: positiveInt(8765),
  RPC_URL: text('http://127.0.0.1:27486').pipe(z.string().url()),
  RPC_USER: text(''),
  RPC_PASSWORD: text(''),
  CHAIN: text('VRSC').pipe(z.string().min(1)),
  CACHE_TTL_SECONDS: positiveInt(60),
  BLOCK_POLL_INTERVAL_SECONDS: positiveInt(15),
  SOURCE_TIMEOUT_SECONDS: positiveInt(30),
  RPC_TIMEOUT_SECONDS: positiveInt(10),
  RPC_RETRIES: nonNegativeInt(2),
  RPC_MAX_CONCURRENCY: positiveInt(5),
  BLOCKS_PER_DAY: positiveInt(1440),
  SUPPLY_CACHE_SECONDS: positiveInt(600),
  DEFAULT_MIN_NATIVE_TOKENS: z.preprocess(blankAsUnset, z.coerce.number().nonnegative().default(100)),
  ENABLE_LIVE_ENDPOINTS: text('false').transform((v) => v.toLowerCase() === 'true'),
  TRACKED_CONVERTERS: list([]),
  // earlier entries win the quote (target) side of a pair
  QUOTE_PRIORITY: list(['DAI.vETH', 'USDC.vETH', 'USDT.vETH', 'vETH', 'tBTC.vETH', 'VRSC']),
  CURRENCY_MAPPINGS_PATH: text(path.join(__dirname, '..', 'data', 'currency-mappings.json'))
})

export type AppConfig = z.infer<typeof envSchema> & { MIN_NATIVE_RESERVE: number }

// <CHAIN>_MIN_NATIVE_TOKENS overrides DEFAULT_MIN_NATIVE_TOKENS for the tracked chain
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const base = envSchema.parse(env)
  const perChain = z
    .preprocess(blankAsUnset, z.coerce.number().nonnegative().optional())
    .parse(env[`${base.CHAIN.toUpperCase()}_MIN_NATIVE_TOKENS`])
  return { ...base, MIN_NATIVE_RESERVE: perChain ?? base.DEFAULT_MIN_NATIVE_TOKENS }
}

const config = parseConfig(process.env)

export const PORT = config.PORT
export const RPC_URL = config.RPC_URL
export const RPC_USER = config.RPC_USER
export const RPC_PASSWORD = config.RPC_PASSWORD
export const CHAIN = config.CHAIN
export const CACHE_TTL_SECONDS = config.CACHE_TTL_SECONDS
export const BLOCK_POLL_INTERVAL_SECONDS = config.BLOCK_POLL_INTERVAL_SECONDS
export const SOURCE_TIMEOUT_SECONDS = config.SOURCE_TIMEOUT_SECONDS
export const RPC_TIMEOUT_SECONDS = config.RPC_TIMEOUT_SECONDS
export const RPC_RETRIES = config.RPC_RETRIES
export const RPC_MAX_CONCURRENCY = config.RPC_MAX_CONCURRENCY
export const BLOCKS_PER_DAY = config.BLOCKS_PER_DAY
export const SUPPLY_CACHE_SECONDS = config.SUPPLY_CACHE_SECONDS
export const MIN_NATIVE_RESERVE = config.MIN_NATIVE_RESERVE
export const ENABLE_LIVE_ENDPOINTS = config.ENABLE_LIVE_ENDPOINTS
export const TRACKED_CONVERTERS = config.TRACKED_CONVERTERS
export const QUOTE_PRIORITY = config.QUOTE_PRIORITY
export const CURRENCY_MAPPINGS_PATH = config.CURRENCY_MAPPINGS_PATH
