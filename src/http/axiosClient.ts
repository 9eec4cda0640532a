// src/http/axiosClient.ts
import axios, { AxiosInstance } from 'axios'
import axiosRetry from 'axios-retry'

export interface RpcHttpOptions {
  baseURL: string
  username?: string
  password?: string
  timeoutMs: number
  retries: number
}

// HTTP transport for the daemon's JSON-RPC port
export function createRpcHttpClient(options: RpcHttpOptions): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: { 'Content-Type': 'text/plain', 'User-Agent': 'dex-ticker-service/1.0' },
    auth: options.username ? { username: options.username, password: options.password ?? '' } : undefined
  })

  axiosRetry(client, {
    retries: options.retries,
    retryDelay: (retryCount, error) => {
      const ra = error.response?.headers?.['retry-after']
      if (typeof ra === 'string') {
        const n = parseInt(ra, 10)
        if (!isNaN(n)) return Math.min(n * 1000, 10_000)
      }
      return Math.min(500 * Math.pow(2, retryCount - 1), 5_000)
    },
    // every RPC we issue is a read, so POSTs are safe to replay on transport errors
    retryCondition: (error) => {
      if (error.response) {
        const s = error.response.status
        return s === 429 || s === 502 || s === 503 || s === 504
      }
      return axiosRetry.isNetworkError(error)
    }
  })

  return client
}
