// src/services/supply.ts
import debug from 'debug'
import { VerusRpcClient } from './verusRpc'
import { ConverterDirectory, SupplyReport } from '../types'

const log = debug('app:supply')

export interface SupplyOptions {
  chain: string
  ttlMs: number
  now?: () => number
}

/**
 * Total, converter-locked and circulating supply of the chain's own currency.
 *
 * Locked supply is what the active converters hold in reserve. A report is
 * reused for ttlMs; concurrent callers share one computation.
 */
export class SupplyReporter {
  private cached: { report: SupplyReport; at: number } | null = null
  private inFlight: Promise<SupplyReport> | null = null
  private readonly now: () => number

  constructor(
    private readonly rpc: Pick<VerusRpcClient, 'getCurrencySupply'>,
    private readonly directory: ConverterDirectory,
    private readonly options: SupplyOptions
  ) {
    this.now = options.now ?? Date.now
  }

  report(): Promise<SupplyReport> {
    if (this.cached && this.now() - this.cached.at < this.options.ttlMs) {
      return Promise.resolve(this.cached.report)
    }
    if (!this.inFlight) {
      this.inFlight = this.compute().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  private async compute(): Promise<SupplyReport> {
    const [total, listing] = await Promise.all([
      this.rpc.getCurrencySupply(this.options.chain),
      this.directory.listConverters()
    ])

    const details = listing.active
      .filter((c) => c.nativeReserve > 0)
      .map((c) => ({ converter: c.name, reserve: c.nativeReserve }))
    const locked = details.reduce((sum, d) => sum + d.reserve, 0)

    const report: SupplyReport = {
      chain: this.options.chain,
      total_supply: total,
      circulating_supply: total - locked,
      locked_supply: { in_converters: locked, converter_count: details.length, converter_details: details },
      timestamp: new Date(this.now()).toISOString()
    }
    this.cached = { report, at: this.now() }
    log('supply of %s: total %d, locked %d in %d converters', this.options.chain, total, locked, details.length)
    return report
  }
}
