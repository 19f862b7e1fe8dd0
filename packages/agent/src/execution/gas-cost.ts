import { formatEther } from "viem";
import { log } from "../logger.js";
import type { GasParams } from "../types.js";

/** Worst-case fee of one call (gasLimit × maxFeePerGas), converted to collateral. */
export function gasCostInCollateral(gas: GasParams, nativeTokenPrice: number): number {
  return Number(formatEther(gas.gasLimit * gas.maxFeePerGas)) * nativeTokenPrice;
}

export interface GasCostOptions {
  /** collateral per unit of the chain's native token */
  nativeTokenPrice: number;
  /** how long a gas quote is reused before it is refreshed */
  maxAgeMs: number;
}

/**
 * Caches the gas cost of an exchange call for the detector. Concurrent callers share
 * one quote; a failed refresh keeps the last known cost.
 */
export class GasCostEstimator {
  private cached: { cost: number; quotedAt: number } | null = null;
  private refreshing: Promise<number> | null = null;

  constructor(
    private readonly quoteGas: () => Promise<GasParams>,
    private readonly opts: GasCostOptions,
    private readonly clock: () => number = Date.now,
  ) {}

  current(): Promise<number> {
    const now = this.clock();
    if (this.cached && now - this.cached.quotedAt < this.opts.maxAgeMs) {
      return Promise.resolve(this.cached.cost);
    }
    if (!this.refreshing) {
      this.refreshing = this.refresh(now).finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async refresh(now: number): Promise<number> {
    try {
      const cost = gasCostInCollateral(await this.quoteGas(), this.opts.nativeTokenPrice);
      this.cached = { cost, quotedAt: now };
      log.debug("Gas cost refreshed", { cost });
      return cost;
    } catch (err) {
      if (!this.cached) throw err;
      log.warn("Gas quote failed; keeping the last gas cost", { cost: this.cached.cost, error: String(err) });
      return this.cached.cost;
    }
  }
}
