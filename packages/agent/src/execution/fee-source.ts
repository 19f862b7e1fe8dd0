import type { PublicClient } from "viem";
import type { GasParams } from "../types.js";

export interface FeeSource {
  /** Highest base fee over the recent blocks. */
  baseFee(): Promise<bigint>;
  suggestedPriorityFee(): Promise<bigint>;
}

export class ViemFeeSource implements FeeSource {
  constructor(
    private readonly publicClient: PublicClient,
    private readonly blockCount = 5,
  ) {}

  async baseFee(): Promise<bigint> {
    const history = await this.publicClient.getFeeHistory({
      blockCount: this.blockCount,
      rewardPercentiles: [50],
    });
    let max = 0n;
    for (const fee of history.baseFeePerGas) {
      if (fee > max) max = fee;
    }
    return max;
  }

  suggestedPriorityFee(): Promise<bigint> {
    return this.publicClient.estimateMaxPriorityFeePerGas();
  }
}

/** maxFee = 2 * baseFee + priority, with the priority fee capped at `bound`. */
export function priceGas(baseFee: bigint, suggestedPriority: bigint, bound: bigint, gasLimit: bigint): GasParams {
  const priority = suggestedPriority < bound ? suggestedPriority : bound;
  return {
    gasLimit,
    maxPriorityFeePerGas: priority,
    maxFeePerGas: 2n * baseFee + priority,
  };
}

/** Raises the priority fee by `percent` and lifts maxFee by the same amount. */
export function bumpPriorityFee<T extends { maxFeePerGas: bigint; maxPriorityFeePerGas: bigint }>(
  gas: T,
  percent: number,
): T {
  const bumped = (gas.maxPriorityFeePerGas * BigInt(100 + percent)) / 100n;
  // a zero tip would stay zero
  const priority = bumped > gas.maxPriorityFeePerGas ? bumped : gas.maxPriorityFeePerGas + 1n;
  return {
    ...gas,
    maxPriorityFeePerGas: priority,
    maxFeePerGas: gas.maxFeePerGas - gas.maxPriorityFeePerGas + priority,
  };
}
