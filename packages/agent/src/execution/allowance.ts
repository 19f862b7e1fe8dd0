import { erc20Abi, maxUint256, parseUnits } from "viem";
import type { Account, Chain, PublicClient, Transport, WalletClient } from "viem";
import { InsufficientAllowance, SigningError } from "../errors.js";
import { log } from "../logger.js";

// the exchange's collateral uses 6 decimals
const COLLATERAL_DECIMALS = 6;

export function toCollateralUnits(amount: number): bigint {
  return parseUnits(amount.toFixed(COLLATERAL_DECIMALS), COLLATERAL_DECIMALS);
}

export interface CollateralToken {
  readonly address: `0x${string}`;
  allowance(owner: `0x${string}`, spender: `0x${string}`): Promise<bigint>;
  /** Sends an approval and resolves once it is mined. */
  approve(spender: `0x${string}`, amount: bigint): Promise<`0x${string}`>;
}

export class ViemCollateralToken implements CollateralToken {
  constructor(
    readonly address: `0x${string}`,
    private readonly walletClient: WalletClient<Transport, Chain, Account>,
    private readonly publicClient: PublicClient,
  ) {}

  allowance(owner: `0x${string}`, spender: `0x${string}`): Promise<bigint> {
    return this.publicClient.readContract({
      address: this.address,
      abi: erc20Abi,
      functionName: "allowance",
      args: [owner, spender],
    });
  }

  async approve(spender: `0x${string}`, amount: bigint): Promise<`0x${string}`> {
    const hash = await this.walletClient.writeContract({
      account: this.walletClient.account,
      chain: this.walletClient.chain,
      address: this.address,
      abi: erc20Abi,
      functionName: "approve",
      args: [spender, amount],
    });
    const receipt = await this.publicClient.waitForTransactionReceipt({ hash });
    if (receipt.status === "reverted") {
      throw new SigningError(`Approval reverted: ${hash}`);
    }
    return hash;
  }
}

export interface AllowanceOptions {
  owner: `0x${string}`;
  spender: `0x${string}`;
  /** smallest allowance that lets the pipeline reach its global cap */
  required: bigint;
  autoApprove: boolean;
}

/**
 * Makes sure the exchange may pull enough collateral before live trading starts.
 * Approves an unlimited amount when allowed to; otherwise throws.
 */
export async function ensureAllowance(token: CollateralToken, opts: AllowanceOptions): Promise<bigint> {
  const current = await token.allowance(opts.owner, opts.spender);
  if (current >= opts.required) {
    log.info("Collateral allowance sufficient", { token: token.address, spender: opts.spender, allowance: current });
    return current;
  }
  if (!opts.autoApprove) {
    throw new InsufficientAllowance(token.address, opts.spender, current, opts.required);
  }

  log.warn("Collateral allowance too low, approving", {
    token: token.address,
    spender: opts.spender,
    allowance: current,
    required: opts.required,
  });
  const hash = await token.approve(opts.spender, maxUint256);
  log.info("Collateral approved", { token: token.address, spender: opts.spender, hash });
  return maxUint256;
}
