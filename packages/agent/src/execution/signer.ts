import { TransactionReceiptNotFoundError } from "viem";
import type { Account, Chain, PublicClient, Transport, WalletClient } from "viem";
import { SigningError } from "../errors.js";
import { log } from "../logger.js";
import type { GasParams } from "../types.js";

export type BlockTag = "latest" | "pending";

/** Transaction counts for an identity: mined only, or mined plus mempool. */
export interface NonceSource {
  getSequence(identity: `0x${string}`, tag: BlockTag): Promise<number>;
}

export interface UnsignedTx {
  to: `0x${string}`;
  data: `0x${string}`;
  nonce: number;
  gas: GasParams;
}

export interface TxHandle {
  hash: `0x${string}`;
  nonce: number;
  broadcastAt: number;
}

export type TxStatus =
  | { state: "Pending" }
  | { state: "Confirmed"; blockNumber: bigint; gasUsed: bigint; effectiveGasPrice: bigint }
  | { state: "Rejected"; reason: string; gasUsed?: bigint; effectiveGasPrice?: bigint };

export interface Signer extends NonceSource {
  readonly identity: `0x${string}`;
  /** Throws SigningError when the node refuses the transaction. */
  signAndBroadcast(tx: UnsignedTx): Promise<TxHandle>;
  pollStatus(handle: TxHandle): Promise<TxStatus>;
}

export class ViemSigner implements Signer {
  readonly identity: `0x${string}`;

  constructor(
    private readonly walletClient: WalletClient<Transport, Chain, Account>,
    private readonly publicClient: PublicClient,
  ) {
    this.identity = walletClient.account.address;
  }

  async signAndBroadcast(tx: UnsignedTx): Promise<TxHandle> {
    try {
      const hash = await this.walletClient.sendTransaction({
        account: this.walletClient.account,
        chain: this.walletClient.chain,
        to: tx.to,
        data: tx.data,
        nonce: tx.nonce,
        gas: tx.gas.gasLimit,
        maxFeePerGas: tx.gas.maxFeePerGas,
        maxPriorityFeePerGas: tx.gas.maxPriorityFeePerGas,
      });
      log.info("Transaction broadcast", { hash, nonce: tx.nonce });
      return { hash, nonce: tx.nonce, broadcastAt: Date.now() };
    } catch (err) {
      throw new SigningError(`Broadcast of nonce ${tx.nonce} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async pollStatus(handle: TxHandle): Promise<TxStatus> {
    try {
      const receipt = await this.publicClient.getTransactionReceipt({ hash: handle.hash });
      if (receipt.status === "reverted") {
        return {
          state: "Rejected",
          reason: `Transaction reverted: ${handle.hash}`,
          gasUsed: receipt.gasUsed,
          effectiveGasPrice: receipt.effectiveGasPrice,
        };
      }
      return {
        state: "Confirmed",
        blockNumber: receipt.blockNumber,
        gasUsed: receipt.gasUsed,
        effectiveGasPrice: receipt.effectiveGasPrice,
      };
    } catch (err) {
      if (err instanceof TransactionReceiptNotFoundError) return { state: "Pending" };
      throw err;
    }
  }

  getSequence(identity: `0x${string}`, tag: BlockTag): Promise<number> {
    return this.publicClient.getTransactionCount({ address: identity, blockTag: tag });
  }
}
