import { SigningError } from "../../errors.js";
import type { FeeSource } from "../../execution/fee-source.js";
import type { BlockTag, Signer, TxHandle, TxStatus, UnsignedTx } from "../../execution/signer.js";
import type { Feed, RawTick } from "../../feed/types.js";
import type {
  ExecutionOutcome,
  ExecutionResult,
  Opportunity,
  Quote,
  ValuationEstimate,
} from "../../types.js";

export const MARKET_ID = "market-a";
export const MARKET_B = "market-b";
export const IDENTITY = "0x1111111111111111111111111111111111111111";
export const T0 = 1_700_000_000_000;

export function makeQuote(overrides: Partial<Quote> = {}): Quote {
  return {
    marketId: MARKET_ID,
    side: "YES",
    price: 0.5,
    size: 1000,
    bestBid: 0.48,
    observedAt: T0,
    ...overrides,
  };
}

export function makeEstimate(overrides: Partial<ValuationEstimate> = {}): ValuationEstimate {
  return {
    marketId: MARKET_ID,
    side: "YES",
    value: 0.6,
    variance: 0,
    estimatedAt: T0,
    model: "constant",
    ...overrides,
  };
}

let oppCounter = 0;

/** BUY 100 YES shares at 0.50 against a fair value of 0.60: notional 50. */
export function makeOpportunity(overrides: Partial<Opportunity> = {}): Opportunity {
  oppCounter++;
  return {
    id: `opp-${oppCounter}`,
    marketId: MARKET_ID,
    side: "YES",
    direction: "BUY",
    quotePrice: 0.5,
    fairValue: 0.6,
    edge: 0.1,
    size: 100,
    notional: 50,
    quoteObservedAt: T0,
    detectedAt: T0,
    ...overrides,
  };
}

export function makeResult(
  opportunity: Opportunity,
  outcome: ExecutionOutcome,
  overrides: Partial<ExecutionResult> = {},
): ExecutionResult {
  return {
    requestId: `req-${opportunity.id}`,
    opportunityId: opportunity.id,
    marketId: opportunity.marketId,
    side: opportunity.side,
    outcome,
    sequenceConsumed: outcome === "Confirmed",
    needsReconciliation: false,
    completedAt: T0,
    ...overrides,
  };
}

/** Replays a fixed list of ticks; restartable like a file replay. */
export function arrayFeed(ticks: RawTick[]): Feed {
  return {
    name: "array",
    async *ticks(signal?: AbortSignal) {
      for (const tick of ticks) {
        if (signal?.aborted) return;
        yield tick;
      }
    },
  };
}

export function replayTick(
  marketId: string,
  side: "YES" | "NO",
  ask: number,
  size: number,
  timestamp: number,
  bid = 0,
): RawTick {
  return {
    kind: "replay-row",
    line: 0,
    row: {
      timestamp: String(timestamp),
      market_id: marketId,
      side,
      best_bid: String(bid),
      best_ask: String(ask),
      ask_size: String(size),
    },
  };
}

export class FakeFeeSource implements FeeSource {
  constructor(
    public base = 30_000_000_000n,
    public priority = 2_000_000_000n,
  ) {}

  async baseFee(): Promise<bigint> {
    return this.base;
  }

  async suggestedPriorityFee(): Promise<bigint> {
    return this.priority;
  }
}

/**
 * In-process chain and signer. Broadcasts land in a mempool; each poll mines per
 * the scripted outcome. `failBroadcasts` refuses that many broadcasts first;
 * `leakBroadcasts` accepts that many into the mempool but still reports an error.
 */
export class FakeSigner implements Signer {
  readonly identity = IDENTITY;
  readonly broadcasts: UnsignedTx[] = [];
  mined = 0;
  pending: UnsignedTx[] = [];
  failBroadcasts = 0;
  leakBroadcasts = 0;
  /** what a poll of a pending tx returns: mine it, revert it, or leave it pending */
  onPoll: "confirm" | "revert" | "hang" = "confirm";
  polls = 0;

  constructor(initialNonce = 0) {
    this.mined = initialNonce;
  }

  async signAndBroadcast(tx: UnsignedTx): Promise<TxHandle> {
    this.broadcasts.push(tx);
    if (this.failBroadcasts > 0) {
      this.failBroadcasts--;
      throw new SigningError("replacement transaction underpriced");
    }
    if (this.pending.some((p) => p.nonce === tx.nonce)) {
      throw new SigningError("already known");
    }
    if (tx.nonce !== this.mined + this.pending.length) {
      throw new SigningError(`nonce ${tx.nonce} does not follow the account`);
    }
    this.pending.push(tx);
    if (this.leakBroadcasts > 0) {
      this.leakBroadcasts--;
      throw new SigningError("request timed out");
    }
    return { hash: `0x${tx.nonce.toString(16).padStart(64, "0")}`, nonce: tx.nonce, broadcastAt: T0 };
  }

  async pollStatus(handle: TxHandle): Promise<TxStatus> {
    this.polls++;
    if (handle.nonce < this.mined) {
      return { state: "Confirmed", blockNumber: 1n, gasUsed: 21_000n, effectiveGasPrice: 1n };
    }
    if (this.onPoll === "hang") return { state: "Pending" };
    this.pending = this.pending.filter((tx) => tx.nonce !== handle.nonce);
    this.mined++;
    if (this.onPoll === "revert") {
      return { state: "Rejected", reason: "execution reverted", gasUsed: 50_000n, effectiveGasPrice: 1n };
    }
    return { state: "Confirmed", blockNumber: 1n, gasUsed: 120_000n, effectiveGasPrice: 32_000_000_000n };
  }

  async getSequence(_identity: `0x${string}`, tag: BlockTag): Promise<number> {
    return tag === "latest" ? this.mined : this.mined + this.pending.length;
  }

  /** Mines everything in the mempool, as a later block would. */
  mineAll(): void {
    this.mined += this.pending.length;
    this.pending = [];
  }
}
