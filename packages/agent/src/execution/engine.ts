import { encodeFunctionData, parseUnits } from "viem";
import type { QuoteBook } from "../feed/quote-book.js";
import { log } from "../logger.js";
import { sleep } from "../retry.js";
import type {
  ExecutionMode,
  ExecutionOutcome,
  ExecutionRequest,
  ExecutionResult,
  GasParams,
  MarketTokens,
} from "../types.js";
import { bumpPriorityFee, priceGas } from "./fee-source.js";
import type { FeeSource } from "./fee-source.js";
import type { Signer, TxHandle } from "./signer.js";
import type { SimulatedLedger } from "./simulated-ledger.js";

const exchangeAbi = [
  {
    type: "function",
    name: "buy",
    inputs: [
      { name: "tokenId", type: "uint256" },
      { name: "amount", type: "uint256" },
      { name: "minShares", type: "uint256" },
    ],
    outputs: [],
    stateMutability: "nonpayable",
  },
  {
    type: "function",
    name: "sell",
    inputs: [
      { name: "tokenId", type: "uint256" },
      { name: "shares", type: "uint256" },
      { name: "minAmount", type: "uint256" },
    ],
    outputs: [],
    stateMutability: "nonpayable",
  },
] as const;

// collateral and outcome shares both use 6 decimals
const UNIT_DECIMALS = 6;

export interface Executor {
  readonly identity: `0x${string}`;
  readonly mode: ExecutionMode;
  quoteGas(): Promise<GasParams>;
  /** Never throws; every path ends in a terminal result. */
  execute(request: ExecutionRequest, signal?: AbortSignal): Promise<ExecutionResult>;
}

type Terminal = Omit<ExecutionResult, "requestId" | "opportunityId" | "marketId" | "side" | "sequence" | "completedAt">;

function finish(request: ExecutionRequest, terminal: Terminal, now: number): ExecutionResult {
  return {
    requestId: request.requestId,
    opportunityId: request.opportunity.id,
    marketId: request.opportunity.marketId,
    side: request.opportunity.side,
    sequence: request.sequence,
    completedAt: now,
    ...terminal,
  };
}

function failed(error: string, sequenceConsumed = false, needsReconciliation = false): Terminal {
  return { outcome: "Failed", sequenceConsumed, needsReconciliation, error };
}

function dropped(error: string): Terminal {
  return { outcome: "Dropped", sequenceConsumed: false, needsReconciliation: false, error };
}

/** Worst acceptable fill price for the request's direction. */
export function limitPrice(request: ExecutionRequest, slippageBps: number): number {
  const { direction, quotePrice } = request.opportunity;
  const slip = slippageBps / 10_000;
  return direction === "BUY" ? quotePrice * (1 + slip) : quotePrice * (1 - slip);
}

function logResult(request: ExecutionRequest, outcome: ExecutionOutcome, data: Record<string, unknown> = {}): void {
  const context = {
    marketId: request.opportunity.marketId,
    opportunityId: request.opportunity.id,
    requestId: request.requestId,
    sequence: request.sequence,
    mode: request.mode,
    ...data,
  };
  if (outcome === "Confirmed") log.info("Execution confirmed", context);
  else log.warn(`Execution ${outcome.toLowerCase()}`, context);
}

export interface DryRunEngineOptions {
  gasLimit: bigint;
  gasPrice: bigint;
  slippageBps: number;
  /** artificial delay before the fill; the request can be cancelled during it */
  latencyMs?: number;
}

/**
 * Fills requests against the latest quote held in the quote book: BUY at the
 * current ask, SELL at the current bid, capped by the size shown. No signer is
 * involved; the simulated ledger stands in for the chain's nonce accounting.
 */
export class DryRunEngine implements Executor {
  readonly mode = "dry-run" as const;

  constructor(
    readonly identity: `0x${string}`,
    private readonly book: QuoteBook,
    private readonly ledger: SimulatedLedger,
    private readonly opts: DryRunEngineOptions,
    private readonly clock: () => number = Date.now,
  ) {}

  async quoteGas(): Promise<GasParams> {
    return { gasLimit: this.opts.gasLimit, maxFeePerGas: this.opts.gasPrice, maxPriorityFeePerGas: 0n };
  }

  async execute(request: ExecutionRequest, signal?: AbortSignal): Promise<ExecutionResult> {
    const terminal = await this.simulate(request, signal);
    logResult(request, terminal.outcome, { realizedPrice: terminal.realizedPrice, error: terminal.error });
    return finish(request, terminal, this.clock());
  }

  private async simulate(request: ExecutionRequest, signal?: AbortSignal): Promise<Terminal> {
    if (request.mode !== this.mode) return failed(`Dry-run engine cannot run a ${request.mode} request`);
    if (this.opts.latencyMs) await sleep(this.opts.latencyMs, signal);
    if (signal?.aborted) return dropped("Cancelled before fill");

    const { opportunity } = request;
    const quote = this.book.latest(opportunity.marketId, opportunity.side);
    if (!quote) return failed("No quote to simulate against");

    const price = opportunity.direction === "BUY" ? quote.price : quote.bestBid;
    if (price === undefined) return failed("No bid to sell into");

    try {
      this.ledger.consume(request.identity, request.sequence);
    } catch (err) {
      return failed(String(err), false, true);
    }
    const gasFields = { gasUsed: request.gas.gasLimit, effectiveGasPrice: request.gas.maxFeePerGas };

    const limit = limitPrice(request, this.opts.slippageBps);
    const outside = opportunity.direction === "BUY" ? price > limit : price < limit;
    if (outside) {
      return { ...failed(`Price ${price} outside limit ${limit.toFixed(6)}`, true), ...gasFields };
    }
    return {
      outcome: "Confirmed",
      sequenceConsumed: true,
      needsReconciliation: false,
      realizedPrice: price,
      filledSize: Math.min(opportunity.size, quote.size),
      ...gasFields,
    };
  }
}

export interface LiveEngineOptions {
  exchangeAddress: `0x${string}`;
  gasLimit: bigint;
  gasPriorityBound: bigint;
  priorityFeeBumpPercent: number;
  slippageBps: number;
  confirmationTimeoutMs: number;
  confirmationPollIntervalMs: number;
}

/**
 * Signs and broadcasts exchange calls through the signer. A refused broadcast is
 * retried once with a bumped priority fee. A second refusal, a timeout or an
 * abort after broadcast all end flagged for reconciliation.
 */
export class LiveEngine implements Executor {
  readonly mode = "live" as const;
  readonly identity: `0x${string}`;

  constructor(
    private readonly signer: Signer,
    private readonly fees: FeeSource,
    private readonly tokens: Record<string, MarketTokens>,
    private readonly opts: LiveEngineOptions,
    private readonly clock: () => number = Date.now,
  ) {
    this.identity = signer.identity;
  }

  async quoteGas(): Promise<GasParams> {
    const [baseFee, suggested] = await Promise.all([this.fees.baseFee(), this.fees.suggestedPriorityFee()]);
    return priceGas(baseFee, suggested, this.opts.gasPriorityBound, this.opts.gasLimit);
  }

  async execute(request: ExecutionRequest, signal?: AbortSignal): Promise<ExecutionResult> {
    const terminal = await this.run(request, signal);
    logResult(request, terminal.outcome, { txHash: terminal.txHash, error: terminal.error });
    return finish(request, terminal, this.clock());
  }

  buildCall(request: ExecutionRequest): `0x${string}` {
    const { opportunity } = request;
    const tokens = this.tokens[opportunity.marketId];
    const tokenId = tokens ? (opportunity.side === "YES" ? tokens.yesTokenId : tokens.noTokenId) : undefined;
    if (!tokenId || !/^\d+$/.test(tokenId)) {
      throw new Error(`No outcome token id for ${opportunity.marketId}:${opportunity.side}`);
    }
    const limit = limitPrice(request, this.opts.slippageBps);
    const units = (n: number) => parseUnits(n.toFixed(UNIT_DECIMALS), UNIT_DECIMALS);

    if (opportunity.direction === "BUY") {
      return encodeFunctionData({
        abi: exchangeAbi,
        functionName: "buy",
        args: [BigInt(tokenId), units(opportunity.notional), units(opportunity.notional / limit)],
      });
    }
    return encodeFunctionData({
      abi: exchangeAbi,
      functionName: "sell",
      args: [BigInt(tokenId), units(opportunity.size), units(opportunity.size * limit)],
    });
  }

  private async run(request: ExecutionRequest, signal?: AbortSignal): Promise<Terminal> {
    if (request.mode !== this.mode) return failed(`Live engine cannot run a ${request.mode} request`);

    let data: `0x${string}`;
    try {
      data = this.buildCall(request);
    } catch (err) {
      return failed(String(err));
    }

    let gas = request.gas;
    let handle: TxHandle | null = null;
    let lastError = "";
    for (let attempt = 0; attempt < 2 && !handle; attempt++) {
      if (signal?.aborted) return dropped("Cancelled before broadcast");
      try {
        handle = await this.signer.signAndBroadcast({ to: this.opts.exchangeAddress, data, nonce: request.sequence, gas });
      } catch (err) {
        lastError = err instanceof Error ? err.message : String(err);
        if (attempt === 0) {
          gas = bumpPriorityFee(gas, this.opts.priorityFeeBumpPercent);
          log.warn("Broadcast rejected, retrying with higher priority fee", {
            requestId: request.requestId,
            sequence: request.sequence,
            maxPriorityFeePerGas: gas.maxPriorityFeePerGas,
            error: lastError,
          });
        }
      }
    }
    // a refused call may still have reached the mempool, so the chain decides whether the number is free
    if (!handle) return failed(lastError, false, true);

    return this.awaitConfirmation(request, handle, signal);
  }

  private async awaitConfirmation(request: ExecutionRequest, handle: TxHandle, signal?: AbortSignal): Promise<Terminal> {
    const deadline = this.clock() + this.opts.confirmationTimeoutMs;
    const { opportunity } = request;

    while (!signal?.aborted && this.clock() < deadline) {
      try {
        const status = await this.signer.pollStatus(handle);
        if (status.state === "Confirmed") {
          return {
            outcome: "Confirmed",
            sequenceConsumed: true,
            needsReconciliation: false,
            txHash: handle.hash,
            // intended values: the receipt's fill events are not decoded
            realizedPrice: opportunity.quotePrice,
            filledSize: opportunity.size,
            gasUsed: status.gasUsed,
            effectiveGasPrice: status.effectiveGasPrice,
          };
        }
        if (status.state === "Rejected") {
          return {
            ...failed(status.reason, true),
            txHash: handle.hash,
            gasUsed: status.gasUsed,
            effectiveGasPrice: status.effectiveGasPrice,
          };
        }
      } catch (err) {
        log.warn("Confirmation poll failed", { txHash: handle.hash, error: String(err) });
      }
      await sleep(this.opts.confirmationPollIntervalMs, signal);
    }

    const reason = signal?.aborted ? "Confirmation wait abandoned" : "Confirmation timed out";
    return { ...failed(`${reason} for ${handle.hash}`, false, true), txHash: handle.hash };
  }
}
