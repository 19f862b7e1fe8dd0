export type Side = "YES" | "NO";

export type Direction = "BUY" | "SELL";

export type ExecutionMode = "dry-run" | "live";

export const SIDES: readonly Side[] = ["YES", "NO"];

export interface MarketTokens {
  yesTokenId: string;
  noTokenId: string;
}

export interface OutcomeBook {
  takerPrice: number; // best ask
  makerPrice?: number; // best bid
  liquidity: number; // size resting at the best ask
  updatedAt: number;
}

export interface Market {
  marketId: string;
  tokens?: MarketTokens;
  yes?: OutcomeBook;
  no?: OutcomeBook;
  updatedAt: number;
}

export interface Quote {
  readonly marketId: string;
  readonly side: Side;
  readonly price: number; // best taker price, 0-1
  readonly size: number; // shares available at that price
  readonly bestBid?: number;
  readonly observedAt: number;
}

export interface PricePoint {
  price: number;
  observedAt: number;
}

export interface ValuationEstimate {
  marketId: string;
  side: Side;
  value: number; // fair probability, 0-1
  variance: number;
  estimatedAt: number;
  model: string;
}

export interface Opportunity {
  id: string;
  marketId: string;
  side: Side;
  direction: Direction;
  quotePrice: number;
  fairValue: number;
  edge: number; // |quotePrice - fairValue|
  size: number; // shares
  notional: number; // size * quotePrice, in collateral units
  quoteObservedAt: number;
  detectedAt: number;
}

// --- Risk gate ---

export type RejectionReason =
  | "CooldownActive"
  | "MarketExposureExceeded"
  | "GlobalExposureExceeded"
  | "StaleOpportunity";

export type RiskDecision =
  | { approved: true; opportunity: Opportunity; reserved: number }
  | { approved: false; opportunity: Opportunity; reason: RejectionReason };

export type MarketRiskPhase = "Eligible" | "Cooling";

export interface MarketRiskSnapshot {
  marketId: string;
  phase: MarketRiskPhase;
  lastExecutionAt: number | null;
  committed: number;
  reserved: number;
}

export interface RiskSnapshot {
  markets: MarketRiskSnapshot[];
  globalCommitted: number;
  globalReserved: number;
  perMarketCap: number;
  globalCap: number;
}

// --- Execution ---

export interface GasParams {
  gasLimit: bigint;
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
}

export interface ExecutionRequest {
  readonly requestId: string;
  readonly opportunity: Opportunity;
  readonly identity: `0x${string}`;
  readonly sequence: number;
  readonly gas: GasParams;
  readonly mode: ExecutionMode;
  readonly createdAt: number;
}

export type ExecutionOutcome = "Confirmed" | "Failed" | "Dropped";

export interface ExecutionResult {
  requestId: string;
  opportunityId: string;
  marketId: string;
  side: Side;
  outcome: ExecutionOutcome;
  sequence?: number;
  /** true when the sequence number is known to be used on-chain (mined or simulated) */
  sequenceConsumed: boolean;
  /** set when the engine cannot tell whether the transaction landed */
  needsReconciliation: boolean;
  txHash?: `0x${string}`;
  /**
   * Fill price. Dry-run reports the simulated fill; live reports the opportunity's
   * quote price, since receipts are not decoded into fills.
   */
  realizedPrice?: number;
  /** Filled shares; for live, the size the call was sent for. */
  filledSize?: number;
  gasUsed?: bigint;
  effectiveGasPrice?: bigint;
  error?: string;
  completedAt: number;
}

// --- Observation ---

export type PipelineEventKind =
  | "execution.confirmed"
  | "execution.failed"
  | "execution.dropped"
  | "risk.rejected"
  | "scheduler.rejected"
  | "feed.malformed";

export interface PipelineEvent {
  timestamp: number;
  marketId: string;
  kind: PipelineEventKind;
  payload: Record<string, unknown>;
}

export interface PipelineStatus {
  running: boolean;
  mode: ExecutionMode;
  identity: `0x${string}`;
  startedAt: number | null;
  ticksProcessed: number;
  opportunitiesDetected: number;
  approvals: number;
  rejections: Record<RejectionReason, number>;
  confirmed: number;
  failed: number;
  dropped: number;
  queueDepth: number;
  nextSequence: number | null;
  awaitingReconciliation: boolean;
}
