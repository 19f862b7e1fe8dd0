import { createPublicClient, createWalletClient, defineChain, http } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { Config } from "./config.js";
import { ConfigError } from "./errors.js";
import { EventBus, EventLog } from "./events.js";
import { ViemCollateralToken } from "./execution/allowance.js";
import type { CollateralToken } from "./execution/allowance.js";
import { DryRunEngine, LiveEngine } from "./execution/engine.js";
import type { Executor } from "./execution/engine.js";
import { ViemFeeSource } from "./execution/fee-source.js";
import type { FeeSource } from "./execution/fee-source.js";
import { GasCostEstimator } from "./execution/gas-cost.js";
import { ExecutionScheduler } from "./execution/scheduler.js";
import { SequenceTracker } from "./execution/sequence-tracker.js";
import { ViemSigner } from "./execution/signer.js";
import type { NonceSource, Signer } from "./execution/signer.js";
import { SimulatedLedger } from "./execution/simulated-ledger.js";
import { ClobFeed } from "./feed/clob-feed.js";
import { QuoteBook } from "./feed/quote-book.js";
import { ReplayFeed } from "./feed/replay-feed.js";
import type { Feed } from "./feed/types.js";
import { saveState } from "./persistence.js";
import type { PersistedState } from "./persistence.js";
import { Pipeline } from "./pipeline/pipeline.js";
import { RiskGate } from "./risk/risk-gate.js";
import type { Opportunity, Quote } from "./types.js";
import { PriceHistory, createValuationModel } from "./valuation/index.js";

/** Signing identity used by dry-run when no key is configured. */
export const DRY_RUN_IDENTITY = "0x000000000000000000000000000000000000dEaD";

export interface RuntimeOverrides {
  feed?: Feed;
  signer?: Signer;
  fees?: FeeSource;
  collateral?: CollateralToken;
  clock?: () => number;
  onQuote?: (quote: Quote) => void;
  onApproved?: (opportunity: Opportunity) => void;
  persisted?: PersistedState | null;
  /** write state to config.stateFile after each result; default true */
  persist?: boolean;
}

export interface Runtime {
  pipeline: Pipeline;
  bus: EventBus;
  events: EventLog;
  book: QuoteBook;
  riskGate: RiskGate;
  scheduler: ExecutionScheduler;
  tracker: SequenceTracker;
  ledger: SimulatedLedger | null;
  /** live only: the token whose allowance is checked before trading */
  collateral: CollateralToken | null;
}

function createFeed(config: Config): Feed {
  if (config.feed === "replay") {
    if (!config.replayFile) throw new ConfigError("Missing required env var: REPLAY_FILE");
    return new ReplayFeed(config.replayFile);
  }
  return new ClobFeed({ markets: config.markets, pollIntervalMs: config.pollIntervalMs, clobBase: config.clobApiBase });
}

function createViemClients(config: Config) {
  if (!config.rpcUrl || !config.privateKey) {
    throw new ConfigError("RPC_URL and PRIVATE_KEY are required in live mode");
  }
  const account = privateKeyToAccount(config.privateKey);
  const chain = defineChain({
    id: config.chainId,
    name: config.chainId === 137 ? "Polygon" : `chain-${config.chainId}`,
    nativeCurrency: { name: "POL", symbol: "POL", decimals: 18 },
    rpcUrls: { default: { http: [config.rpcUrl] } },
  });
  const publicClient = createPublicClient({
    chain,
    transport: http(config.rpcUrl, { timeout: 10_000 }),
  });
  const walletClient = createWalletClient({
    account,
    chain,
    transport: http(config.rpcUrl, { timeout: 10_000 }),
  });
  return { publicClient, walletClient };
}

/** Wires every stage for the configured mode and feed. */
export function createRuntime(config: Config, overrides: RuntimeOverrides = {}): Runtime {
  const clock = overrides.clock ?? Date.now;
  const bus = new EventBus();
  const events = new EventLog(bus, config.eventBufferSize);
  const book = new QuoteBook(config.markets);
  const history = new PriceHistory(config.historyWindow);
  const model = createValuationModel(config);
  const riskGate = new RiskGate(
    {
      cooldownMs: config.cooldownMs,
      perMarketCap: config.perMarketCap,
      globalCap: config.globalCap,
      stalenessWindowMs: config.stalenessWindowMs,
    },
    bus,
    clock,
  );

  let engine: Executor;
  let nonceSource: NonceSource;
  let ledger: SimulatedLedger | null = null;
  let collateral: CollateralToken | null = null;

  if (config.mode === "dry-run") {
    const identity = config.privateKey ? privateKeyToAccount(config.privateKey).address : DRY_RUN_IDENTITY;
    ledger = new SimulatedLedger(overrides.persisted?.ledger ?? {});
    engine = new DryRunEngine(
      identity,
      book,
      ledger,
      { gasLimit: config.gasLimit, gasPrice: config.dryRunGasPrice, slippageBps: config.slippageBps },
      clock,
    );
    nonceSource = ledger;
  } else {
    let signer = overrides.signer;
    let fees = overrides.fees;
    collateral = overrides.collateral ?? null;
    if (!signer || !fees) {
      const { publicClient, walletClient } = createViemClients(config);
      signer = signer ?? new ViemSigner(walletClient, publicClient);
      fees = fees ?? new ViemFeeSource(publicClient);
      collateral = collateral ?? new ViemCollateralToken(config.collateralAddress, walletClient, publicClient);
    }
    engine = new LiveEngine(
      signer,
      fees,
      config.markets,
      {
        exchangeAddress: config.exchangeAddress,
        gasLimit: config.gasLimit,
        gasPriorityBound: config.gasPriorityBound,
        priorityFeeBumpPercent: config.priorityFeeBumpPercent,
        slippageBps: config.slippageBps,
        confirmationTimeoutMs: config.confirmationTimeoutMs,
        confirmationPollIntervalMs: config.confirmationPollIntervalMs,
      },
      clock,
    );
    nonceSource = signer;
  }

  const tracker = new SequenceTracker(nonceSource, clock);
  const scheduler = new ExecutionScheduler(
    [engine],
    tracker,
    bus,
    {
      queueDepth: config.schedulerQueueDepth,
      stalenessWindowMs: config.stalenessWindowMs,
      reconcileIntervalMs: config.reconcileIntervalMs,
    },
    clock,
  );

  const gasCost = new GasCostEstimator(
    () => engine.quoteGas(),
    { nativeTokenPrice: config.nativeTokenPrice, maxAgeMs: config.gasCostMaxAgeMs },
    clock,
  );

  const simulated = ledger;
  const pipeline = new Pipeline({
    identity: engine.identity,
    mode: engine.mode,
    feed: overrides.feed ?? createFeed(config),
    book,
    history,
    model,
    riskGate,
    scheduler,
    tracker,
    bus,
    events,
    detector: {
      minEdgeThreshold: config.minEdgeThreshold,
      minSizeThreshold: config.minSizeThreshold,
      orderNotional: config.orderNotional,
      stalenessWindowMs: config.stalenessWindowMs,
    },
    gasCost: () => gasCost.current(),
    clock,
    onQuote: overrides.onQuote,
    onApproved: overrides.onApproved,
    onStateChanged: overrides.persist === false ? undefined : (state) => saveState(config.stateFile, state),
    collectLedger: simulated ? () => simulated.entries() : undefined,
  });

  return { pipeline, bus, events, book, riskGate, scheduler, tracker, ledger, collateral };
}
