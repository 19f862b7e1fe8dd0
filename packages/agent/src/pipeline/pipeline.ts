import { detectBest } from "../detection/detector.js";
import type { Candidate, DetectorConfig } from "../detection/detector.js";
import { InsufficientHistory, MalformedFeedData } from "../errors.js";
import type { EventBus, EventLog } from "../events.js";
import type { ExecutionScheduler } from "../execution/scheduler.js";
import type { SequenceTracker } from "../execution/sequence-tracker.js";
import { normalize, marketIdOf } from "../feed/normalizer.js";
import type { QuoteBook } from "../feed/quote-book.js";
import type { Feed, RawTick } from "../feed/types.js";
import { log } from "../logger.js";
import type { PersistedState } from "../persistence.js";
import type { RiskGate } from "../risk/risk-gate.js";
import type {
  ExecutionMode,
  ExecutionResult,
  Market,
  Opportunity,
  PipelineEvent,
  PipelineEventKind,
  PipelineStatus,
  Quote,
  RejectionReason,
  RiskSnapshot,
} from "../types.js";
import { SIDES } from "../types.js";
import type { PriceHistory, ValuationModel } from "../valuation/index.js";

export interface PipelineParams {
  identity: `0x${string}`;
  mode: ExecutionMode;
  feed: Feed;
  book: QuoteBook;
  history: PriceHistory;
  model: ValuationModel;
  riskGate: RiskGate;
  scheduler: ExecutionScheduler;
  tracker: SequenceTracker;
  bus: EventBus;
  events: EventLog;
  detector: DetectorConfig;
  /** Gas cost of one exchange call in collateral units; detection nets it out of the expected profit. */
  gasCost?: () => Promise<number>;
  clock?: () => number;
  /** Called after every normalized quote, before detection. */
  onQuote?: (quote: Quote) => void;
  /** Called for every opportunity the risk gate approves. */
  onApproved?: (opportunity: Opportunity) => void;
  /** Called once the risk gate has applied a terminal result. */
  onStateChanged?: (state: PersistedState) => void;
  /** Extra state written alongside sequences and risk, e.g. the dry-run ledger. */
  collectLedger?: () => Record<string, number>;
}

function emptyRejections(): Record<RejectionReason, number> {
  return { CooldownActive: 0, MarketExposureExceeded: 0, GlobalExposureExceeded: 0, StaleOpportunity: 0 };
}

/**
 * Feed → normalize → value → detect → risk gate → scheduler. Ticks are routed to a
 * serial task per market; markets run concurrently and only meet at the risk gate
 * and the scheduler.
 */
export class Pipeline {
  private readonly params: PipelineParams;
  private readonly clock: () => number;
  private readonly marketTasks = new Map<string, Promise<void>>();
  private controller: AbortController | null = null;
  /** Settles once the feed has ended and every request it produced has settled. */
  private running: Promise<void> | null = null;
  private startedAt: number | null = null;
  private persisting: Promise<void> = Promise.resolve();

  private ticksProcessed = 0;
  private opportunitiesDetected = 0;
  private approvals = 0;
  private rejections = emptyRejections();
  private confirmed = 0;
  private failed = 0;
  private dropped = 0;

  constructor(params: PipelineParams) {
    this.params = params;
    this.clock = params.clock ?? Date.now;
    params.bus.onResult((result) => this.onResult(result));
  }

  /**
   * Restores risk exposure from a previous run and re-reads the sequence state
   * from the signer. Persisted sequence values are only compared, never adopted.
   */
  async resume(state: PersistedState | null): Promise<void> {
    const { riskGate, tracker, identity } = this.params;
    if (state) await riskGate.restore(state.risk);
    try {
      await tracker.sync(identity);
    } catch (err) {
      log.warn("Initial sequence sync failed; the scheduler will retry", { identity, error: String(err) });
      return;
    }
    const persisted = state?.sequences[identity.toLowerCase()];
    if (persisted) tracker.compare(identity, persisted.next);
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.startedAt = this.clock();
    this.params.riskGate.attach();
    this.params.scheduler.start();
    log.info("Pipeline started", { mode: this.params.mode, feed: this.params.feed.name, identity: this.params.identity });

    const consuming = this.consume(controller.signal).catch((err) => {
      log.error("Feed consumption failed", { feed: this.params.feed.name, error: String(err) });
    });
    this.running = consuming
      .then(() => this.drain())
      .catch((err) => {
        log.error("Pipeline drain failed", { error: String(err) });
      })
      .finally(() => {
        if (this.controller === controller) this.controller = null;
      });
  }

  /**
   * Stops consuming, drops queued requests and abandons the active ones. Also
   * applies after a finite feed has ended while requests are still in flight.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    controller.abort();
    this.params.scheduler.stop();
    // abandoned requests still settle: their results carry the reconciliation flag
    await this.running;
    log.info("Pipeline stopped", { ticksProcessed: this.ticksProcessed });
  }

  /** Resolves once a finite feed is exhausted and every request has settled. */
  async finished(): Promise<void> {
    await this.running;
    await this.persisting;
  }

  /** True from `start` until the feed has ended and every request has settled. */
  isRunning(): boolean {
    return this.controller !== null;
  }

  getStatus(): PipelineStatus {
    const { identity, mode, tracker, scheduler } = this.params;
    const sequence = tracker.status(identity);
    return {
      running: this.isRunning(),
      mode,
      identity,
      startedAt: this.startedAt,
      ticksProcessed: this.ticksProcessed,
      opportunitiesDetected: this.opportunitiesDetected,
      approvals: this.approvals,
      rejections: { ...this.rejections },
      confirmed: this.confirmed,
      failed: this.failed,
      dropped: this.dropped,
      queueDepth: scheduler.depth(identity),
      nextSequence: sequence.next,
      awaitingReconciliation: sequence.needsReconciliation,
    };
  }

  getRisk(): RiskSnapshot {
    return this.params.riskGate.snapshot(this.clock());
  }

  getMarkets(): Market[] {
    return this.params.book.markets();
  }

  getEvents(limit?: number, kind?: PipelineEventKind): PipelineEvent[] {
    return this.params.events.recent(limit, kind);
  }

  private async drain(): Promise<void> {
    await Promise.all(this.marketTasks.values());
    await this.params.scheduler.idle();
    await this.params.riskGate.idle();
    await this.persisting;
  }

  private async consume(signal: AbortSignal): Promise<void> {
    for await (const raw of this.params.feed.ticks(signal)) {
      if (signal.aborted) break;
      this.route(raw);
    }
  }

  private route(raw: RawTick): void {
    this.ticksProcessed++;
    const marketId = marketIdOf(raw) ?? "";
    const previous = this.marketTasks.get(marketId) ?? Promise.resolve();
    const task = previous
      .then(() => this.process(raw))
      .catch((err) => {
        log.error("Market task failed", { marketId, error: String(err) });
      });
    this.marketTasks.set(marketId, task);
  }

  private async process(raw: RawTick): Promise<void> {
    const { book, history, bus, riskGate, scheduler, identity } = this.params;

    let quote: Quote;
    try {
      quote = normalize(raw);
    } catch (err) {
      if (!(err instanceof MalformedFeedData)) throw err;
      log.warn("Skipping malformed tick", { marketId: marketIdOf(raw), field: err.field, error: err.message });
      bus.publish({
        timestamp: this.clock(),
        marketId: marketIdOf(raw) ?? "",
        kind: "feed.malformed",
        payload: { field: err.field, error: err.message },
      });
      return;
    }

    if (!book.apply(quote)) return;
    history.record(quote);
    this.params.onQuote?.(quote);

    if (!riskGate.isEligible(quote.marketId, this.clock())) return;

    const gasCost = this.params.gasCost ? await this.params.gasCost() : 0;
    const now = this.clock();
    const candidates = this.candidates(quote.marketId);
    const opportunity = detectBest(candidates, { ...this.params.detector, gasCost }, now);
    if (!opportunity) return;
    this.opportunitiesDetected++;
    log.info("Opportunity detected", {
      marketId: opportunity.marketId,
      opportunityId: opportunity.id,
      side: opportunity.side,
      direction: opportunity.direction,
      edge: opportunity.edge,
      notional: opportunity.notional,
    });

    const decision = await riskGate.evaluate(opportunity);
    if (!decision.approved) {
      this.rejections[decision.reason]++;
      return;
    }
    this.approvals++;
    this.params.onApproved?.(opportunity);

    const submitted = scheduler.submit(opportunity, identity);
    if (submitted.status === "Rejected") {
      await riskGate.release(opportunity.id);
    }
  }

  private candidates(marketId: string): Candidate[] {
    const { book, history, model } = this.params;
    const candidates: Candidate[] = [];
    for (const side of SIDES) {
      const quote = book.latest(marketId, side);
      if (!quote) continue;
      try {
        candidates.push({ quote, estimate: model.estimate(marketId, side, history.get(marketId, side)) });
      } catch (err) {
        if (!(err instanceof InsufficientHistory)) throw err;
        log.debug("Valuation skipped", { marketId, side, have: err.have, need: err.need });
      }
    }
    return candidates;
  }

  private onResult(result: ExecutionResult): void {
    if (result.outcome === "Confirmed") this.confirmed++;
    else if (result.outcome === "Failed") this.failed++;
    else this.dropped++;

    const { onStateChanged } = this.params;
    if (!onStateChanged) return;
    this.persisting = this.persisting
      .then(() => this.params.riskGate.idle())
      .then(() => onStateChanged(this.snapshotState()))
      .catch((err) => {
        log.error("Failed to persist state", { requestId: result.requestId, error: String(err) });
      });
  }

  private snapshotState(): PersistedState {
    const { tracker, identity, riskGate, collectLedger } = this.params;
    const sequence = tracker.status(identity);
    return {
      savedAt: this.clock(),
      sequences: {
        [identity.toLowerCase()]: {
          next: sequence.next,
          inFlight: sequence.inFlight,
          needsReconciliation: sequence.needsReconciliation,
        },
      },
      ledger: collectLedger ? collectLedger() : {},
      risk: riskGate.snapshot(this.clock()),
    };
  }
}
