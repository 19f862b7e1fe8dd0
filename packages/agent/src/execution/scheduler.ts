import { isStale } from "../detection/detector.js";
import { SchedulerSaturated } from "../errors.js";
import type { EventBus } from "../events.js";
import { log } from "../logger.js";
import { sleep } from "../retry.js";
import type { ExecutionRequest, ExecutionResult, GasParams, Opportunity } from "../types.js";
import { makeId } from "../utils.js";
import type { Executor } from "./engine.js";
import type { SequenceTracker } from "./sequence-tracker.js";

export interface SchedulerConfig {
  queueDepth: number;
  stalenessWindowMs: number;
  reconcileIntervalMs: number;
}

export interface Ticket {
  requestId: string;
  opportunityId: string;
  identity: `0x${string}`;
  /** Resolves with the terminal result; never rejects. */
  result: Promise<ExecutionResult>;
}

export type SubmitOutcome =
  | { status: "Queued"; ticket: Ticket }
  | { status: "Rejected"; error: SchedulerSaturated };

interface Entry {
  requestId: string;
  opportunity: Opportunity;
  resolve: (result: ExecutionResult) => void;
}

interface Lane {
  engine: Executor;
  queue: Entry[];
  /** entry currently between dequeue and its terminal result */
  active: Entry | null;
  draining: boolean;
}

/**
 * One FIFO lane per signing identity. A lane handles a single request at a time:
 * the sequence number is taken at dequeue and the next entry waits for the
 * previous terminal result. Terminal results go out on the event bus.
 */
export class ExecutionScheduler {
  private readonly lanes = new Map<string, Lane>();
  private readonly defaultIdentity: `0x${string}`;
  private readonly completions = new Map<string, Array<() => void>>();
  private controller = new AbortController();

  constructor(
    engines: readonly Executor[],
    private readonly tracker: SequenceTracker,
    private readonly bus: EventBus,
    private readonly config: SchedulerConfig,
    private readonly clock: () => number = Date.now,
  ) {
    const [first] = engines;
    if (!first) throw new Error("Scheduler needs at least one engine");
    this.defaultIdentity = first.identity;
    for (const engine of engines) {
      this.lanes.set(engine.identity.toLowerCase(), { engine, queue: [], active: null, draining: false });
    }
  }

  submit(opportunity: Opportunity, identity: `0x${string}` = this.defaultIdentity): SubmitOutcome {
    const lane = this.lanes.get(identity.toLowerCase());
    if (!lane) throw new Error(`No engine registered for ${identity}`);

    const depth = lane.queue.length + (lane.active ? 1 : 0);
    if (depth >= this.config.queueDepth) {
      const error = new SchedulerSaturated(identity, this.config.queueDepth);
      log.warn("Scheduler saturated", { marketId: opportunity.marketId, opportunityId: opportunity.id, identity, depth });
      this.bus.publish({
        timestamp: this.clock(),
        marketId: opportunity.marketId,
        kind: "scheduler.rejected",
        payload: { opportunityId: opportunity.id, reason: error.name, identity, depth },
      });
      return { status: "Rejected", error };
    }

    const requestId = makeId("req");
    const result = new Promise<ExecutionResult>((resolve) => {
      lane.queue.push({ requestId, opportunity, resolve });
    });
    log.debug("Request queued", { marketId: opportunity.marketId, opportunityId: opportunity.id, requestId, depth: depth + 1 });

    this.drain(lane).catch((err) => {
      log.error("Scheduler lane crashed", { identity, error: String(err) });
    });
    return { status: "Queued", ticket: { requestId, opportunityId: opportunity.id, identity: lane.engine.identity, result } };
  }

  /** Re-arms the scheduler after `stop`. */
  start(): void {
    if (this.controller.signal.aborted) this.controller = new AbortController();
  }

  /**
   * Drops everything still queued and abandons the active wait. A live request
   * that was already broadcast comes back flagged for reconciliation.
   */
  stop(): void {
    this.controller.abort();
    for (const lane of this.lanes.values()) {
      const waiting = lane.queue.splice(0);
      for (const entry of waiting) {
        this.complete(entry, this.dropped(entry, "Scheduler stopped"));
      }
    }
  }

  depth(identity: `0x${string}` = this.defaultIdentity): number {
    const lane = this.lanes.get(identity.toLowerCase());
    return lane ? lane.queue.length + (lane.active ? 1 : 0) : 0;
  }

  /** Resolves when every lane is empty and idle. */
  async idle(): Promise<void> {
    const pending = [...this.lanes.values()].flatMap((lane) =>
      [lane.active, ...lane.queue].filter((e): e is Entry => e !== null),
    );
    await Promise.all(pending.map((e) => new Promise<void>((resolve) => this.onComplete(e, resolve))));
  }

  private onComplete(entry: Entry, listener: () => void): void {
    const listeners = this.completions.get(entry.requestId) ?? [];
    listeners.push(listener);
    this.completions.set(entry.requestId, listeners);
  }

  private async drain(lane: Lane): Promise<void> {
    if (lane.draining) return;
    lane.draining = true;
    try {
      let entry = lane.queue.shift();
      while (entry) {
        lane.active = entry;
        const result = await this.dispatch(lane, entry);
        lane.active = null;
        this.complete(entry, result);
        entry = lane.queue.shift();
      }
    } finally {
      lane.active = null;
      lane.draining = false;
    }
  }

  private complete(entry: Entry, result: ExecutionResult): void {
    entry.resolve(result);
    this.bus.publishResult(result);
    for (const listener of this.completions.get(entry.requestId) ?? []) listener();
    this.completions.delete(entry.requestId);
  }

  private async dispatch(lane: Lane, entry: Entry): Promise<ExecutionResult> {
    const { engine } = lane;
    const { opportunity } = entry;
    const signal = this.controller.signal;

    if (isStale(opportunity, this.config.stalenessWindowMs, this.clock())) {
      return this.dropped(entry, "Stale at dequeue");
    }

    const synced = await this.awaitSequence(engine.identity, signal);
    if (!synced) return this.dropped(entry, "Scheduler stopped");
    if (isStale(opportunity, this.config.stalenessWindowMs, this.clock())) {
      return this.dropped(entry, "Stale after sequence wait");
    }

    let gas: GasParams;
    try {
      gas = await engine.quoteGas();
    } catch (err) {
      log.warn("Gas quote failed", { marketId: opportunity.marketId, requestId: entry.requestId, error: String(err) });
      return this.unsequenced(entry, "Failed", `Gas quote failed: ${String(err)}`);
    }

    const sequence = this.tracker.next(engine.identity);
    const request: ExecutionRequest = Object.freeze({
      requestId: entry.requestId,
      opportunity,
      identity: engine.identity,
      sequence,
      gas,
      mode: engine.mode,
      createdAt: this.clock(),
    });
    log.info("Dispatching request", {
      marketId: opportunity.marketId,
      opportunityId: opportunity.id,
      requestId: entry.requestId,
      sequence,
    });

    let result: ExecutionResult;
    try {
      result = await engine.execute(request, signal);
    } catch (err) {
      // fate unknown: hold the identity until the chain is re-read
      result = {
        requestId: request.requestId,
        opportunityId: opportunity.id,
        marketId: opportunity.marketId,
        side: opportunity.side,
        outcome: "Failed",
        sequence,
        sequenceConsumed: false,
        needsReconciliation: true,
        error: String(err),
        completedAt: this.clock(),
      };
    }
    this.tracker.settle(engine.identity, result);
    return result;
  }

  /** Waits until the tracker can issue for `identity`; false if stopped first. */
  private async awaitSequence(identity: `0x${string}`, signal: AbortSignal): Promise<boolean> {
    while (!this.tracker.ready(identity)) {
      if (signal.aborted) return false;
      try {
        if (await this.tracker.sync(identity)) return true;
      } catch (err) {
        log.warn("Sequence sync failed", { identity, error: String(err) });
      }
      await sleep(this.config.reconcileIntervalMs, signal);
    }
    return !signal.aborted;
  }

  private dropped(entry: Entry, reason: string): ExecutionResult {
    log.info("Request dropped", { marketId: entry.opportunity.marketId, requestId: entry.requestId, reason });
    return this.unsequenced(entry, "Dropped", reason);
  }

  private unsequenced(entry: Entry, outcome: "Failed" | "Dropped", error: string): ExecutionResult {
    return {
      requestId: entry.requestId,
      opportunityId: entry.opportunity.id,
      marketId: entry.opportunity.marketId,
      side: entry.opportunity.side,
      outcome,
      sequenceConsumed: false,
      needsReconciliation: false,
      error,
      completedAt: this.clock(),
    };
  }
}
