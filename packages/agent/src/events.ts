import { EventEmitter } from "node:events";
import { log } from "./logger.js";
import type { ExecutionResult, PipelineEvent, PipelineEventKind } from "./types.js";

type Listener<T> = (value: T) => void;

const OUTCOME_KIND: Record<ExecutionResult["outcome"], PipelineEventKind> = {
  Confirmed: "execution.confirmed",
  Failed: "execution.failed",
  Dropped: "execution.dropped",
};

export function resultEvent(result: ExecutionResult): PipelineEvent {
  return {
    timestamp: result.completedAt,
    marketId: result.marketId,
    kind: OUTCOME_KIND[result.outcome],
    payload: {
      requestId: result.requestId,
      opportunityId: result.opportunityId,
      side: result.side,
      sequence: result.sequence,
      sequenceConsumed: result.sequenceConsumed,
      needsReconciliation: result.needsReconciliation,
      txHash: result.txHash,
      realizedPrice: result.realizedPrice,
      filledSize: result.filledSize,
      gasUsed: result.gasUsed,
      effectiveGasPrice: result.effectiveGasPrice,
      error: result.error,
    },
  };
}

/**
 * In-process message channel between pipeline stages. Terminal execution results
 * travel on their own channel so the risk gate consumes them as messages; every
 * result is also mirrored as an observation event.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  publish(event: PipelineEvent): void {
    this.emitter.emit("event", event);
  }

  publishResult(result: ExecutionResult): void {
    this.emitter.emit("result", result);
    this.publish(resultEvent(result));
  }

  onEvent(listener: Listener<PipelineEvent>): () => void {
    return this.subscribe("event", listener);
  }

  onResult(listener: Listener<ExecutionResult>): () => void {
    return this.subscribe("result", listener);
  }

  private subscribe<T>(channel: string, listener: Listener<T>): () => void {
    const wrapped = (value: T) => {
      try {
        listener(value);
      } catch (err) {
        log.error("Event listener threw", { channel, error: String(err) });
      }
    };
    this.emitter.on(channel, wrapped);
    return () => {
      this.emitter.off(channel, wrapped);
    };
  }
}

/** Keeps the most recent events for the status API. */
export class EventLog {
  private readonly events: PipelineEvent[] = [];
  private readonly unsubscribe: () => void;

  constructor(bus: EventBus, private readonly capacity: number) {
    this.unsubscribe = bus.onEvent((e) => {
      this.events.push(e);
      if (this.events.length > this.capacity) this.events.shift();
    });
  }

  recent(limit = this.capacity, kind?: PipelineEventKind): PipelineEvent[] {
    const filtered = kind ? this.events.filter((e) => e.kind === kind) : this.events;
    return filtered.slice(-limit);
  }

  close(): void {
    this.unsubscribe();
  }
}
