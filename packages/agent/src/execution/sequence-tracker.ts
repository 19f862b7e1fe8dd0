import { log } from "../logger.js";
import type { ExecutionResult } from "../types.js";
import type { NonceSource } from "./signer.js";

export interface SequenceState {
  /** next number to issue; null until synced or while reconciling */
  next: number | null;
  inFlight: number | null;
  needsReconciliation: boolean;
  lastSyncAt: number | null;
}

/**
 * Per-identity sequence (nonce) bookkeeping. Numbers are issued one at a time:
 * `next` refuses while a previous number is unsettled, and an identity whose last
 * transaction has an unknown fate stays blocked until `sync` sees no pending
 * transactions beyond the mined count. Local state is never trusted over the source.
 */
export class SequenceTracker {
  private readonly states = new Map<string, SequenceState>();

  constructor(
    private readonly source: NonceSource,
    private readonly clock: () => number = Date.now,
  ) {}

  /**
   * Re-reads the mined and pending counts. Returns true when the identity can
   * issue again.
   */
  async sync(identity: `0x${string}`): Promise<boolean> {
    const state = this.state(identity);
    if (state.inFlight !== null) {
      throw new Error(`Cannot sync ${identity} while sequence ${state.inFlight} is in flight`);
    }
    const [latest, pending] = await Promise.all([
      this.source.getSequence(identity, "latest"),
      this.source.getSequence(identity, "pending"),
    ]);
    state.lastSyncAt = this.clock();

    if (pending > latest) {
      state.next = null;
      state.needsReconciliation = true;
      log.warn("Pending transactions outstanding, holding sequence issuance", { identity, latest, pending });
      return false;
    }
    if (state.next !== null && state.next !== latest) {
      log.warn("Local sequence disagrees with chain, adopting chain value", { identity, local: state.next, chain: latest });
    }
    state.next = latest;
    state.needsReconciliation = false;
    log.info("Sequence synced", { identity, next: latest });
    return true;
  }

  ready(identity: `0x${string}`): boolean {
    const state = this.state(identity);
    return state.next !== null && state.inFlight === null && !state.needsReconciliation;
  }

  /** Issues the current number and holds it until `settle`. */
  next(identity: `0x${string}`): number {
    const state = this.state(identity);
    if (state.next === null || state.needsReconciliation) {
      throw new Error(`Sequence for ${identity} is not synced`);
    }
    if (state.inFlight !== null) {
      throw new Error(`Sequence ${state.inFlight} for ${identity} is still unsettled`);
    }
    state.inFlight = state.next;
    return state.next;
  }

  settle(identity: `0x${string}`, result: ExecutionResult): void {
    const state = this.state(identity);
    const sequence = state.inFlight;
    if (sequence === null || result.sequence !== sequence) {
      throw new Error(
        `Result ${result.requestId} settles sequence ${String(result.sequence)} but ${String(sequence)} is in flight`,
      );
    }
    state.inFlight = null;

    if (result.needsReconciliation) {
      state.next = null;
      state.needsReconciliation = true;
      log.warn("Sequence needs reconciliation", { identity, sequence, requestId: result.requestId });
      return;
    }
    if (result.sequenceConsumed) {
      state.next = sequence + 1;
    }
  }

  /** Logs a mismatch between a persisted value and the synced one. */
  compare(identity: `0x${string}`, persistedNext: number | null): void {
    const { next } = this.state(identity);
    if (persistedNext !== null && next !== null && persistedNext !== next) {
      log.warn("Persisted sequence differs from chain", { identity, persisted: persistedNext, chain: next });
    }
  }

  status(identity: `0x${string}`): SequenceState {
    return { ...this.state(identity) };
  }

  private state(identity: `0x${string}`): SequenceState {
    const key = identity.toLowerCase();
    let state = this.states.get(key);
    if (!state) {
      state = { next: null, inFlight: null, needsReconciliation: false, lastSyncAt: null };
      this.states.set(key, state);
    }
    return state;
  }
}
