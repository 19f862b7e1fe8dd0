import { isStale } from "../detection/detector.js";
import type { EventBus } from "../events.js";
import { log } from "../logger.js";
import { Mailbox } from "../mailbox.js";
import type {
  ExecutionResult,
  MarketRiskSnapshot,
  Opportunity,
  RejectionReason,
  RiskDecision,
  RiskSnapshot,
} from "../types.js";

export interface RiskGateConfig {
  cooldownMs: number;
  perMarketCap: number;
  globalCap: number;
  stalenessWindowMs: number;
}

interface MarketRisk {
  lastExecutionAt: number | null;
  committed: number;
  reserved: number;
}

interface Reservation {
  marketId: string;
  amount: number;
}

// Caps are compared in collateral units; tolerate float dust from size * price.
const CAP_EPSILON = 1e-9;

/**
 * Owns all cooldown and exposure state. Every mutation (evaluate, settle, release,
 * restore) is queued on one mailbox, so concurrent market tasks see a serial order.
 * Terminal execution results arrive as messages from the event bus.
 */
export class RiskGate {
  private readonly markets = new Map<string, MarketRisk>();
  private readonly reservations = new Map<string, Reservation>();
  private readonly mailbox = new Mailbox();
  private globalCommitted = 0;
  private globalReserved = 0;
  private detach: (() => void) | null = null;

  constructor(
    private readonly config: RiskGateConfig,
    private readonly bus: EventBus,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Subscribes to terminal results so reservations are committed or released. */
  attach(): void {
    if (this.detach) return;
    this.detach = this.bus.onResult((result) => {
      this.settle(result).catch((err) => {
        log.error("Risk gate failed to settle result", { requestId: result.requestId, error: String(err) });
      });
    });
  }

  close(): void {
    this.detach?.();
    this.detach = null;
  }

  evaluate(opportunity: Opportunity): Promise<RiskDecision> {
    return this.mailbox.run(() => {
      const now = this.clock();
      const reason = this.check(opportunity, now);
      if (reason) {
        this.reject(opportunity, reason, now);
        return { approved: false, opportunity, reason };
      }

      const market = this.market(opportunity.marketId);
      market.lastExecutionAt = now;
      market.reserved += opportunity.notional;
      this.globalReserved += opportunity.notional;
      this.reservations.set(opportunity.id, { marketId: opportunity.marketId, amount: opportunity.notional });

      log.info("Risk gate approved", {
        marketId: opportunity.marketId,
        opportunityId: opportunity.id,
        reserved: opportunity.notional,
        globalExposure: this.globalCommitted + this.globalReserved,
      });
      return { approved: true, opportunity, reserved: opportunity.notional };
    });
  }

  /**
   * Applies a terminal result. Confirmed commits the realized notional (never more
   * than was reserved); Failed and Dropped release the reservation. The cooldown
   * started by the approval is kept either way.
   */
  settle(result: ExecutionResult): Promise<void> {
    return this.mailbox.run(() => {
      const reservation = this.takeReservation(result.opportunityId);
      if (!reservation) return;

      if (result.outcome === "Confirmed") {
        const realized =
          result.realizedPrice !== undefined && result.filledSize !== undefined
            ? result.realizedPrice * result.filledSize
            : reservation.amount;
        const committed = Math.min(realized, reservation.amount);
        this.market(reservation.marketId).committed += committed;
        this.globalCommitted += committed;
        log.info("Exposure committed", {
          marketId: reservation.marketId,
          opportunityId: result.opportunityId,
          committed,
        });
      } else {
        log.info("Exposure released", {
          marketId: reservation.marketId,
          opportunityId: result.opportunityId,
          outcome: result.outcome,
          released: reservation.amount,
        });
      }
    });
  }

  /** Releases a reservation whose opportunity never reached the engine. */
  release(opportunityId: string): Promise<void> {
    return this.mailbox.run(() => {
      const reservation = this.takeReservation(opportunityId);
      if (reservation) {
        log.info("Exposure released", { marketId: reservation.marketId, opportunityId, released: reservation.amount });
      }
    });
  }

  /**
   * Loads persisted exposure and cooldown timestamps. Reservations that were open at
   * shutdown are restored as committed: their transactions may have landed.
   */
  restore(snapshot: RiskSnapshot): Promise<void> {
    return this.mailbox.run(() => {
      this.markets.clear();
      this.reservations.clear();
      this.globalCommitted = 0;
      this.globalReserved = 0;
      for (const m of snapshot.markets) {
        const committed = m.committed + m.reserved;
        this.markets.set(m.marketId, { lastExecutionAt: m.lastExecutionAt, committed, reserved: 0 });
        this.globalCommitted += committed;
      }
      log.info("Risk state restored", { markets: snapshot.markets.length, globalCommitted: this.globalCommitted });
    });
  }

  isEligible(marketId: string, now: number = this.clock()): boolean {
    const market = this.markets.get(marketId);
    if (!market) return true;
    return !this.cooling(market, now) && market.committed + market.reserved < this.config.perMarketCap;
  }

  snapshot(now: number = this.clock()): RiskSnapshot {
    const markets: MarketRiskSnapshot[] = [...this.markets.entries()].map(([marketId, m]) => ({
      marketId,
      phase: this.cooling(m, now) ? "Cooling" : "Eligible",
      lastExecutionAt: m.lastExecutionAt,
      committed: m.committed,
      reserved: m.reserved,
    }));
    return {
      markets,
      globalCommitted: this.globalCommitted,
      globalReserved: this.globalReserved,
      perMarketCap: this.config.perMarketCap,
      globalCap: this.config.globalCap,
    };
  }

  /** Resolves once all queued mutations have been applied. */
  idle(): Promise<void> {
    return this.mailbox.drain();
  }

  private check(opportunity: Opportunity, now: number): RejectionReason | null {
    const market = this.markets.get(opportunity.marketId);
    if (market && this.cooling(market, now)) return "CooldownActive";

    const marketExposure = market ? market.committed + market.reserved : 0;
    if (marketExposure + opportunity.notional > this.config.perMarketCap + CAP_EPSILON) {
      return "MarketExposureExceeded";
    }
    if (this.globalCommitted + this.globalReserved + opportunity.notional > this.config.globalCap + CAP_EPSILON) {
      return "GlobalExposureExceeded";
    }
    if (isStale(opportunity, this.config.stalenessWindowMs, now)) return "StaleOpportunity";
    return null;
  }

  private reject(opportunity: Opportunity, reason: RejectionReason, now: number): void {
    log.info("Risk gate rejected", { marketId: opportunity.marketId, opportunityId: opportunity.id, reason });
    this.bus.publish({
      timestamp: now,
      marketId: opportunity.marketId,
      kind: "risk.rejected",
      payload: {
        opportunityId: opportunity.id,
        reason,
        side: opportunity.side,
        edge: opportunity.edge,
        notional: opportunity.notional,
      },
    });
  }

  private cooling(market: MarketRisk, now: number): boolean {
    return market.lastExecutionAt !== null && now - market.lastExecutionAt < this.config.cooldownMs;
  }

  private market(marketId: string): MarketRisk {
    let market = this.markets.get(marketId);
    if (!market) {
      market = { lastExecutionAt: null, committed: 0, reserved: 0 };
      this.markets.set(marketId, market);
    }
    return market;
  }

  private takeReservation(opportunityId: string): Reservation | undefined {
    const reservation = this.reservations.get(opportunityId);
    if (!reservation) return undefined;
    this.reservations.delete(opportunityId);
    const market = this.market(reservation.marketId);
    market.reserved -= reservation.amount;
    this.globalReserved -= reservation.amount;
    return reservation;
  }
}
