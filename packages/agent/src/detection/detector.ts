import type { Opportunity, Quote, ValuationEstimate } from "../types.js";
import { makeId } from "../utils.js";

export interface DetectorConfig {
  minEdgeThreshold: number;
  minSizeThreshold: number;
  /** collateral committed per trade; caps the implied size */
  orderNotional: number;
  /** quotes older than this are not paired into a market's candidates */
  stalenessWindowMs?: number;
  /** gas for one exchange call, in collateral; `edge * size` must exceed it */
  gasCost?: number;
}

export interface Candidate {
  quote: Quote;
  estimate: ValuationEstimate;
}

// Absorbs float noise such as 0.6 - 0.5 = 0.09999999999999998
const EDGE_EPSILON = 1e-9;

/**
 * Compares one quote with the fair-value estimate for the same market and side.
 * Returns null when the edge or the available size is below threshold, or when
 * the expected profit does not cover the gas cost.
 */
export function detect(
  quote: Quote,
  estimate: ValuationEstimate,
  config: DetectorConfig,
  now: number = Date.now(),
): Opportunity | null {
  if (quote.marketId !== estimate.marketId || quote.side !== estimate.side) {
    throw new Error(
      `Estimate for ${estimate.marketId}:${estimate.side} cannot price quote ${quote.marketId}:${quote.side}`,
    );
  }

  const signedEdge = quote.price - estimate.value;
  const edge = Math.abs(signedEdge);
  if (edge + EDGE_EPSILON < config.minEdgeThreshold) return null;
  if (quote.size < config.minSizeThreshold) return null;
  if (quote.price <= 0) return null;

  const size = Math.min(quote.size, config.orderNotional / quote.price);
  if (config.gasCost !== undefined && config.gasCost > 0 && edge * size <= config.gasCost) return null;
  return {
    id: makeId("opp"),
    marketId: quote.marketId,
    side: quote.side,
    direction: signedEdge < 0 ? "BUY" : "SELL",
    quotePrice: quote.price,
    fairValue: estimate.value,
    edge,
    size,
    notional: size * quote.price,
    quoteObservedAt: quote.observedAt,
    detectedAt: now,
  };
}

/**
 * Runs `detect` over the candidates of a single market (at most one per side) and
 * keeps one winner. Candidates whose quote is older than the staleness window are
 * left out first. Both sides qualifying means the complementary pair is priced
 * inconsistently: take the larger edge, then the larger size, and on a full tie
 * take nothing rather than two conflicting legs.
 */
export function detectBest(
  allCandidates: readonly Candidate[],
  config: DetectorConfig,
  now: number = Date.now(),
): Opportunity | null {
  const maxAge = config.stalenessWindowMs;
  const candidates =
    maxAge === undefined ? allCandidates : allCandidates.filter((c) => now - c.quote.observedAt <= maxAge);
  const qualifying = candidates
    .map((c) => detect(c.quote, c.estimate, config, now))
    .filter((o): o is Opportunity => o !== null);

  if (qualifying.length <= 1) return qualifying[0] ?? null;

  const [a, b] = qualifying;
  if (Math.abs(a.edge - b.edge) > EDGE_EPSILON) {
    return a.edge > b.edge ? a : b;
  }
  const sizeA = candidates.find((c) => c.quote.side === a.side)?.quote.size ?? 0;
  const sizeB = candidates.find((c) => c.quote.side === b.side)?.quote.size ?? 0;
  if (sizeA !== sizeB) {
    return sizeA > sizeB ? a : b;
  }
  return null;
}

export function isStale(opportunity: Opportunity, stalenessWindowMs: number, now: number = Date.now()): boolean {
  return now - opportunity.quoteObservedAt > stalenessWindowMs;
}
