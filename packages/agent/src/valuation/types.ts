import type { PricePoint, Side, ValuationEstimate } from "../types.js";

/**
 * Anything that can turn a market's observed price history into a fair-value
 * estimate. Implementations must be pure: the same history always yields the
 * same estimate, and `estimatedAt` comes from the history, not the clock.
 */
export interface ValuationModel {
  readonly name: string;
  /** @throws InsufficientHistory when `history` is shorter than the model's minimum */
  estimate(marketId: string, side: Side, history: readonly PricePoint[]): ValuationEstimate;
}
