import { InsufficientHistory } from "../errors.js";
import type { PricePoint, Side, ValuationEstimate } from "../types.js";
import type { ValuationModel } from "./types.js";

/**
 * Fixed fair value per market: the operator's own view of what the YES outcome is
 * worth. The NO side is valued at the complement.
 */
export class ConstantValuationModel implements ValuationModel {
  readonly name = "constant";
  private readonly overrides: Map<string, number>;

  constructor(
    private readonly defaultValue: number,
    overrides: Record<string, number> = {},
    private readonly minObservations = 1,
  ) {
    this.overrides = new Map(Object.entries(overrides));
    for (const v of [defaultValue, ...this.overrides.values()]) {
      if (!(v >= 0 && v <= 1)) throw new Error(`Fair value out of range: ${v}`);
    }
  }

  estimate(marketId: string, side: Side, history: readonly PricePoint[]): ValuationEstimate {
    if (history.length < this.minObservations) {
      throw new InsufficientHistory(marketId, history.length, this.minObservations);
    }
    const yesValue = this.overrides.get(marketId) ?? this.defaultValue;
    return {
      marketId,
      side,
      value: side === "YES" ? yesValue : 1 - yesValue,
      variance: 0,
      estimatedAt: history[history.length - 1].observedAt,
      model: this.name,
    };
  }
}
