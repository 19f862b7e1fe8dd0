import { InsufficientHistory } from "../errors.js";
import type { PricePoint, Side, ValuationEstimate } from "../types.js";
import type { ValuationModel } from "./types.js";

/** Window average of observed taker prices, with the sample variance. */
export class EmpiricalValuationModel implements ValuationModel {
  readonly name = "empirical";

  constructor(private readonly minObservations: number) {}

  estimate(marketId: string, side: Side, history: readonly PricePoint[]): ValuationEstimate {
    if (history.length < this.minObservations || history.length === 0) {
      throw new InsufficientHistory(marketId, history.length, Math.max(this.minObservations, 1));
    }
    const n = history.length;
    let sum = 0;
    for (const p of history) sum += p.price;
    const avg = sum / n;
    let ss = 0;
    for (const p of history) ss += (p.price - avg) ** 2;

    return {
      marketId,
      side,
      value: avg,
      variance: n > 1 ? ss / (n - 1) : 0,
      estimatedAt: history[n - 1].observedAt,
      model: this.name,
    };
  }
}
