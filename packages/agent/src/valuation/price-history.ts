import type { PricePoint, Quote, Side } from "../types.js";

function key(marketId: string, side: Side): string {
  return `${marketId}:${side}`;
}

/** Bounded rolling window of observed taker prices per (market, side). */
export class PriceHistory {
  private readonly windows = new Map<string, PricePoint[]>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 2) {
      throw new Error("PriceHistory capacity must be an integer >= 2");
    }
  }

  record(quote: Quote): void {
    const k = key(quote.marketId, quote.side);
    const window = this.windows.get(k) ?? [];
    const last = window[window.length - 1];
    // Replayed or out-of-order ticks never rewrite the past
    if (last && quote.observedAt <= last.observedAt) return;
    window.push({ price: quote.price, observedAt: quote.observedAt });
    if (window.length > this.capacity) window.shift();
    this.windows.set(k, window);
  }

  get(marketId: string, side: Side): readonly PricePoint[] {
    return this.windows.get(key(marketId, side)) ?? [];
  }

  size(marketId: string, side: Side): number {
    return this.get(marketId, side).length;
  }

  clear(): void {
    this.windows.clear();
  }
}
