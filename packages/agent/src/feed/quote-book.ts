import type { Market, MarketTokens, Quote, Side } from "../types.js";

function key(marketId: string, side: Side): string {
  return `${marketId}:${side}`;
}

/**
 * Latest Quote per (market, side) plus the Market snapshot built from them.
 * Quotes are replaced, never edited; an older quote never supersedes a newer one.
 */
export class QuoteBook {
  private readonly quotes = new Map<string, Quote>();
  private readonly marketsById = new Map<string, Market>();

  constructor(tokens: Record<string, MarketTokens> = {}) {
    for (const [marketId, t] of Object.entries(tokens)) {
      this.marketsById.set(marketId, { marketId, tokens: t, updatedAt: 0 });
    }
  }

  /** Returns false when `quote` is older than the one already held. */
  apply(quote: Quote): boolean {
    const k = key(quote.marketId, quote.side);
    const current = this.quotes.get(k);
    if (current && current.observedAt > quote.observedAt) return false;
    this.quotes.set(k, quote);

    const market = this.marketsById.get(quote.marketId) ?? { marketId: quote.marketId, updatedAt: 0 };
    const book = {
      takerPrice: quote.price,
      ...(quote.bestBid !== undefined ? { makerPrice: quote.bestBid } : {}),
      liquidity: quote.size,
      updatedAt: quote.observedAt,
    };
    this.marketsById.set(quote.marketId, {
      ...market,
      ...(quote.side === "YES" ? { yes: book } : { no: book }),
      updatedAt: Math.max(market.updatedAt, quote.observedAt),
    });
    return true;
  }

  latest(marketId: string, side: Side): Quote | undefined {
    return this.quotes.get(key(marketId, side));
  }

  market(marketId: string): Market | undefined {
    return this.marketsById.get(marketId);
  }

  markets(): Market[] {
    return [...this.marketsById.values()];
  }
}
