import { FeedUnavailable } from "../errors.js";
import { log } from "../logger.js";
import { sleep, withRetry } from "../retry.js";
import type { MarketTokens, Side } from "../types.js";
import { isRecord, pMap } from "../utils.js";
import type { BookLevel, ClobBookTick, Feed, RawTick } from "./types.js";

const CLOB_BASE_DEFAULT = "https://clob.polymarket.com";
const FETCH_CONCURRENCY = 4;

interface PolymarketBook {
  asks: BookLevel[];
  bids: BookLevel[];
}

function toLevels(raw: unknown): BookLevel[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((l) => ({
    price: isRecord(l) && l.price !== undefined ? String(l.price) : "",
    size: isRecord(l) && l.size !== undefined ? String(l.size) : "",
  }));
}

export interface ClobFeedOptions {
  markets: Record<string, MarketTokens>;
  pollIntervalMs: number;
  clobBase?: string;
  retries?: number;
}

/** Polls the CLOB order books of every configured market, both outcomes, forever. */
export class ClobFeed implements Feed {
  readonly name = "clob";
  private readonly clobBase: string;

  constructor(private readonly opts: ClobFeedOptions) {
    this.clobBase = opts.clobBase ?? CLOB_BASE_DEFAULT;
  }

  async *ticks(signal?: AbortSignal): AsyncIterable<RawTick> {
    const entries = Object.entries(this.opts.markets);
    if (entries.length === 0) {
      log.warn("ClobFeed has no markets configured");
      return;
    }

    while (!signal?.aborted) {
      const batches = await pMap(
        entries,
        ([marketId, tokens]) => this.pollMarket(marketId, tokens, signal),
        FETCH_CONCURRENCY,
      );
      for (const batch of batches) {
        for (const tick of batch) yield tick;
      }
      await sleep(this.opts.pollIntervalMs, signal);
    }
  }

  /** Both outcome books of one market; empty when the market could not be fetched this cycle. */
  async pollMarket(marketId: string, tokens: MarketTokens, signal?: AbortSignal): Promise<ClobBookTick[]> {
    const sides: Array<[Side, string]> = [["YES", tokens.yesTokenId], ["NO", tokens.noTokenId]];
    try {
      return await Promise.all(
        sides.map(async ([side, tokenId]) => {
          const book = await withRetry(() => this.fetchBook(tokenId, signal), {
            retries: this.opts.retries ?? 2,
            delayMs: 500,
            label: `book(${marketId}, ${side})`,
            signal,
          });
          return { kind: "clob-book" as const, marketId, side, asks: book.asks, bids: book.bids, fetchedAt: Date.now() };
        }),
      );
    } catch (err) {
      const failure = new FeedUnavailable(this.name, err);
      log.error("Skipping market this cycle", { marketId, error: failure.message });
      return [];
    }
  }

  private async fetchBook(tokenId: string, signal?: AbortSignal): Promise<PolymarketBook> {
    const res = await fetch(`${this.clobBase}/book?token_id=${encodeURIComponent(tokenId)}`, { signal });
    if (!res.ok) throw new Error(`CLOB API error: ${res.status}`);
    const body: unknown = await res.json();
    if (!isRecord(body)) throw new Error("CLOB API returned a non-object book");
    return { asks: toLevels(body.asks), bids: toLevels(body.bids) };
  }
}
