import type { Side } from "../types.js";

export interface BookLevel {
  price: string;
  size: string;
}

/** One outcome's order book as returned by the CLOB `/book` endpoint. */
export interface ClobBookTick {
  kind: "clob-book";
  marketId: string;
  side: Side;
  asks: BookLevel[];
  bids: BookLevel[];
  fetchedAt: number;
}

/** One CSV row written by the recorder script. */
export interface ReplayRowTick {
  kind: "replay-row";
  line: number;
  row: Record<string, string>;
}

export type RawTick = ClobBookTick | ReplayRowTick;

/**
 * A source of raw ticks. Live feeds never end on their own; replay feeds end at
 * the end of their file and start over from the first row when iterated again.
 */
export interface Feed {
  readonly name: string;
  ticks(signal?: AbortSignal): AsyncIterable<RawTick>;
}

export const REPLAY_COLUMNS = ["timestamp", "market_id", "side", "best_bid", "best_ask", "ask_size"] as const;
