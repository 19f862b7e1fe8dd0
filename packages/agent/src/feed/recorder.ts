import { appendFileSync, existsSync, writeFileSync } from "node:fs";
import type { Quote } from "../types.js";
import { REPLAY_COLUMNS } from "./types.js";

export function formatReplayRow(quote: Quote): string {
  return [
    new Date(quote.observedAt).toISOString(),
    quote.marketId,
    quote.side,
    (quote.bestBid ?? 0).toFixed(6),
    quote.price.toFixed(6),
    quote.size.toFixed(2),
  ].join(",");
}

/** Appends normalized quotes to a CSV that ReplayFeed can read back. */
export class CsvRecorder {
  private rows = 0;

  constructor(private readonly path: string) {
    if (!existsSync(path)) {
      writeFileSync(path, REPLAY_COLUMNS.join(",") + "\n", "utf-8");
    }
  }

  write(quote: Quote): void {
    appendFileSync(this.path, formatReplayRow(quote) + "\n", "utf-8");
    this.rows++;
  }

  get count(): number {
    return this.rows;
  }
}
