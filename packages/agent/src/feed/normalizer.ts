import { MalformedFeedData } from "../errors.js";
import type { Quote, Side } from "../types.js";
import type { BookLevel, ClobBookTick, RawTick, ReplayRowTick } from "./types.js";

function parsePrice(field: string, raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    throw new MalformedFeedData(field, "missing");
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new MalformedFeedData(field, `not a number: ${raw}`);
  }
  if (value < 0 || value > 1) {
    throw new MalformedFeedData(field, `price ${value} outside [0, 1]`);
  }
  return value;
}

function parseSize(field: string, raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    throw new MalformedFeedData(field, "missing");
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new MalformedFeedData(field, `not a number: ${raw}`);
  }
  if (value < 0) {
    throw new MalformedFeedData(field, `negative size ${value}`);
  }
  return value;
}

function parseSide(raw: string | undefined): Side {
  const upper = raw?.trim().toUpperCase();
  if (upper === "YES" || upper === "NO") return upper;
  throw new MalformedFeedData("side", `expected YES or NO, got ${raw ?? "nothing"}`);
}

function parseTimestamp(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    throw new MalformedFeedData("timestamp", "missing");
  }
  const trimmed = raw.trim();
  const ms = /^\d+$/.test(trimmed) ? Number(trimmed) : Date.parse(trimmed);
  if (!Number.isFinite(ms)) {
    throw new MalformedFeedData("timestamp", `unparseable: ${raw}`);
  }
  return ms;
}

function normalizeBook(tick: ClobBookTick): Quote {
  if (!tick.marketId) throw new MalformedFeedData("marketId", "missing");
  if (!Number.isFinite(tick.fetchedAt)) throw new MalformedFeedData("fetchedAt", "missing");
  if (tick.asks.length === 0) throw new MalformedFeedData("asks", "no resting asks");

  const asks = tick.asks.map((l: BookLevel, i) => ({
    price: parsePrice(`asks[${i}].price`, l.price),
    size: parseSize(`asks[${i}].size`, l.size),
  }));
  const best = Math.min(...asks.map((a) => a.price));
  const size = asks.filter((a) => a.price === best).reduce((sum, a) => sum + a.size, 0);

  const bids = tick.bids.map((l, i) => parsePrice(`bids[${i}].price`, l.price));
  const bestBid = bids.length > 0 ? Math.max(...bids) : undefined;

  return {
    marketId: tick.marketId,
    side: tick.side,
    price: best,
    size,
    ...(bestBid !== undefined ? { bestBid } : {}),
    observedAt: tick.fetchedAt,
  };
}

function normalizeReplayRow(tick: ReplayRowTick): Quote {
  const { row } = tick;
  const marketId = row.market_id?.trim();
  if (!marketId) throw new MalformedFeedData("market_id", `missing on line ${tick.line}`);

  const bidRaw = row.best_bid?.trim();
  const bestBid = bidRaw ? parsePrice("best_bid", bidRaw) : undefined;

  return {
    marketId,
    side: parseSide(row.side),
    price: parsePrice("best_ask", row.best_ask),
    size: parseSize("ask_size", row.ask_size),
    ...(bestBid !== undefined && bestBid > 0 ? { bestBid } : {}),
    observedAt: parseTimestamp(row.timestamp),
  };
}

/**
 * Canonical Quote for any raw feed record. Live books and replayed rows produce
 * the same shape, so everything downstream is feed-agnostic.
 *
 * @throws MalformedFeedData on missing fields, prices outside [0, 1] or negative sizes
 */
export function normalize(raw: RawTick): Quote {
  switch (raw.kind) {
    case "clob-book":
      return normalizeBook(raw);
    case "replay-row":
      return normalizeReplayRow(raw);
  }
}

export function marketIdOf(raw: RawTick): string | undefined {
  return raw.kind === "clob-book" ? raw.marketId : raw.row.market_id?.trim() || undefined;
}
