import { readFileSync, writeFileSync, renameSync } from "node:fs";
import { log } from "./logger.js";
import type { MarketRiskSnapshot, RiskSnapshot } from "./types.js";
import { isRecord } from "./utils.js";

export interface PersistedSequence {
  next: number | null;
  inFlight: number | null;
  needsReconciliation: boolean;
}

export interface PersistedState {
  savedAt: number;
  sequences: Record<string, PersistedSequence>;
  /** dry-run only: simulated transaction counts per identity */
  ledger: Record<string, number>;
  risk: RiskSnapshot;
}

function nullableNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function finite(value: unknown, fallback = 0): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function reviveSequences(raw: unknown): Record<string, PersistedSequence> {
  const out: Record<string, PersistedSequence> = {};
  if (!isRecord(raw)) return out;
  for (const [identity, value] of Object.entries(raw)) {
    if (!isRecord(value)) continue;
    out[identity] = {
      next: nullableNumber(value.next),
      inFlight: nullableNumber(value.inFlight),
      needsReconciliation: value.needsReconciliation === true,
    };
  }
  return out;
}

function reviveLedger(raw: unknown): Record<string, number> {
  const out: Record<string, number> = {};
  if (!isRecord(raw)) return out;
  for (const [identity, value] of Object.entries(raw)) {
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) out[identity] = value;
  }
  return out;
}

function reviveMarket(raw: unknown): MarketRiskSnapshot | null {
  if (!isRecord(raw) || typeof raw.marketId !== "string") return null;
  return {
    marketId: raw.marketId,
    phase: raw.phase === "Cooling" ? "Cooling" : "Eligible",
    lastExecutionAt: nullableNumber(raw.lastExecutionAt),
    committed: finite(raw.committed),
    reserved: finite(raw.reserved),
  };
}

function reviveRisk(raw: unknown): RiskSnapshot {
  const risk = isRecord(raw) ? raw : {};
  const markets = Array.isArray(risk.markets)
    ? risk.markets.map(reviveMarket).filter((m): m is MarketRiskSnapshot => m !== null)
    : [];
  return {
    markets,
    globalCommitted: finite(risk.globalCommitted),
    globalReserved: finite(risk.globalReserved),
    perMarketCap: finite(risk.perMarketCap),
    globalCap: finite(risk.globalCap),
  };
}

export function saveState(file: string, state: PersistedState): void {
  try {
    const tmpFile = file + ".tmp";
    writeFileSync(tmpFile, JSON.stringify(state, null, 2), "utf-8");
    renameSync(tmpFile, file);
  } catch (err) {
    log.error("Failed to save state", { file, error: String(err) });
  }
}

export function loadState(file: string): PersistedState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, "utf-8"));
  } catch (err) {
    log.warn("Could not load persisted state, starting fresh", { file, error: String(err) });
    return null;
  }
  if (!isRecord(parsed)) {
    log.warn("Persisted state is not an object, starting fresh", { file });
    return null;
  }
  return {
    savedAt: finite(parsed.savedAt),
    sequences: reviveSequences(parsed.sequences),
    ledger: reviveLedger(parsed.ledger),
    risk: reviveRisk(parsed.risk),
  };
}
