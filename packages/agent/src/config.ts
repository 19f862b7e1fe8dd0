import "dotenv/config";
import { parseGwei } from "viem";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import type { ExecutionMode, MarketTokens } from "./types.js";
import { isRecord } from "./utils.js";

type Env = Record<string, string | undefined>;

export type ValuationModelName = "ou" | "empirical" | "constant";
export type FeedKind = "live" | "replay";

// Polymarket CTF exchange on Polygon
const DEFAULT_EXCHANGE = "0x4bFb41d5B3570DeFd03C39a9A4D8dE6Bd8B8982E";
// USDC.e on Polygon
const DEFAULT_COLLATERAL = "0x2791Bca1f2de4661ED88A30C99A7a9449Aa84174";

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`Missing required env var: ${name}`);
  }
  return value;
}

function requireAddress(name: string, value: string): `0x${string}` {
  if (!isAddress(value)) {
    throw new ConfigError(`Invalid address for ${name}: ${value}`);
  }
  return value;
}

function requireHex(env: Env, name: string): `0x${string}` {
  const value = requireEnv(env, name);
  if (!isHex(value)) {
    throw new ConfigError(`Invalid hex for ${name}: ${value}`);
  }
  return value;
}

function isAddress(value: string): value is `0x${string}` {
  return /^0x[0-9a-fA-F]{40}$/.test(value);
}

function isHex(value: string): value is `0x${string}` {
  return /^0x[0-9a-fA-F]+$/.test(value);
}

function num(env: Env, name: string, fallback: number, check?: (n: number) => boolean): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || (check && !check(value))) {
    throw new ConfigError(`Invalid number for ${name}: ${raw}`);
  }
  return value;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const match = allowed.find((a) => a === raw);
  if (!match) {
    throw new ConfigError(`Invalid value for ${name}: ${raw} (expected ${allowed.join(" | ")})`);
  }
  return match;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigError(`Invalid boolean for ${name}: ${raw} (expected true | false)`);
}

function parseMarkets(raw: string): Record<string, MarketTokens> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError("MARKETS must be valid JSON");
  }
  if (!isRecord(parsed)) {
    throw new ConfigError("MARKETS must be an object of marketId -> { yesTokenId, noTokenId }");
  }
  const markets: Record<string, MarketTokens> = {};
  for (const [marketId, entry] of Object.entries(parsed)) {
    if (!isRecord(entry) || typeof entry.yesTokenId !== "string" || typeof entry.noTokenId !== "string") {
      throw new ConfigError(`MARKETS entry for ${marketId} needs yesTokenId and noTokenId`);
    }
    markets[marketId] = { yesTokenId: entry.yesTokenId, noTokenId: entry.noTokenId };
  }
  return markets;
}

const positive = (n: number) => n > 0;
const nonNegative = (n: number) => n >= 0;
const probability = (n: number) => n >= 0 && n <= 1;
const integer = (n: number) => Number.isInteger(n) && n > 0;

export function loadConfig(env: Env = process.env) {
  const mode = oneOf<ExecutionMode>(env, "EXECUTION_MODE", ["dry-run", "live"], "dry-run");
  const feed = oneOf<FeedKind>(env, "FEED", ["live", "replay"], "live");
  const live = mode === "live";

  const config = {
    // detection
    minEdgeThreshold: num(env, "MIN_EDGE_THRESHOLD", 0.05, probability),
    minSizeThreshold: num(env, "MIN_SIZE_THRESHOLD", 100, nonNegative),
    orderNotional: num(env, "ORDER_NOTIONAL", 50, positive),
    // risk
    cooldownMs: num(env, "COOLDOWN_MS", 30_000, nonNegative),
    perMarketCap: num(env, "PER_MARKET_CAP", 500, positive),
    globalCap: num(env, "GLOBAL_CAP", 2_000, positive),
    stalenessWindowMs: num(env, "STALENESS_WINDOW_MS", 10_000, positive),
    // scheduling
    schedulerQueueDepth: num(env, "SCHEDULER_QUEUE_DEPTH", 8, integer),
    reconcileIntervalMs: num(env, "RECONCILE_INTERVAL_MS", 15_000, positive),
    // execution
    mode,
    gasPriorityBound: parseGwei(String(num(env, "GAS_PRIORITY_BOUND_GWEI", 50, positive))),
    priorityFeeBumpPercent: num(env, "PRIORITY_FEE_BUMP_PERCENT", 25, integer),
    slippageBps: num(env, "SLIPPAGE_BPS", 500, (n) => Number.isInteger(n) && n >= 0 && n < 10_000),
    gasLimit: BigInt(num(env, "GAS_LIMIT", 300_000, integer)),
    dryRunGasPrice: parseGwei(String(num(env, "DRY_RUN_GAS_PRICE_GWEI", 50, nonNegative))),
    confirmationTimeoutMs: num(env, "CONFIRMATION_TIMEOUT_MS", 120_000, positive),
    confirmationPollIntervalMs: num(env, "CONFIRMATION_POLL_INTERVAL_MS", 2_000, positive),
    rpcUrl: live ? requireEnv(env, "RPC_URL") : env.RPC_URL,
    privateKey: live ? requireHex(env, "PRIVATE_KEY") : undefined,
    chainId: num(env, "CHAIN_ID", 137, integer),
    exchangeAddress: requireAddress("EXCHANGE_ADDRESS", env.EXCHANGE_ADDRESS || DEFAULT_EXCHANGE),
    collateralAddress: requireAddress("COLLATERAL_ADDRESS", env.COLLATERAL_ADDRESS || DEFAULT_COLLATERAL),
    autoApprove: flag(env, "AUTO_APPROVE", false),
    // collateral per native token, to price gas against the edge
    nativeTokenPrice: num(env, "NATIVE_TOKEN_PRICE", 0.5, nonNegative),
    gasCostMaxAgeMs: num(env, "GAS_COST_MAX_AGE_MS", 30_000, positive),
    // valuation
    valuationModel: oneOf<ValuationModelName>(env, "VALUATION_MODEL", ["ou", "empirical", "constant"], "ou"),
    minHistory: num(env, "MIN_HISTORY", 20, integer),
    historyWindow: num(env, "HISTORY_WINDOW", 120, integer),
    ouHorizonMs: num(env, "OU_HORIZON_MS", 60_000, positive),
    constantFairValue: num(env, "CONSTANT_FAIR_VALUE", 0.5, probability),
    // feed
    feed,
    replayFile: feed === "replay" ? requireEnv(env, "REPLAY_FILE") : env.REPLAY_FILE,
    pollIntervalMs: num(env, "POLL_INTERVAL_MS", 3_000, positive),
    markets: feed === "live" ? parseMarkets(requireEnv(env, "MARKETS")) : {},
    clobApiBase: env.CLOB_API_BASE || "https://clob.polymarket.com",
    // surface
    port: num(env, "PORT", 3001, integer),
    apiKey: env.API_KEY ?? "",
    stateFile: env.STATE_FILE_PATH || "engine-state.json",
    eventBufferSize: num(env, "EVENT_BUFFER_SIZE", 500, integer),
  };

  if (config.historyWindow < config.minHistory) {
    throw new ConfigError(
      `HISTORY_WINDOW (${config.historyWindow}) must be at least MIN_HISTORY (${config.minHistory})`,
    );
  }
  if (config.perMarketCap > config.globalCap) {
    log.warn("PER_MARKET_CAP exceeds GLOBAL_CAP; the global cap will bind first", {
      perMarketCap: config.perMarketCap,
      globalCap: config.globalCap,
    });
  }
  if (live && !config.apiKey) {
    log.warn("API_KEY is not set: status API endpoints are unauthenticated");
  }

  return config;
}

export type Config = ReturnType<typeof loadConfig>;
