import { serve } from "@hono/node-server";
import { createServer } from "./api/server.js";
import { loadConfig } from "./config.js";
import type { Config } from "./config.js";
import { ConfigError, InsufficientAllowance } from "./errors.js";
import { ensureAllowance, toCollateralUnits } from "./execution/allowance.js";
import { log } from "./logger.js";
import { loadState } from "./persistence.js";
import { createRuntime } from "./runtime.js";

let config: Config;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    log.error(err.message);
    process.exit(1);
  }
  throw err;
}

const persisted = loadState(config.stateFile);
const { pipeline, collateral } = createRuntime(config, { persisted });

if (collateral) {
  try {
    await ensureAllowance(collateral, {
      owner: pipeline.getStatus().identity,
      spender: config.exchangeAddress,
      required: toCollateralUnits(config.globalCap),
      autoApprove: config.autoApprove,
    });
  } catch (err) {
    if (err instanceof InsufficientAllowance) {
      log.error(`${err.message}; approve it or set AUTO_APPROVE=true`);
      process.exit(1);
    }
    throw err;
  }
}

await pipeline.resume(persisted);

// --- HTTP server ---
const app = createServer(pipeline, { apiKey: config.apiKey });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info("Server running", {
    url: `http://localhost:${info.port}`,
    mode: config.mode,
    feed: config.feed,
    valuationModel: config.valuationModel,
    minEdgeThreshold: config.minEdgeThreshold,
    perMarketCap: config.perMarketCap,
    globalCap: config.globalCap,
  });

  // Auto-start the pipeline
  pipeline.start();
});

// --- Graceful shutdown ---
let shuttingDown = false;

async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info("Shutting down gracefully...");
  await pipeline.stop();
  log.info("Pipeline drained");
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch((err) => {
    log.error("Shutdown failed", { error: String(err) });
    process.exit(1);
  });
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
