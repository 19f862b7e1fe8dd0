import { Hono } from "hono";
import { cors } from "hono/cors";
import type { Market, PipelineEvent, PipelineEventKind, PipelineStatus, RiskSnapshot } from "../types.js";

const EVENT_KINDS: readonly PipelineEventKind[] = [
  "execution.confirmed",
  "execution.failed",
  "execution.dropped",
  "risk.rejected",
  "scheduler.rejected",
  "feed.malformed",
];

function isEventKind(value: string | undefined): value is PipelineEventKind {
  return EVENT_KINDS.some((k) => k === value);
}

/** Converts bigints to strings for JSON serialization */
function serializeBigInts(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(serializeBigInts);
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      result[key] = serializeBigInts(v);
    }
    return result;
  }
  return value;
}

export interface StatusSource {
  getStatus(): PipelineStatus;
  getRisk(): RiskSnapshot;
  getMarkets(): Market[];
  getEvents(limit?: number, kind?: PipelineEventKind): PipelineEvent[];
  start(): void;
  stop(): Promise<void>;
}

export function createServer(pipeline: StatusSource, opts: { apiKey: string }): Hono {
  const app = new Hono();

  // CORS for dev
  app.use("*", cors());

  // Auth middleware for all routes
  app.use("*", async (c, next) => {
    if (opts.apiKey) {
      const auth = c.req.header("Authorization");
      if (auth !== `Bearer ${opts.apiKey}`) {
        return c.json({ error: "unauthorized" }, 401);
      }
    }
    await next();
  });

  app.get("/api/status", (c) => {
    return c.json(pipeline.getStatus());
  });

  app.get("/api/risk", (c) => {
    return c.json(pipeline.getRisk());
  });

  app.get("/api/markets", (c) => {
    return c.json(pipeline.getMarkets());
  });

  app.get("/api/events", (c) => {
    const limitParam = c.req.query("limit");
    const kindParam = c.req.query("kind");
    const limit = limitParam === undefined ? undefined : Number(limitParam);
    if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
      return c.json({ error: "limit must be a positive integer" }, 400);
    }
    if (kindParam !== undefined && !isEventKind(kindParam)) {
      return c.json({ error: `unknown event kind: ${kindParam}` }, 400);
    }
    const kind = isEventKind(kindParam) ? kindParam : undefined;
    return c.json(serializeBigInts(pipeline.getEvents(limit, kind)));
  });

  app.post("/api/pipeline/start", (c) => {
    pipeline.start();
    return c.json({ ok: true });
  });

  app.post("/api/pipeline/stop", async (c) => {
    await pipeline.stop();
    return c.json({ ok: true });
  });

  return app;
}
