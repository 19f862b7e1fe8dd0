import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventBus } from "../events.js";
import { RiskGate } from "../risk/risk-gate.js";
import type { RiskGateConfig } from "../risk/risk-gate.js";
import type { PipelineEvent } from "../types.js";
import { makeOpportunity, makeResult, T0 } from "./helpers/fixtures.js";

vi.mock("../logger.js", () => ({
  log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const config: RiskGateConfig = {
  cooldownMs: 30_000,
  perMarketCap: 100,
  globalCap: 200,
  stalenessWindowMs: 10_000,
};

describe("RiskGate", () => {
  let now: number;
  let bus: EventBus;
  let gate: RiskGate;
  let events: PipelineEvent[];

  beforeEach(() => {
    now = T0;
    bus = new EventBus();
    events = [];
    bus.onEvent((e) => events.push(e));
    gate = new RiskGate(config, bus, () => now);
  });

  it("approves and reserves the notional", async () => {
    const opp = makeOpportunity();
    const decision = await gate.evaluate(opp);

    expect(decision).toEqual({ approved: true, opportunity: opp, reserved: 50 });
    const snapshot = gate.snapshot();
    expect(snapshot.globalReserved).toBe(50);
    expect(snapshot.globalCommitted).toBe(0);
    expect(snapshot.markets).toEqual([
      { marketId: "market-a", phase: "Cooling", lastExecutionAt: T0, committed: 0, reserved: 50 },
    ]);
  });

  it("rejects the same opportunity within the cooldown", async () => {
    const opp = makeOpportunity();
    await gate.evaluate(opp);
    now = T0 + 1000;

    const second = await gate.evaluate(opp);
    expect(second).toEqual({ approved: false, opportunity: opp, reason: "CooldownActive" });
    expect(events).toHaveLength(1);
    expect(events[0]).toEqual({
      timestamp: T0 + 1000,
      marketId: "market-a",
      kind: "risk.rejected",
      payload: { opportunityId: opp.id, reason: "CooldownActive", side: "YES", edge: 0.1, notional: 50 },
    });
  });

  it("becomes eligible again once the cooldown has elapsed", async () => {
    await gate.evaluate(makeOpportunity());
    expect(gate.isEligible("market-a", T0 + 29_999)).toBe(false);
    expect(gate.isEligible("market-a", T0 + 30_000)).toBe(true);

    now = T0 + 30_000;
    const decision = await gate.evaluate(makeOpportunity({ quoteObservedAt: now }));
    expect(decision.approved).toBe(true);
  });

  it("treats an unseen market as eligible", () => {
    expect(gate.isEligible("fresh")).toBe(true);
  });

  it("checks the cooldown before exposure", async () => {
    await gate.evaluate(makeOpportunity({ notional: 100 }));
    const decision = await gate.evaluate(makeOpportunity({ notional: 100 }));
    expect(decision).toMatchObject({ approved: false, reason: "CooldownActive" });
  });

  it("rejects when the market cap would be exceeded", async () => {
    const decision = await gate.evaluate(makeOpportunity({ notional: 101 }));
    expect(decision).toMatchObject({ approved: false, reason: "MarketExposureExceeded" });
  });

  it("checks market exposure before global exposure", async () => {
    const small = new RiskGate({ ...config, perMarketCap: 100, globalCap: 50 }, bus, () => now);
    const decision = await small.evaluate(makeOpportunity({ notional: 150 }));
    expect(decision).toMatchObject({ approved: false, reason: "MarketExposureExceeded" });
  });

  it("checks global exposure before staleness", async () => {
    const small = new RiskGate({ ...config, globalCap: 40 }, bus, () => now);
    const decision = await small.evaluate(makeOpportunity({ quoteObservedAt: T0 - 60_000 }));
    expect(decision).toMatchObject({ approved: false, reason: "GlobalExposureExceeded" });
  });

  it("rejects a stale opportunity", async () => {
    const decision = await gate.evaluate(makeOpportunity({ quoteObservedAt: T0 - 10_001 }));
    expect(decision).toMatchObject({ approved: false, reason: "StaleOpportunity" });
  });

  it("approves exactly the prefix that fits the global cap under concurrent evaluations", async () => {
    const opps = Array.from({ length: 7 }, (_, i) => makeOpportunity({ marketId: `m${i}` }));
    const decisions = await Promise.all(opps.map((o) => gate.evaluate(o)));

    // 200 / 50 = 4
    expect(decisions.map((d) => d.approved)).toEqual([true, true, true, true, false, false, false]);
    for (const d of decisions.slice(4)) {
      expect(d).toMatchObject({ reason: "GlobalExposureExceeded" });
    }
    expect(gate.snapshot().globalReserved).toBe(200);
  });

  it("commits the realized notional on Confirmed", async () => {
    const opp = makeOpportunity();
    await gate.evaluate(opp);
    await gate.settle(makeResult(opp, "Confirmed", { realizedPrice: 0.5, filledSize: 80 }));

    const snapshot = gate.snapshot();
    expect(snapshot.globalCommitted).toBe(40);
    expect(snapshot.globalReserved).toBe(0);
    expect(snapshot.markets[0]).toMatchObject({ committed: 40, reserved: 0 });
  });

  it("never commits more than was reserved", async () => {
    const opp = makeOpportunity();
    await gate.evaluate(opp);
    await gate.settle(makeResult(opp, "Confirmed", { realizedPrice: 0.6, filledSize: 100 }));
    expect(gate.snapshot().globalCommitted).toBe(50);
  });

  it("releases the reservation on Failed and Dropped but keeps the cooldown", async () => {
    const a = makeOpportunity({ marketId: "a" });
    const b = makeOpportunity({ marketId: "b" });
    await gate.evaluate(a);
    await gate.evaluate(b);

    await gate.settle(makeResult(a, "Failed"));
    await gate.settle(makeResult(b, "Dropped"));

    const snapshot = gate.snapshot();
    expect(snapshot.globalReserved).toBe(0);
    expect(snapshot.globalCommitted).toBe(0);
    expect(gate.isEligible("a")).toBe(false);
  });

  it("ignores a result for an unknown opportunity", async () => {
    await gate.settle(makeResult(makeOpportunity(), "Confirmed"));
    expect(gate.snapshot().globalCommitted).toBe(0);
  });

  it("settles results published on the bus once attached", async () => {
    gate.attach();
    const opp = makeOpportunity();
    await gate.evaluate(opp);

    bus.publishResult(makeResult(opp, "Failed"));
    await gate.idle();
    expect(gate.snapshot().globalReserved).toBe(0);

    gate.close();
    const other = makeOpportunity({ marketId: "other" });
    await gate.evaluate(other);
    bus.publishResult(makeResult(other, "Failed"));
    await gate.idle();
    expect(gate.snapshot().globalReserved).toBe(50);
  });

  it("release frees a reservation that never reached the engine", async () => {
    const opp = makeOpportunity();
    await gate.evaluate(opp);
    await gate.release(opp.id);
    expect(gate.snapshot().globalReserved).toBe(0);
  });

  it("restores open reservations as committed exposure", async () => {
    await gate.restore({
      markets: [
        { marketId: "a", phase: "Cooling", lastExecutionAt: T0 - 1000, committed: 60, reserved: 20 },
        { marketId: "b", phase: "Eligible", lastExecutionAt: null, committed: 30, reserved: 0 },
      ],
      globalCommitted: 90,
      globalReserved: 20,
      perMarketCap: 100,
      globalCap: 200,
    });

    const snapshot = gate.snapshot();
    expect(snapshot.globalCommitted).toBe(110);
    expect(snapshot.globalReserved).toBe(0);
    expect(gate.isEligible("a")).toBe(false);
    expect(await gate.evaluate(makeOpportunity({ marketId: "b", notional: 80 }))).toMatchObject({
      approved: false,
      reason: "MarketExposureExceeded",
    });
  });
});
