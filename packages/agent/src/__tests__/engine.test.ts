import { describe, it, expect, vi, beforeEach } from "vitest";
import { decodeFunctionData } from "viem";
import { DryRunEngine, LiveEngine, limitPrice } from "../execution/engine.js";
import type { LiveEngineOptions } from "../execution/engine.js";
import { SimulatedLedger } from "../execution/simulated-ledger.js";
import { QuoteBook } from "../feed/quote-book.js";
import type { ExecutionRequest, GasParams, Opportunity } from "../types.js";
import { FakeFeeSource, FakeSigner, IDENTITY, makeOpportunity, makeQuote, T0 } from "./helpers/fixtures.js";

vi.mock("../logger.js", () => ({
  log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const EXCHANGE = "0x00000000000000000000000000000000000000e1";
const GAS: GasParams = { gasLimit: 300_000n, maxFeePerGas: 64_000_000_000n, maxPriorityFeePerGas: 4_000_000_000n };

function request(overrides: Partial<ExecutionRequest> = {}, opportunity: Opportunity = makeOpportunity()): ExecutionRequest {
  return {
    requestId: "req-1",
    opportunity,
    identity: IDENTITY,
    sequence: 0,
    gas: GAS,
    mode: "live",
    createdAt: T0,
    ...overrides,
  };
}

describe("limitPrice", () => {
  it("allows slippage above the quote for BUY and below it for SELL", () => {
    expect(limitPrice(request(), 500)).toBeCloseTo(0.525, 12);
    expect(limitPrice(request({}, makeOpportunity({ direction: "SELL", quotePrice: 0.7 })), 500)).toBeCloseTo(0.665, 12);
  });
});

describe("DryRunEngine", () => {
  let book: QuoteBook;
  let ledger: SimulatedLedger;
  let engine: DryRunEngine;

  beforeEach(() => {
    book = new QuoteBook();
    ledger = new SimulatedLedger();
    engine = new DryRunEngine(IDENTITY, book, ledger, { gasLimit: 300_000n, gasPrice: 50_000_000_000n, slippageBps: 500 }, () => T0 + 5);
  });

  function dryRequest(opportunity = makeOpportunity(), sequence = 0): ExecutionRequest {
    return request({ mode: "dry-run", sequence }, opportunity);
  }

  it("quotes the configured dry-run gas price", async () => {
    expect(await engine.quoteGas()).toEqual({ gasLimit: 300_000n, maxFeePerGas: 50_000_000_000n, maxPriorityFeePerGas: 0n });
  });

  it("fills a BUY at the latest ask, capped by the size shown", async () => {
    book.apply(makeQuote({ price: 0.51, size: 60 }));
    const result = await engine.execute(dryRequest());

    expect(result).toMatchObject({
      outcome: "Confirmed",
      sequence: 0,
      sequenceConsumed: true,
      needsReconciliation: false,
      realizedPrice: 0.51,
      filledSize: 60,
      gasUsed: 300_000n,
      completedAt: T0 + 5,
    });
    expect(ledger.count(IDENTITY)).toBe(1);
  });

  it("fills a SELL at the latest bid", async () => {
    book.apply(makeQuote({ price: 0.72, bestBid: 0.69 }));
    const result = await engine.execute(dryRequest(makeOpportunity({ direction: "SELL", quotePrice: 0.7 })));
    expect(result).toMatchObject({ outcome: "Confirmed", realizedPrice: 0.69, filledSize: 100 });
  });

  it("fails with the number consumed when the price moved past the limit", async () => {
    book.apply(makeQuote({ price: 0.6 }));
    const result = await engine.execute(dryRequest());
    expect(result).toMatchObject({ outcome: "Failed", sequenceConsumed: true, error: "Price 0.6 outside limit 0.525000" });
  });

  it("fails without consuming when there is nothing to simulate against", async () => {
    const result = await engine.execute(dryRequest());
    expect(result).toMatchObject({ outcome: "Failed", sequenceConsumed: false, error: "No quote to simulate against" });
    expect(ledger.count(IDENTITY)).toBe(0);
  });

  it("drops a cancelled request", async () => {
    book.apply(makeQuote());
    const controller = new AbortController();
    controller.abort();
    const result = await engine.execute(dryRequest(), controller.signal);
    expect(result).toMatchObject({ outcome: "Dropped", sequenceConsumed: false });
  });

  it("flags an out-of-order number for reconciliation", async () => {
    book.apply(makeQuote());
    const result = await engine.execute(dryRequest(makeOpportunity(), 4));
    expect(result).toMatchObject({ outcome: "Failed", sequenceConsumed: false, needsReconciliation: true });
  });

  it("refuses a live request", async () => {
    const result = await engine.execute(request());
    expect(result.error).toBe("Dry-run engine cannot run a live request");
  });

  it("never touches a signer", async () => {
    const signer = new FakeSigner();
    const broadcast = vi.spyOn(signer, "signAndBroadcast");
    const poll = vi.spyOn(signer, "pollStatus");
    book.apply(makeQuote());
    await engine.execute(dryRequest());
    expect(broadcast).not.toHaveBeenCalled();
    expect(poll).not.toHaveBeenCalled();
  });
});

describe("LiveEngine", () => {
  const tokens = { "market-a": { yesTokenId: "101", noTokenId: "102" } };
  const opts: LiveEngineOptions = {
    exchangeAddress: EXCHANGE,
    gasLimit: 300_000n,
    gasPriorityBound: 3_000_000_000n,
    priorityFeeBumpPercent: 25,
    slippageBps: 500,
    confirmationTimeoutMs: 200,
    confirmationPollIntervalMs: 5,
  };
  let signer: FakeSigner;
  let engine: LiveEngine;

  beforeEach(() => {
    signer = new FakeSigner();
    engine = new LiveEngine(signer, new FakeFeeSource(30_000_000_000n, 5_000_000_000n), tokens, opts);
  });

  it("prices gas from the fee source with the priority fee bounded", async () => {
    expect(await engine.quoteGas()).toEqual({
      gasLimit: 300_000n,
      maxPriorityFeePerGas: 3_000_000_000n,
      maxFeePerGas: 63_000_000_000n,
    });
  });

  it("encodes a BUY as the exchange buy call with a minimum-shares guard", () => {
    const data = engine.buildCall(request());
    const decoded = decodeFunctionData({
      abi: [{
        type: "function",
        name: "buy",
        inputs: [
          { name: "tokenId", type: "uint256" },
          { name: "amount", type: "uint256" },
          { name: "minShares", type: "uint256" },
        ],
        outputs: [],
        stateMutability: "nonpayable",
      }] as const,
      data,
    });
    // 50 collateral at a 0.525 limit buys at least 95.238095 shares
    expect(decoded.args).toEqual([101n, 50_000_000n, 95_238_095n]);
  });

  it("fails without broadcasting when the outcome token is unknown", async () => {
    const result = await engine.execute(request({}, makeOpportunity({ marketId: "unknown" })));
    expect(result).toMatchObject({ outcome: "Failed", sequenceConsumed: false });
    expect(result.error).toContain("No outcome token id for unknown:YES");
    expect(signer.broadcasts).toHaveLength(0);
  });

  it("confirms a mined transaction at the intended price and size", async () => {
    const result = await engine.execute(request());
    expect(result).toMatchObject({
      outcome: "Confirmed",
      sequence: 0,
      sequenceConsumed: true,
      txHash: `0x${"0".repeat(64)}`,
      realizedPrice: 0.5,
      filledSize: 100,
      gasUsed: 120_000n,
    });
    expect(signer.broadcasts[0]).toMatchObject({ to: EXCHANGE, nonce: 0, gas: GAS });
  });

  it("retries a rejected broadcast once with a bumped priority fee", async () => {
    signer.failBroadcasts = 1;
    const result = await engine.execute(request());

    expect(result.outcome).toBe("Confirmed");
    expect(signer.broadcasts).toHaveLength(2);
    expect(signer.broadcasts[1].nonce).toBe(0);
    expect(signer.broadcasts[1].gas).toEqual({
      gasLimit: 300_000n,
      maxPriorityFeePerGas: 5_000_000_000n,
      maxFeePerGas: 65_000_000_000n,
    });
  });

  it("flags a second broadcast rejection for reconciliation", async () => {
    signer.failBroadcasts = 2;
    const result = await engine.execute(request());

    expect(result).toMatchObject({
      outcome: "Failed",
      sequence: 0,
      sequenceConsumed: false,
      needsReconciliation: true,
      error: "replacement transaction underpriced",
    });
    expect(signer.broadcasts).toHaveLength(2);
    expect(signer.polls).toBe(0);
  });

  it("fails with the number consumed on a mined revert", async () => {
    signer.onPoll = "revert";
    const result = await engine.execute(request());
    expect(result).toMatchObject({ outcome: "Failed", sequenceConsumed: true, needsReconciliation: false, error: "execution reverted" });
  });

  it("flags a confirmation timeout for reconciliation and does not rebroadcast", async () => {
    signer.onPoll = "hang";
    const result = await engine.execute(request());

    expect(result).toMatchObject({ outcome: "Failed", sequenceConsumed: false, needsReconciliation: true });
    expect(result.error).toContain("Confirmation timed out");
    expect(signer.broadcasts).toHaveLength(1);
    expect(signer.polls).toBeGreaterThan(1);
  });

  it("abandons the wait on abort but still flags reconciliation", async () => {
    signer.onPoll = "hang";
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    const result = await engine.execute(request({}, makeOpportunity()), controller.signal);

    expect(result).toMatchObject({ outcome: "Failed", needsReconciliation: true });
    expect(result.error).toContain("Confirmation wait abandoned");
  });

  it("drops a request cancelled before broadcast", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await engine.execute(request(), controller.signal);
    expect(result).toMatchObject({ outcome: "Dropped", sequenceConsumed: false });
    expect(signer.broadcasts).toHaveLength(0);
  });
});
