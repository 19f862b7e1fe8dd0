import { describe, it, expect, vi } from "vitest";
import { GasCostEstimator, gasCostInCollateral } from "../execution/gas-cost.js";
import type { GasParams } from "../types.js";
import { T0 } from "./helpers/fixtures.js";

vi.mock("../logger.js", () => ({
  log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

// 300k gas at 50 gwei = 0.015 native
const GAS: GasParams = { gasLimit: 300_000n, maxFeePerGas: 50_000_000_000n, maxPriorityFeePerGas: 0n };

describe("gasCostInCollateral", () => {
  it("prices the worst-case fee in collateral", () => {
    expect(gasCostInCollateral(GAS, 0.5)).toBeCloseTo(0.0075, 12);
    expect(gasCostInCollateral(GAS, 0)).toBe(0);
  });
});

describe("GasCostEstimator", () => {
  it("reuses a quote until it is older than the max age", async () => {
    let now = T0;
    const quote = vi.fn().mockResolvedValue(GAS);
    const estimator = new GasCostEstimator(quote, { nativeTokenPrice: 2, maxAgeMs: 1_000 }, () => now);

    expect(await estimator.current()).toBeCloseTo(0.03, 12);
    now = T0 + 999;
    await estimator.current();
    expect(quote).toHaveBeenCalledTimes(1);

    now = T0 + 1_000;
    await estimator.current();
    expect(quote).toHaveBeenCalledTimes(2);
  });

  it("shares one quote between concurrent callers", async () => {
    const quote = vi.fn().mockResolvedValue(GAS);
    const estimator = new GasCostEstimator(quote, { nativeTokenPrice: 1, maxAgeMs: 1_000 }, () => T0);

    const costs = await Promise.all([estimator.current(), estimator.current(), estimator.current()]);
    expect(costs).toEqual([0.015, 0.015, 0.015]);
    expect(quote).toHaveBeenCalledTimes(1);
  });

  it("keeps the last cost when a refresh fails", async () => {
    let now = T0;
    const quote = vi.fn().mockResolvedValueOnce(GAS).mockRejectedValue(new Error("rpc down"));
    const estimator = new GasCostEstimator(quote, { nativeTokenPrice: 1, maxAgeMs: 10 }, () => now);

    await estimator.current();
    now = T0 + 50;
    expect(await estimator.current()).toBe(0.015);
    expect(quote).toHaveBeenCalledTimes(2);
  });

  it("throws when the first quote fails", async () => {
    const estimator = new GasCostEstimator(
      () => Promise.reject(new Error("rpc down")),
      { nativeTokenPrice: 1, maxAgeMs: 10 },
      () => T0,
    );
    await expect(estimator.current()).rejects.toThrow("rpc down");
  });
});
