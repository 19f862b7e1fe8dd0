import { InsufficientHistory } from "../errors.js";
import type { PricePoint, Side, ValuationEstimate } from "../types.js";
import type { ValuationModel } from "./types.js";

const FLAT_EPSILON = 1e-15;

export interface OuFit {
  /** long-run mean */
  mu: number;
  /** reversion rate per millisecond; 0 when the series does not revert */
  theta: number;
  /** AR(1) slope of the discretized process */
  slope: number;
  residualVariance: number;
  meanSpacingMs: number;
}

function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Least-squares fit of x[t+1] = a + b·x[t] over the window. For 0 < b < 1 this is
 * the exact discretization of an Ornstein-Uhlenbeck process with
 * b = e^(−θΔ) and μ = a / (1 − b).
 */
export function fitOu(history: readonly PricePoint[]): OuFit | null {
  const n = history.length;
  if (n < 3) return null;

  const xs = history.slice(0, -1).map((p) => p.price);
  const ys = history.slice(1).map((p) => p.price);
  const meanX = mean(xs);
  const meanY = mean(ys);

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < xs.length; i++) {
    sxx += (xs[i] - meanX) ** 2;
    sxy += (xs[i] - meanX) * (ys[i] - meanY);
  }
  if (sxx < FLAT_EPSILON) return null;

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  let sse = 0;
  for (let i = 0; i < xs.length; i++) {
    sse += (ys[i] - intercept - slope * xs[i]) ** 2;
  }
  const residualVariance = sse / Math.max(xs.length - 2, 1);
  const meanSpacingMs = (history[n - 1].observedAt - history[0].observedAt) / (n - 1);

  if (slope >= 1 || slope <= 0 || meanSpacingMs <= 0) {
    return { mu: meanY, theta: 0, slope, residualVariance, meanSpacingMs };
  }
  return {
    mu: intercept / (1 - slope),
    theta: -Math.log(slope) / meanSpacingMs,
    slope,
    residualVariance,
    meanSpacingMs,
  };
}

export class OuValuationModel implements ValuationModel {
  readonly name = "ou";

  constructor(
    private readonly minObservations: number,
    private readonly horizonMs: number,
  ) {
    if (minObservations < 3) {
      throw new Error("OU model needs at least 3 observations to fit");
    }
  }

  estimate(marketId: string, side: Side, history: readonly PricePoint[]): ValuationEstimate {
    if (history.length < this.minObservations) {
      throw new InsufficientHistory(marketId, history.length, this.minObservations);
    }
    const last = history[history.length - 1];
    const fit = fitOu(history);

    let value: number;
    let variance: number;
    if (fit === null) {
      // flat window: nothing to revert from
      value = last.price;
      variance = 0;
    } else if (fit.slope >= 1) {
      value = last.price;
      variance = fit.residualVariance;
    } else if (fit.slope <= 0) {
      value = mean(history.map((p) => p.price));
      variance = fit.residualVariance;
    } else {
      const decay = Math.exp(-fit.theta * this.horizonMs);
      value = fit.mu + (last.price - fit.mu) * decay;
      variance = fit.residualVariance;
    }

    return {
      marketId,
      side,
      value: clamp01(value),
      variance,
      estimatedAt: last.observedAt,
      model: this.name,
    };
  }
}
