/**
 * Risk/return statistics over a single return series.
 *
 * Standard deviations are sample deviations (n - 1). Ratios whose
 * denominator is zero or undefined come back as degenerate values
 * instead of Infinity/NaN.
 */

import { TRADING_PERIODS_PER_YEAR } from "@/config";
import type { ConfidenceLevel, MetricsResult, Ratio, Result } from "@/types";

// Fixed one-sided standard normal quantiles
export const Z_SCORES: Record<ConfidenceLevel, number> = {
  90: 1.28,
  95: 1.645,
  99: 2.33,
};

const ZERO_DEVIATION_TOLERANCE = 1e-12;

export interface MetricsOptions {
  riskFreeRate: number; // Per period
  confidence: ConfidenceLevel;
  portfolioValue: number;
}

export function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function sampleStandardDeviation(values: number[]): number | null {
  if (values.length < 2) return null;
  const avg = mean(values);
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  const deviation = Math.sqrt(squared / (values.length - 1));
  // Rounding noise on a constant series counts as zero
  return deviation <= ZERO_DEVIATION_TOLERANCE * Math.max(1, Math.abs(avg)) ? 0 : deviation;
}

export function riskFreeRatePerPeriod(
  annualRate: number,
  periodsPerYear = TRADING_PERIODS_PER_YEAR
): number {
  return annualRate / periodsPerYear;
}

export function downsideReturns(values: number[]): number[] {
  return values.filter((v) => v < 0);
}

export function sharpeRatio(
  meanReturn: number,
  standardDeviation: number | null,
  riskFreeRate: number
): Ratio {
  if (standardDeviation === null) return { status: "degenerate", reason: "insufficient-data" };
  if (standardDeviation === 0) return { status: "degenerate", reason: "zero-volatility" };
  return { status: "ok", value: (meanReturn - riskFreeRate) / standardDeviation };
}

export function sortinoRatio(values: number[], meanReturn: number, riskFreeRate: number): Ratio {
  const downside = downsideReturns(values);
  if (downside.length === 0) return { status: "degenerate", reason: "no-downside-returns" };

  const deviation = sampleStandardDeviation(downside);
  if (deviation === null) return { status: "degenerate", reason: "insufficient-data" };
  if (deviation === 0) return { status: "degenerate", reason: "zero-downside-deviation" };

  return { status: "ok", value: (meanReturn - riskFreeRate) / deviation };
}

/**
 * Parametric one-period VaR under a normal assumption, as a positive
 * currency amount.
 */
export function valueAtRisk(
  standardDeviation: number | null,
  confidence: ConfidenceLevel,
  portfolioValue: number
): number | null {
  if (standardDeviation === null) return null;
  return Z_SCORES[confidence] * standardDeviation * portfolioValue;
}

export function cumulativeReturns(values: number[]): number[] {
  const growth: number[] = [];
  let level = 1;
  for (const r of values) {
    level *= 1 + r;
    growth.push(level);
  }
  return growth;
}

export function computeMetrics(values: number[], options: MetricsOptions): Result<MetricsResult> {
  if (values.length === 0) {
    return {
      ok: false,
      error: { kind: "insufficient-data", message: "Return series is empty" },
    };
  }

  const avg = mean(values);
  const std = sampleStandardDeviation(values);

  return {
    ok: true,
    value: {
      mean: avg,
      standardDeviation: std,
      sharpeRatio: sharpeRatio(avg, std, options.riskFreeRate),
      sortinoRatio: sortinoRatio(values, avg, options.riskFreeRate),
      valueAtRisk: valueAtRisk(std, options.confidence, options.portfolioValue),
      observations: values.length,
    },
  };
}
