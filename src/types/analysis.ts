import type { Benchmark, LookbackPeriod } from "./marketData";

export type ConfidenceLevel = 90 | 95 | 99;

export const CONFIDENCE_LEVELS: ConfidenceLevel[] = [90, 95, 99];

export interface AnalysisSettings {
  benchmark: Benchmark;
  period: LookbackPeriod;
  confidence: ConfidenceLevel;
}

export type AnalysisError =
  | { kind: "empty-portfolio"; message: string }
  | { kind: "data-retrieval"; message: string; tickers: string[] }
  | { kind: "alignment"; message: string; commonDates: number }
  | { kind: "configuration-mismatch"; message: string; missingTickers: string[] }
  | { kind: "insufficient-data"; message: string }
  | { kind: "invalid-holding"; message: string; field: "ticker" | "averagePrice" | "quantity" };


export type Result<T, E = AnalysisError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface ReturnTable {
  dates: string[]; // Date of the later price in each pair
  returns: Record<string, number[]>;
}

export interface ReturnSeries {
  dates: string[];
  values: number[];
}

export type DegenerateReason =
  | "zero-volatility"
  | "insufficient-data"
  | "no-downside-returns"
  | "zero-downside-deviation";

export type Ratio =
  | { status: "ok"; value: number }
  | { status: "degenerate"; reason: DegenerateReason };

export interface MetricsResult {
  mean: number;
  standardDeviation: number | null; // null with fewer than 2 observations
  sharpeRatio: Ratio;
  sortinoRatio: Ratio;
  valueAtRisk: number | null; // One-period loss magnitude in currency
  observations: number;
}

export interface SeriesAnalysis {
  returns: ReturnSeries;
  cumulative: ReturnSeries;
  metrics: MetricsResult;
}

export interface ComparisonPoint {
  date: string;
  portfolio: number | null;
  benchmark: number | null;
}

export interface AnalysisReport {
  settings: AnalysisSettings;
  totalValue: number;
  portfolio: SeriesAnalysis;
  benchmark: SeriesAnalysis;
  comparison: ComparisonPoint[];
}
