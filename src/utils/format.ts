import type { DegenerateReason, Ratio } from "@/types";

export function formatCurrency(value: number | null | undefined): string {
  if (value === null || value === undefined || isNaN(value)) return "-";
  return new Intl.NumberFormat("en-US", { style: "currency", currency: "USD" }).format(value);
}

export function formatPercent(value: number | null | undefined): string {
  if (value === null || value === undefined || isNaN(value)) return "N/A";
  return `${(value * 100).toFixed(2)}%`;
}

export function formatCurrencyShort(value: number): string {
  if (value >= 1_000_000) return `$${(value / 1_000_000).toFixed(1)}M`;
  if (value >= 1_000) return `$${(value / 1_000).toFixed(1)}k`;
  return `$${value.toFixed(0)}`;
}

const DEGENERATE_REASONS: Record<DegenerateReason, string> = {
  "zero-volatility": "Returns are constant, so volatility is zero",
  "insufficient-data": "Not enough returns to measure deviation",
  "no-downside-returns": "No negative returns in the period",
  "zero-downside-deviation": "Negative returns are all equal, so downside deviation is zero",
};

export function describeDegenerate(reason: DegenerateReason): string {
  return DEGENERATE_REASONS[reason];
}

export function formatRatio(ratio: Ratio): string {
  return ratio.status === "ok" ? ratio.value.toFixed(2) : "N/A";
}

export function formatGrowth(value: number): string {
  return value.toFixed(2);
}
