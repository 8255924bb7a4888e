/**
 * Portfolio construction and weighting.
 */

import type {
  Holding,
  HoldingInput,
  Portfolio,
  PortfolioSummary,
  Result,
  TickerWeights,
} from "@/types";
import { normalizeTicker } from "./ticker";

export const EMPTY_PORTFOLIO: Portfolio = { holdings: [] };

export function createHolding(input: HoldingInput, id: string): Result<Holding> {
  const ticker = normalizeTicker(input.ticker);
  if (!ticker) {
    return {
      ok: false,
      error: { kind: "invalid-holding", field: "ticker", message: "Ticker is required" },
    };
  }
  if (!Number.isFinite(input.averagePrice) || input.averagePrice <= 0) {
    return {
      ok: false,
      error: {
        kind: "invalid-holding",
        field: "averagePrice",
        message: "Average price must be greater than zero",
      },
    };
  }
  if (!Number.isInteger(input.quantity) || input.quantity < 1) {
    return {
      ok: false,
      error: {
        kind: "invalid-holding",
        field: "quantity",
        message: "Quantity must be a whole number of at least 1",
      },
    };
  }

  return {
    ok: true,
    value: { id, ticker, averagePrice: input.averagePrice, quantity: input.quantity },
  };
}

export function addHolding(portfolio: Portfolio, holding: Holding): Portfolio {
  return { holdings: [...portfolio.holdings, holding] };
}

export function summarizePortfolio(portfolio: Portfolio): PortfolioSummary {
  const investments = portfolio.holdings.map((h) => h.averagePrice * h.quantity);
  const totalValue = investments.reduce((sum, v) => sum + v, 0);

  // An empty portfolio has no rows, so the division below never sees a zero total
  const rows = portfolio.holdings.map((holding, i) => ({
    holding,
    totalInvestment: investments[i],
    weight: investments[i] / totalValue,
  }));

  return { rows, totalValue };
}

/**
 * Weights keyed by ticker. A ticker held in several rows gets the sum of
 * their weights, since price history comes back once per symbol.
 */
export function tickerWeights(summary: PortfolioSummary): TickerWeights {
  const weights: TickerWeights = {};
  for (const row of summary.rows) {
    const { ticker } = row.holding;
    weights[ticker] = (weights[ticker] ?? 0) + row.weight;
  }
  return weights;
}

export function uniqueTickers(portfolio: Portfolio): string[] {
  return [...new Set(portfolio.holdings.map((h) => h.ticker))];
}
