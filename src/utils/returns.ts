/**
 * Price alignment, period returns and weighted aggregation.
 */

import type {
  PricePoint,
  PriceTable,
  Result,
  ReturnSeries,
  ReturnTable,
  TickerWeights,
} from "@/types";

function isUsablePrice(point: PricePoint): boolean {
  return Number.isFinite(point.close) && point.close > 0;
}

/**
 * Keeps only the dates every ticker has a usable price for, sorted
 * ascending. A date missing for one ticker is dropped for all of them.
 */
export function alignPriceTable(table: PriceTable): PriceTable {
  const tickers = Object.keys(table);
  if (tickers.length === 0) return {};

  const byTicker = tickers.map((ticker) => {
    const prices = new Map<string, number>();
    for (const point of table[ticker]) {
      if (isUsablePrice(point)) prices.set(point.date, point.close);
    }
    return prices;
  });

  const commonDates = [...byTicker[0].keys()]
    .filter((date) => byTicker.every((prices) => prices.has(date)))
    .sort();

  const aligned: PriceTable = {};
  tickers.forEach((ticker, i) => {
    aligned[ticker] = commonDates.map((date) => ({
      date,
      close: byTicker[i].get(date) ?? Number.NaN,
    }));
  });
  return aligned;
}

export function buildReturnTable(table: PriceTable): Result<ReturnTable> {
  const aligned = alignPriceTable(table);
  const tickers = Object.keys(aligned);
  const rowCount = tickers.length > 0 ? aligned[tickers[0]].length : 0;

  if (rowCount < 2) {
    return {
      ok: false,
      error: {
        kind: "alignment",
        commonDates: rowCount,
        message:
          tickers.length === 0
            ? "No price history to compute returns from"
            : `Only ${rowCount} common trading date(s) across ${tickers.join(", ")}; at least 2 are needed`,
      },
    };
  }

  const dates = aligned[tickers[0]].slice(1).map((p) => p.date);
  const returns: Record<string, number[]> = {};
  for (const ticker of tickers) {
    const prices = aligned[ticker];
    returns[ticker] = prices
      .slice(1)
      .map((point, i) => (point.close - prices[i].close) / prices[i].close);
  }

  return { ok: true, value: { dates, returns } };
}

export function returnSeriesFor(table: ReturnTable, ticker: string): ReturnSeries | null {
  if (!Object.hasOwn(table.returns, ticker)) return null;
  return { dates: [...table.dates], values: [...table.returns[ticker]] };
}

/**
 * Weighted linear combination of each date's returns.
 */
export function aggregateReturns(
  table: ReturnTable,
  weights: TickerWeights
): Result<ReturnSeries> {
  const weighted = Object.keys(weights);
  const missingTickers = weighted.filter((ticker) => !Object.hasOwn(table.returns, ticker));

  if (missingTickers.length > 0) {
    return {
      ok: false,
      error: {
        kind: "configuration-mismatch",
        missingTickers,
        message: `No return history for ${missingTickers.join(", ")} in the selected period`,
      },
    };
  }

  const values = table.dates.map((_, row) =>
    weighted.reduce((sum, ticker) => sum + table.returns[ticker][row] * weights[ticker], 0)
  );

  return { ok: true, value: { dates: [...table.dates], values } };
}
