/**
 * Price history client for the Yahoo Finance chart endpoint
 */

import { apiClient } from "./client";
import type {
  ChartResponse,
  ChartResult,
  LookbackPeriod,
  PriceHistoryProvider,
  PricePoint,
  PriceTable,
} from "@/types";

function toLocalDate(timestamp: number, gmtoffset: number): string {
  return new Date((timestamp + gmtoffset) * 1000).toISOString().split("T")[0];
}

/**
 * Daily adjusted closes from one chart result, falling back to raw closes
 * when the adjusted series is absent. Null closes are skipped.
 */
export function parseChartResult(result: ChartResult): PricePoint[] {
  const timestamps = result.timestamp ?? [];
  const closes =
    result.indicators.adjclose?.[0]?.adjclose ?? result.indicators.quote?.[0]?.close ?? [];
  const gmtoffset = result.meta.gmtoffset ?? 0;

  const points: PricePoint[] = [];
  timestamps.forEach((ts, i) => {
    const close = closes[i];
    if (close === null || close === undefined || !Number.isFinite(close)) return;
    points.push({ date: toLocalDate(ts, gmtoffset), close });
  });
  return points;
}

export const marketDataApi = {
  /**
   * Get the raw daily chart for one symbol
   */
  getChart: (ticker: string, period: LookbackPeriod) =>
    apiClient.get<ChartResponse>(`/v8/finance/chart/${encodeURIComponent(ticker)}`, {
      params: { range: period, interval: "1d", events: "div,splits" },
    }),

  /**
   * Get daily price history for one symbol
   */
  getPriceHistory: async (ticker: string, period: LookbackPeriod): Promise<PricePoint[]> => {
    const response = await marketDataApi.getChart(ticker, period);
    const { result, error } = response.data.chart;
    if (error) {
      throw new Error(`${ticker}: ${error.description}`);
    }
    const first = result?.[0];
    if (!first) {
      throw new Error(`${ticker}: no chart data returned`);
    }
    return parseChartResult(first);
  },

  /**
   * Get price history for several symbols, fetched in parallel
   */
  fetchPriceTable: async (tickers: string[], period: LookbackPeriod): Promise<PriceTable> => {
    const histories = await Promise.all(
      tickers.map((ticker) => marketDataApi.getPriceHistory(ticker, period))
    );
    const table: PriceTable = {};
    tickers.forEach((ticker, i) => {
      table[ticker] = histories[i];
    });
    return table;
  },
};

marketDataApi satisfies PriceHistoryProvider;
