import { describe, it, expect, vi, beforeEach } from "vitest";
import { marketDataApi, parseChartResult } from "@/api/marketData";
import { apiClient } from "@/api/client";
import type { ChartResponse, ChartResult } from "@/types";

vi.mock("@/api/client", () => ({
  apiClient: {
    get: vi.fn(),
  },
}));

function chartResult(symbol: string, closes: (number | null)[], adjusted = true): ChartResult {
  const timestamp = [1735828200, 1735914600, 1736121600].slice(0, closes.length);
  return {
    meta: { symbol, gmtoffset: 0 },
    timestamp,
    indicators: adjusted
      ? { quote: [{ close: closes.map(() => 1) }], adjclose: [{ adjclose: closes }] }
      : { quote: [{ close: closes }] },
  };
}

function chartResponse(result: ChartResult): { data: ChartResponse } {
  return { data: { chart: { result: [result], error: null } } };
}

describe("parseChartResult", () => {
  it("reads adjusted closes keyed by trading date", () => {
    expect(parseChartResult(chartResult("AAPL", [100, 101.5, 99]))).toEqual([
      { date: "2025-01-02", close: 100 },
      { date: "2025-01-03", close: 101.5 },
      { date: "2025-01-06", close: 99 },
    ]);
  });

  it("falls back to raw closes without an adjusted series", () => {
    expect(parseChartResult(chartResult("^GSPC", [5900, 5950], false))).toEqual([
      { date: "2025-01-02", close: 5900 },
      { date: "2025-01-03", close: 5950 },
    ]);
  });

  it("skips null closes", () => {
    expect(parseChartResult(chartResult("AAPL", [100, null, 99]))).toEqual([
      { date: "2025-01-02", close: 100 },
      { date: "2025-01-06", close: 99 },
    ]);
  });

  it("dates each bar in the exchange's time zone", () => {
    const result: ChartResult = {
      meta: { symbol: "^N225", gmtoffset: 32400 },
      timestamp: [1736206200],
      indicators: { quote: [{ close: [39000] }] },
    };
    expect(parseChartResult(result)).toEqual([{ date: "2025-01-07", close: 39000 }]);
  });

  it("returns nothing when the result has no timestamps", () => {
    expect(parseChartResult({ meta: { symbol: "AAPL" }, indicators: {} })).toEqual([]);
  });
});

describe("marketDataApi", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("getChart", () => {
    it("should call GET /v8/finance/chart/:ticker with daily bars", async () => {
      vi.mocked(apiClient.get).mockResolvedValue(chartResponse(chartResult("AAPL", [100])));

      await marketDataApi.getChart("AAPL", "3mo");

      expect(apiClient.get).toHaveBeenCalledWith("/v8/finance/chart/AAPL", {
        params: { range: "3mo", interval: "1d", events: "div,splits" },
      });
    });

    it("should encode index symbols", async () => {
      vi.mocked(apiClient.get).mockResolvedValue(chartResponse(chartResult("^GSPC", [5900])));

      await marketDataApi.getChart("^GSPC", "1y");

      expect(apiClient.get).toHaveBeenCalledWith("/v8/finance/chart/%5EGSPC", {
        params: { range: "1y", interval: "1d", events: "div,splits" },
      });
    });
  });

  describe("getPriceHistory", () => {
    it("should throw the chart error description", async () => {
      vi.mocked(apiClient.get).mockResolvedValue({
        data: {
          chart: {
            result: null,
            error: { code: "Not Found", description: "No data found, symbol may be delisted" },
          },
        },
      });

      await expect(marketDataApi.getPriceHistory("ZZZZ", "3mo")).rejects.toThrow(
        "ZZZZ: No data found, symbol may be delisted"
      );
    });

    it("should throw when no result comes back", async () => {
      vi.mocked(apiClient.get).mockResolvedValue({
        data: { chart: { result: [], error: null } },
      });

      await expect(marketDataApi.getPriceHistory("AAPL", "3mo")).rejects.toThrow(
        "AAPL: no chart data returned"
      );
    });
  });

  describe("fetchPriceTable", () => {
    it("should key each history by its ticker", async () => {
      vi.mocked(apiClient.get).mockImplementation(async (url: string) =>
        url.endsWith("/MSFT")
          ? chartResponse(chartResult("MSFT", [400, 410]))
          : chartResponse(chartResult("AAPL", [100, 102]))
      );

      const table = await marketDataApi.fetchPriceTable(["AAPL", "MSFT"], "1mo");

      expect(apiClient.get).toHaveBeenCalledTimes(2);
      expect(table).toEqual({
        AAPL: [
          { date: "2025-01-02", close: 100 },
          { date: "2025-01-03", close: 102 },
        ],
        MSFT: [
          { date: "2025-01-02", close: 400 },
          { date: "2025-01-03", close: 410 },
        ],
      });
    });

    it("should reject when any ticker fails", async () => {
      vi.mocked(apiClient.get).mockRejectedValue(new Error("Network Error"));

      await expect(marketDataApi.fetchPriceTable(["AAPL"], "1mo")).rejects.toThrow(
        "Network Error"
      );
    });
  });
});
