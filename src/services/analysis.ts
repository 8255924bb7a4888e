/**
 * Analysis runner
 *
 * One run: fetch prices for the holdings and the benchmark, build return
 * series, compute metrics for both, and line the cumulative series up for
 * comparison. Every failure comes back as an AnalysisError; the portfolio
 * passed in is never modified.
 */

import { config } from "@/config";
import type {
  AnalysisReport,
  AnalysisSettings,
  ComparisonPoint,
  LookbackPeriod,
  Portfolio,
  PriceHistoryProvider,
  PriceTable,
  Result,
  ReturnSeries,
  SeriesAnalysis,
} from "@/types";
import { extractErrorMessage } from "@/utils/errors";
import { computeMetrics, cumulativeReturns, riskFreeRatePerPeriod } from "@/utils/metrics";
import { summarizePortfolio, tickerWeights, uniqueTickers } from "@/utils/portfolio";
import { aggregateReturns, buildReturnTable, returnSeriesFor } from "@/utils/returns";

export interface RunOptions {
  annualRiskFreeRate?: number;
}

async function fetchPrices(
  provider: PriceHistoryProvider,
  tickers: string[],
  period: LookbackPeriod
): Promise<Result<PriceTable>> {
  let table: PriceTable;
  try {
    table = await provider.fetchPriceTable(tickers, period);
  } catch (err) {
    console.error("Failed to fetch price history:", err);
    return {
      ok: false,
      error: {
        kind: "data-retrieval",
        tickers,
        message: `Error fetching data: ${extractErrorMessage(err, "price history unavailable")}`,
      },
    };
  }

  // Only the requested tickers take part in date alignment
  const requested: PriceTable = {};
  for (const ticker of tickers) {
    requested[ticker] = table[ticker] ?? [];
  }

  const empty = tickers.filter((t) => requested[t].length === 0);
  if (empty.length > 0) {
    return {
      ok: false,
      error: {
        kind: "data-retrieval",
        tickers: empty,
        message: `No price history for ${empty.join(", ")} over ${period}`,
      },
    };
  }
  return { ok: true, value: requested };
}

function analyzeSeries(
  returns: ReturnSeries,
  riskFreeRate: number,
  settings: AnalysisSettings,
  portfolioValue: number
): Result<SeriesAnalysis> {
  const metrics = computeMetrics(returns.values, {
    riskFreeRate,
    confidence: settings.confidence,
    portfolioValue,
  });
  if (!metrics.ok) return metrics;

  return {
    ok: true,
    value: {
      returns,
      cumulative: { dates: returns.dates, values: cumulativeReturns(returns.values) },
      metrics: metrics.value,
    },
  };
}

/**
 * Union of both date axes, ascending, with null where a series has no point.
 */
export function mergeCumulative(portfolio: ReturnSeries, benchmark: ReturnSeries): ComparisonPoint[] {
  const points = new Map<string, ComparisonPoint>();
  const pointFor = (date: string): ComparisonPoint => {
    let point = points.get(date);
    if (!point) {
      point = { date, portfolio: null, benchmark: null };
      points.set(date, point);
    }
    return point;
  };

  portfolio.dates.forEach((date, i) => {
    pointFor(date).portfolio = portfolio.values[i];
  });
  benchmark.dates.forEach((date, i) => {
    pointFor(date).benchmark = benchmark.values[i];
  });

  return [...points.values()].sort((a, b) => a.date.localeCompare(b.date));
}

export async function runAnalysis(
  provider: PriceHistoryProvider,
  portfolio: Portfolio,
  settings: AnalysisSettings,
  options: RunOptions = {}
): Promise<Result<AnalysisReport>> {
  if (portfolio.holdings.length === 0) {
    return {
      ok: false,
      error: {
        kind: "empty-portfolio",
        message: "Your portfolio is empty. Add stocks to begin.",
      },
    };
  }

  const summary = summarizePortfolio(portfolio);
  const riskFreeRate = riskFreeRatePerPeriod(
    options.annualRiskFreeRate ?? config.annualRiskFreeRate
  );

  const holdingPrices = await fetchPrices(provider, uniqueTickers(portfolio), settings.period);
  if (!holdingPrices.ok) return holdingPrices;

  const holdingReturns = buildReturnTable(holdingPrices.value);
  if (!holdingReturns.ok) return holdingReturns;

  const portfolioReturns = aggregateReturns(holdingReturns.value, tickerWeights(summary));
  if (!portfolioReturns.ok) return portfolioReturns;

  const benchmarkTicker = settings.benchmark.ticker;
  const benchmarkPrices = await fetchPrices(provider, [benchmarkTicker], settings.period);
  if (!benchmarkPrices.ok) return benchmarkPrices;

  const benchmarkTable = buildReturnTable(benchmarkPrices.value);
  if (!benchmarkTable.ok) return benchmarkTable;
  const benchmarkReturns = returnSeriesFor(benchmarkTable.value, benchmarkTicker);
  if (!benchmarkReturns) {
    return {
      ok: false,
      error: {
        kind: "configuration-mismatch",
        missingTickers: [benchmarkTicker],
        message: `No return history for ${benchmarkTicker} in the selected period`,
      },
    };
  }

  const portfolioAnalysis = analyzeSeries(
    portfolioReturns.value,
    riskFreeRate,
    settings,
    summary.totalValue
  );
  if (!portfolioAnalysis.ok) return portfolioAnalysis;

  // Benchmark VaR is sized against the same capital, using the index's own volatility
  const benchmarkAnalysis = analyzeSeries(
    benchmarkReturns,
    riskFreeRate,
    settings,
    summary.totalValue
  );
  if (!benchmarkAnalysis.ok) return benchmarkAnalysis;

  return {
    ok: true,
    value: {
      settings,
      totalValue: summary.totalValue,
      portfolio: portfolioAnalysis.value,
      benchmark: benchmarkAnalysis.value,
      comparison: mergeCumulative(
        portfolioAnalysis.value.cumulative,
        benchmarkAnalysis.value.cumulative
      ),
    },
  };
}
