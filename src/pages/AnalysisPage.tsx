import { usePortfolioContext } from "@/context";
import { useAnalysis } from "@/hooks";
import { AnalysisControls } from "@/components/analysis/AnalysisControls";
import { MetricsPanel } from "@/components/analysis/MetricsPanel";
import { CumulativeReturnsChart } from "@/components/analysis/CumulativeReturnsChart";
import { ValueAtRiskCard } from "@/components/analysis/ValueAtRiskCard";
import { isInformational } from "@/utils/errors";
import type { PriceHistoryProvider } from "@/types";

interface Props {
  provider?: PriceHistoryProvider;
}

export function AnalysisPage({ provider }: Props) {
  const { portfolio } = usePortfolioContext();
  const { report, loading, error, run } = useAnalysis(provider);
  const isEmpty = portfolio.holdings.length === 0;

  return (
    <div className="space-y-6">
      <div>
        <h1 className="text-2xl font-bold">Portfolio Analysis and Benchmark Comparison</h1>
        <p className="text-sm text-rk-text-secondary mt-1">
          Compare your portfolio with a benchmark index: Value at Risk, Sharpe ratio and
          Sortino ratio over the selected lookback period.
        </p>
      </div>

      <AnalysisControls running={loading} canRun={!isEmpty} onRun={() => void run()} />

      {isEmpty && !error && (
        <div className="bg-rk-bg-surface border border-rk-border-subtle rounded-xl p-12 text-center">
          <p className="text-rk-text-tertiary">
            Your portfolio is empty. Add stocks to begin.
          </p>
        </div>
      )}

      {error &&
        (isInformational(error) ? (
          <div
            className="p-4 bg-rk-bg-surface border border-rk-border-subtle text-rk-text-secondary rounded text-sm"
            role="status"
          >
            {error.message}
          </div>
        ) : (
          <div
            className="p-4 bg-rk-negative/10 border border-rk-negative/20 text-rk-negative rounded text-sm"
            role="alert"
            data-error-kind={error.kind}
          >
            {error.message}
          </div>
        ))}

      {loading && !report && (
        <div className="flex items-center justify-center h-32">
          <p className="text-rk-text-tertiary">Fetching price history...</p>
        </div>
      )}

      {report && (
        <>
          <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
            <MetricsPanel
              title="Portfolio Metrics"
              metrics={report.portfolio.metrics}
              testId="portfolio-metrics"
            />
            <MetricsPanel
              title={`Benchmark Metrics: ${report.settings.benchmark.label}`}
              metrics={report.benchmark.metrics}
              testId="benchmark-metrics"
            />
          </div>
          <CumulativeReturnsChart
            points={report.comparison}
            benchmarkName={report.settings.benchmark.label}
          />
          <ValueAtRiskCard report={report} />
        </>
      )}
    </div>
  );
}
