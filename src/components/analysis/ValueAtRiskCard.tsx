import type { AnalysisReport } from "@/types";
import { formatCurrency } from "@/utils/format";

interface Props {
  report: AnalysisReport;
}

export function ValueAtRiskCard({ report }: Props) {
  const { confidence, benchmark } = report.settings;

  return (
    <div className="bg-rk-bg-surface border border-rk-border-subtle rounded-xl p-6">
      <h2 className="text-xl font-semibold mb-4">Value at Risk (VaR)</h2>
      <div className="grid grid-cols-2 gap-6">
        <div>
          <p className="text-xs text-rk-text-tertiary mb-1">
            Portfolio VaR ({confidence}% Confidence)
          </p>
          <p className="text-2xl font-bold tabular-nums" data-testid="portfolio-var">
            {formatCurrency(report.portfolio.metrics.valueAtRisk)}
          </p>
        </div>
        <div>
          <p className="text-xs text-rk-text-tertiary mb-1">
            {benchmark.label} VaR ({confidence}% Confidence)
          </p>
          <p className="text-2xl font-bold tabular-nums" data-testid="benchmark-var">
            {formatCurrency(report.benchmark.metrics.valueAtRisk)}
          </p>
        </div>
      </div>
      <p className="mt-4 text-sm text-rk-text-secondary">
        <strong>Interpretation:</strong> VaR is the loss that one trading day should not
        exceed at the chosen confidence level, assuming normally distributed returns. A{" "}
        {confidence}% VaR of {formatCurrency(report.portfolio.metrics.valueAtRisk)} means a{" "}
        {confidence}% chance of losing no more than that amount on{" "}
        {formatCurrency(report.totalValue)} in a day.
      </p>
    </div>
  );
}
