import type { MetricsResult, Ratio } from "@/types";
import { describeDegenerate, formatPercent, formatRatio } from "@/utils/format";

function RatioValue({ ratio }: { ratio: Ratio }) {
  if (ratio.status === "degenerate") {
    return (
      <span
        className="text-rk-text-tertiary"
        title={describeDegenerate(ratio.reason)}
        data-degenerate={ratio.reason}
      >
        {formatRatio(ratio)}
      </span>
    );
  }
  const colorClass = ratio.value >= 0 ? "text-rk-positive" : "text-rk-negative";
  return <span className={colorClass}>{formatRatio(ratio)}</span>;
}

function MetricRow({ label, hint, children }: { label: string; hint?: string; children: React.ReactNode }) {
  return (
    <div className="flex items-baseline justify-between py-3 border-b border-rk-border-subtle last:border-b-0">
      <div>
        <p className="text-sm text-rk-text-secondary">{label}</p>
        {hint && <p className="text-xs text-rk-text-tertiary">{hint}</p>}
      </div>
      <p className="text-lg font-semibold tabular-nums">{children}</p>
    </div>
  );
}

interface Props {
  title: string;
  metrics: MetricsResult;
  testId?: string;
}

export function MetricsPanel({ title, metrics, testId }: Props) {
  const reasons = [metrics.sharpeRatio, metrics.sortinoRatio].flatMap((r) =>
    r.status === "degenerate" ? [describeDegenerate(r.reason)] : []
  );

  return (
    <div
      className="bg-rk-bg-surface border border-rk-border-subtle rounded-xl p-6"
      data-testid={testId}
    >
      <h3 className="text-sm font-medium text-rk-text-secondary mb-2">{title}</h3>
      <MetricRow label="Average Daily Return" hint="Represents expected daily return">
        {formatPercent(metrics.mean)}
      </MetricRow>
      <MetricRow label="Volatility (Std Dev)" hint="Indicates riskiness">
        {formatPercent(metrics.standardDeviation)}
      </MetricRow>
      <MetricRow label="Sharpe Ratio" hint="Higher means better risk-adjusted returns">
        <RatioValue ratio={metrics.sharpeRatio} />
      </MetricRow>
      <MetricRow label="Sortino Ratio" hint="Penalises downside volatility only">
        <RatioValue ratio={metrics.sortinoRatio} />
      </MetricRow>
      <p className="mt-3 text-xs text-rk-text-tertiary">
        Based on {metrics.observations} daily returns.
      </p>
      {reasons.length > 0 && (
        <ul className="mt-2 text-xs text-rk-warning list-disc pl-4" data-testid="degenerate-notes">
          {[...new Set(reasons)].map((reason) => (
            <li key={reason}>{reason}</li>
          ))}
        </ul>
      )}
    </div>
  );
}
