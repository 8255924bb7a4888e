import { usePortfolioContext } from "@/context";
import { OptionSelect, type SelectOption } from "@/components/common/OptionSelect";
import {
  BENCHMARKS,
  CONFIDENCE_LEVELS,
  LOOKBACK_PERIODS,
  type ConfidenceLevel,
  type LookbackPeriod,
} from "@/types";

const BENCHMARK_OPTIONS: SelectOption<string>[] = BENCHMARKS.map((b) => ({
  value: b.ticker,
  label: b.label,
}));

const PERIOD_OPTIONS: SelectOption<LookbackPeriod>[] = LOOKBACK_PERIODS.map((p) => ({
  value: p,
  label: p,
}));

const CONFIDENCE_OPTIONS: SelectOption<ConfidenceLevel>[] = CONFIDENCE_LEVELS.map((c) => ({
  value: c,
  label: `${c}%`,
}));

interface Props {
  running: boolean;
  canRun: boolean;
  onRun: () => void;
}

export function AnalysisControls({ running, canRun, onRun }: Props) {
  const { settings, updateSettings } = usePortfolioContext();

  const handleBenchmarkChange = (ticker: string) => {
    const benchmark = BENCHMARKS.find((b) => b.ticker === ticker);
    if (benchmark) updateSettings({ benchmark });
  };

  return (
    <div className="bg-rk-bg-surface border border-rk-border-subtle rounded-xl p-6">
      <div className="grid grid-cols-1 md:grid-cols-4 gap-4 items-end">
        <OptionSelect
          label="Benchmark Index"
          value={settings.benchmark.ticker}
          options={BENCHMARK_OPTIONS}
          onChange={handleBenchmarkChange}
          disabled={running}
          testId="benchmark-select"
        />
        <OptionSelect
          label="Lookback Period"
          value={settings.period}
          options={PERIOD_OPTIONS}
          onChange={(period) => updateSettings({ period })}
          disabled={running}
          testId="period-select"
        />
        <OptionSelect
          label="VaR Confidence"
          value={settings.confidence}
          options={CONFIDENCE_OPTIONS}
          onChange={(confidence) => updateSettings({ confidence })}
          disabled={running}
          testId="confidence-select"
        />
        <button
          type="button"
          onClick={onRun}
          disabled={running || !canRun}
          className="px-4 py-2 bg-rk-accent-primary text-rk-text-primary rounded hover:bg-rk-accent-hover transition disabled:opacity-50"
          data-testid="run-analysis"
        >
          {running ? "Running..." : "Run Simulation"}
        </button>
      </div>
    </div>
  );
}
