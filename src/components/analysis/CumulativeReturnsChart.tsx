import { useMemo } from "react";
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from "recharts";
import type { ComparisonPoint } from "@/types";
import { formatGrowth } from "@/utils/format";

function formatDateShort(dateStr: string): string {
  const d = new Date(dateStr + "T00:00:00");
  return d.toLocaleDateString("en-US", { month: "short", day: "numeric" });
}

function formatDateFull(dateStr: string): string {
  const d = new Date(dateStr + "T00:00:00");
  return d.toLocaleDateString("en-US", {
    month: "short",
    day: "numeric",
    year: "numeric",
  });
}

interface ChartDataPoint extends ComparisonPoint {
  label: string;
}

interface CustomTooltipProps {
  active?: boolean;
  payload?: Array<{ payload: ChartDataPoint }>;
  benchmarkName: string;
}

function CustomTooltip({ active, payload, benchmarkName }: CustomTooltipProps) {
  if (!active || !payload || payload.length === 0) return null;

  const data = payload[0].payload;
  return (
    <div className="bg-rk-bg-elevated border border-rk-border-default rounded-lg px-3 py-2">
      <p className="text-xs text-rk-text-tertiary">{formatDateFull(data.date)}</p>
      {data.portfolio !== null && (
        <p className="text-sm font-semibold text-rk-text-primary">
          Portfolio: {formatGrowth(data.portfolio)}
        </p>
      )}
      {data.benchmark !== null && (
        <p className="text-sm font-semibold text-rk-text-primary">
          {benchmarkName}: {formatGrowth(data.benchmark)}
        </p>
      )}
    </div>
  );
}

interface Props {
  points: ComparisonPoint[];
  benchmarkName: string;
}

export function CumulativeReturnsChart({ points, benchmarkName }: Props) {
  const chartData: ChartDataPoint[] = useMemo(
    () => points.map((p) => ({ ...p, label: formatDateShort(p.date) })),
    [points]
  );

  if (chartData.length === 0) {
    return null;
  }

  return (
    <div className="bg-rk-bg-surface rounded-lg border border-rk-border-subtle p-6">
      <h3 className="text-lg font-semibold text-rk-text-primary mb-4">
        Portfolio vs Benchmark Cumulative Returns
      </h3>
      <ResponsiveContainer width="100%" height={320}>
        <LineChart data={chartData} margin={{ top: 5, right: 5, left: 5, bottom: 5 }}>
          <CartesianGrid
            strokeDasharray="3 3"
            stroke="var(--border-subtle)"
            vertical={false}
          />
          <XAxis
            dataKey="label"
            tick={{ fontSize: 11, fill: "var(--text-tertiary)" }}
            tickLine={false}
            axisLine={{ stroke: "var(--border-default)" }}
            interval="preserveStartEnd"
            minTickGap={40}
          />
          <YAxis
            tickFormatter={formatGrowth}
            tick={{ fontSize: 11, fill: "var(--text-tertiary)" }}
            tickLine={false}
            axisLine={false}
            width={50}
            domain={["auto", "auto"]}
          />
          <Tooltip content={<CustomTooltip benchmarkName={benchmarkName} />} />
          <Legend />
          <Line
            type="monotone"
            dataKey="portfolio"
            name="Portfolio"
            stroke="var(--accent-primary)"
            strokeWidth={3}
            dot={false}
            connectNulls
          />
          <Line
            type="monotone"
            dataKey="benchmark"
            name={benchmarkName}
            stroke="var(--chart-benchmark)"
            strokeWidth={3}
            dot={false}
            connectNulls
          />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
