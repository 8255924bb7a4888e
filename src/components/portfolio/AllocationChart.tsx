/**
 * Donut chart of each holding's share of total investment
 */

import type { PortfolioSummary } from "@/types";
import { formatCurrencyShort } from "@/utils/format";

const SEGMENT_COLORS = [
  "#3B82F6",
  "#F97316",
  "#10B981",
  "#A855F7",
  "#EF4444",
  "#EAB308",
  "#14B8A6",
  "#EC4899",
];

interface Props {
  summary: PortfolioSummary;
}

export function AllocationChart({ summary }: Props) {
  if (summary.rows.length === 0) {
    return null;
  }

  const total = summary.totalValue;
  const segments = summary.rows.map((row, index) => ({
    key: row.holding.id,
    name: row.holding.ticker,
    color: SEGMENT_COLORS[index % SEGMENT_COLORS.length],
    percent: row.weight * 100,
  }));

  // Hole at 40% of the radius
  const size = 300;
  const radius = size / 2;
  const innerRadius = radius * 0.4;
  const center = size / 2;

  const point = (r: number, angleDeg: number) => {
    const rad = (angleDeg * Math.PI) / 180;
    return { x: center + r * Math.cos(rad), y: center + r * Math.sin(rad) };
  };

  type SegmentWithPath = (typeof segments)[number] & { path: string };
  const paths = segments.reduce<{ paths: SegmentWithPath[]; nextAngle: number }>(
    (acc, segment) => {
      let angle = (segment.percent / 100) * 360;

      // SVG arcs can't handle exactly 360 degrees (start === end)
      if (angle >= 360) {
        angle = 359.99;
      }

      const startAngle = acc.nextAngle;
      const endAngle = startAngle + angle;
      const largeArcFlag = angle > 180 ? 1 : 0;

      const outerStart = point(radius, startAngle);
      const outerEnd = point(radius, endAngle);
      const innerEnd = point(innerRadius, endAngle);
      const innerStart = point(innerRadius, startAngle);

      const path = [
        `M ${outerStart.x} ${outerStart.y}`,
        `A ${radius} ${radius} 0 ${largeArcFlag} 1 ${outerEnd.x} ${outerEnd.y}`,
        `L ${innerEnd.x} ${innerEnd.y}`,
        `A ${innerRadius} ${innerRadius} 0 ${largeArcFlag} 0 ${innerStart.x} ${innerStart.y}`,
        `Z`,
      ].join(" ");

      acc.paths.push({ ...segment, path });
      acc.nextAngle = endAngle;
      return acc;
    },
    { paths: [], nextAngle: -90 }
  ).paths;

  return (
    <div className="bg-rk-bg-surface border border-rk-border-subtle rounded-lg p-6">
      <h2 className="text-xl font-semibold mb-4">Portfolio Allocation by Investment</h2>

      <div className="flex flex-col items-center">
        <svg width={size} height={size} viewBox={`0 0 ${size} ${size}`}>
          {paths.map((segment) => (
            <path
              key={segment.key}
              d={segment.path}
              fill={segment.color}
              opacity={0.9}
              className="transition-opacity hover:opacity-100"
            >
              <title>{`${segment.name}: ${segment.percent.toFixed(1)}%`}</title>
            </path>
          ))}

          <text
            x={center}
            y={center - 6}
            textAnchor="middle"
            className="text-lg font-bold"
            fill="var(--text-primary)"
          >
            {formatCurrencyShort(total)}
          </text>
          <text
            x={center}
            y={center + 14}
            textAnchor="middle"
            className="text-xs"
            fill="var(--text-secondary)"
          >
            Invested
          </text>
        </svg>

        <div className="mt-6 grid grid-cols-2 gap-3 w-full">
          {segments.map((segment) => (
            <div key={segment.key} className="flex items-center gap-2">
              <div
                className="w-4 h-4 rounded-full flex-shrink-0"
                style={{ backgroundColor: segment.color }}
              />
              <div className="text-sm">
                <div className="font-medium text-rk-text-primary truncate">
                  {segment.name}
                </div>
                <div className="text-rk-text-secondary">
                  {segment.percent.toFixed(1)}%
                </div>
              </div>
            </div>
          ))}
        </div>
      </div>
    </div>
  );
}
