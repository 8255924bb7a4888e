/**
 * Holdings with their total investment and weight, in the order they were added
 */

import type { PortfolioSummary } from "@/types";
import { formatCurrency } from "@/utils/format";

interface Props {
  summary: PortfolioSummary;
}

export function HoldingsTable({ summary }: Props) {
  if (summary.rows.length === 0) {
    return (
      <div className="bg-rk-bg-surface border border-rk-border-subtle rounded-lg p-6">
        <h2 className="text-xl font-semibold mb-4">Portfolio Details</h2>
        <div className="text-center py-8 text-rk-text-tertiary">
          Your portfolio is empty. Add stocks to begin.
        </div>
      </div>
    );
  }

  return (
    <div className="bg-rk-bg-surface border border-rk-border-subtle rounded-lg overflow-hidden">
      <div className="px-6 py-4 border-b border-rk-border-subtle">
        <h2 className="text-xl font-semibold">Portfolio Details</h2>
      </div>

      <div className="overflow-x-auto">
        <table className="w-full">
          <thead className="bg-rk-bg-surface">
            <tr>
              <th className="px-6 py-3 text-left text-xs font-medium text-rk-text-tertiary uppercase tracking-wider">
                Ticker
              </th>
              <th className="px-6 py-3 text-right text-xs font-medium text-rk-text-tertiary uppercase tracking-wider">
                Avg Price
              </th>
              <th className="px-6 py-3 text-right text-xs font-medium text-rk-text-tertiary uppercase tracking-wider">
                Quantity
              </th>
              <th className="px-6 py-3 text-right text-xs font-medium text-rk-text-tertiary uppercase tracking-wider">
                Total Investment
              </th>
              <th className="px-6 py-3 text-right text-xs font-medium text-rk-text-tertiary uppercase tracking-wider">
                Weight
              </th>
            </tr>
          </thead>
          <tbody className="divide-y divide-rk-border-subtle">
            {summary.rows.map(({ holding, totalInvestment, weight }) => (
              <tr key={holding.id} className="hover:bg-rk-bg-elevated" data-testid="holding-row">
                <td className="px-6 py-4 whitespace-nowrap text-sm font-medium text-rk-text-primary">
                  {holding.ticker}
                </td>
                <td className="px-6 py-4 whitespace-nowrap text-right text-sm text-rk-text-primary tabular-nums">
                  {formatCurrency(holding.averagePrice)}
                </td>
                <td className="px-6 py-4 whitespace-nowrap text-right text-sm text-rk-text-primary tabular-nums">
                  {holding.quantity}
                </td>
                <td className="px-6 py-4 whitespace-nowrap text-right text-sm text-rk-text-primary tabular-nums">
                  {formatCurrency(totalInvestment)}
                </td>
                <td className="px-6 py-4 whitespace-nowrap text-right text-sm text-rk-text-primary tabular-nums">
                  {(weight * 100).toFixed(1)}%
                </td>
              </tr>
            ))}
          </tbody>
          <tfoot className="border-t border-rk-border-default">
            <tr>
              <td
                colSpan={3}
                className="px-6 py-3 text-sm font-semibold text-rk-text-secondary"
              >
                Total Portfolio Value
              </td>
              <td
                className="px-6 py-3 text-right text-sm font-semibold text-rk-text-primary tabular-nums"
                data-testid="portfolio-total"
              >
                {formatCurrency(summary.totalValue)}
              </td>
              <td className="px-6 py-3 text-right text-sm font-semibold text-rk-text-primary tabular-nums">
                100.0%
              </td>
            </tr>
          </tfoot>
        </table>
      </div>
    </div>
  );
}
