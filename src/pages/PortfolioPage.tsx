import { useState } from "react";
import { Link } from "react-router-dom";
import { usePortfolioSummary } from "@/context";
import { HoldingFormModal } from "@/components/portfolio/HoldingFormModal";
import { HoldingsTable } from "@/components/portfolio/HoldingsTable";
import { AllocationChart } from "@/components/portfolio/AllocationChart";
import { formatCurrency } from "@/utils/format";
import type { Holding } from "@/types";

export function PortfolioPage() {
  const summary = usePortfolioSummary();
  const [showForm, setShowForm] = useState(false);
  const [notice, setNotice] = useState<string | null>(null);

  const handleAdded = (holding: Holding) => {
    setNotice(`Added ${holding.ticker} to your portfolio!`);
  };

  return (
    <div className="space-y-6">
      <div className="flex items-center justify-between">
        <div>
          <h1 className="text-2xl font-bold">Portfolio</h1>
          <p className="text-sm text-rk-text-secondary mt-1">
            Total Portfolio Value{" "}
            <span className="font-semibold text-rk-text-primary tabular-nums" data-testid="total-value">
              {formatCurrency(summary.totalValue)}
            </span>
          </p>
        </div>
        <button
          type="button"
          onClick={() => {
            setNotice(null);
            setShowForm(true);
          }}
          className="px-4 py-2 bg-rk-accent-primary text-rk-text-primary rounded hover:bg-rk-accent-hover transition"
        >
          Add Stock
        </button>
      </div>

      {notice && (
        <div
          className="p-3 bg-rk-positive/10 border border-rk-positive/20 text-rk-positive rounded text-sm"
          role="status"
        >
          {notice}
        </div>
      )}

      <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
        <div className="lg:col-span-2">
          <HoldingsTable summary={summary} />
        </div>
        <AllocationChart summary={summary} />
      </div>

      {summary.rows.length > 0 && (
        <div className="text-sm">
          <Link to="/analysis" className="text-rk-accent hover:text-rk-text-primary">
            Compare against a benchmark →
          </Link>
        </div>
      )}

      <HoldingFormModal
        isOpen={showForm}
        onClose={() => setShowForm(false)}
        onAdded={handleAdded}
      />
    </div>
  );
}
