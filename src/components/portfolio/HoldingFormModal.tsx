import { useEffect, useState } from "react";
import { usePortfolioContext } from "@/context";
import { isIndexTicker, normalizeTicker } from "@/utils/ticker";
import { Modal } from "@/components/common/Modal";
import type { Holding } from "@/types";

const DEFAULT_TICKER = "AAPL";
const DEFAULT_PRICE = "100";
const DEFAULT_QUANTITY = "10";

interface Props {
  isOpen: boolean;
  onClose: () => void;
  onAdded: (holding: Holding) => void;
}

export function HoldingFormModal({ isOpen, onClose, onAdded }: Props) {
  const { portfolio, addHolding } = usePortfolioContext();
  const [ticker, setTicker] = useState(DEFAULT_TICKER);
  const [averagePrice, setAveragePrice] = useState(DEFAULT_PRICE);
  const [quantity, setQuantity] = useState(DEFAULT_QUANTITY);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    if (isOpen) {
      setTicker(DEFAULT_TICKER);
      setAveragePrice(DEFAULT_PRICE);
      setQuantity(DEFAULT_QUANTITY);
      setError(null);
    }
  }, [isOpen]);

  const normalized = normalizeTicker(ticker);
  const isDuplicate =
    normalized !== "" && portfolio.holdings.some((h) => h.ticker === normalized);

  const totalInvestment = parseFloat(averagePrice) * parseFloat(quantity);

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();

    const result = addHolding({
      ticker,
      averagePrice: parseFloat(averagePrice),
      quantity: Number(quantity),
    });

    if (!result.ok) {
      setError(result.error.message);
      return;
    }

    onAdded(result.value);
    onClose();
  };

  return (
    <Modal isOpen={isOpen} onClose={onClose} title="Add Stock to Portfolio">
      <form onSubmit={handleSubmit} data-testid="holding-form">
        <div className="mb-4">
          <label
            htmlFor="holding-ticker"
            className="block text-sm font-medium text-rk-text-secondary mb-2"
          >
            Stock Ticker
          </label>
          <input
            id="holding-ticker"
            type="text"
            value={ticker}
            onChange={(e) => setTicker(e.target.value)}
            className="w-full px-3 py-2 bg-rk-bg-surface border border-rk-border-default rounded text-rk-text-primary focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-rk-accent-primary"
            placeholder="e.g., AAPL"
            data-testid="holding-ticker"
          />
          {isDuplicate && (
            <p className="mt-1 text-xs text-rk-warning" data-testid="duplicate-ticker-warning">
              {normalized} is already in your portfolio. Both rows count toward its weight.
            </p>
          )}
          {isIndexTicker(normalized) && (
            <p className="mt-1 text-xs text-rk-warning" data-testid="index-ticker-warning">
              {normalized} looks like an index. Pick benchmarks on the Analysis page.
            </p>
          )}
        </div>

        <div className="grid grid-cols-2 gap-4 mb-4">
          <div>
            <label
              htmlFor="holding-average-price"
              className="block text-sm font-medium text-rk-text-secondary mb-2"
            >
              Average Price Bought ($)
            </label>
            <input
              id="holding-average-price"
              type="number"
              step="any"
              value={averagePrice}
              onChange={(e) => setAveragePrice(e.target.value)}
              className="w-full px-3 py-2 bg-rk-bg-surface border border-rk-border-default rounded text-rk-text-primary focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-rk-accent-primary"
              placeholder="0.00"
              data-testid="holding-average-price"
            />
          </div>
          <div>
            <label
              htmlFor="holding-quantity"
              className="block text-sm font-medium text-rk-text-secondary mb-2"
            >
              Quantity Bought
            </label>
            <input
              id="holding-quantity"
              type="number"
              step="1"
              min="1"
              value={quantity}
              onChange={(e) => setQuantity(e.target.value)}
              className="w-full px-3 py-2 bg-rk-bg-surface border border-rk-border-default rounded text-rk-text-primary focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-rk-accent-primary"
              placeholder="1"
              data-testid="holding-quantity"
            />
          </div>
        </div>

        {Number.isFinite(totalInvestment) && totalInvestment > 0 && (
          <p className="mb-4 text-xs text-rk-text-tertiary" data-testid="holding-total">
            Total investment: ${totalInvestment.toLocaleString(undefined, {
              minimumFractionDigits: 2,
              maximumFractionDigits: 2,
            })}
          </p>
        )}

        {error && (
          <div
            className="mb-4 p-3 bg-rk-negative/10 border border-rk-negative/20 text-rk-negative rounded text-sm"
            data-testid="holding-form-error"
          >
            {error}
          </div>
        )}

        <div className="flex justify-end gap-2">
          <button
            type="button"
            onClick={onClose}
            className="px-4 py-2 text-rk-text-secondary hover:bg-rk-bg-elevated rounded transition"
          >
            Cancel
          </button>
          <button
            type="submit"
            className="px-4 py-2 bg-rk-accent-primary text-rk-text-primary rounded hover:bg-rk-accent-hover transition"
          >
            Add Stock
          </button>
        </div>
      </form>
    </Modal>
  );
}
