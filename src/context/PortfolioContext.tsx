import { useCallback, useRef, useState } from "react";
import { PortfolioContext } from "./context";
import type { PortfolioContextType } from "./context";
import type { AnalysisSettings, HoldingInput, Portfolio } from "@/types";
import { BENCHMARKS } from "@/types";
import { EMPTY_PORTFOLIO, addHolding as appendHolding, createHolding } from "@/utils/portfolio";

export const DEFAULT_SETTINGS: AnalysisSettings = {
  benchmark: BENCHMARKS[0],
  period: "3mo",
  confidence: 95,
};

export interface PortfolioProviderProps {
  children: React.ReactNode;
  initialPortfolio?: Portfolio;
  initialSettings?: AnalysisSettings;
}

export function PortfolioProvider({
  children,
  initialPortfolio = EMPTY_PORTFOLIO,
  initialSettings = DEFAULT_SETTINGS,
}: PortfolioProviderProps) {
  const [portfolio, setPortfolio] = useState<Portfolio>(initialPortfolio);
  const [settings, setSettings] = useState<AnalysisSettings>(initialSettings);
  const nextIdRef = useRef(initialPortfolio.holdings.length + 1);

  const addHolding = useCallback((input: HoldingInput) => {
    const created = createHolding(input, `h-${nextIdRef.current}`);
    if (created.ok) {
      nextIdRef.current += 1;
      setPortfolio((prev) => appendHolding(prev, created.value));
    }
    return created;
  }, []);

  const updateSettings = useCallback((changes: Partial<AnalysisSettings>) => {
    setSettings((prev) => ({ ...prev, ...changes }));
  }, []);

  const value: PortfolioContextType = {
    portfolio,
    settings,
    addHolding,
    updateSettings,
  };

  return (
    <PortfolioContext.Provider value={value}>
      {children}
    </PortfolioContext.Provider>
  );
}
