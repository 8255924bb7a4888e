import { useContext, useMemo } from "react";
import { PortfolioContext } from "./context";
import type { PortfolioContextType } from "./context";
import type { PortfolioSummary } from "@/types";
import { summarizePortfolio } from "@/utils/portfolio";

export function usePortfolioContext(): PortfolioContextType {
  const context = useContext(PortfolioContext);
  if (!context) {
    throw new Error("usePortfolioContext must be used within PortfolioProvider");
  }
  return context;
}

export function usePortfolioSummary(): PortfolioSummary {
  const { portfolio } = usePortfolioContext();
  return useMemo(() => summarizePortfolio(portfolio), [portfolio]);
}
