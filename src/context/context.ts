import { createContext } from "react";
import type {
  AnalysisSettings,
  Holding,
  HoldingInput,
  Portfolio,
  Result,
} from "@/types";

export interface PortfolioContextType {
  portfolio: Portfolio;
  settings: AnalysisSettings;
  addHolding: (input: HoldingInput) => Result<Holding>;
  updateSettings: (changes: Partial<AnalysisSettings>) => void;
}

export const PortfolioContext = createContext<PortfolioContextType | undefined>(
  undefined
);
