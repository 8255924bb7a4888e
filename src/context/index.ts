export { PortfolioContext } from "./context";
export type { PortfolioContextType } from "./context";
export { PortfolioProvider, DEFAULT_SETTINGS } from "./PortfolioContext";
export type { PortfolioProviderProps } from "./PortfolioContext";
export { usePortfolioContext, usePortfolioSummary } from "./usePortfolioContext";
