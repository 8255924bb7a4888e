import { useState, useCallback, useRef } from "react";
import { marketDataApi } from "@/api";
import { usePortfolioContext } from "@/context";
import { runAnalysis } from "@/services/analysis";
import type { AnalysisError, AnalysisReport, PriceHistoryProvider } from "@/types";

interface AnalysisState {
  report: AnalysisReport | null;
  loading: boolean;
  error: AnalysisError | null;
}

export function useAnalysis(
  provider: PriceHistoryProvider = marketDataApi
): AnalysisState & { run: () => Promise<void> } {
  const { portfolio, settings } = usePortfolioContext();
  const [state, setState] = useState<AnalysisState>({
    report: null,
    loading: false,
    error: null,
  });
  const requestIdRef = useRef(0);

  const run = useCallback(async () => {
    const requestId = ++requestIdRef.current;
    setState((prev) => ({ ...prev, loading: true, error: null }));

    const result = await runAnalysis(provider, portfolio, settings);
    // A newer run superseded this one
    if (requestId !== requestIdRef.current) return;

    if (result.ok) {
      setState({ report: result.value, loading: false, error: null });
    } else {
      setState({ report: null, loading: false, error: result.error });
    }
  }, [provider, portfolio, settings]);

  return {
    ...state,
    run,
  };
}
