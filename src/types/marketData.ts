export const LOOKBACK_PERIODS = ["1mo", "3mo", "6mo", "1y", "2y", "5y"] as const;

export type LookbackPeriod = (typeof LOOKBACK_PERIODS)[number];

export interface Benchmark {
  ticker: string;
  label: string;
}

export const BENCHMARKS: Benchmark[] = [
  { ticker: "^GSPC", label: "S&P 500 (SPY)" },
  { ticker: "^DJI", label: "Dow Jones (DIA)" },
  { ticker: "^FTSE", label: "FTSE 100 (FTSE)" },
  { ticker: "^N225", label: "Nikkei 225 (NIKKEI)" },
  { ticker: "^STOXX50E", label: "Euro Stoxx 50 (STOXX50E)" },
  { ticker: "^NSEI", label: "India Nifty 50 (NSEI)" },
];

export interface PricePoint {
  date: string; // Exchange-local calendar date "2025-06-02"
  close: number; // Adjusted close
}

export type PriceTable = Record<string, PricePoint[]>;

export interface PriceHistoryProvider {
  fetchPriceTable(tickers: string[], period: LookbackPeriod): Promise<PriceTable>;
}

// Subset of the Yahoo Finance v8 chart response that the client reads
export interface ChartResponse {
  chart: {
    result: ChartResult[] | null;
    error: { code: string; description: string } | null;
  };
}

export interface ChartResult {
  meta: {
    symbol: string;
    gmtoffset?: number; // Seconds east of UTC for the exchange
  };
  timestamp?: number[]; // Unix seconds
  indicators: {
    quote?: Array<{ close?: Array<number | null> }>;
    adjclose?: Array<{ adjclose?: Array<number | null> }>;
  };
}
