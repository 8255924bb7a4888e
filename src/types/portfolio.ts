export interface Holding {
  id: string;
  ticker: string; // Upper-cased symbol, e.g. "AAPL"
  averagePrice: number; // Average price paid per share
  quantity: number; // Whole shares
}

export interface HoldingInput {
  ticker: string;
  averagePrice: number;
  quantity: number;
}

export interface Portfolio {
  holdings: Holding[]; // Insertion order is display order
}

export interface HoldingRow {
  holding: Holding;
  totalInvestment: number;
  weight: number; // Fraction of total value, 0..1
}

export interface PortfolioSummary {
  rows: HoldingRow[];
  totalValue: number;
}

export type TickerWeights = Record<string, number>;
