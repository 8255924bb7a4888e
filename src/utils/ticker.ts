/**
 * Utility functions for handling ticker symbols.
 */

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

/**
 * Checks if a ticker is an index symbol.
 * Yahoo Finance prefixes index tickers with a caret, e.g. ^GSPC.
 */
export function isIndexTicker(ticker: string): boolean {
  return ticker.startsWith("^");
}

