/**
 * Runtime configuration read from Vite environment variables.
 */

export const TRADING_PERIODS_PER_YEAR = 252;

const DEFAULT_MARKET_DATA_URL = "/market-data";
const DEFAULT_RISK_FREE_RATE = 0.02;
const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export interface AppConfig {
  marketDataUrl: string;
  annualRiskFreeRate: number;
  requestTimeoutMs: number;
}

type ConfigEnv = Pick<
  ImportMetaEnv,
  "VITE_MARKET_DATA_URL" | "VITE_RISK_FREE_RATE" | "VITE_REQUEST_TIMEOUT_MS"
>;

export function loadConfig(env: ConfigEnv): AppConfig {
  const timeout = readNumber(env.VITE_REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS);
  return {
    marketDataUrl: env.VITE_MARKET_DATA_URL?.trim() || DEFAULT_MARKET_DATA_URL,
    annualRiskFreeRate: readNumber(env.VITE_RISK_FREE_RATE, DEFAULT_RISK_FREE_RATE),
    requestTimeoutMs: timeout > 0 ? timeout : DEFAULT_REQUEST_TIMEOUT_MS,
  };
}

export const config: AppConfig = loadConfig(import.meta.env);
