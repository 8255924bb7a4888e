import { describe, it, expect } from "vitest";
import { loadConfig } from "@/config";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      marketDataUrl: "/market-data",
      annualRiskFreeRate: 0.02,
      requestTimeoutMs: 15_000,
    });
  });

  it("reads overrides", () => {
    expect(
      loadConfig({
        VITE_MARKET_DATA_URL: "http://localhost:9000",
        VITE_RISK_FREE_RATE: "0.045",
        VITE_REQUEST_TIMEOUT_MS: "5000",
      })
    ).toEqual({
      marketDataUrl: "http://localhost:9000",
      annualRiskFreeRate: 0.045,
      requestTimeoutMs: 5000,
    });
  });

  it("ignores values that are not numbers", () => {
    const cfg = loadConfig({ VITE_RISK_FREE_RATE: "two percent", VITE_REQUEST_TIMEOUT_MS: "" });
    expect(cfg.annualRiskFreeRate).toBe(0.02);
    expect(cfg.requestTimeoutMs).toBe(15_000);
  });

  it("rejects a non-positive timeout and a blank url", () => {
    const cfg = loadConfig({ VITE_REQUEST_TIMEOUT_MS: "0", VITE_MARKET_DATA_URL: "  " });
    expect(cfg.requestTimeoutMs).toBe(15_000);
    expect(cfg.marketDataUrl).toBe("/market-data");
  });

  it("allows a zero risk-free rate", () => {
    expect(loadConfig({ VITE_RISK_FREE_RATE: "0" }).annualRiskFreeRate).toBe(0);
  });
});
