/**
 * Tests for PortfolioContext - holdings and analysis settings
 */

import { describe, it, expect, vi } from "vitest";
import { render, screen, act, renderHook } from "@testing-library/react";
import {
  DEFAULT_SETTINGS,
  PortfolioProvider,
  usePortfolioContext,
  usePortfolioSummary,
} from "@/context";
import { BENCHMARKS } from "@/types";

function TestComponent() {
  const { portfolio, settings, addHolding, updateSettings } = usePortfolioContext();
  const summary = usePortfolioSummary();

  return (
    <div>
      <span data-testid="tickers">{portfolio.holdings.map((h) => h.ticker).join(",")}</span>
      <span data-testid="ids">{portfolio.holdings.map((h) => h.id).join(",")}</span>
      <span data-testid="total">{summary.totalValue}</span>
      <span data-testid="period">{settings.period}</span>
      <button onClick={() => addHolding({ ticker: "msft", averagePrice: 20, quantity: 5 })}>
        Add MSFT
      </button>
      <button onClick={() => addHolding({ ticker: "", averagePrice: 20, quantity: 5 })}>
        Add Blank
      </button>
      <button onClick={() => updateSettings({ period: "1y" })}>Use 1y</button>
    </div>
  );
}

describe("PortfolioContext", () => {
  it("should start with an empty portfolio and default settings", () => {
    render(
      <PortfolioProvider>
        <TestComponent />
      </PortfolioProvider>
    );

    expect(screen.getByTestId("tickers")).toBeEmptyDOMElement();
    expect(screen.getByTestId("total")).toHaveTextContent("0");
    expect(screen.getByTestId("period")).toHaveTextContent("3mo");
    expect(DEFAULT_SETTINGS).toEqual({ benchmark: BENCHMARKS[0], period: "3mo", confidence: 95 });
  });

  it("should add a valid holding", () => {
    render(
      <PortfolioProvider
        initialPortfolio={{
          holdings: [{ id: "h-1", ticker: "AAPL", averagePrice: 10, quantity: 100 }],
        }}
      >
        <TestComponent />
      </PortfolioProvider>
    );

    act(() => {
      screen.getByText("Add MSFT").click();
    });

    expect(screen.getByTestId("tickers")).toHaveTextContent("AAPL,MSFT");
    expect(screen.getByTestId("ids")).toHaveTextContent("h-1,h-2");
    expect(screen.getByTestId("total")).toHaveTextContent("1100");
  });

  it("should ignore an invalid holding", () => {
    render(
      <PortfolioProvider>
        <TestComponent />
      </PortfolioProvider>
    );

    act(() => {
      screen.getByText("Add Blank").click();
    });

    expect(screen.getByTestId("total")).toHaveTextContent("0");
  });

  it("should return the validation result from addHolding", () => {
    const { result } = renderHook(() => usePortfolioContext(), {
      wrapper: ({ children }) => <PortfolioProvider>{children}</PortfolioProvider>,
    });

    let outcome: ReturnType<typeof result.current.addHolding> | undefined;
    act(() => {
      outcome = result.current.addHolding({ ticker: "AAPL", averagePrice: 0, quantity: 1 });
    });

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: "invalid-holding",
        field: "averagePrice",
        message: "Average price must be greater than zero",
      },
    });
    expect(result.current.portfolio.holdings).toHaveLength(0);
  });

  it("should merge settings updates", () => {
    render(
      <PortfolioProvider>
        <TestComponent />
      </PortfolioProvider>
    );

    act(() => {
      screen.getByText("Use 1y").click();
    });

    expect(screen.getByTestId("period")).toHaveTextContent("1y");
  });

  it("should throw outside the provider", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});

    expect(() => renderHook(() => usePortfolioContext())).toThrow(
      "usePortfolioContext must be used within PortfolioProvider"
    );

    vi.restoreAllMocks();
  });
});
