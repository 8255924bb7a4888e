/**
 * Tests for ValueAtRiskCard component
 */

import { describe, it, expect } from "vitest";
import { render, screen } from "@testing-library/react";
import { ValueAtRiskCard } from "@/components/analysis/ValueAtRiskCard";
import { BENCHMARKS } from "@/types";
import { buildReport } from "../fixtures/report";

describe("ValueAtRiskCard", () => {
  it("should show both VaR figures at the chosen confidence", () => {
    render(<ValueAtRiskCard report={buildReport()} />);

    expect(screen.getByText("Value at Risk (VaR)")).toBeInTheDocument();
    expect(screen.getByText("Portfolio VaR (95% Confidence)")).toBeInTheDocument();
    expect(screen.getByText("S&P 500 (SPY) VaR (95% Confidence)")).toBeInTheDocument();
    expect(screen.getByTestId("portfolio-var")).toHaveTextContent("$329.00");
    expect(screen.getByTestId("benchmark-var")).toHaveTextContent("$164.50");
  });

  it("should explain the figure against the portfolio value", () => {
    const { container } = render(<ValueAtRiskCard report={buildReport()} />);

    expect(container).toHaveTextContent(
      "A 95% VaR of $329.00 means a 95% chance of losing no more than that amount on $10,000.00 in a day."
    );
  });

  it("should follow the selected benchmark and confidence", () => {
    const report = buildReport({
      settings: { benchmark: BENCHMARKS[3], period: "1y", confidence: 99 },
    });

    render(<ValueAtRiskCard report={report} />);

    expect(screen.getByText("Portfolio VaR (99% Confidence)")).toBeInTheDocument();
    expect(screen.getByText("Nikkei 225 (NIKKEI) VaR (99% Confidence)")).toBeInTheDocument();
  });

  it("should show a dash when VaR is unavailable", () => {
    const base = buildReport();
    const report = buildReport({
      portfolio: { ...base.portfolio, metrics: { ...base.portfolio.metrics, valueAtRisk: null } },
    });

    render(<ValueAtRiskCard report={report} />);

    expect(screen.getByTestId("portfolio-var")).toHaveTextContent("-");
  });
});
