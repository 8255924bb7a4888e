/**
 * Tests for OptionSelect component
 */

import { describe, it, expect, vi } from "vitest";
import { render, screen } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { OptionSelect, type SelectOption } from "@/components/common/OptionSelect";

const periods: SelectOption<string>[] = [
  { value: "1mo", label: "1 month" },
  { value: "3mo", label: "3 months" },
  { value: "1y", label: "1 year" },
];

describe("OptionSelect", () => {
  it("should show the label and the selected option", () => {
    render(
      <OptionSelect label="Lookback Period" value="3mo" options={periods} onChange={vi.fn()} />
    );

    expect(screen.getByText("Lookback Period")).toBeInTheDocument();
    expect(screen.getByRole("button")).toHaveTextContent("3 months");
  });

  it("should call onChange when selection changes", async () => {
    const user = userEvent.setup();
    const onChange = vi.fn();

    render(
      <OptionSelect
        label="Lookback Period"
        value="3mo"
        options={periods}
        onChange={onChange}
        testId="period-select"
      />
    );

    await user.click(screen.getByTestId("period-select"));
    await user.click(screen.getByRole("option", { name: "1 year" }));

    expect(onChange).toHaveBeenCalledWith("1y");
  });

  it("should pass numeric values through", async () => {
    const user = userEvent.setup();
    const onChange = vi.fn();

    render(
      <OptionSelect
        label="VaR Confidence"
        value={95}
        options={[
          { value: 90, label: "90%" },
          { value: 95, label: "95%" },
          { value: 99, label: "99%" },
        ]}
        onChange={onChange}
      />
    );

    await user.click(screen.getByRole("button"));
    await user.click(screen.getByRole("option", { name: "99%" }));

    expect(onChange).toHaveBeenCalledWith(99);
  });

  it("should be disabled when disabled prop is true", () => {
    render(
      <OptionSelect
        label="Lookback Period"
        value="3mo"
        options={periods}
        onChange={vi.fn()}
        disabled={true}
      />
    );

    expect(screen.getByRole("button")).toBeDisabled();
  });
});
