import { describe, it, expect, vi } from "vitest";
import { render, screen } from "@testing-library/react";
import { ChartLegend } from "./ChartLegend";
import { getLegend, legendOrEmpty } from "../lib/legends";

describe("ChartLegend", () => {
  it("renders the title and every label", () => {
    render(<ChartLegend legend={getLegend("candlestick")} />);
    expect(screen.getByText("Chart Legend")).toBeTruthy();
    for (const label of ["Bullish Candle", "Bearish Candle", "Volume", "Price Range"]) {
      expect(screen.getByText(label)).toBeTruthy();
    }
  });

  it("draws dots for colors and glyphs for icons", () => {
    render(<ChartLegend legend={getLegend("price")} />);
    expect(screen.getAllByTestId(/^legend-dot-/)).toHaveLength(1);
    expect(screen.getAllByTestId(/^legend-icon-/)).toHaveLength(3);
  });

  it("renders the fallback for an unknown chart kind as an empty card", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { container } = render(<ChartLegend legend={legendOrEmpty("heatmap")} />);
    expect(container.textContent).toBe("");
    expect(screen.queryAllByTestId(/^legend-/)).toHaveLength(0);
  });
});
