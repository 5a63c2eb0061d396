import { describe, it, expect } from "vitest";
import { fireEvent, render, screen } from "@testing-library/react";
import { EmptyStatePreviewScreen } from "./EmptyStatePreviewScreen";

describe("EmptyStatePreviewScreen", () => {
  it("starts on the chart illustration", () => {
    render(<EmptyStatePreviewScreen />);
    expect(screen.getByText("Current: Chart")).toBeTruthy();
    expect(screen.getByText("Icon: chart.line.uptrend.xyaxis")).toBeTruthy();
    expect(screen.getByText("No Chart Data")).toBeTruthy();
  });

  it("switches illustration from the picker", () => {
    render(<EmptyStatePreviewScreen />);
    fireEvent.click(screen.getByText("Trades"));
    expect(screen.getByText("Current: Trades")).toBeTruthy();
    expect(screen.getByText("No Trades Yet")).toBeTruthy();
  });

  it("clamps an out-of-range starting index", () => {
    render(<EmptyStatePreviewScreen initialIndex={42} />);
    expect(screen.getByText("Current: AI Signal")).toBeTruthy();
  });

  it("reports the P&L action", () => {
    render(<EmptyStatePreviewScreen initialIndex={1} />);
    fireEvent.click(screen.getByText("Start Trading"));
    expect(screen.getByText("Start Trading tapped")).toBeTruthy();
  });
});
