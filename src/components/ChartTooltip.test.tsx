import { describe, it, expect } from "vitest";
import { render, screen } from "@testing-library/react";
import { ChartTooltip } from "./ChartTooltip";
import { priceTooltip } from "../lib/tooltips";

const data = priceTooltip(45000, new Date(2024, 0, 5, 14, 30), -120);

describe("ChartTooltip", () => {
  it("renders nothing while hidden", () => {
    const { container } = render(<ChartTooltip data={data} position={{ x: 0, y: 0 }} visible={false} />);
    expect(container.textContent).toBe("");
  });

  it("shows the title and each row", () => {
    render(<ChartTooltip data={data} position={{ x: 10, y: 20 }} visible />);
    expect(screen.getByText("Price Data")).toBeTruthy();
    expect(screen.getByText("14:30")).toBeTruthy();
    expect(screen.getByText("45000.00")).toBeTruthy();
    expect(screen.getByText("-120.00")).toBeTruthy();
  });
});
