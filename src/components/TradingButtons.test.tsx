import { describe, it, expect, vi } from "vitest";
import { fireEvent, render, screen } from "@testing-library/react";
import { BuyButton, SellButton } from "./TradingButtons";

describe("TradingButtons", () => {
  it("labels each side", () => {
    render(
      <>
        <BuyButton disabled={false} demoMode={false} onPress={() => {}} />
        <SellButton disabled={false} demoMode onPress={() => {}} />
      </>,
    );
    expect(screen.getByText("BUY")).toBeTruthy();
    expect(screen.getByText("SELL")).toBeTruthy();
  });

  it("invokes the action when pressed", () => {
    const onPress = vi.fn();
    render(<BuyButton disabled={false} demoMode={false} onPress={onPress} />);
    fireEvent.click(screen.getByText("BUY"));
    expect(onPress).toHaveBeenCalledTimes(1);
  });

  it("ignores presses while disabled", () => {
    const onPress = vi.fn();
    render(<SellButton disabled demoMode={false} onPress={onPress} />);
    fireEvent.click(screen.getByText("SELL"));
    expect(onPress).not.toHaveBeenCalled();
  });
});
