import { describe, it, expect } from "vitest";
import { pressedTransform, tradeButtonAppearance } from "./tradeButtons";
import { colors } from "../theme/colors";

describe("tradeButtonAppearance", () => {
  it("fills buy green and sell red", () => {
    const buy = tradeButtonAppearance("buy", { disabled: false, demoMode: false });
    expect(buy.label).toBe("BUY");
    expect(buy.icon).toBe("arrow.up.circle.fill");
    expect(buy.fill).toEqual([colors.buy, "rgba(22,163,74,0.8)"]);
    expect(buy.borderColor).toBe("transparent");

    const sell = tradeButtonAppearance("sell", { disabled: false, demoMode: false });
    expect(sell.label).toBe("SELL");
    expect(sell.icon).toBe("arrow.down.circle.fill");
    expect(sell.fill).toEqual([colors.sell, "rgba(239,68,68,0.8)"]);
  });

  it("grays out disabled buttons", () => {
    expect(tradeButtonAppearance("sell", { disabled: true, demoMode: false }).fill).toEqual([
      colors.neutral,
      colors.neutral,
    ]);
  });

  it("outlines buttons in demo mode", () => {
    expect(tradeButtonAppearance("buy", { disabled: false, demoMode: true }).borderColor).toBe(
      "rgba(249,115,22,0.5)",
    );
  });
});

describe("pressedTransform", () => {
  it("shrinks and fades while pressed", () => {
    expect(pressedTransform(true)).toEqual({ scale: 0.95, opacity: 0.8 });
    expect(pressedTransform(false)).toEqual({ scale: 1, opacity: 1 });
  });
});
