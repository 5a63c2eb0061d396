import { describe, it, expect } from "vitest";
import { emptyState, emptyStateAccessibilityLabel } from "./emptyStates";

describe("emptyState", () => {
  it("uses preset copy by default", () => {
    expect(emptyState("chart")).toEqual({
      icon: "chart.line.uptrend.xyaxis",
      title: "No Chart Data",
      description: "Market data is loading or unavailable",
      action: undefined,
    });
    expect(emptyState("strategies").icon).toBe("brain.head.profile");
  });

  it("applies overrides but keeps the preset icon", () => {
    const onPress = () => {};
    const content = emptyState("pnl", { title: "Nothing yet", action: { title: "Get Started", onPress } });
    expect(content.icon).toBe("dollarsign.circle");
    expect(content.title).toBe("Nothing yet");
    expect(content.description).toBe("Start trading to see performance here");
    expect(content.action).toEqual({ title: "Get Started", onPress });
  });

  it("joins title and description for screen readers", () => {
    expect(emptyStateAccessibilityLabel(emptyState("trades"))).toBe(
      "No Trades Yet. Start trading to see performance here",
    );
  });
});
