import { describe, it, expect, vi } from "vitest";
import { appTabs, clampIndex, illustrationSamples } from "./previews";

describe("illustrationSamples", () => {
  it("covers the five empty states in picker order", () => {
    expect(illustrationSamples.map((s) => s.name)).toEqual(["Chart", "P&L", "Trades", "Strategies", "AI Signal"]);
    expect(illustrationSamples.map((s) => s.content(() => {}).icon)).toEqual([
      "chart.line.uptrend.xyaxis",
      "dollarsign.circle",
      "list.bullet.rectangle",
      "brain.head.profile",
      "antenna.radiowaves.left.and.right",
    ]);
  });

  it("wires the P&L action to the notice callback", () => {
    const onAction = vi.fn();
    const content = illustrationSamples[1].content(onAction);
    expect(content.action?.title).toBe("Start Trading");
    content.action?.onPress();
    expect(onAction).toHaveBeenCalledWith("Start Trading tapped");
  });

  it("has no action on the other samples", () => {
    const withAction = illustrationSamples.filter((s) => s.content(() => {}).action);
    expect(withAction.map((s) => s.name)).toEqual(["P&L"]);
  });
});

describe("clampIndex", () => {
  it("keeps the index inside the list", () => {
    expect(clampIndex(2, 5)).toBe(2);
    expect(clampIndex(-1, 5)).toBe(0);
    expect(clampIndex(9, 5)).toBe(4);
    expect(clampIndex(1.7, 5)).toBe(1);
    expect(clampIndex(Number.NaN, 5)).toBe(0);
    expect(clampIndex(3, 0)).toBe(0);
  });
});

describe("appTabs", () => {
  it("maps each tab to its icon", () => {
    expect(appTabs.map((t) => [t.title, t.icon])).toEqual([
      ["Dashboard", "chart.line.uptrend.xyaxis"],
      ["Trades", "list.bullet.rectangle"],
      ["P&L", "dollarsign.circle"],
      ["Strategies", "brain"],
      ["Settings", "gearshape"],
    ]);
  });
});
