import { describe, it, expect } from "vitest";
import { fixed, formatDateTime, formatTime, formatVolume, signed } from "./format";

describe("format", () => {
  it("fixes decimals and guards non-finite values", () => {
    expect(fixed(3.14159)).toBe("3.14");
    expect(fixed(2, 0)).toBe("2");
    expect(fixed(Number.NaN)).toBe("—");
  });

  it("always signs", () => {
    expect(signed(0)).toBe("+0.00");
    expect(signed(12.345, 1)).toBe("+12.3");
    expect(signed(-0.5)).toBe("-0.50");
  });

  it("compacts volume at the thousand and million thresholds", () => {
    expect(formatVolume(999)).toBe("999");
    expect(formatVolume(1000)).toBe("1.0K");
    expect(formatVolume(999_999)).toBe("1000.0K");
    expect(formatVolume(1_000_000)).toBe("1.0M");
  });

  it("formats local wall-clock time", () => {
    const d = new Date(2023, 11, 31, 7, 5);
    expect(formatTime(d)).toBe("07:05");
    expect(formatDateTime(d)).toBe("12/31/23 07:05");
    expect(formatTime(d.getTime())).toBe("07:05");
  });
});
