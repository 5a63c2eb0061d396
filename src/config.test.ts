import { describe, it, expect } from "vitest";
import { parseFlag } from "./config";

describe("parseFlag", () => {
  it("accepts common truthy spellings", () => {
    for (const raw of ["1", "true", "TRUE", " yes ", "on"]) {
      expect(parseFlag(raw)).toBe(true);
    }
  });

  it("treats everything else as off", () => {
    for (const raw of [undefined, "", "0", "false", "off", "enabled"]) {
      expect(parseFlag(raw)).toBe(false);
    }
  });
});
