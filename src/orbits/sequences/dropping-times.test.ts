import { describe, expect, it } from "vitest";
import { allowableDroppingTimes } from "./dropping-times";

describe("allowableDroppingTimes", () => {
  it("should produce the leading terms of A122437", () => {
    expect(allowableDroppingTimes(10, "m3a1")).toEqual([3, 6, 8, 11, 13, 16, 19, 21, 24, 26]);
  });

  it("should include the stopping time of 27", () => {
    expect(allowableDroppingTimes(200, "m3a1")).toContain(96);
  });

  it("should be strictly increasing", () => {
    const terms = allowableDroppingTimes(200, "m3a1");
    for (let i = 1; i < terms.length; i++) {
      expect(terms[i]).toBeGreaterThan(terms[i - 1]);
    }
  });

  it("should be identical across calls", () => {
    expect(allowableDroppingTimes(200, "m3a1")).toEqual(allowableDroppingTimes(200, "m3a1"));
  });

  it("should return nothing for other rules or zero terms", () => {
    expect(allowableDroppingTimes(10, "m3a5")).toEqual([]);
    expect(allowableDroppingTimes(0, "m3a1")).toEqual([]);
  });
});
