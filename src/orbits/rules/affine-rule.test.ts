import { describe, expect, it } from "vitest";
import { createHP, hpToStd } from "../hp-int";
import { AffineRule, createM3A1Rule, createM3A3Rule, createM3A5Rule } from "./affine-rule";

describe("AffineRule", () => {
  describe("m3a1", () => {
    const rule = createM3A1Rule();

    it("should have classic metadata", () => {
      expect(rule.name).toBe("m3a1");
      expect(rule.minStart).toBe(1);
      expect(rule.maxIterations).toBeUndefined();
    });

    it("should halt only at 1", () => {
      expect(rule.isHalt(createHP(1))).toBe(true);
      expect(rule.isHalt(createHP(2))).toBe(false);
    });

    it("should select exactly one transform per value", () => {
      for (const v of [2, 3, 10, 27]) {
        const value = createHP(v);
        expect(rule.isDecrease(value)).not.toBe(rule.isIncrease(value));
      }
    });

    it("should halve even values with op d2", () => {
      const step = rule.decrease(createHP(10));
      expect(hpToStd(step.value)).toBe(5);
      expect(step.opId).toBe("d2");
    });

    it("should map odd values to 3v+1 with op m3a1", () => {
      const step = rule.increase(createHP(5));
      expect(hpToStd(step.value)).toBe(16);
      expect(step.opId).toBe("m3a1");
    });
  });

  describe("m3a3", () => {
    const rule = createM3A3Rule();

    it("should halt at 3 and start at 3", () => {
      expect(rule.minStart).toBe(3);
      expect(rule.isHalt(createHP(3))).toBe(true);
      expect(rule.isHalt(createHP(1))).toBe(false);
    });

    it("should map odd values to 3v+3 with op m3a3", () => {
      const step = rule.increase(createHP(5));
      expect(hpToStd(step.value)).toBe(18);
      expect(step.opId).toBe("m3a3");
    });
  });

  describe("m3a5", () => {
    it("should carry a default cap of 100", () => {
      expect(createM3A5Rule().maxIterations).toBe(100);
    });

    it("should accept a custom cap", () => {
      expect(createM3A5Rule(5).maxIterations).toBe(5);
    });

    it("should map odd values to 3v+5 with op m3a5", () => {
      const step = createM3A5Rule().increase(createHP(7));
      expect(hpToStd(step.value)).toBe(26);
      expect(step.opId).toBe("m3a5");
    });
  });

  it("should derive the increase op id from the addend", () => {
    const rule = new AffineRule({ name: "m3a7", addend: 7, haltValue: 7, minStart: 7 });
    expect(rule.increaseOpId).toBe("m3a7");
    expect(hpToStd(rule.increase(createHP(1)).value)).toBe(10);
  });
});
