import { describe, expect, it, vi } from "vitest";
import { createHP, hpToStd } from "../hp-int";
import { ProbabilisticRule } from "./probabilistic-rule";

describe("ProbabilisticRule", () => {
  it("should halt at any value <= 3", () => {
    const rule = new ProbabilisticRule(0.5);
    expect(rule.isHalt(createHP(1))).toBe(true);
    expect(rule.isHalt(createHP(3))).toBe(true);
    expect(rule.isHalt(createHP(4))).toBe(false);
  });

  it("should take 3v+1 when the draw is below p", () => {
    const rule = new ProbabilisticRule(0.5, () => 0.49);
    const step = rule.increase(createHP(7));
    expect(hpToStd(step.value)).toBe(22);
    expect(step.opId).toBe("m3a1");
  });

  it("should take 3v+3 when the draw is at or above p", () => {
    const rule = new ProbabilisticRule(0.5, () => 0.5);
    const step = rule.increase(createHP(7));
    expect(hpToStd(step.value)).toBe(24);
    expect(step.opId).toBe("m3a3");
  });

  it("should draw once per increase and never on decrease", () => {
    const random = vi.fn(() => 0.1);
    const rule = new ProbabilisticRule(0.5, random);

    rule.decrease(createHP(8));
    expect(random).not.toHaveBeenCalled();

    rule.increase(createHP(9));
    rule.increase(createHP(11));
    expect(random).toHaveBeenCalledTimes(2);
  });

  it("should always take 3v+3 when p is 0", () => {
    const rule = new ProbabilisticRule(0, () => 0);
    expect(rule.increase(createHP(5)).opId).toBe("m3a3");
  });

  it("should reject probabilities outside [0, 1]", () => {
    expect(() => new ProbabilisticRule(1.5)).toThrow(RangeError);
    expect(() => new ProbabilisticRule(Number.NaN)).toThrow(RangeError);
  });
});
