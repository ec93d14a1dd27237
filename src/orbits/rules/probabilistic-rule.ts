import type { Decimal } from "decimal.js";
import type { Step } from "../types";
import { affineHP, halveHP, isEvenHP } from "../hp-int";
import { HALVE_OP_ID } from "./affine-rule";
import type { RandomSource, Rule } from "./base";

/**
 * Randomized mix of 3v+1 and 3v+3.
 *
 * Each odd step draws once from the random source: a draw below p applies
 * 3v+1 (op "m3a1"), anything else 3v+3 (op "m3a3"). Halts at any value <= 3.
 */
export class ProbabilisticRule implements Rule {
  readonly name = "probabilistic";
  readonly description = "v → v/2 (even); odd v → 3v+1 with probability p, else 3v+3; halt at <= 3";
  readonly minStart = 1;
  readonly maxIterations?: number;
  readonly p: number;
  private readonly random: RandomSource;

  /**
   * @param p - Probability of taking 3v+1 on an odd step, in [0, 1]
   * @param random - Uniform source in [0, 1); defaults to Math.random
   * @param maxIterations - Optional cap on orbit length
   */
  constructor(p: number, random: RandomSource = Math.random, maxIterations?: number) {
    if (!(p >= 0 && p <= 1)) {
      throw new RangeError(`Probability must be in [0, 1], got ${p}`);
    }
    this.p = p;
    this.random = random;
    this.maxIterations = maxIterations;
  }

  isHalt(v: Decimal): boolean {
    return v.lessThanOrEqualTo(3);
  }

  isDecrease(v: Decimal): boolean {
    return isEvenHP(v);
  }

  isIncrease(v: Decimal): boolean {
    return !isEvenHP(v);
  }

  decrease(v: Decimal): Step {
    return { value: halveHP(v), opId: HALVE_OP_ID };
  }

  increase(v: Decimal): Step {
    if (this.random() < this.p) {
      return { value: affineHP(v, 3, 1), opId: "m3a1" };
    }
    return { value: affineHP(v, 3, 3), opId: "m3a3" };
  }
}
