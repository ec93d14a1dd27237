// ABOUTME: Deterministic 3x+a rules: halve even values, map odd v to 3v+a
// ABOUTME: Covers m3a1 (classic Collatz), m3a3 and m3a5

import type { Decimal } from "decimal.js";
import type { Step } from "../types";
import { affineHP, halveHP, isEvenHP } from "../hp-int";
import type { Rule } from "./base";

export const HALVE_OP_ID = "d2";

export type AffineRuleOptions = {
  name: string;
  /** a in 3v+a */
  addend: number;
  /** Orbit halts on reaching exactly this value */
  haltValue: number;
  minStart: number;
  maxIterations?: number;
  description?: string;
};

/**
 * 3x+a rule family.
 *
 * For each value v:
 *   v even: v → v/2       (op "d2")
 *   v odd:  v → 3v + a    (op "m3a<a>")
 * until v equals the halting value.
 */
export class AffineRule implements Rule {
  readonly name: string;
  readonly description?: string;
  readonly minStart: number;
  readonly maxIterations?: number;
  readonly addend: number;
  readonly haltValue: number;
  readonly increaseOpId: string;

  constructor(options: AffineRuleOptions) {
    this.name = options.name;
    this.description = options.description;
    this.minStart = options.minStart;
    this.maxIterations = options.maxIterations;
    this.addend = options.addend;
    this.haltValue = options.haltValue;
    this.increaseOpId = `m3a${options.addend}`;
  }

  isHalt(v: Decimal): boolean {
    return v.equals(this.haltValue);
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
    return { value: affineHP(v, 3, this.addend), opId: this.increaseOpId };
  }
}

/**
 * Classic Collatz rule: 3v+1, halting at 1.
 */
export function createM3A1Rule(maxIterations?: number): AffineRule {
  return new AffineRule({
    name: "m3a1",
    addend: 1,
    haltValue: 1,
    minStart: 1,
    maxIterations,
    description: "Classic Collatz: v → v/2 (even), v → 3v+1 (odd), halt at 1",
  });
}

export function createM3A3Rule(maxIterations?: number): AffineRule {
  return new AffineRule({
    name: "m3a3",
    addend: 3,
    haltValue: 3,
    minStart: 3,
    maxIterations,
    description: "v → v/2 (even), v → 3v+3 (odd), halt at 3",
  });
}

/**
 * 3v+5 has cycles that never reach 5 (e.g. 19 → 62 → 31 → … → 38 → 19),
 * so this rule always carries an iteration cap.
 */
export function createM3A5Rule(maxIterations = 100): AffineRule {
  return new AffineRule({
    name: "m3a5",
    addend: 5,
    haltValue: 5,
    minStart: 5,
    maxIterations,
    description: "v → v/2 (even), v → 3v+5 (odd), halt at 5, capped",
  });
}
