import type { Decimal } from "decimal.js";
import type { Step } from "../types";

/**
 * Source of uniform draws in [0, 1).
 * Injected into randomized rules so tests can script the draws.
 */
export type RandomSource = () => number;

/**
 * Interface that every orbit rule must implement.
 * The simulator only talks to rules through this interface, so new rule
 * families plug in without touching the loop.
 */
export interface Rule {
  /** Identifier (e.g., "m3a1"); gates classification */
  readonly name: string;

  /** Optional description of the rule */
  readonly description?: string;

  /** Smallest starting value the rule is defined for */
  readonly minStart: number;

  /**
   * Optional cap on orbit length, start value included.
   * When reached before halting, the simulation stops without error.
   */
  readonly maxIterations?: number;

  isHalt(v: Decimal): boolean;

  /** Checked before isIncrease; exactly one of the two holds for non-halting values */
  isDecrease(v: Decimal): boolean;

  isIncrease(v: Decimal): boolean;

  decrease(v: Decimal): Step;

  increase(v: Decimal): Step;
}
