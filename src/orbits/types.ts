// ABOUTME: Data types shared by the orbit simulator, batch driver and consumers
// ABOUTME: Orbit values are exact integers held in decimal.js instances

import type { Decimal } from "decimal.js";

/** Symbolic identifier of a transform, e.g. "d2" or "m3a1". */
export type OpId = string;

/** Tally of operation identifiers. */
export type OpCounts = Record<OpId, number>;

/** Result of applying one transform. */
export type Step = {
  value: Decimal;
  opId: OpId;
};

/**
 * Terminal state of a simulation.
 * "halted": the rule's halting predicate fired.
 * "capped": the orbit reached the rule's maxIterations first.
 */
export type OrbitStatus = "halted" | "capped";

/**
 * Classification address assigned at first-drop time.
 */
export type Classification = {
  /** Wheel slot, 1-indexed */
  stopMod: number;
  /** Ordinal within (first drop length, stopMod) */
  stopIndex: number;
};

/**
 * Immutable result of simulating one starting value.
 */
export type OrbitRecord = {
  readonly start: number;
  /** Steps until the value first became <= start, or null if it never did */
  readonly firstDropLength: number | null;
  /** Values from start up to, excluding, the first value <= start */
  readonly firstOrbit: readonly Decimal[] | null;
  /** Every value visited, start through the halting value (or the cap) */
  readonly totalOrbit: readonly Decimal[];
  readonly stopMod: number | null;
  readonly stopIndex: number | null;
  readonly firstOpIds: readonly OpId[];
  readonly firstOpCounts: Readonly<OpCounts>;
  readonly totalOpIds: readonly OpId[];
  readonly totalOpCounts: Readonly<OpCounts>;
  readonly status: OrbitStatus;
};
