import type { Decimal } from "decimal.js";
import type { ClassificationState } from "./classification/classification-state";
import { ClassificationLookupError, RuleInvariantError } from "./errors";
import { createHP } from "./hp-int";
import type { Rule } from "./rules/base";
import { isClassificationEligible } from "./rules";
import type { OpCounts, OpId, OrbitRecord, OrbitStatus, Step } from "./types";

/**
 * Fixed records for the minimal starting values, where "first value <= start"
 * degenerates: m3a1 at 1 and m3a3 at 3 both run n → 4n → 2n.
 */
const SHORTCUTS: Record<string, { start: number; increaseOpId: OpId }> = {
  m3a1: { start: 1, increaseOpId: "m3a1" },
  m3a3: { start: 3, increaseOpId: "m3a3" },
};

function shortcutRecord(start: number, increaseOpId: OpId): OrbitRecord {
  const n = createHP(start);
  return {
    start,
    firstDropLength: 1,
    firstOrbit: [n],
    totalOrbit: [n, n.times(4), n.times(2)],
    stopMod: 1,
    stopIndex: 1,
    firstOpIds: [increaseOpId],
    firstOpCounts: { [increaseOpId]: 1 },
    totalOpIds: [increaseOpId, "d2"],
    totalOpCounts: { [increaseOpId]: 1, d2: 1 },
    status: "halted",
  };
}

function tally(counts: OpCounts, opId: OpId): void {
  counts[opId] = (counts[opId] ?? 0) + 1;
}

function applyStep(rule: Rule, v: Decimal): Step {
  if (rule.isDecrease(v)) {
    return rule.decrease(v);
  }
  if (rule.isIncrease(v)) {
    return rule.increase(v);
  }
  throw new RuleInvariantError(rule.name, v.toString());
}

/**
 * Simulate one orbit and classify its first drop.
 *
 * Applies the rule from `start` until isHalt fires (status "halted") or the
 * orbit holds rule.maxIterations values (status "capped"). The first time a
 * value <= start appears, the orbit so far becomes `firstOrbit` and, for
 * classification-eligible rules with a state, the state assigns the orbit its
 * wheel slot and ordinal. That happens at most once per orbit.
 *
 * Determinism: output depends only on `start` and the state's contents,
 * except for rules that draw random numbers.
 *
 * @param start - Starting value, a safe integer >= rule.minStart
 * @param rule - Rule to iterate
 * @param state - Classification state to read and mutate; omit to skip classification
 * @throws ClassificationLookupError if the first drop length has no lookup entry
 * @throws RuleInvariantError if a non-halting value has no applicable transform
 */
export function simulateOrbit(start: number, rule: Rule, state?: ClassificationState): OrbitRecord {
  if (!Number.isSafeInteger(start) || start < rule.minStart) {
    throw new RangeError(`Start ${start} must be an integer >= ${rule.minStart} for rule ${rule.name}`);
  }

  const shortcut = SHORTCUTS[rule.name];
  if (shortcut && shortcut.start === start) {
    return shortcutRecord(start, shortcut.increaseOpId);
  }

  const classifier = isClassificationEligible(rule) ? state : undefined;
  const origin = createHP(start);
  const orbit: Decimal[] = [origin];

  let current = origin;
  let status: OrbitStatus = "halted";
  let firstOrbit: Decimal[] | null = null;
  let firstDropLength: number | null = null;
  let stopMod: number | null = null;
  let stopIndex: number | null = null;

  const firstOpIds: OpId[] = [];
  const firstOpCounts: OpCounts = {};
  const totalOpIds: OpId[] = [];
  const totalOpCounts: OpCounts = {};

  while (!rule.isHalt(current)) {
    if (rule.maxIterations !== undefined && orbit.length >= rule.maxIterations) {
      status = "capped";
      break;
    }

    const step = applyStep(rule, current);
    current = step.value;

    totalOpIds.push(step.opId);
    tally(totalOpCounts, step.opId);
    if (firstDropLength === null) {
      firstOpIds.push(step.opId);
      tally(firstOpCounts, step.opId);
    }

    if (firstDropLength === null && current.lessThanOrEqualTo(origin)) {
      firstOrbit = orbit.slice();
      firstDropLength = firstOrbit.length;

      if (classifier) {
        try {
          ({ stopMod, stopIndex } = classifier.classify(firstDropLength));
        } catch (error) {
          if (error instanceof ClassificationLookupError) {
            throw new ClassificationLookupError(error.firstDropLength, start, { cause: error });
          }
          throw error;
        }
      }
    }

    orbit.push(current);
  }

  return {
    start,
    firstDropLength,
    firstOrbit,
    totalOrbit: orbit,
    stopMod,
    stopIndex,
    firstOpIds,
    firstOpCounts,
    totalOpIds,
    totalOpCounts,
    status,
  };
}
