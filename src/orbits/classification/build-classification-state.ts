import { config } from "@/lib/config";
import { admissibleTerms } from "../sequences/admissible";
import { allowableDroppingTimes } from "../sequences/dropping-times";
import { ClassificationState } from "./classification-state";

export type BuildStateOptions = {
  /** Terms taken from each auxiliary sequence */
  termCount?: number;
  /** Working-array size of the admissible-term generator */
  limit?: number;
};

/**
 * Build a fresh classification state for a rule.
 *
 * Pairs the i-th allowable dropping time with the i-th admissible term on top
 * of the seeded base entries. Rules without auxiliary sequences get the seed only.
 */
export function buildClassificationState(ruleName: string, options: BuildStateOptions = {}): ClassificationState {
  const termCount = options.termCount ?? config.termCount;
  const limit = options.limit ?? config.sequenceLimit;

  const admissible = admissibleTerms(termCount, ruleName, limit);
  const droppingTimes = allowableDroppingTimes(termCount, ruleName);

  const state = ClassificationState.seeded();
  droppingTimes.forEach((length, i) => {
    state.register(length, admissible[i]);
  });
  return state;
}
