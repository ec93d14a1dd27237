import { FULLY_SUPPORTED_RULES } from "../rules";

/**
 * Allowable dropping times (https://oeis.org/A122437, from its second term).
 *
 * Term k (1-indexed) = floor(1 + k + k·ln3/ln2), computed in floating point
 * so the first 200 terms match the reference sequence exactly.
 *
 * Returns an empty list for rules other than m3a1.
 */
export function allowableDroppingTimes(termCount: number, ruleName: string): number[] {
  const results: number[] = [];
  if (!FULLY_SUPPORTED_RULES.includes(ruleName)) {
    return results;
  }

  for (let k = 1; k <= termCount; k++) {
    results.push(Math.floor(1 + k + (k * Math.log(3)) / Math.log(2)));
  }
  return results;
}
