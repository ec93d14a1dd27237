// ABOUTME: Admissible-term generator (OEIS A100982 analogue)
// ABOUTME: Counts residue classes per allowable stopping time for the 3x+1 rule

import type { Decimal } from "decimal.js";
import { FULLY_SUPPORTED_RULES } from "../rules";
import { SequenceCapacityError } from "../errors";
import { hpFactoryForBits } from "../hp-int";

export const DEFAULT_SEQUENCE_LIMIT = 1000;

const LN2 = Math.log(2);
const LN3 = Math.log(3);

/**
 * Generate admissible terms (https://oeis.org/A100982).
 *
 * Works on two arrays x, y indexed 1..limit+1. Starting from x[1] = 1, each
 * outer step b = 2, 3, … does:
 *   y[c] = x[c] + x[c-1]          for c in [2, b+1]   (from the old x)
 *   x[c] = y[c]                   for c in [2, b+1]
 *   term += x[c], x[c] = 0        for c in [1, b+1] where (b+1-c)·ln3 < b·ln2
 * and emits the term when it is nonzero.
 *
 * Every cell is at most 2^b, so arithmetic runs at a precision sized from
 * `limit` and terms stay exact however far the limit is raised.
 *
 * Returns an empty list for rules other than m3a1.
 *
 * @param termCount - Number of terms to produce
 * @param ruleName - Name of the rule the terms are for
 * @param limit - Working-array size; 200 terms stop at b = 317 of the default 1000
 * @throws SequenceCapacityError if the arrays fill up before termCount terms exist
 */
export function admissibleTerms(termCount: number, ruleName: string, limit = DEFAULT_SEQUENCE_LIMIT): Decimal[] {
  const results: Decimal[] = [];
  if (!FULLY_SUPPORTED_RULES.includes(ruleName)) {
    return results;
  }

  const createTerm = hpFactoryForBits(limit + 1);
  const zero = createTerm(0);
  const x: Decimal[] = Array.from({ length: limit + 2 }, () => zero);
  const y: Decimal[] = Array.from({ length: limit + 2 }, () => zero);
  x[1] = createTerm(1);

  let b = 1;
  while (results.length < termCount) {
    b += 1;
    if (b + 1 > limit + 1) {
      throw new SequenceCapacityError(termCount, limit, results.length);
    }

    for (let c = 2; c <= b + 1; c++) {
      y[c] = x[c].plus(x[c - 1]);
    }
    for (let c = 2; c <= b + 1; c++) {
      x[c] = y[c];
    }

    let term = zero;
    for (let c = 1; c <= b + 1; c++) {
      if ((b + 1 - c) * LN3 < b * LN2) {
        term = term.plus(x[c]);
        x[c] = zero;
      }
    }

    if (!term.isZero()) {
      results.push(term);
    }
  }

  return results;
}
