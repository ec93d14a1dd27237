import type { Decimal } from "decimal.js";
import type { Classification } from "../types";
import { ClassificationLookupError } from "../errors";
import { createHP } from "../hp-int";

/**
 * Key of the legacy base entry in the index map.
 * Never produced by indexKey(), so it takes no part in classification.
 */
export const LEGACY_INDEX_SEED_KEY = "1";

/**
 * Composite index key for (first drop length, wheel slot).
 */
export function indexKey(firstDropLength: number, slot: number): string {
  return `${firstDropLength}-${slot}`;
}

/**
 * Lookup, wheel and index maps for first-drop classification.
 *
 * - lookup: first drop length → number of wheel slots admissible for it
 * - wheel:  first drop length → next slot to hand out (1-indexed, wraps)
 * - index:  "length-slot" → orbits assigned to that slot so far
 *
 * One instance belongs to one batch. classify() mutates it in place, so it
 * must not be shared between batches.
 *
 * Usage:
 * ```typescript
 * const state = ClassificationState.seeded();
 * state.register(3, createHP(1));
 * const { stopMod, stopIndex } = state.classify(3);
 * ```
 */
export class ClassificationState {
  readonly lookup = new Map<number, Decimal>();
  readonly wheel = new Map<number, number>();
  readonly index = new Map<string, number>();

  /**
   * State holding only the base entries for the trivial length-1 drop:
   * lookup[1] = 1, wheel[1] = 1, and the legacy index entry.
   */
  static seeded(): ClassificationState {
    const state = new ClassificationState();
    state.lookup.set(1, createHP(1));
    state.wheel.set(1, 1);
    state.index.set(LEGACY_INDEX_SEED_KEY, 1);
    return state;
  }

  /**
   * Make a first drop length classifiable with the given slot magnitude.
   */
  register(firstDropLength: number, magnitude: Decimal): void {
    this.lookup.set(firstDropLength, magnitude);
    this.wheel.set(firstDropLength, 1);
    this.index.set(indexKey(firstDropLength, 1), 0);
  }

  has(firstDropLength: number): boolean {
    return this.lookup.has(firstDropLength);
  }

  /**
   * Assign the next wheel slot and its ordinal to an orbit with this first drop length.
   *
   * The slot wraps back to 1 once it exceeds lookup[length].
   *
   * @throws ClassificationLookupError if the length is not in the lookup
   */
  classify(firstDropLength: number): Classification {
    const magnitude = this.lookup.get(firstDropLength);
    if (magnitude === undefined) {
      throw new ClassificationLookupError(firstDropLength);
    }

    let slot = this.wheel.get(firstDropLength) ?? 1;
    if (magnitude.lessThan(slot)) {
      slot = 1;
    }
    this.wheel.set(firstDropLength, slot + 1);

    const key = indexKey(firstDropLength, slot);
    const stopIndex = (this.index.get(key) ?? 0) + 1;
    this.index.set(key, stopIndex);

    return { stopMod: slot, stopIndex };
  }
}
