type Comparable = string | number | bigint | boolean;

/**
 * Count the elements present in every list.
 *
 * @returns Size of the intersection; 0 when no lists are given
 */
export function countCommonElements<T extends Comparable>(...lists: ReadonlyArray<readonly T[]>): number {
  if (lists.length === 0) {
    return 0;
  }

  let common = new Set(lists[0]);
  for (const list of lists.slice(1)) {
    const members = new Set(list);
    common = new Set([...common].filter((item) => members.has(item)));
  }
  return common.size;
}

/**
 * Count the positions at which every list holds the same element.
 *
 * @returns Number of matching indexes; 0 when no lists are given
 * @throws RangeError if the lists differ in length
 */
export function countMatchingIndexes<T extends Comparable>(...lists: ReadonlyArray<readonly T[]>): number {
  if (lists.length === 0) {
    return 0;
  }

  const length = lists[0].length;
  if (lists.some((list) => list.length !== length)) {
    throw new RangeError("All lists must have the same length.");
  }

  let count = 0;
  for (let i = 0; i < length; i++) {
    if (lists.every((list) => list[i] === lists[0][i])) {
      count++;
    }
  }
  return count;
}
