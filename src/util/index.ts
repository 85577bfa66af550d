import type { Cell } from '../core/table/types.js';

/** Number of distinct non-missing values. */
export function countDistinct(values: readonly Cell[]): number {
  const seen = new Set<Cell>();
  for (const v of values) {
    if (v !== null) seen.add(v);
  }
  return seen.size;
}

/**
 * Number of values equal to an earlier value in the sequence.
 * Missing values compare equal to each other.
 */
export function countRepeats<T>(values: readonly T[]): number {
  const seen = new Set<T>();
  let repeats = 0;
  for (const v of values) {
    if (seen.has(v)) {
      repeats += 1;
    } else {
      seen.add(v);
    }
  }
  return repeats;
}

/** Share of `count` in `total`, or 0 for an empty denominator. */
export function share(count: number, total: number): number {
  return total === 0 ? 0 : count / total;
}
