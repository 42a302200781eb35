/**
 * Utility functions for generating collision-free IDs
 */

/**
 * Append a numeric suffix to a base id
 * @example
 * suffixedId('Q1', 2) // returns 'Q1_2'
 */
export function suffixedId(base: string, n: number): string {
  return `${base}_${n}`;
}

/**
 * Find the smallest positive suffix that gives an id not yet taken
 * @param base - Id that collided
 * @param isTaken - Predicate over candidate ids
 * @example
 * nextAvailableId('Q1', id => ['Q1', 'Q1_1'].includes(id)) // returns 'Q1_2'
 */
export function nextAvailableId(base: string, isTaken: (id: string) => boolean): string {
  let n = 1;
  while (isTaken(suffixedId(base, n))) {
    n++;
  }
  return suffixedId(base, n);
}
