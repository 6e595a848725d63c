/**
 * Minimum excluded value: the smallest non-negative integer not in `values`.
 *
 * Input order and duplicates do not affect the result. `mex([]) === 0`.
 */
export function mex(values: Iterable<number>): number {
  const sorted = Array.from(new Set(values)).sort((a, b) => a - b);

  let expected = 0;
  for (const value of sorted) {
    if (value === expected) {
      expected += 1;
    } else if (value > expected) {
      return expected;
    }
  }
  return expected;
}
