/**
 * RangeSet defines an exported type contract.
 * Flat inclusive `[start, end]` pairs, sorted by start, non-overlapping.
 */
export type RangeSet = Int32Array;

/**
 * Build a range set from inclusive pairs. A single code point is
 * written as a one-element tuple.
 * Units: Unicode scalar values.
 */
export function rangeSet(
  ranges: readonly (readonly [number] | readonly [number, number])[],
): RangeSet {
  const table = new Int32Array(ranges.length * 2);
  ranges.forEach((range, index) => {
    const start = range[0];
    table[index * 2] = start;
    table[index * 2 + 1] = range.length === 2 ? range[1] : start;
  });
  return table;
}

/**
 * Whether a Unicode scalar value falls inside any range of the set.
 * Units: Unicode scalar values.
 */
export function rangeSetHas(table: RangeSet, codePoint: number): boolean {
  let lo = 0;
  let hi = table.length / 2 - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const base = mid * 2;
    const start = table[base] ?? 0;
    const end = table[base + 1] ?? 0;
    if (codePoint < start) {
      hi = mid - 1;
    } else if (codePoint > end) {
      lo = mid + 1;
    } else {
      return true;
    }
  }
  return false;
}

/**
 * Number of code points covered by a range set.
 * Units: Unicode scalar values.
 */
export function rangeSetSize(table: RangeSet): number {
  let size = 0;
  for (let base = 0; base < table.length; base += 2) {
    size += (table[base + 1] ?? 0) - (table[base] ?? 0) + 1;
  }
  return size;
}
