import type { StopCharPredicate } from "./stop.ts";
import { SCRIPT_TABLE_SIZE, classifySlot } from "./table.ts";

/**
 * CountVector defines an exported type contract.
 * One slot per predicate table entry, indexed by table position.
 */
export type CountVector = Uint32Array;

/**
 * ShardFold defines an exported structural contract.
 */
export interface ShardFold {
  counts: CountVector;
  /** Table slot that exceeded the threshold, or -1 when the shard ran to the end. */
  earlySlot: number;
  scanned: number;
}

/**
 * ShardReduction defines an exported structural contract.
 */
export interface ShardReduction {
  counts: CountVector;
  earlySlot: number;
}

/**
 * createCountVector executes a deterministic operation in this module.
 */
export function createCountVector(): CountVector {
  return new Uint32Array(SCRIPT_TABLE_SIZE);
}

/**
 * Cut a code point sequence into at most `shards` contiguous slices of
 * `ceil(n / shards)` code points. Empty input gives no slices.
 * Units: Unicode scalar values.
 */
export function splitShards(codePoints: Uint32Array, shards: number): Uint32Array[] {
  const out: Uint32Array[] = [];
  if (codePoints.length === 0) return out;
  const size = Math.ceil(codePoints.length / Math.max(1, shards));
  for (let start = 0; start < codePoints.length; start += size) {
    out.push(codePoints.subarray(start, start + size));
  }
  return out;
}

/**
 * Classify and count one shard, stopping as soon as a slot exceeds `half`.
 * Units: Unicode scalar values.
 */
export function foldShard(
  codePoints: Uint32Array,
  half: number,
  isStop: StopCharPredicate,
): ShardFold {
  const counts = createCountVector();
  let scanned = 0;
  for (const codePoint of codePoints) {
    scanned += 1;
    if (isStop(codePoint)) continue;
    const slot = classifySlot(codePoint);
    if (slot < 0) continue;
    const next = (counts[slot] ?? 0) + 1;
    counts[slot] = next;
    if (next > half) return { counts, earlySlot: slot, scanned };
  }
  return { counts, earlySlot: -1, scanned };
}

/**
 * Add `right` into `left` slot by slot. Returns the first slot, in table
 * order, whose sum exceeds `half`, or -1.
 */
export function combineCounts(left: CountVector, right: CountVector, half: number): number {
  let earlySlot = -1;
  for (let slot = 0; slot < left.length; slot += 1) {
    const sum = (left[slot] ?? 0) + (right[slot] ?? 0);
    left[slot] = sum;
    if (earlySlot < 0 && sum > half) earlySlot = slot;
  }
  return earlySlot;
}

/**
 * Merge shard vectors pairwise, adjacent pairs left to right, one tree level
 * at a time. Stops at the first combination with a slot above `half`.
 * The left vector of each pair receives the sum.
 */
export function reduceShards(vectors: readonly CountVector[], half: number): ShardReduction {
  let level = vectors.slice();
  if (level.length === 0) return { counts: createCountVector(), earlySlot: -1 };
  while (level.length > 1) {
    const next: CountVector[] = [];
    for (let index = 0; index < level.length; index += 2) {
      const left = level[index];
      const right = level[index + 1];
      if (!left) continue;
      if (!right) {
        next.push(left);
        continue;
      }
      const earlySlot = combineCounts(left, right, half);
      if (earlySlot >= 0) return { counts: left, earlySlot };
      next.push(left);
    }
    level = next;
  }
  return { counts: level[0] ?? createCountVector(), earlySlot: -1 };
}

/**
 * Slot with the highest count; ties go to the later slot. Returns -1 when
 * every slot is zero.
 */
export function pickMaximumSlot(counts: CountVector): number {
  let best = -1;
  let bestCount = 0;
  for (let slot = 0; slot < counts.length; slot += 1) {
    const count = counts[slot] ?? 0;
    if (count > 0 && count >= bestCount) {
      best = slot;
      bestCount = count;
    }
  }
  return best;
}
