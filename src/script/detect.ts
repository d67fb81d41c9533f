import { collectCodePoints } from "../core/codepoint.ts";
import { TallyscriptError } from "../core/error.ts";
import { normalizeInput } from "../core/input.ts";
import { createProvenance } from "../core/provenance.ts";
import type { AlgorithmInfo, Provenance, TextInput } from "../core/types.ts";
import { IMPLEMENTATION_ID } from "../core/version.ts";
import type { Script, ScriptName } from "./script.ts";
import { scriptName } from "./script.ts";
import type { StopCharPredicate } from "./stop.ts";
import { isStopChar } from "./stop.ts";
import { scriptAtSlot } from "./table.ts";
import type { CountVector } from "./tally.ts";
import { foldShard, pickMaximumSlot, reduceShards, splitShards } from "./tally.ts";

/**
 * DetectScriptOptions defines an exported structural contract.
 */
export interface DetectScriptOptions {
  /** Number of contiguous slices counted independently before merging. Defaults to 1. */
  shards?: number;
  /** Replaces the default ASCII stop-character test. */
  isStopChar?: StopCharPredicate;
}

/**
 * ScriptCount defines an exported structural contract.
 */
export interface ScriptCount {
  script: Script;
  name: ScriptName;
  count: number;
}

/**
 * How a detection was decided.
 * - "fold-majority": a shard's own count passed half of the input
 * - "merge-majority": a pairwise merge of shard counts passed half of the input
 * - "maximum": no majority; highest count after merging every shard
 * - "none": no character matched any script
 */
export type DetectionDecision = "fold-majority" | "merge-majority" | "maximum" | "none";

/**
 * ScriptDetection defines an exported structural contract.
 */
export interface ScriptDetection {
  script: Script | undefined;
  decidedBy: DetectionDecision;
  totalCodePoints: number;
  scannedCodePoints: number;
  half: number;
  shards: number;
  counts: ScriptCount[];
  provenance: Provenance;
}

interface NormalizedDetectOptions {
  shards: number;
  isStop: StopCharPredicate;
  customStopChar: boolean;
}

interface Decision {
  slot: number;
  decidedBy: DetectionDecision;
  counts: CountVector;
  scanned: number;
  shards: number;
}

const ALGORITHM: AlgorithmInfo = {
  name: "script-majority",
  standard: "Unicode block ranges, majority vote",
  revisionOrDate: "2026-10",
  implementationId: IMPLEMENTATION_ID,
};

function normalizeDetectOptions(options: DetectScriptOptions): NormalizedDetectOptions {
  const rawShards = options.shards ?? 1;
  if (!Number.isFinite(rawShards) || rawShards < 1) {
    throw new TallyscriptError("OPTIONS_INVALID_SHARDS", "shards must be a finite number >= 1", {
      shards: rawShards,
    });
  }
  return {
    shards: Math.floor(rawShards),
    isStop: options.isStopChar ?? isStopChar,
    customStopChar: options.isStopChar !== undefined,
  };
}

function decide(codePoints: Uint32Array, options: NormalizedDetectOptions): Decision {
  const half = Math.floor(codePoints.length / 2);
  const slices = splitShards(codePoints, options.shards);
  const vectors: CountVector[] = [];
  let scanned = 0;
  for (const slice of slices) {
    const fold = foldShard(slice, half, options.isStop);
    scanned += fold.scanned;
    if (fold.earlySlot >= 0) {
      return {
        slot: fold.earlySlot,
        decidedBy: "fold-majority",
        counts: fold.counts,
        scanned,
        shards: slices.length,
      };
    }
    vectors.push(fold.counts);
  }
  const reduction = reduceShards(vectors, half);
  if (reduction.earlySlot >= 0) {
    return {
      slot: reduction.earlySlot,
      decidedBy: "merge-majority",
      counts: reduction.counts,
      scanned,
      shards: slices.length,
    };
  }
  const slot = pickMaximumSlot(reduction.counts);
  return {
    slot,
    decidedBy: slot < 0 ? "none" : "maximum",
    counts: reduction.counts,
    scanned,
    shards: slices.length,
  };
}

function toScriptCounts(counts: CountVector): ScriptCount[] {
  const items: { slot: number; item: ScriptCount }[] = [];
  counts.forEach((count, slot) => {
    const script = scriptAtSlot(slot);
    if (count === 0 || script === undefined) return;
    items.push({ slot, item: { script, name: scriptName(script), count } });
  });
  items.sort((left, right) => right.item.count - left.item.count || left.slot - right.slot);
  return items.map((entry) => entry.item);
}

/**
 * Detect the dominant script of a text. Returns undefined when no character
 * belongs to a known script.
 * Units: Unicode scalar values.
 */
export function detectScript(
  input: TextInput,
  options: DetectScriptOptions = {},
): Script | undefined {
  const normalized = normalizeDetectOptions(options);
  const { text } = normalizeInput(input);
  return scriptAtSlot(decide(collectCodePoints(text), normalized).slot);
}

/**
 * Detect the dominant script and report how the decision was reached.
 * Units: Unicode scalar values.
 */
export function detectScriptReport(
  input: TextInput,
  options: DetectScriptOptions = {},
): ScriptDetection {
  const normalized = normalizeDetectOptions(options);
  const { text, inputType } = normalizeInput(input);
  const codePoints = collectCodePoints(text);
  const decision = decide(codePoints, normalized);
  return {
    script: scriptAtSlot(decision.slot),
    decidedBy: decision.decidedBy,
    totalCodePoints: codePoints.length,
    scannedCodePoints: decision.scanned,
    half: Math.floor(codePoints.length / 2),
    shards: decision.shards,
    counts: toScriptCounts(decision.counts),
    provenance: createProvenance(
      ALGORITHM,
      { shards: normalized.shards, customStopChar: normalized.customStopChar },
      {
        text: "utf16-code-unit",
        ...(inputType === "utf8" ? { byte: "utf8-byte" as const } : {}),
        codePoint: "unicode-code-point",
        script: "tallyscript-block-range",
      },
    ),
  };
}

/**
 * Count every classified character without stopping early. Scripts with a
 * zero count are omitted; order is by count, then table position.
 * Units: Unicode scalar values.
 */
export function countScripts(input: TextInput, options: DetectScriptOptions = {}): ScriptCount[] {
  const normalized = normalizeDetectOptions(options);
  const { text } = normalizeInput(input);
  const codePoints = collectCodePoints(text);
  const vectors = splitShards(codePoints, normalized.shards).map(
    (slice) => foldShard(slice, Number.POSITIVE_INFINITY, normalized.isStop).counts,
  );
  return toScriptCounts(reduceShards(vectors, Number.POSITIVE_INFINITY).counts);
}
