import type { RangeSet } from "../unicode/lookup.ts";
import { rangeSetHas } from "../unicode/lookup.ts";
import { scriptRanges } from "./ranges.ts";
import { Script, scriptName } from "./script.ts";

/**
 * ScriptTableEntry defines an exported structural contract.
 */
export interface ScriptTableEntry {
  readonly script: Script;
  readonly ranges: RangeSet;
}

// Order matters: a code point claimed by several entries goes to the first,
// and count ties go to the last.
const TABLE_ORDER: readonly Script[] = [
  Script.Latin,
  Script.Cyrillic,
  Script.Arabic,
  Script.Mandarin,
  Script.Devanagari,
  Script.Hebrew,
  Script.Ethiopic,
  Script.Georgian,
  Script.Bengali,
  Script.Hangul,
  Script.Hiragana,
  Script.Katakana,
  Script.Greek,
  Script.Kannada,
  Script.Tamil,
  Script.Thai,
  Script.Gujarati,
  Script.Gurmukhi,
  Script.Telugu,
  Script.Malayalam,
  Script.Oriya,
  Script.Myanmar,
  Script.Sinhala,
  Script.Khmer,
];

/**
 * SCRIPT_TABLE is an exported constant used by public APIs.
 */
export const SCRIPT_TABLE: readonly ScriptTableEntry[] = Object.freeze(
  TABLE_ORDER.map((script) => Object.freeze({ script, ranges: scriptRanges(script) })),
);

/**
 * SCRIPT_TABLE_SIZE is an exported constant used by public APIs.
 */
export const SCRIPT_TABLE_SIZE: number = SCRIPT_TABLE.length;

const SLOT_BY_SCRIPT = new Int8Array(SCRIPT_TABLE_SIZE);
SCRIPT_TABLE.forEach((entry, slot) => {
  SLOT_BY_SCRIPT[entry.script] = slot;
});

/**
 * Position of a script in the predicate table.
 */
export function tableSlotOf(script: Script): number {
  return SLOT_BY_SCRIPT[script] ?? -1;
}

/**
 * Script stored at a predicate table position.
 */
export function scriptAtSlot(slot: number): Script | undefined {
  return SCRIPT_TABLE[slot]?.script;
}

/**
 * Whether a Unicode scalar value belongs to a script.
 * Units: Unicode scalar values.
 */
export function isScriptCodePoint(script: Script, codePoint: number): boolean {
  return rangeSetHas(scriptRanges(script), codePoint);
}

/**
 * Table position of the first script matching a Unicode scalar value, or -1.
 * Units: Unicode scalar values.
 */
export function classifySlot(codePoint: number): number {
  for (let slot = 0; slot < SCRIPT_TABLE_SIZE; slot += 1) {
    const entry = SCRIPT_TABLE[slot];
    if (entry && rangeSetHas(entry.ranges, codePoint)) return slot;
  }
  return -1;
}

/**
 * First script in table order matching a Unicode scalar value.
 * Units: Unicode scalar values.
 */
export function classifyCodePoint(codePoint: number): Script | undefined {
  return scriptAtSlot(classifySlot(codePoint));
}

/**
 * Script for a Unicode scalar value.
 * Units: Unicode scalar values.
 */
export function scriptAt(codePoint: number): Script | undefined {
  return classifyCodePoint(codePoint);
}

/**
 * Script name for a Unicode scalar value.
 * Units: Unicode scalar values.
 */
export function scriptNameAt(codePoint: number): string {
  const script = classifyCodePoint(codePoint);
  return script === undefined ? "Unknown" : scriptName(script);
}
