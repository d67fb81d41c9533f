export type { ScriptName } from "./script.ts";
export {
  ALL_SCRIPTS,
  SCRIPT_IDS,
  SCRIPT_NAMES,
  Script,
  isScript,
  scriptFromName,
  scriptName,
} from "./script.ts";
export { scriptRanges } from "./ranges.ts";
export type { ScriptTableEntry } from "./table.ts";
export {
  SCRIPT_TABLE,
  SCRIPT_TABLE_SIZE,
  classifyCodePoint,
  isScriptCodePoint,
  scriptAt,
  scriptAtSlot,
  scriptNameAt,
  tableSlotOf,
} from "./table.ts";
export type { StopCharPredicate } from "./stop.ts";
export { isStopChar } from "./stop.ts";
export type { CountVector, ShardFold, ShardReduction } from "./tally.ts";
export {
  combineCounts,
  createCountVector,
  foldShard,
  pickMaximumSlot,
  reduceShards,
  splitShards,
} from "./tally.ts";
export type {
  DetectScriptOptions,
  DetectionDecision,
  ScriptCount,
  ScriptDetection,
} from "./detect.ts";
export { countScripts, detectScript, detectScriptReport } from "./detect.ts";
