/**
 * Script ids. The numeric value is the stable ordinal used when scripts are
 * exchanged as small integers; it follows alphabetical order and never changes.
 */
export const Script = {
  Arabic: 0,
  Bengali: 1,
  Cyrillic: 2,
  Devanagari: 3,
  Ethiopic: 4,
  Georgian: 5,
  Greek: 6,
  Gujarati: 7,
  Gurmukhi: 8,
  Hangul: 9,
  Hebrew: 10,
  Hiragana: 11,
  Kannada: 12,
  Katakana: 13,
  Khmer: 14,
  Latin: 15,
  Malayalam: 16,
  Mandarin: 17,
  Myanmar: 18,
  Oriya: 19,
  Sinhala: 20,
  Tamil: 21,
  Telugu: 22,
  Thai: 23,
} as const;

/**
 * Script defines an exported type contract.
 */
export type Script = (typeof Script)[keyof typeof Script];

/**
 * ScriptName defines an exported type contract.
 */
export type ScriptName = keyof typeof Script;

/**
 * Display name of a script.
 */
export function scriptName(script: Script): ScriptName {
  switch (script) {
    case Script.Arabic:
      return "Arabic";
    case Script.Bengali:
      return "Bengali";
    case Script.Cyrillic:
      return "Cyrillic";
    case Script.Devanagari:
      return "Devanagari";
    case Script.Ethiopic:
      return "Ethiopic";
    case Script.Georgian:
      return "Georgian";
    case Script.Greek:
      return "Greek";
    case Script.Gujarati:
      return "Gujarati";
    case Script.Gurmukhi:
      return "Gurmukhi";
    case Script.Hangul:
      return "Hangul";
    case Script.Hebrew:
      return "Hebrew";
    case Script.Hiragana:
      return "Hiragana";
    case Script.Kannada:
      return "Kannada";
    case Script.Katakana:
      return "Katakana";
    case Script.Khmer:
      return "Khmer";
    case Script.Latin:
      return "Latin";
    case Script.Malayalam:
      return "Malayalam";
    case Script.Mandarin:
      return "Mandarin";
    case Script.Myanmar:
      return "Myanmar";
    case Script.Oriya:
      return "Oriya";
    case Script.Sinhala:
      return "Sinhala";
    case Script.Tamil:
      return "Tamil";
    case Script.Telugu:
      return "Telugu";
    case Script.Thai:
      return "Thai";
    default:
      return assertNever(script);
  }
}

function assertNever(value: never): never {
  throw new TypeError(`Unknown script id: ${String(value)}`);
}

/**
 * ALL_SCRIPTS is an exported constant used by public APIs.
 * Ordered by script id.
 */
export const ALL_SCRIPTS: readonly Script[] = Object.freeze(
  Object.values(Script).sort((left, right) => left - right),
);

/**
 * SCRIPT_NAMES is an exported constant used by public APIs.
 */
export const SCRIPT_NAMES: readonly ScriptName[] = Object.freeze(ALL_SCRIPTS.map(scriptName));

/**
 * SCRIPT_IDS is an exported constant used by public APIs.
 */
export const SCRIPT_IDS: Readonly<Record<ScriptName, Script>> = Object.freeze({ ...Script });

/**
 * Whether a value is a known script id.
 */
export function isScript(value: unknown): value is Script {
  return (
    typeof value === "number" && Number.isInteger(value) && value >= 0 && value < ALL_SCRIPTS.length
  );
}

function isScriptName(name: string): name is ScriptName {
  return Object.hasOwn(Script, name);
}

/**
 * Script id for an exact display name.
 */
export function scriptFromName(name: string): Script | undefined {
  return isScriptName(name) ? Script[name] : undefined;
}
