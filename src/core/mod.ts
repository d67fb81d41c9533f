export type { AlgorithmInfo, Provenance, TextInput } from "./types.ts";
export type { NormalizedInput } from "./input.ts";
export type { TallyscriptErrorCode } from "./error.ts";
export { TallyscriptError } from "./error.ts";
export { normalizeInput } from "./input.ts";
export { codePointLength, collectCodePoints } from "./codepoint.ts";
export { canonicalizeJson, canonicalModelStringify } from "./canonical.ts";
export { fnv1a32 } from "./hash.ts";
export { createProvenance } from "./provenance.ts";
export { IMPLEMENTATION_ID, LIBRARY_VERSION } from "./version.ts";
