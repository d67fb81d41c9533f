export * from "../core/mod.ts";
export * from "../script/mod.ts";
export type { RangeSet } from "../unicode/lookup.ts";
export { rangeSet, rangeSetHas, rangeSetSize } from "../unicode/lookup.ts";
