/**
 * StopCharPredicate defines an exported type contract.
 */
export type StopCharPredicate = (codePoint: number) => boolean;

/**
 * Whether a Unicode scalar value is ignored by script detection: ASCII
 * controls, whitespace, digits and punctuation.
 * Units: Unicode scalar values.
 */
export function isStopChar(codePoint: number): boolean {
  return (
    (codePoint >= 0x0000 && codePoint <= 0x0040) ||
    (codePoint >= 0x005b && codePoint <= 0x0060) ||
    (codePoint >= 0x007b && codePoint <= 0x007e)
  );
}
