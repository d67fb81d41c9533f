/**
 * Length of a Unicode scalar value in UTF-16 code units.
 * Units: Unicode scalar values.
 */
export function codePointLength(codePoint: number): number {
  return codePoint > 0xffff ? 2 : 1;
}

/**
 * Collect the code points of a string in order. A lone surrogate is kept as
 * its own code point.
 * Units: Unicode scalar values.
 */
export function collectCodePoints(text: string): Uint32Array {
  const out = new Uint32Array(text.length);
  let count = 0;
  for (let codeUnitIndex = 0; codeUnitIndex < text.length; ) {
    const codePoint = text.codePointAt(codeUnitIndex) ?? 0;
    out[count] = codePoint;
    count += 1;
    codeUnitIndex += codePointLength(codePoint);
  }
  return out.subarray(0, count);
}
