import type { RangeSet } from "../unicode/lookup.ts";
import { rangeSet } from "../unicode/lookup.ts";
import { Script } from "./script.ts";

// Block-level ranges, hand-curated from the Unicode block assignments.
// Classification results depend on these exact boundaries.

const LATIN = rangeSet([
  [0x0041, 0x005a],
  [0x0061, 0x007a],
  [0x0080, 0x00ff],
  [0x0100, 0x017f],
  [0x0180, 0x024f],
  [0x0250, 0x02af],
  [0x1d00, 0x1d7f],
  [0x1d80, 0x1dbf],
  [0x1e00, 0x1eff],
  [0x2100, 0x214f],
  [0x2c60, 0x2c7f],
  [0xa720, 0xa7ff],
  [0xab30, 0xab6f],
]);

// U+1D2B and U+1D78 also sit inside Latin's Phonetic Extensions range.
const CYRILLIC = rangeSet([
  [0x0400, 0x0484],
  [0x0487, 0x052f],
  [0x1d2b],
  [0x1d78],
  [0x2de0, 0x2dff],
  [0xa640, 0xa69d],
  [0xa69f],
]);

const ARABIC = rangeSet([
  [0x0600, 0x06ff],
  [0x0750, 0x07ff],
  [0x08a0, 0x08ff],
  [0xfb50, 0xfdff],
  [0xfe70, 0xfeff],
  [0x10e60, 0x10e7f],
  [0x1ee00, 0x1eeff],
]);

// CJK radicals, ideographic marks and unified/compatibility ideographs.
const MANDARIN = rangeSet([
  [0x2e80, 0x2e99],
  [0x2e9b, 0x2ef3],
  [0x2f00, 0x2fd5],
  [0x3005],
  [0x3007],
  [0x3021, 0x3029],
  [0x3038, 0x303b],
  [0x3400, 0x4db5],
  [0x4e00, 0x9fcc],
  [0xf900, 0xfa6d],
  [0xfa70, 0xfad9],
]);

const DEVANAGARI = rangeSet([
  [0x0900, 0x097f],
  [0x1cd0, 0x1cff],
  [0xa8e0, 0xa8ff],
]);

const HEBREW = rangeSet([[0x0590, 0x05ff]]);

const ETHIOPIC = rangeSet([
  [0x1200, 0x139f],
  [0x2d80, 0x2ddf],
  [0xab00, 0xab2f],
]);

const GEORGIAN = rangeSet([[0x10a0, 0x10ff]]);

const BENGALI = rangeSet([[0x0980, 0x09ff]]);

// Includes the Halfwidth and Fullwidth Forms block.
const HANGUL = rangeSet([
  [0x1100, 0x11ff],
  [0x3130, 0x318f],
  [0x3200, 0x32ff],
  [0xa960, 0xa97f],
  [0xac00, 0xd7af],
  [0xd7b0, 0xd7ff],
  [0xff00, 0xffef],
]);

const HIRAGANA = rangeSet([[0x3040, 0x309f]]);

const KATAKANA = rangeSet([[0x30a0, 0x30ff]]);

// Greek and Coptic block.
const GREEK = rangeSet([[0x0370, 0x03ff]]);

const KANNADA = rangeSet([[0x0c80, 0x0cff]]);

const TAMIL = rangeSet([[0x0b80, 0x0bff]]);

const THAI = rangeSet([[0x0e00, 0x0e7f]]);

const GUJARATI = rangeSet([[0x0a80, 0x0aff]]);

const GURMUKHI = rangeSet([[0x0a00, 0x0a7f]]);

const TELUGU = rangeSet([[0x0c00, 0x0c7f]]);

const MALAYALAM = rangeSet([[0x0d00, 0x0d7f]]);

const ORIYA = rangeSet([[0x0b00, 0x0b7f]]);

const MYANMAR = rangeSet([[0x1000, 0x109f]]);

const SINHALA = rangeSet([[0x0d80, 0x0dff]]);

// Khmer and Khmer Symbols.
const KHMER = rangeSet([
  [0x1780, 0x17ff],
  [0x19e0, 0x19ff],
]);

/**
 * Code-point ranges assigned to a script.
 * Units: Unicode scalar values.
 */
export function scriptRanges(script: Script): RangeSet {
  switch (script) {
    case Script.Arabic:
      return ARABIC;
    case Script.Bengali:
      return BENGALI;
    case Script.Cyrillic:
      return CYRILLIC;
    case Script.Devanagari:
      return DEVANAGARI;
    case Script.Ethiopic:
      return ETHIOPIC;
    case Script.Georgian:
      return GEORGIAN;
    case Script.Greek:
      return GREEK;
    case Script.Gujarati:
      return GUJARATI;
    case Script.Gurmukhi:
      return GURMUKHI;
    case Script.Hangul:
      return HANGUL;
    case Script.Hebrew:
      return HEBREW;
    case Script.Hiragana:
      return HIRAGANA;
    case Script.Kannada:
      return KANNADA;
    case Script.Katakana:
      return KATAKANA;
    case Script.Khmer:
      return KHMER;
    case Script.Latin:
      return LATIN;
    case Script.Malayalam:
      return MALAYALAM;
    case Script.Mandarin:
      return MANDARIN;
    case Script.Myanmar:
      return MYANMAR;
    case Script.Oriya:
      return ORIYA;
    case Script.Sinhala:
      return SINHALA;
    case Script.Tamil:
      return TAMIL;
    case Script.Telugu:
      return TELUGU;
    case Script.Thai:
      return THAI;
    default: {
      const unreachable: never = script;
      throw new TypeError(`Unknown script id: ${String(unreachable)}`);
    }
  }
}
