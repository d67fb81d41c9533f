import type { Rng } from "./prng.ts";

const STOP = " \t\n0123456789-_.:,;!?/\\|@#$%^&*()[]{}<>";

// Letters from scripts that sit next to each other in the predicate table,
// so generated text produces close races and ties.
const LATIN = [0x0061, 0x0062, 0x0063, 0x0045, 0x00e9, 0x0161];
const CYRILLIC = [0x0430, 0x0431, 0x0436, 0x042f, 0x0457];
const GREEK = [0x03b1, 0x03b2, 0x03c6, 0x03a9];
const HEBREW = [0x05d0, 0x05d1, 0x05e9];
const MANDARIN = [0x4e00, 0x4f60, 0x597d, 0x754c];
const ARABIC_ASTRAL = [0x1ee00, 0x1ee01, 0x1ee21];
const OVERLAP = [0x1d2b, 0x1d78];

// Matched by no script.
const UNCLASSIFIED = [0x007f, 0x2013, 0x1f600, 0x1f680, 0xd800];

const LETTER_GROUPS = [LATIN, CYRILLIC, GREEK, HEBREW, MANDARIN, ARABIC_ASTRAL, OVERLAP];

function pickFrom(rng: Rng, list: readonly number[]): string {
  return String.fromCodePoint(rng.choice(list));
}

/**
 * Text drawn from two or three scripts at a time, with stop characters and
 * unclassified symbols mixed in.
 */
export function genMixedScript(rng: Rng, size: number): string {
  const groups = [rng.choice(LETTER_GROUPS), rng.choice(LETTER_GROUPS), rng.choice(LETTER_GROUPS)];
  const out: string[] = [];
  const outputLength = rng.int(0, size);
  for (let index = 0; index < outputLength; index += 1) {
    const roll = rng.int(0, 9);
    if (roll <= 1) {
      out.push(STOP[rng.int(0, STOP.length - 1)] ?? " ");
    } else if (roll === 2) {
      out.push(pickFrom(rng, UNCLASSIFIED));
    } else {
      out.push(pickFrom(rng, rng.choice(groups)));
    }
  }
  return out.join("");
}

/**
 * Stop characters only.
 */
export function genStopOnly(rng: Rng, size: number): string {
  const out: string[] = [];
  const outputLength = rng.int(0, size);
  for (let index = 0; index < outputLength; index += 1) {
    out.push(STOP[rng.int(0, STOP.length - 1)] ?? " ");
  }
  return out.join("");
}
