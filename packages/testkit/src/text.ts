/**
 * Deterministic text generation and a brute-force occurrence oracle
 */

/**
 * Seeded pseudo-random source (mulberry32). Same seed, same sequence.
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Pick an integer in [min, max]
 */
export function randomInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/**
 * Random text of the given length drawn from the characters of alphabet
 */
export function randomText(rng: () => number, length: number, alphabet = "ab"): string {
  const chars = Array.from(alphabet);
  let out = "";
  for (let i = 0; i < length; i++) {
    out += chars[randomInt(rng, 0, chars.length - 1)] ?? "";
  }
  return out;
}

/**
 * Random substring of text, at least one character long.
 * Offsets are in code points.
 */
export function randomSubstring(rng: () => number, text: string, maxLength = 4): string {
  const chars = Array.from(text);
  const start = randomInt(rng, 0, chars.length - 1);
  const length = randomInt(rng, 1, Math.min(maxLength, chars.length - start));
  return chars.slice(start, start + length).join("");
}

/**
 * Every code-point offset where pattern starts in text, overlaps included
 */
export function findAll(text: string, pattern: string): number[] {
  const chars = Array.from(text);
  const needle = Array.from(pattern);
  const offsets: number[] = [];
  if (needle.length === 0) {
    return offsets;
  }

  for (let i = 0; i + needle.length <= chars.length; i++) {
    let match = true;
    for (let j = 0; j < needle.length; j++) {
      if (chars[i + j] !== needle[j]) {
        match = false;
        break;
      }
    }
    if (match) {
      offsets.push(i);
    }
  }
  return offsets;
}
