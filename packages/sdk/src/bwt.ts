/**
 * Burrows-Wheeler Transform
 */

import { rankAt } from "./counts.js";
import type { CTable, RankTable } from "./types.js";

/**
 * BWT[k] is the character preceding the suffix at suffixArray[k].
 * The suffix starting at 0 is preceded by the sentinel, which is only
 * cyclic wraparound because the sentinel is always the last character.
 */
export function buildBwt(
  chars: readonly string[],
  suffixArray: readonly number[],
  sentinel: string
): string[] {
  return suffixArray.map((start) => (start === 0 ? sentinel : (chars[start - 1] ?? sentinel)));
}

/**
 * Row of the suffix that starts one position earlier than the suffix at row k
 */
export function lastToFirst(bwt: readonly string[], cTable: CTable, rankTable: RankTable, k: number): number {
  const char = bwt[k] ?? "";
  return (cTable.get(char) ?? 0) + rankAt(rankTable, char, k) - 1;
}

/**
 * Recover the sentinel-terminated text from the BWT by walking the
 * LF-mapping backwards from row 0, the suffix holding only the sentinel
 */
export function invertBwt(
  bwt: readonly string[],
  cTable: CTable,
  rankTable: RankTable,
  sentinel: string
): string[] {
  const n = bwt.length;
  if (n === 0) {
    return [];
  }

  const chars = new Array<string>(n);
  chars[n - 1] = sentinel;
  let row = 0;
  for (let i = n - 2; i >= 0; i--) {
    chars[i] = bwt[row] ?? "";
    row = lastToFirst(bwt, cTable, rankTable, row);
  }
  return chars;
}
