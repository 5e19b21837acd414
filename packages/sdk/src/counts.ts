/**
 * Count tables derived from the BWT
 *
 * Dense layout: one cumulative array of length n per distinct character,
 * O(n × alphabet) space, built with one linear pass per character.
 */

import { compareSymbols } from "./alphabet.js";
import type { CTable, RankTable } from "./types.js";

/**
 * Distinct BWT characters in ascending order (sentinel first)
 */
export function sortedAlphabet(bwt: readonly string[], sentinel: string): string[] {
  return [...new Set(bwt)].sort((a, b) => compareSymbols(a, b, sentinel));
}

/**
 * Entry k of each row is the number of occurrences of that character in BWT[0..k]
 */
export function buildRankTable(
  bwt: readonly string[],
  alphabet: readonly string[]
): Map<string, number[]> {
  const table = new Map<string, number[]>();
  for (const char of alphabet) {
    const row = new Array<number>(bwt.length);
    let count = 0;
    for (let k = 0; k < bwt.length; k++) {
      if (bwt[k] === char) {
        count++;
      }
      row[k] = count;
    }
    table.set(char, row);
  }
  return table;
}

/**
 * For each character, the number of BWT characters that sort strictly below it
 */
export function buildCTable(bwt: readonly string[], alphabet: readonly string[]): Map<string, number> {
  const occurrences = new Map<string, number>();
  for (const char of bwt) {
    occurrences.set(char, (occurrences.get(char) ?? 0) + 1);
  }

  const table = new Map<string, number>();
  let total = 0;
  for (const char of alphabet) {
    table.set(char, total);
    total += occurrences.get(char) ?? 0;
  }
  return table;
}

/**
 * Occurrences of char in BWT[0..k]; 0 when k < 0 or char never occurs
 */
export function rankAt(table: RankTable, char: string, k: number): number {
  if (k < 0) {
    return 0;
  }
  return table.get(char)?.[k] ?? 0;
}

/**
 * Total occurrences of char in the BWT
 */
export function occurrences(table: RankTable, char: string): number {
  const row = table.get(char);
  return row?.[row.length - 1] ?? 0;
}
