/**
 * Backward search over the count tables
 *
 * Pattern characters are consumed from last to first. Each step narrows the
 * interval of suffix-ordering rows whose suffixes start with the pattern
 * read so far.
 */

import { rankAt } from "./counts.js";
import type { CTable, RankTable, SearchInterval } from "./types.js";

export interface SearchTables {
  cTable: CTable;
  rankTable: RankTable;
  /** Text length including the sentinel */
  size: number;
}

/**
 * Resolve a pattern to its suffix-ordering interval
 * @returns The interval, or undefined when the pattern does not occur
 */
export function backwardSearch(
  pattern: readonly string[],
  { cTable, rankTable, size }: SearchTables
): SearchInterval | undefined {
  let start = 0;
  let end = size - 1;

  for (let i = pattern.length - 1; i >= 0; i--) {
    const char = pattern[i] ?? "";
    const base = cTable.get(char);
    if (base === undefined) {
      return undefined;
    }

    start = base + rankAt(rankTable, char, start - 1);
    end = base + rankAt(rankTable, char, end) - 1;
    if (start > end) {
      return undefined;
    }
  }

  return { start, end };
}

/**
 * Map an interval back to text offsets, ascending
 */
export function locate(interval: SearchInterval, suffixArray: readonly number[]): number[] {
  const offsets = suffixArray.slice(interval.start, interval.end + 1);
  return offsets.sort((a, b) => a - b);
}

/**
 * Number of rows in an interval
 */
export function intervalSize(interval: SearchInterval | undefined): number {
  return interval ? interval.end - interval.start + 1 : 0;
}
