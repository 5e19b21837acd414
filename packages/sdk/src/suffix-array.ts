/**
 * Suffix ordering construction
 *
 * Input is the encoded text (see encodeText) whose last key is the unique
 * sentinel key 0, so no two suffixes compare equal. Both methods return the
 * same permutation of 0..n-1.
 */

import type { SuffixArrayAlgorithm } from "./types.js";

/**
 * Compare the suffixes starting at a and b
 */
export function compareSuffixes(keys: ArrayLike<number>, a: number, b: number): number {
  const n = keys.length;
  let i = a;
  let j = b;
  while (i < n && j < n) {
    const diff = (keys[i] ?? 0) - (keys[j] ?? 0);
    if (diff !== 0) {
      return diff;
    }
    i++;
    j++;
  }
  // A suffix that is a prefix of the other sorts first; the later start is shorter
  return b - a;
}

/**
 * Sort every suffix by direct comparison. O(n² log n) worst case.
 */
export function naiveSuffixArray(keys: ArrayLike<number>): number[] {
  const order = Array.from({ length: keys.length }, (_, i) => i);
  return order.sort((a, b) => compareSuffixes(keys, a, b));
}

/**
 * Prefix doubling: after round k every suffix is ranked by its first 2k
 * characters, so ranks become unique after at most log2(n) rounds.
 * O(n log² n).
 */
export function doublingSuffixArray(keys: ArrayLike<number>): number[] {
  const n = keys.length;
  const order = Array.from({ length: n }, (_, i) => i);
  if (n === 0) {
    return order;
  }

  let rank = Int32Array.from(keys);
  let next = new Int32Array(n);

  for (let k = 1; ; k *= 2) {
    const current = rank;
    const second = (i: number): number => (i + k < n ? (current[i + k] ?? 0) : -1);
    const compare = (a: number, b: number): number => {
      const diff = (current[a] ?? 0) - (current[b] ?? 0);
      return diff !== 0 ? diff : second(a) - second(b);
    };

    order.sort(compare);

    next[order[0] ?? 0] = 0;
    for (let i = 1; i < n; i++) {
      const prev = order[i - 1] ?? 0;
      const cur = order[i] ?? 0;
      next[cur] = (next[prev] ?? 0) + (compare(prev, cur) < 0 ? 1 : 0);
    }

    [rank, next] = [next, rank];

    if ((rank[order[n - 1] ?? 0] ?? 0) === n - 1 || k >= n) {
      return order;
    }
  }
}

/**
 * Build the suffix ordering with the selected method
 */
export function buildSuffixArray(
  keys: ArrayLike<number>,
  algorithm: SuffixArrayAlgorithm = "doubling"
): number[] {
  switch (algorithm) {
    case "naive":
      return naiveSuffixArray(keys);
    case "doubling":
      return doublingSuffixArray(keys);
  }
}
