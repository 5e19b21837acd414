/**
 * Integrity checks for a generation
 *
 * Each check appends issues instead of throwing so a report lists every
 * violated invariant at once.
 */

import { invertBwt } from "./bwt.js";
import { compareSuffixes } from "./suffix-array.js";
import { encodeText } from "./alphabet.js";
import type { IndexGeneration, IntegrityIssue, IntegrityReport } from "./types.js";

function checkSentinel(gen: IndexGeneration, sentinel: string, issues: IntegrityIssue[]): void {
  const n = gen.chars.length;
  const positions = gen.chars.flatMap((char, i) => (char === sentinel ? [i] : []));
  if (positions.length !== 1 || positions[0] !== n - 1) {
    issues.push({
      code: "sentinel",
      message: `text must hold exactly one sentinel at offset ${n - 1}, found at [${positions.join(", ")}]`,
    });
  }

  const inBwt = gen.bwt.filter((char) => char === sentinel).length;
  if (inBwt !== 1) {
    issues.push({ code: "sentinel", message: `BWT holds ${inBwt} sentinels, expected 1` });
  }
}

function checkLengths(gen: IndexGeneration, issues: IntegrityIssue[]): void {
  const n = gen.chars.length;
  if (gen.suffixArray.length !== n || gen.bwt.length !== n) {
    issues.push({
      code: "length",
      message: `text, suffix array and BWT lengths differ: ${n}, ${gen.suffixArray.length}, ${gen.bwt.length}`,
    });
  }
  for (const [char, row] of gen.rankTable) {
    if (row.length !== gen.bwt.length) {
      issues.push({ code: "length", message: `rank row for "${char}" has length ${row.length}` });
    }
  }
}

function checkPermutation(gen: IndexGeneration, issues: IntegrityIssue[]): void {
  const n = gen.chars.length;
  const seen = new Uint8Array(n);
  for (const start of gen.suffixArray) {
    if (!Number.isInteger(start) || start < 0 || start >= n || seen[start] === 1) {
      issues.push({ code: "permutation", message: `suffix array is not a permutation of 0..${n - 1}` });
      return;
    }
    seen[start] = 1;
  }
}

function checkOrder(gen: IndexGeneration, sentinel: string, issues: IntegrityIssue[]): void {
  const keys = encodeText(gen.chars, sentinel);
  for (let k = 1; k < gen.suffixArray.length; k++) {
    const prev = gen.suffixArray[k - 1] ?? 0;
    const cur = gen.suffixArray[k] ?? 0;
    if (compareSuffixes(keys, prev, cur) >= 0) {
      issues.push({
        code: "order",
        message: `suffix at ${prev} does not sort below suffix at ${cur} (rows ${k - 1}, ${k})`,
      });
      return;
    }
  }
}

function checkRank(gen: IndexGeneration, issues: IntegrityIssue[]): void {
  for (const [char, row] of gen.rankTable) {
    let previous = 0;
    let count = 0;
    for (let k = 0; k < row.length; k++) {
      const value = row[k] ?? 0;
      if (gen.bwt[k] === char) {
        count++;
      }
      if (value < previous || value !== count) {
        issues.push({ code: "rank", message: `rank row for "${char}" is wrong at position ${k}` });
        break;
      }
      previous = value;
    }
  }
}

function checkCTable(gen: IndexGeneration, issues: IntegrityIssue[]): void {
  let expected = 0;
  for (const char of gen.alphabet) {
    const value = gen.cTable.get(char);
    if (value !== expected) {
      issues.push({
        code: "c-table",
        message: `C["${char}"] is ${String(value)}, expected ${expected}`,
      });
      return;
    }
    const row = gen.rankTable.get(char);
    expected += row?.[row.length - 1] ?? 0;
  }
  if (expected !== gen.bwt.length) {
    issues.push({ code: "c-table", message: `C-table covers ${expected} of ${gen.bwt.length} characters` });
  }
}

function checkInversion(gen: IndexGeneration, sentinel: string, issues: IntegrityIssue[]): void {
  const recovered = invertBwt(gen.bwt, gen.cTable, gen.rankTable, sentinel).join("");
  if (recovered !== gen.chars.join("")) {
    issues.push({ code: "inversion", message: "inverting the BWT does not reproduce the text" });
  }
}

/**
 * Check a generation against every structural invariant
 */
export function verifyGeneration(gen: IndexGeneration, sentinel: string): IntegrityReport {
  const issues: IntegrityIssue[] = [];

  checkSentinel(gen, sentinel, issues);
  checkLengths(gen, issues);
  checkPermutation(gen, issues);

  // The remaining checks index by suffix array and row positions
  if (issues.length === 0) {
    checkOrder(gen, sentinel, issues);
    checkRank(gen, issues);
    checkCTable(gen, issues);
  }
  if (issues.length === 0) {
    checkInversion(gen, sentinel, issues);
  }

  return { ok: issues.length === 0, generation: gen.generation, issues };
}
