/**
 * Core types for the FM text index
 */

/**
 * Suffix ordering construction method. Both produce identical orderings.
 */
export type SuffixArrayAlgorithm = "naive" | "doubling";

/**
 * Options accepted when constructing an index
 */
export interface IndexOptions {
  /** Label used in logs and metrics (default: "default") */
  name?: string;
  /** Terminator appended to the text; exactly one character (default: "$") */
  sentinel?: string;
  /** Suffix ordering method (default: FMINDEX_SUFFIX_ARRAY or "doubling") */
  suffixArray?: SuffixArrayAlgorithm;
  /** Record build and search timings in the shared metrics collector (default: true) */
  metrics?: boolean;
}

/**
 * Options after defaults and environment overrides have been applied
 */
export interface ResolvedIndexOptions {
  name: string;
  sentinel: string;
  suffixArray: SuffixArrayAlgorithm;
  metrics: boolean;
}

/**
 * Cumulative occurrence counts: entry k is the number of times the
 * character occurs in BWT[0..k] inclusive
 */
export type RankTable = ReadonlyMap<string, readonly number[]>;

/**
 * Per-character count of BWT characters that sort strictly below it
 */
export type CTable = ReadonlyMap<string, number>;

/**
 * Rows of the suffix ordering; both bounds inclusive
 */
export interface SearchInterval {
  start: number;
  end: number;
}

/**
 * One consistent set of text and derived structures. A generation is never
 * modified; mutations build a new one.
 */
export interface IndexGeneration {
  /** Sequence number: 0 at construction, +1 per successful mutation */
  generation: number;
  /** Characters of the text, sentinel last */
  chars: readonly string[];
  suffixArray: readonly number[];
  bwt: readonly string[];
  /** Distinct BWT characters in ascending order, sentinel first */
  alphabet: readonly string[];
  rankTable: RankTable;
  cTable: CTable;
  /** Wall time spent building this generation */
  buildMs: number;
}

/**
 * Detached, frozen copy of the current generation
 */
export interface IndexSnapshot {
  generation: number;
  text: string;
  sentinel: string;
  suffixArray: readonly number[];
  bwt: string;
  alphabet: readonly string[];
  rankTable: Readonly<Record<string, readonly number[]>>;
  cTable: Readonly<Record<string, number>>;
}

export type IntegrityIssueCode =
  | "sentinel"
  | "permutation"
  | "length"
  | "order"
  | "rank"
  | "c-table"
  | "inversion";

/**
 * A single invariant violation found by verify()
 */
export interface IntegrityIssue {
  code: IntegrityIssueCode;
  message: string;
}

/**
 * Result of checking a generation against the index invariants
 */
export interface IntegrityReport {
  /** True when no issue was found */
  ok: boolean;
  generation: number;
  issues: IntegrityIssue[];
}

/**
 * Summary of the current generation
 */
export interface IndexStats {
  name: string;
  generation: number;
  /** Logical text length, sentinel excluded */
  length: number;
  /** Distinct characters including the sentinel */
  alphabetSize: number;
  suffixArrayAlgorithm: SuffixArrayAlgorithm;
  lastBuildMs: number;
}
