/**
 * FM text index SDK
 *
 * Exact-match substring search over a mutable text, backed by the
 * Burrows-Wheeler Transform and backward search
 */

// Re-export types
export type {
  SuffixArrayAlgorithm,
  IndexOptions,
  ResolvedIndexOptions,
  RankTable,
  CTable,
  SearchInterval,
  IndexGeneration,
  IndexSnapshot,
  IntegrityIssueCode,
  IntegrityIssue,
  IntegrityReport,
  IndexStats,
} from "./types.js";

export { FMIndex, createIndex } from "./fm-index.js";

// Re-export pipeline building blocks
export { splitChars, sortKey, encodeText, compareSymbols } from "./alphabet.js";
export {
  compareSuffixes,
  naiveSuffixArray,
  doublingSuffixArray,
  buildSuffixArray,
} from "./suffix-array.js";
export { buildBwt, invertBwt, lastToFirst } from "./bwt.js";
export { sortedAlphabet, buildRankTable, buildCTable, rankAt, occurrences } from "./counts.js";
export { backwardSearch, locate, intervalSize } from "./search.js";
export type { SearchTables } from "./search.js";
export { buildGeneration } from "./build.js";
export { verifyGeneration } from "./verify.js";

// Re-export configuration
export {
  resolveOptions,
  IndexOptionsSchema,
  DEFAULT_SENTINEL,
  DEFAULT_INDEX_NAME,
  DEFAULT_SUFFIX_ARRAY,
} from "./config.js";

// Re-export errors
export { FMIndexError, InvalidArgumentError, isInvalidArgument } from "./errors.js";

// Re-export observability
export { logger, formatLogLine } from "./observability/logs.js";
export type { LogLevel, IndexLogFields } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { IndexMetrics } from "./observability/metrics.js";
