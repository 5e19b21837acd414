/**
 * Generation builder
 *
 * Runs the whole derivation pipeline for one sentinel-terminated text:
 * suffix ordering → BWT → alphabet → rank and C tables.
 */

import { encodeText } from "./alphabet.js";
import { buildBwt } from "./bwt.js";
import { buildCTable, buildRankTable, sortedAlphabet } from "./counts.js";
import { buildSuffixArray } from "./suffix-array.js";
import type { IndexGeneration, ResolvedIndexOptions } from "./types.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

/**
 * Above this many characters the naive orderer gets a warning
 */
export const NAIVE_SIZE_WARNING = 10_000;

/**
 * Build a complete generation from a sentinel-terminated character sequence
 */
export function buildGeneration(
  chars: readonly string[],
  generation: number,
  options: ResolvedIndexOptions
): IndexGeneration {
  const { name, sentinel, suffixArray: algorithm } = options;
  const startTime = performance.now();
  logger.debug("index.build.start", { index: name, generation, size: chars.length });

  if (algorithm === "naive" && chars.length > NAIVE_SIZE_WARNING) {
    logger.warn("index.build.naive_large", { index: name, generation, size: chars.length });
  }

  const frozenChars = Object.freeze([...chars]);
  const suffixArray = Object.freeze(buildSuffixArray(encodeText(frozenChars, sentinel), algorithm));
  const bwt = Object.freeze(buildBwt(frozenChars, suffixArray, sentinel));
  const alphabet = Object.freeze(sortedAlphabet(bwt, sentinel));
  const rankTable = buildRankTable(bwt, alphabet);
  for (const row of rankTable.values()) {
    Object.freeze(row);
  }
  const cTable = buildCTable(bwt, alphabet);

  const buildMs = performance.now() - startTime;
  if (options.metrics) {
    metrics.recordBuildTime(name, buildMs);
    metrics.updateSize(name, chars.length - 1, alphabet.length);
  }

  logger.debug("index.build.end", {
    index: name,
    generation,
    size: chars.length,
    alphabetSize: alphabet.length,
    durationMs: buildMs,
  });

  return {
    generation,
    chars: frozenChars,
    suffixArray,
    bwt,
    alphabet,
    rankTable,
    cTable,
    buildMs,
  };
}
