/**
 * FM index over a single mutable text
 *
 * Invariants:
 * - The text always ends with exactly one sentinel
 * - Text, suffix ordering, BWT and count tables always come from the same
 *   generation; mutations swap in a complete new generation or nothing
 * - Every operation is synchronous; callers sharing an instance across
 *   concurrent tasks must serialize access themselves
 */

import { buildGeneration } from "./build.js";
import { resolveOptions } from "./config.js";
import { intervalSize, backwardSearch, locate } from "./search.js";
import { verifyGeneration } from "./verify.js";
import {
  validateDeleteIndex,
  validateInsertChar,
  validatePattern,
  validateText,
} from "./validation.js";
import type {
  CTable,
  IndexGeneration,
  IndexOptions,
  IndexSnapshot,
  IndexStats,
  IntegrityReport,
  RankTable,
  ResolvedIndexOptions,
  SearchInterval,
} from "./types.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

export class FMIndex {
  readonly #options: ResolvedIndexOptions;
  #current: IndexGeneration;

  /**
   * @throws InvalidArgumentError if text is empty, contains the sentinel, or options are invalid
   */
  constructor(text: string, options: IndexOptions = {}) {
    this.#options = resolveOptions(options);
    const chars = validateText(text, this.#options.sentinel);
    this.#current = buildGeneration([...chars, this.#options.sentinel], 0, this.#options);
  }

  /** Text including the trailing sentinel */
  get text(): string {
    return this.#current.chars.join("");
  }

  /** Text without the sentinel */
  get logicalText(): string {
    return this.#current.chars.slice(0, -1).join("");
  }

  /** Number of characters in the logical text */
  get length(): number {
    return this.#current.chars.length - 1;
  }

  get sentinel(): string {
    return this.#options.sentinel;
  }

  get name(): string {
    return this.#options.name;
  }

  get generation(): number {
    return this.#current.generation;
  }

  get suffixArray(): readonly number[] {
    return this.#current.suffixArray;
  }

  get bwt(): string {
    return this.#current.bwt.join("");
  }

  get alphabet(): readonly string[] {
    return this.#current.alphabet;
  }

  /** Copy of the rank table; rows are frozen and shared with the generation */
  get rankTable(): RankTable {
    return new Map(this.#current.rankTable);
  }

  /** Copy of the C-table */
  get cTable(): CTable {
    return new Map(this.#current.cTable);
  }

  /**
   * Offsets of every occurrence of pattern in the logical text, ascending.
   * Overlapping occurrences are all reported.
   * @throws InvalidArgumentError if pattern is empty
   */
  search(pattern: string): number[] {
    const startTime = performance.now();
    const interval = this.#resolve(pattern);
    const offsets = interval ? locate(interval, this.#current.suffixArray) : [];

    if (this.#options.metrics) {
      metrics.recordSearchTime(this.#options.name, performance.now() - startTime);
      if (offsets.length > 0) {
        metrics.recordHit(this.#options.name);
      } else {
        metrics.recordMiss(this.#options.name);
      }
    }
    return offsets;
  }

  /**
   * Number of occurrences of pattern, without locating them
   * @throws InvalidArgumentError if pattern is empty
   */
  count(pattern: string): number {
    return intervalSize(this.#resolve(pattern));
  }

  /**
   * @throws InvalidArgumentError if pattern is empty
   */
  contains(pattern: string): boolean {
    return this.count(pattern) > 0;
  }

  /**
   * Append one character before the sentinel and rebuild
   * @throws InvalidArgumentError if char is not exactly one character or is the sentinel
   */
  insert(char: string): void {
    const { sentinel, name } = this.#options;
    const value = validateInsertChar(char, sentinel);
    const chars = this.#current.chars;

    logger.debug("index.insert", {
      index: name,
      generation: this.#current.generation,
      offset: chars.length - 1,
    });
    this.#replace([...chars.slice(0, -1), value, sentinel]);
  }

  /**
   * Remove the character at index of the logical text and rebuild
   * @throws InvalidArgumentError if index is not an integer in [0, length)
   */
  delete(index: number): void {
    const position = validateDeleteIndex(index, this.length);
    const chars = this.#current.chars;

    logger.debug("index.delete", {
      index: this.#options.name,
      generation: this.#current.generation,
      offset: position,
    });
    this.#replace([...chars.slice(0, position), ...chars.slice(position + 1)]);
  }

  /**
   * Detached, frozen copy of the current generation
   */
  snapshot(): IndexSnapshot {
    const gen = this.#current;
    const rankTable: Record<string, readonly number[]> = {};
    for (const [char, row] of gen.rankTable) {
      rankTable[char] = Object.freeze([...row]);
    }

    return Object.freeze({
      generation: gen.generation,
      text: this.text,
      sentinel: this.sentinel,
      suffixArray: Object.freeze([...gen.suffixArray]),
      bwt: this.bwt,
      alphabet: Object.freeze([...gen.alphabet]),
      rankTable: Object.freeze(rankTable),
      cTable: Object.freeze(Object.fromEntries(gen.cTable)),
    });
  }

  /**
   * Check the current generation against every structural invariant
   */
  verify(): IntegrityReport {
    const report = verifyGeneration(this.#current, this.#options.sentinel);
    if (!report.ok) {
      logger.error("index.verify.failed", {
        index: this.#options.name,
        generation: report.generation,
        reason: report.issues.map((issue) => issue.code).join(","),
      });
    }
    return report;
  }

  stats(): IndexStats {
    const gen = this.#current;
    return {
      name: this.#options.name,
      generation: gen.generation,
      length: this.length,
      alphabetSize: gen.alphabet.length,
      suffixArrayAlgorithm: this.#options.suffixArray,
      lastBuildMs: gen.buildMs,
    };
  }

  #resolve(pattern: string): SearchInterval | undefined {
    const chars = validatePattern(pattern);
    // The sentinel never occurs inside the logical text
    if (chars.includes(this.#options.sentinel)) {
      return undefined;
    }

    const gen = this.#current;
    return backwardSearch(chars, {
      cTable: gen.cTable,
      rankTable: gen.rankTable,
      size: gen.chars.length,
    });
  }

  /**
   * Build the next generation in full, then swap it in
   */
  #replace(chars: readonly string[]): void {
    this.#current = buildGeneration(chars, this.#current.generation + 1, this.#options);
  }
}

/**
 * Build an index over text
 * @throws InvalidArgumentError if text is empty, contains the sentinel, or options are invalid
 */
export function createIndex(text: string, options?: IndexOptions): FMIndex {
  return new FMIndex(text, options);
}
