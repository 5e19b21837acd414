/**
 * Argument validation for index operations
 *
 * Every check runs before any state changes and throws InvalidArgumentError.
 */

import { splitChars } from "./alphabet.js";
import { InvalidArgumentError } from "./errors.js";
import { logger } from "./observability/logs.js";

function reject(argument: string, reason: string): never {
  logger.debug("index.invalid_argument", { argument, reason });
  throw new InvalidArgumentError(argument, reason);
}

/**
 * Validate the text an index is built over
 * @returns The text split into characters, without a sentinel
 */
export function validateText(text: string, sentinel: string): string[] {
  if (typeof text !== "string") {
    reject("text", "must be a string");
  }
  if (text.length === 0) {
    reject("text", "must not be empty");
  }

  const chars = splitChars(text);
  const at = chars.indexOf(sentinel);
  if (at !== -1) {
    reject("text", `must not contain the sentinel "${sentinel}" (found at offset ${at})`);
  }
  return chars;
}

/**
 * Validate a search pattern
 * @returns The pattern split into characters
 */
export function validatePattern(pattern: string): string[] {
  if (typeof pattern !== "string") {
    reject("pattern", "must be a string");
  }
  if (pattern.length === 0) {
    reject("pattern", "must not be empty");
  }
  return splitChars(pattern);
}

/**
 * Validate an insert payload: exactly one character, never the sentinel
 */
export function validateInsertChar(char: string, sentinel: string): string {
  if (typeof char !== "string") {
    reject("char", "must be a string");
  }

  const chars = splitChars(char);
  if (chars.length !== 1) {
    reject("char", `must be exactly one character, got ${chars.length}`);
  }
  if (char === sentinel) {
    reject("char", `must not be the sentinel "${sentinel}"`);
  }
  return char;
}

/**
 * Validate a delete position against the sentinel-exclusive text length
 */
export function validateDeleteIndex(index: number, length: number): number {
  if (!Number.isInteger(index)) {
    reject("index", `must be an integer, got ${String(index)}`);
  }
  if (index < 0 || index >= length) {
    reject("index", `${index} is out of range [0, ${length})`);
  }
  return index;
}
