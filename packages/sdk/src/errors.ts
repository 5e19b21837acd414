/**
 * Error types for FM index operations
 *
 * Invariants:
 * - Every error is raised before the index state changes
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all FM index errors
 */
export abstract class FMIndexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a caller supplies an argument the index cannot accept:
 * empty text or pattern, a multi-character insert payload, an out-of-range
 * delete position, a misplaced sentinel or invalid options
 */
export class InvalidArgumentError extends FMIndexError {
  readonly code = "INVALID_ARGUMENT";

  constructor(
    public readonly argument: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid argument "${argument}": ${reason}`, options);
  }
}

export function isInvalidArgument(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}
