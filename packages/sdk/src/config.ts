/**
 * Option resolution
 * Priority: explicit option > environment variable > default
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";
import type { IndexOptions, ResolvedIndexOptions, SuffixArrayAlgorithm } from "./types.js";

export const DEFAULT_SENTINEL = "$";
export const DEFAULT_INDEX_NAME = "default";
export const DEFAULT_SUFFIX_ARRAY: SuffixArrayAlgorithm = "doubling";

const SuffixArraySchema = z.enum(["naive", "doubling"]);

const SentinelSchema = z.string().superRefine((val, ctx) => {
  if (Array.from(val).length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "sentinel must be exactly one character",
    });
  }
});

export const IndexOptionsSchema = z
  .object({
    name: z.string().min(1, "name must be non-empty").optional(),
    sentinel: SentinelSchema.optional(),
    suffixArray: SuffixArraySchema.optional(),
    metrics: z.boolean().optional(),
  })
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Read the suffix ordering method from FMINDEX_SUFFIX_ARRAY
 */
export function suffixArrayFromEnv(env: NodeJS.ProcessEnv): SuffixArrayAlgorithm | undefined {
  const raw = env.FMINDEX_SUFFIX_ARRAY;
  if (raw === undefined || raw === "") {
    return undefined;
  }

  const parsed = SuffixArraySchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError(
      "FMINDEX_SUFFIX_ARRAY",
      `expected "naive" or "doubling", got "${raw}"`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

/**
 * Validate options and fill in defaults
 * @throws InvalidArgumentError if an option or environment override is invalid
 */
export function resolveOptions(
  options: IndexOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedIndexOptions {
  const parsed = IndexOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidArgumentError("options", formatIssues(parsed.error), {
      cause: parsed.error,
    });
  }

  const input = parsed.data;
  return {
    name: input.name ?? DEFAULT_INDEX_NAME,
    sentinel: input.sentinel ?? DEFAULT_SENTINEL,
    suffixArray: input.suffixArray ?? suffixArrayFromEnv(env) ?? DEFAULT_SUFFIX_ARRAY,
    metrics: input.metrics ?? true,
  };
}
