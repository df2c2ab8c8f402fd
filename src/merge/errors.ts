/**
 * Structural merge errors.
 *
 * Any of these aborts the structural merge. The pipeline turns them into an
 * unavailable outcome so the caller can fall back to a line-based merge;
 * every other error propagates.
 */

import type { Revision } from "./types.js";

export type StructuralMergeErrorCode =
  | "PARSE_FAILURE"
  | "ROUND_TRIP_MISMATCH"
  | "UNKNOWN_GRAMMAR"
  | "INVALID_RESULT"
  | "INVARIANT_VIOLATION";

export class StructuralMergeError extends Error {
  constructor(
    message: string,
    public code: StructuralMergeErrorCode,
    public revision?: Revision,
  ) {
    super(message);
    this.name = "StructuralMergeError";
  }
}

/**
 * Shorthand for the fatal defect case
 */
export function invariantViolation(message: string): StructuralMergeError {
  return new StructuralMergeError(message, "INVARIANT_VIOLATION");
}
