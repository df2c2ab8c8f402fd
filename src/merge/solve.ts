/**
 * Solving the conflicts a line-based merge left in a file.
 *
 * The three revisions are read back from the markers and merged
 * structurally. The structured result is kept only when it leaves less text
 * inside markers than the file already has.
 */

import { markerErrors } from "../strings/errors.js";
import { imitateLineEndings, normalizeLineEndings } from "../utils/text.js";
import { parseConflictFile } from "./conflict-file.js";
import { structuredMerge, type StructuredMergeOptions } from "./pipeline.js";

/**
 * One way of merging a file, as compared by pickBest
 */
export interface MergeCandidate {
  method: string;
  conflictCount: number;
  conflictMass: number;
}

/**
 * The candidate with the least text inside markers. Earlier candidates win
 * ties.
 */
export function pickBest<T extends MergeCandidate>(candidates: readonly T[]): T | undefined {
  let best: T | undefined;
  for (const candidate of candidates) {
    if (best === undefined || candidate.conflictMass < best.conflictMass) best = candidate;
  }
  return best;
}

export type SolveOutcome =
  | { status: "no_conflicts"; text: string }
  | { status: "solved"; text: string; conflictCount: number; conflictMass: number }
  | { status: "unsolved"; reason: "markers" | "no_base" | "unavailable" | "no_improvement"; message: string };

/**
 * Solve the conflicts of `text` with the grammar `grammar`. Labels found on
 * the markers replace the configured ones.
 */
export function solveConflicts(text: string, grammar: string, options: StructuredMergeOptions): SolveOutcome {
  const normalized = normalizeLineEndings(text);
  const parsed = parseConflictFile(normalized.text);
  if (!parsed.success) {
    return { status: "unsolved", reason: "markers", message: parsed.error };
  }
  const file = parsed.file;
  if (file.conflictCount === 0) {
    return { status: "no_conflicts", text };
  }
  if (!file.diff3) {
    return { status: "unsolved", reason: "no_base", message: markerErrors.noBase };
  }

  const outcome = structuredMerge(
    { ...file.revisions, grammar },
    { ...options, markers: { ...options.markers, names: { ...options.markers?.names, ...file.names } } },
  );
  if (outcome.status === "unavailable") {
    return { status: "unsolved", reason: "unavailable", message: outcome.message };
  }

  const best = pickBest([
    { method: "structured", conflictCount: outcome.conflictCount, conflictMass: outcome.conflictMass },
    { method: "original", conflictCount: file.conflictCount, conflictMass: file.conflictMass },
  ]);
  if (best === undefined || best.method === "original") {
    return { status: "unsolved", reason: "no_improvement", message: markerErrors.noImprovement };
  }
  return {
    status: "solved",
    text: imitateLineEndings(outcome.text, normalized.crlf),
    conflictCount: outcome.conflictCount,
    conflictMass: outcome.conflictMass,
  };
}
