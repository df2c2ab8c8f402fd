/**
 * Structured merge pipeline.
 *
 * Strategy:
 * - Parse the three revisions and check that each tree renders back to its
 *   exact text
 * - Match base with left and base with right, validating both matchings
 * - Diff both sides against base and merge the two edit scripts
 * - Narrow every conflict, then render text and markers
 * - Parse a clean result again; text the grammar rejects makes the merge
 *   unavailable
 *
 * Any StructuralMergeError on the way makes the merge unavailable, so the
 * caller can fall back to a line-based merge. Other errors propagate.
 */

import { performance } from "node:perf_hooks";
import type { GrammarAdapter } from "../grammar/index.js";
import type { GrammarRegistry } from "../grammar/registry.js";
import type { SyntaxTree } from "../tree/index.js";
import { mergeErrors } from "../strings/errors.js";
import { StructuralMergeError } from "./errors.js";
import { diffTrees } from "./differ.js";
import { matchTrees, type MatcherOptions } from "./matcher.js";
import { validateMatching } from "./matching.js";
import { mergeScripts } from "./merger.js";
import { minimizeConflict } from "./minimizer.js";
import { firstDifference, renderMerge, renderSyntaxTree } from "./renderer.js";
import {
  DEFAULT_MARKER_OPTIONS,
  type ConflictRegion,
  type MarkerOptions,
  type MergeOutcome,
  type MergeResult,
  type Revision,
  type RevisionSet,
  type StructuredMergeInput,
} from "./types.js";

/**
 * Marker settings, any of which may be left out
 */
export interface MarkerOverrides {
  size?: number;
  diff3?: boolean;
  compact?: boolean;
  names?: Partial<Record<Revision, string>>;
}

export interface StructuredMergeOptions {
  registry: GrammarRegistry;
  markers?: MarkerOverrides;
  matcher?: MatcherOptions;
  /** Receives one line per stage */
  debug?: (message: string) => void;
}

export function resolveMarkerOptions(overrides: MarkerOverrides = {}): MarkerOptions {
  return {
    size: overrides.size ?? DEFAULT_MARKER_OPTIONS.size,
    diff3: overrides.diff3 ?? DEFAULT_MARKER_OPTIONS.diff3,
    compact: overrides.compact ?? DEFAULT_MARKER_OPTIONS.compact,
    names: { ...DEFAULT_MARKER_OPTIONS.names, ...overrides.names },
  };
}

/**
 * Merge three texts structurally
 */
export function structuredMerge(input: StructuredMergeInput, options: StructuredMergeOptions): MergeOutcome {
  try {
    return runMerge(input, options);
  } catch (err) {
    if (err instanceof StructuralMergeError) {
      options.debug?.(`structured merge unavailable (${err.code}): ${err.message}`);
      return { status: "unavailable", reason: err.code, revision: err.revision, message: err.message };
    }
    throw err;
  }
}

function runMerge(input: StructuredMergeInput, options: StructuredMergeOptions): MergeOutcome {
  const debug = options.debug ?? (() => undefined);
  const grammar = options.registry.get(input.grammar);

  let mark = performance.now();
  const lap = (): string => {
    const now = performance.now();
    const elapsed = (now - mark).toFixed(1);
    mark = now;
    return `${elapsed}ms`;
  };

  const revisions: RevisionSet = {
    base: parseRevision(grammar, input.base, "base"),
    left: parseRevision(grammar, input.left, "left"),
    right: parseRevision(grammar, input.right, "right"),
  };
  debug(
    `parsed with ${grammar.id}: ${revisions.base.size}/${revisions.left.size}/${revisions.right.size} nodes in ${lap()}`,
  );

  const leftMatching = matchTrees(revisions.base, revisions.left, grammar, options.matcher);
  const rightMatching = matchTrees(revisions.base, revisions.right, grammar, options.matcher);
  validateMatching(leftMatching);
  validateMatching(rightMatching);
  debug(`matched ${leftMatching.size} left and ${rightMatching.size} right nodes in ${lap()}`);

  const leftScript = diffTrees("left", leftMatching, grammar);
  const rightScript = diffTrees("right", rightMatching, grammar);
  debug(`diffed ${leftScript.ops.length} left and ${rightScript.ops.length} right edits in ${lap()}`);

  const merged = minimizeAll(mergeScripts(revisions.base, leftScript, rightScript, grammar), revisions);
  debug(`merged with ${merged.status === "conflicted" ? merged.conflicts.size : 0} conflicts in ${lap()}`);

  const rendered = renderMerge(merged, revisions, resolveMarkerOptions(options.markers));
  if (rendered.conflictCount === 0) checkResult(grammar, rendered.text);
  debug(`rendered ${rendered.text.length} characters in ${lap()}`);

  return {
    status: rendered.conflictCount > 0 ? "conflicted" : "clean",
    text: rendered.text,
    result: merged,
    conflictCount: rendered.conflictCount,
    conflictMass: rendered.conflictMass,
  };
}

/**
 * Parse one revision and check that it renders back to its own text
 */
function parseRevision(grammar: GrammarAdapter, text: string, revision: Revision): SyntaxTree {
  let tree: SyntaxTree;
  try {
    tree = grammar.parse(text);
  } catch (err) {
    if (err instanceof StructuralMergeError && err.code === "PARSE_FAILURE") {
      throw new StructuralMergeError(mergeErrors.parseFailure(revision, err.message), "PARSE_FAILURE", revision);
    }
    throw err;
  }

  const offset = firstDifference(renderSyntaxTree(tree), text);
  if (offset >= 0) {
    throw new StructuralMergeError(mergeErrors.roundTripMismatch(revision, offset), "ROUND_TRIP_MISMATCH", revision);
  }
  return tree;
}

/**
 * Parse the merged text with the grammar that produced it
 */
function checkResult(grammar: GrammarAdapter, text: string): void {
  try {
    grammar.parse(text);
  } catch (err) {
    if (err instanceof StructuralMergeError && err.code === "PARSE_FAILURE") {
      throw new StructuralMergeError(mergeErrors.invalidResult(err.message), "INVALID_RESULT");
    }
    throw err;
  }
}

function minimizeAll(result: MergeResult, revisions: RevisionSet): MergeResult {
  if (result.status === "clean") return result;
  const conflicts = new Map<string, ConflictRegion>();
  for (const [key, region] of result.conflicts) {
    conflicts.set(key, minimizeConflict(region, revisions));
  }
  return { ...result, conflicts };
}
