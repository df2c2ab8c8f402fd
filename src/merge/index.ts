/**
 * Structural three-way merge.
 *
 * Public API exports for the merge module.
 */

export type {
  ConflictContent,
  ConflictReason,
  ConflictRegion,
  EditOp,
  EditScript,
  MarkerOptions,
  MergedChild,
  MergedConflict,
  MergedElement,
  MergedTree,
  MergeOutcome,
  MergeResult,
  NodeRef,
  RenderedMerge,
  Revision,
  RevisionSet,
  Side,
  Slot,
  StructuredMergeInput,
} from "./types.js";
export { DEFAULT_MARKER_OPTIONS, REVISIONS } from "./types.js";

export { StructuralMergeError, invariantViolation, type StructuralMergeErrorCode } from "./errors.js";
export { Matching, validateMatching } from "./matching.js";
export { longestCommonSubsequence } from "./lcs.js";
export { DEFAULT_MATCH_THRESHOLD, matchTrees, type MatcherOptions } from "./matcher.js";
export { childSlots, diffTrees } from "./differ.js";
export { mergeSequences } from "./sequence.js";
export { mergeScripts } from "./merger.js";
export { minimizeConflict } from "./minimizer.js";
export { layoutSegments, type Segment } from "./markers.js";
export { chooseText, firstDifference, renderMerge, renderSyntaxTree } from "./renderer.js";
export {
  resolveMarkerOptions,
  structuredMerge,
  type MarkerOverrides,
  type StructuredMergeOptions,
} from "./pipeline.js";
export { parseConflictFile, type ConflictFile, type ConflictFileResult } from "./conflict-file.js";
export { pickBest, solveConflicts, type MergeCandidate, type SolveOutcome } from "./solve.js";
export {
  mergeFile,
  mergeFiles,
  readRevisions,
  type FileMergeResult,
  type MergeJob,
  type ReadResult,
} from "./files.js";
