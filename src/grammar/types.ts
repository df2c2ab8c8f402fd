/**
 * Grammar adapter contract.
 *
 * The merge core never special-cases a language. Everything it needs to know
 * about node kinds comes from the capability table an adapter supplies.
 */

import type { SyntaxTree } from "../tree/index.js";

/**
 * How the merge core treats nodes of one kind
 */
export interface KindCapabilities {
  /** Never descended into: changes inside become a single Update */
  atomic: boolean;
  /** Whether the order of children carries meaning */
  ordering: "ordered" | "unordered";
  /**
   * Identity key rule: the first child whose kind is listed here is the key.
   * Two nodes with differing keys are never matched.
   */
  identity?: { childKinds: readonly string[] };
}

/**
 * Rule for claiming a file by path
 */
export type FileCriterion =
  | { type: "extension"; extension: string }
  | { type: "name"; name: string };

/**
 * Anything that can answer capability lookups
 */
export interface CapabilityLookup {
  capabilities(kind: string): KindCapabilities;
}

/**
 * A language parser wrapped for the merge core
 */
export interface GrammarAdapter extends CapabilityLookup {
  /** Registry id, e.g. "yaml" */
  readonly id: string;
  /** Display name */
  readonly name: string;
  /** Files this grammar claims */
  readonly criteria: readonly FileCriterion[];
  /**
   * Parse a revision. Throws StructuralMergeError(PARSE_FAILURE) when the
   * text is not valid in this grammar.
   */
  parse(text: string): SyntaxTree;
}

export const ORDERED: KindCapabilities = { atomic: false, ordering: "ordered" };
export const UNORDERED: KindCapabilities = { atomic: false, ordering: "unordered" };
export const ATOMIC: KindCapabilities = { atomic: true, ordering: "ordered" };
