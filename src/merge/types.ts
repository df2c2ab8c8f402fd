/**
 * Types for the structural merge engine.
 *
 * Three revisions of a file are parsed into arena trees, aligned, diffed and
 * merged. Everything here refers to nodes by (revision, index) and never holds
 * object handles into another tree.
 */

import type { SyntaxTree } from "../tree/index.js";
import type { Matching } from "./matching.js";
import type { StructuralMergeErrorCode } from "./errors.js";

/**
 * The three revisions of a merge
 */
export type Revision = "base" | "left" | "right";

/**
 * The two derived revisions
 */
export type Side = "left" | "right";

export const REVISIONS: readonly Revision[] = ["base", "left", "right"];

/**
 * One tree per revision
 */
export type RevisionSet = Record<Revision, SyntaxTree>;

/**
 * A node of one revision
 */
export interface NodeRef {
  revision: Revision;
  node: number;
}

/**
 * Edit operations relative to the ancestor
 */
export type EditOp =
  | {
      type: "insert";
      /** Ancestor parent, or a freshly inserted derived parent */
      parent: NodeRef;
      position: number;
      /** Root of the inserted subtree in the derived tree */
      subtree: number;
    }
  | { type: "delete"; node: number }
  | { type: "update"; node: number; text: string }
  | { type: "move"; node: number; parent: NodeRef; position: number };

/**
 * A child slot of a derived parent: an ancestor node kept or moved there, or
 * a derived node with no ancestor partner
 */
export type Slot =
  | { type: "kept"; node: number }
  | { type: "new"; node: number };

/**
 * Edit script of one side, with the indexes the merger reads
 */
export interface EditScript {
  side: Side;
  derived: SyntaxTree;
  matching: Matching;
  /** Operations in ancestor document order */
  ops: EditOp[];
  /** Derived child layout of every ancestor parent present on this side */
  layouts: Map<number, Slot[]>;
  /** Ancestor nodes with an insert, update or move at or below them */
  modified: Set<number>;
}

/**
 * Why a conflict was raised
 */
export type ConflictReason =
  | "update_update" // Both sides changed the same leaf differently
  | "delete_modify" // One side deleted what the other changed
  | "move_move" // Both sides moved a node to different places
  | "cyclic_move" // A move would put a node inside itself
  | "insert_insert" // Different insertions at one place of an ordered list, or under one key
  | "concurrent_reorder"; // Both sides reordered an ordered list differently

/**
 * One side of a conflict: a run of siblings in one revision
 */
export interface ConflictContent {
  revision: Revision;
  nodes: number[];
}

/**
 * A localized conflict
 */
export interface ConflictRegion {
  /** Stable key, also used by the merged tree placeholder */
  key: string;
  reason: ConflictReason;
  /** Ancestor node the conflict is attached to; position for insertions */
  anchor: { node: number; position?: number };
  base?: ConflictContent;
  left?: ConflictContent;
  right?: ConflictContent;
  /** Text shared by both sides before the conflicting part */
  leading: string;
  /** Text shared by both sides after the conflicting part */
  trailing: string;
  /** Outer boundary nodes, used to pick the surrounding whitespace */
  bounds: { first: NodeRef[]; last: NodeRef[] };
}

/**
 * A node of the merged tree
 */
export interface MergedElement {
  type: "element";
  kind: string;
  /** The corresponding node in each revision that has one */
  reps: Partial<Record<Revision, number>>;
  /** Resolved text of a leaf */
  text?: string;
  /** Revision an atomic node is copied from */
  atomicFrom?: Revision;
  children: MergedChild[];
  /** Revisions whose node this element reproduces exactly */
  pristine: Revision[];
}

/**
 * Placeholder for a conflict region
 */
export interface MergedConflict {
  type: "conflict";
  key: string;
}

export type MergedChild = MergedElement | MergedConflict;

export interface MergedTree {
  root: MergedElement;
}

/**
 * Result of combining two edit scripts
 */
export type MergeResult =
  | { status: "clean"; tree: MergedTree }
  | {
      status: "conflicted";
      tree: MergedTree;
      conflicts: Map<string, ConflictRegion>;
    };

/**
 * Conflict marker layout
 */
export interface MarkerOptions {
  /** Length of each marker run */
  size: number;
  /** Include the base section */
  diff3: boolean;
  /** Do not expand conflicts to whole lines */
  compact: boolean;
  names: Record<Revision, string>;
}

export const DEFAULT_MARKER_OPTIONS: MarkerOptions = {
  size: 7,
  diff3: true,
  compact: false,
  names: { base: "base", left: "left", right: "right" },
};

/**
 * Rendered text of a merge
 */
export interface RenderedMerge {
  text: string;
  /** Number of marker blocks */
  conflictCount: number;
  /** Characters inside conflict sides */
  conflictMass: number;
}

/**
 * Input of a structured merge
 */
export interface StructuredMergeInput {
  base: string;
  left: string;
  right: string;
  /** Grammar id chosen by the caller */
  grammar: string;
}

/**
 * Result of the whole pipeline
 */
export type MergeOutcome =
  | {
      status: "clean" | "conflicted";
      text: string;
      result: MergeResult;
      conflictCount: number;
      conflictMass: number;
    }
  | {
      status: "unavailable";
      reason: StructuralMergeErrorCode;
      revision?: Revision;
      message: string;
    };
