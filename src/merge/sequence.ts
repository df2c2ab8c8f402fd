/**
 * Three-way merge of one parent's child sequence.
 *
 * Both sides describe their children as a walk over the ancestor's children
 * ("positions") interleaved with runs of content they put there themselves
 * (insertions and nodes they moved in). Runs are keyed by the ancestor child
 * that precedes them on their side, so a run stays attached to the same
 * neighbour even when that neighbour is deleted by the other side.
 */

import type { ConflictReason, Side } from "./types.js";

/**
 * Content a side contributes to a sequence
 */
export type SequenceEntry =
  | { type: "kept"; node: number }
  | {
      type: "new";
      side: Side;
      node: number;
      hash: string;
      /** Identity key, for kinds that declare one */
      key?: string;
      /** Identical node inserted by the other side */
      twin?: number;
    };

/**
 * One step of a side's walk over a parent's children
 */
export type SideStep =
  | { type: "position"; node: number }
  | { type: "run"; entry: SequenceEntry };

export type SequenceOutput =
  | SequenceEntry
  | {
      type: "conflict";
      reason: ConflictReason;
      /** Ancestor child the conflicting runs follow, -1 for the start */
      predecessor: number;
      left: SequenceEntry[];
      right: SequenceEntry[];
    };

export interface SequenceInput {
  /** Ancestor children in ancestor order */
  base: readonly number[];
  /** Whether an ancestor child is emitted at its own position */
  stays: (node: number) => boolean;
  left: readonly SideStep[];
  right: readonly SideStep[];
  ordered: boolean;
}

const START = -1;

/**
 * Merge one child sequence.
 *
 * Ordered parents keep ancestor order and raise `insert_insert` when both
 * sides put different runs after the same neighbour. Unordered parents follow
 * whichever side reordered (left when both did) and keep both sides'
 * insertions, left before right. There, insertions are paired across the
 * whole parent by identity key (or by hash for kinds without one): an
 * identical pair is kept once, a pair whose contents differ is an
 * `insert_insert` conflict at the left insertion.
 */
export function mergeSequences(input: SequenceInput): SequenceOutput[] {
  const runsLeft = runsByPredecessor(input.left);
  const runsRight = runsByPredecessor(input.right);
  const order = input.ordered ? [...input.base] : unorderedKeys(input);

  const output: SequenceOutput[] = [];
  const emitOrdered = (predecessor: number): void => {
    const left = runsLeft.get(predecessor) ?? [];
    const right = runsRight.get(predecessor) ?? [];
    if (left.length === 0) {
      output.push(...right);
    } else if (right.length === 0) {
      output.push(...left);
    } else if (sameRun(left, right)) {
      output.push(...left.map((entry, i) => withTwin(entry, right[i])));
    } else {
      output.push({ type: "conflict", reason: "insert_insert", predecessor, left, right });
    }
  };

  const counterparts = input.ordered ? new Map<NewEntry, NewEntry>() : pairByIdentity(runsLeft, runsRight);
  const claimed = new Set<SequenceEntry>(counterparts.values());
  const emitUnordered = (predecessor: number): void => {
    for (const entry of runsLeft.get(predecessor) ?? []) {
      const other = entry.type === "new" ? counterparts.get(entry) : undefined;
      if (entry.type === "kept" || other === undefined) {
        output.push(entry);
      } else if (other.hash === entry.hash) {
        output.push({ ...entry, twin: other.node });
      } else {
        output.push({ type: "conflict", reason: "insert_insert", predecessor, left: [entry], right: [other] });
      }
    }
    output.push(...(runsRight.get(predecessor) ?? []).filter((entry) => !claimed.has(entry)));
  };
  const emitRuns = input.ordered ? emitOrdered : emitUnordered;

  emitRuns(START);
  for (const node of order) {
    if (input.stays(node)) output.push({ type: "kept", node });
    emitRuns(node);
  }
  return output;
}

type NewEntry = Extract<SequenceEntry, { type: "new" }>;

/**
 * Right insertions with the same identity as a left insertion, wherever in
 * the parent either side put them
 */
function pairByIdentity(
  runsLeft: Map<number, SequenceEntry[]>,
  runsRight: Map<number, SequenceEntry[]>,
): Map<NewEntry, NewEntry> {
  const identity = (entry: NewEntry): string => (entry.key === undefined ? `#${entry.hash}` : `=${entry.key}`);
  const waiting = new Map<string, NewEntry[]>();
  for (const run of runsRight.values()) {
    for (const entry of run) {
      if (entry.type !== "new") continue;
      const bucket = waiting.get(identity(entry));
      if (bucket) bucket.push(entry);
      else waiting.set(identity(entry), [entry]);
    }
  }

  const pairs = new Map<NewEntry, NewEntry>();
  for (const run of runsLeft.values()) {
    for (const entry of run) {
      if (entry.type !== "new") continue;
      const other = waiting.get(identity(entry))?.shift();
      if (other !== undefined) pairs.set(entry, other);
    }
  }
  return pairs;
}

function runsByPredecessor(steps: readonly SideStep[]): Map<number, SequenceEntry[]> {
  const runs = new Map<number, SequenceEntry[]>();
  let predecessor = START;
  for (const step of steps) {
    if (step.type === "position") {
      predecessor = step.node;
      continue;
    }
    const run = runs.get(predecessor);
    if (run) run.push(step.entry);
    else runs.set(predecessor, [step.entry]);
  }
  return runs;
}

/**
 * Order of ancestor children for an unordered parent
 */
function unorderedKeys(input: SequenceInput): number[] {
  const positions = (steps: readonly SideStep[]): number[] =>
    steps.flatMap((step) => (step.type === "position" ? [step.node] : []));
  const keepsBaseOrder = (seen: number[]): boolean => {
    const present = new Set(seen);
    const expected = input.base.filter((node) => present.has(node));
    return expected.every((node, i) => seen[i] === node);
  };

  const left = positions(input.left);
  const right = positions(input.right);
  const chosen = keepsBaseOrder(left) ? right : left;
  const listed = new Set(chosen);
  return [...chosen, ...input.base.filter((node) => !listed.has(node))];
}

function sameEntry(a: SequenceEntry, b: SequenceEntry): boolean {
  if (a.type === "kept" && b.type === "kept") return a.node === b.node;
  if (a.type === "new" && b.type === "new") return a.hash === b.hash;
  return false;
}

function sameRun(a: readonly SequenceEntry[], b: readonly SequenceEntry[]): boolean {
  return a.length === b.length && a.every((entry, i) => sameEntry(entry, b[i]));
}

function withTwin(entry: SequenceEntry, other: SequenceEntry): SequenceEntry {
  if (entry.type === "new" && other.type === "new") {
    return { ...entry, twin: other.node };
  }
  return entry;
}
