/**
 * Structural differ.
 *
 * Turns a matching between the ancestor and one derived tree into an edit
 * script anchored to ancestor nodes.
 */

import type { SyntaxTree } from "../tree/index.js";
import type { CapabilityLookup } from "../grammar/types.js";
import type { EditOp, EditScript, NodeRef, Side, Slot } from "./types.js";
import type { Matching } from "./matching.js";
import { longestCommonSubsequence } from "./lcs.js";

const OP_RANK: Record<EditOp["type"], number> = {
  delete: 0,
  insert: 1,
  update: 2,
  move: 3,
};

interface SortableOp {
  op: EditOp;
  anchor: number;
  position: number;
  order: number;
}

/**
 * Compute the edit script taking `matching.from` to `matching.to`.
 */
export function diffTrees(
  side: Side,
  matching: Matching,
  lookup: CapabilityLookup,
): EditScript {
  const base = matching.from;
  const derived = matching.to;
  const collected: SortableOp[] = [];

  // Deletions
  for (const id of base.preorder()) {
    if (!matching.hasFrom(id)) {
      collected.push({ op: { type: "delete", node: id }, anchor: id, position: 0, order: id });
    }
  }

  // Insertions and moves, driven by the derived tree
  for (const id of derived.preorder()) {
    const parent = derived.parentOf(id);
    if (parent === undefined) continue;
    const parentSource = matching.sourceOf(parent);
    const baseNode = matching.sourceOf(id);
    const position = derived.node(id).index;

    if (baseNode === undefined) {
      // Descendants of an inserted node travel with it
      if (parentSource === undefined) continue;
      collected.push({
        op: { type: "insert", parent: { revision: "base", node: parentSource }, position, subtree: id },
        anchor: parentSource,
        position,
        order: id,
      });
      continue;
    }

    const target: NodeRef =
      parentSource === undefined
        ? { revision: side, node: parent }
        : { revision: "base", node: parentSource };
    if (target.revision === "base" && target.node === base.parentOf(baseNode)) continue;
    collected.push({
      op: { type: "move", node: baseNode, parent: target, position },
      anchor: baseNode,
      position,
      order: id,
    });
  }

  // Reorders within an unchanged ordered parent
  for (const [baseParent, derivedParent] of matching.pairs()) {
    if (base.isLeaf(baseParent)) continue;
    if (lookup.capabilities(base.kind(baseParent)).ordering === "unordered") continue;
    for (const id of reorderedChildren(base, derived, matching, baseParent, derivedParent)) {
      const partner = matching.partnerOf(id);
      if (partner === undefined) continue;
      const position = derived.node(partner).index;
      collected.push({
        op: { type: "move", node: id, parent: { revision: "base", node: baseParent }, position },
        anchor: id,
        position,
        order: partner,
      });
    }
  }

  // Updates of leaves and atomic nodes
  for (const [baseNode, derivedNode] of matching.pairs()) {
    const atomic = lookup.capabilities(base.kind(baseNode)).atomic;
    if (!atomic && !base.isLeaf(baseNode)) continue;
    const text = derived.textOf(derivedNode);
    if (text !== base.textOf(baseNode)) {
      collected.push({
        op: { type: "update", node: baseNode, text },
        anchor: baseNode,
        position: 0,
        order: derivedNode,
      });
    }
  }

  collected.sort(
    (a, b) =>
      a.anchor - b.anchor ||
      OP_RANK[a.op.type] - OP_RANK[b.op.type] ||
      a.position - b.position ||
      a.order - b.order,
  );
  const ops = collected.map((entry) => entry.op);

  return {
    side,
    derived,
    matching,
    ops,
    layouts: buildLayouts(matching),
    modified: markModified(ops, base, derived, matching),
  };
}

/**
 * Matched children of a parent pair that stay under it but fall outside the
 * longest in-order run
 */
function reorderedChildren(
  base: SyntaxTree,
  derived: SyntaxTree,
  matching: Matching,
  baseParent: number,
  derivedParent: number,
): number[] {
  const stayed = base.children(baseParent).filter((child) => {
    const partner = matching.partnerOf(child);
    return partner !== undefined && derived.parentOf(partner) === derivedParent;
  });
  if (stayed.length < 2) return [];
  const derivedOrder = derived
    .children(derivedParent)
    .filter((child) => stayed.includes(matching.sourceOf(child) ?? -1));
  const inOrder = new Set(
    longestCommonSubsequence(stayed, derivedOrder, (a, b) => matching.partnerOf(a) === b).map(
      ([i]) => stayed[i],
    ),
  );
  return stayed.filter((child) => !inOrder.has(child));
}

/**
 * Child slots of a derived node
 */
export function childSlots(matching: Matching, derivedNode: number): Slot[] {
  return matching.to.children(derivedNode).map((child): Slot => {
    const source = matching.sourceOf(child);
    return source === undefined ? { type: "new", node: child } : { type: "kept", node: source };
  });
}

/**
 * Derived child layout of every matched ancestor parent
 */
function buildLayouts(matching: Matching): Map<number, Slot[]> {
  const layouts = new Map<number, Slot[]>();
  for (const [baseNode, derivedNode] of matching.pairs()) {
    if (matching.from.isLeaf(baseNode) && matching.to.isLeaf(derivedNode)) continue;
    layouts.set(baseNode, childSlots(matching, derivedNode));
  }
  return layouts;
}

/**
 * Ancestor nodes with an insertion, update or move at or below them.
 * Deletions are left out: deleting inside a subtree that the other side
 * deletes as a whole is not a conflict.
 */
function markModified(
  ops: EditOp[],
  base: SyntaxTree,
  derived: SyntaxTree,
  matching: Matching,
): Set<number> {
  const modified = new Set<number>();
  const mark = (start: number | undefined): void => {
    let current = start;
    while (current !== undefined && !modified.has(current)) {
      modified.add(current);
      current = base.parentOf(current);
    }
  };
  const markRef = (ref: NodeRef): void => {
    if (ref.revision === "base") {
      mark(ref.node);
      return;
    }
    let current: number | undefined = ref.node;
    while (current !== undefined && !matching.hasTo(current)) {
      current = derived.parentOf(current);
    }
    mark(current === undefined ? undefined : matching.sourceOf(current));
  };

  for (const op of ops) {
    switch (op.type) {
      case "delete":
        break;
      case "update":
        mark(op.node);
        break;
      case "insert":
        markRef(op.parent);
        break;
      case "move":
        mark(op.node);
        markRef(op.parent);
        break;
    }
  }
  return modified;
}
