/**
 * Conflict minimizer.
 *
 * Narrows a conflict region until only the part where left and right really
 * differ stays between the markers. Everything shared moves into the region's
 * leading and trailing text.
 */

import type { SyntaxTree } from "../tree/index.js";
import type { ConflictContent, ConflictRegion, RevisionSet } from "./types.js";
import { runGap } from "./spans.js";

/**
 * Narrow a region to a fixpoint. Idempotent: a minimized region comes back
 * unchanged.
 */
export function minimizeConflict(region: ConflictRegion, revisions: RevisionSet): ConflictRegion {
  let current = region;
  for (;;) {
    const next = trimEdges(current, revisions) ?? descend(current, revisions);
    if (next === undefined) return current;
    current = next;
  }
}

/**
 * Move an equal first or last sibling (with its gap) out of both sides
 */
function trimEdges(region: ConflictRegion, revisions: RevisionSet): ConflictRegion | undefined {
  const { left, right } = region;
  if (!left || !right || left.nodes.length < 2 || right.nodes.length < 2) return undefined;
  const leftTree = revisions[left.revision];
  const rightTree = revisions[right.revision];

  const headLeft = leftTree.textOf(left.nodes[0]) + runGap(leftTree, left.nodes[0], left.nodes[1]);
  const headRight = rightTree.textOf(right.nodes[0]) + runGap(rightTree, right.nodes[0], right.nodes[1]);
  const headBase = dropEdge(region.base, revisions, "first", leftTree.textOf(left.nodes[0]));
  if (headLeft === headRight && headBase !== null) {
    return {
      ...region,
      left: { ...left, nodes: left.nodes.slice(1) },
      right: { ...right, nodes: right.nodes.slice(1) },
      base: headBase,
      leading: region.leading + headLeft,
    };
  }

  const lastLeft = left.nodes.length - 1;
  const lastRight = right.nodes.length - 1;
  const tailLeft =
    runGap(leftTree, left.nodes[lastLeft - 1], left.nodes[lastLeft]) + leftTree.textOf(left.nodes[lastLeft]);
  const tailRight =
    runGap(rightTree, right.nodes[lastRight - 1], right.nodes[lastRight]) + rightTree.textOf(right.nodes[lastRight]);
  const tailBase = dropEdge(region.base, revisions, "last", leftTree.textOf(left.nodes[lastLeft]));
  if (tailLeft === tailRight && tailBase !== null) {
    return {
      ...region,
      left: { ...left, nodes: left.nodes.slice(0, lastLeft) },
      right: { ...right, nodes: right.nodes.slice(0, lastRight) },
      base: tailBase,
      trailing: tailLeft + region.trailing,
    };
  }
  return undefined;
}

/**
 * Base content without the edge node both sides share. Null when the base
 * does not start (or end) with that node, so the edge cannot move out.
 */
function dropEdge(
  content: ConflictContent | undefined,
  revisions: RevisionSet,
  edge: "first" | "last",
  text: string,
): ConflictContent | undefined | null {
  if (!content) return content;
  if (content.nodes.length === 0) return null;
  const tree = revisions[content.revision];
  const node = edge === "first" ? content.nodes[0] : content.nodes[content.nodes.length - 1];
  if (tree.textOf(node) !== text) return null;
  return {
    ...content,
    nodes: edge === "first" ? content.nodes.slice(1) : content.nodes.slice(0, -1),
  };
}

/**
 * Re-anchor at the single child where both sides differ
 */
function descend(region: ConflictRegion, revisions: RevisionSet): ConflictRegion | undefined {
  const { left, right } = region;
  if (!left || !right || left.nodes.length !== 1 || right.nodes.length !== 1) return undefined;
  const leftTree = revisions[left.revision];
  const rightTree = revisions[right.revision];
  const leftNode = left.nodes[0];
  const rightNode = right.nodes[0];
  if (leftTree.kind(leftNode) !== rightTree.kind(rightNode)) return undefined;

  const leftChildren = leftTree.children(leftNode);
  const rightChildren = rightTree.children(rightNode);
  if (leftChildren.length === 0 || leftChildren.length !== rightChildren.length) return undefined;

  const differing = leftChildren.flatMap((child, i) =>
    leftTree.textOf(child) === rightTree.textOf(rightChildren[i]) ? [] : [i],
  );
  if (differing.length !== 1) return undefined;
  const index = differing[0];

  const [beforeLeft, afterLeft] = around(leftTree, leftNode, leftChildren[index]);
  const [beforeRight, afterRight] = around(rightTree, rightNode, rightChildren[index]);
  if (beforeLeft !== beforeRight || afterLeft !== afterRight) return undefined;

  const narrowed: ConflictRegion = {
    ...region,
    left: { ...left, nodes: [leftChildren[index]] },
    right: { ...right, nodes: [rightChildren[index]] },
    leading: region.leading + beforeLeft,
    trailing: afterLeft + region.trailing,
  };

  const { base } = region;
  if (base && base.nodes.length === 1) {
    const baseTree = revisions[base.revision];
    const baseChildren = baseTree.children(base.nodes[0]);
    if (baseTree.kind(base.nodes[0]) === leftTree.kind(leftNode) && baseChildren.length === leftChildren.length) {
      narrowed.base = { ...base, nodes: [baseChildren[index]] };
      if (base.revision === "base") narrowed.anchor = { node: baseChildren[index] };
    }
  }
  return narrowed;
}

/**
 * Text of a node before and after one of its children
 */
function around(tree: SyntaxTree, parent: number, child: number): [string, string] {
  const outer = tree.node(parent);
  const inner = tree.node(child);
  return [tree.source.slice(outer.start, inner.start), tree.source.slice(inner.end, outer.end)];
}
