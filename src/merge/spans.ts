/**
 * Text of sibling runs within one revision.
 */

import type { SyntaxTree } from "../tree/index.js";

/**
 * Whitespace to put between two nodes of a run. Adjacent siblings keep their
 * own gap; otherwise the gap in front of `next` is reused.
 */
export function runGap(tree: SyntaxTree, previous: number, next: number): string {
  const direct = tree.gapBetween(previous, next);
  if (direct !== undefined) return direct;
  const before = tree.previousSibling(next);
  if (before !== undefined) {
    return tree.source.slice(tree.node(before).end, tree.node(next).start);
  }
  return " ";
}

/**
 * Text of a run of nodes, joined by their gaps
 */
export function runText(tree: SyntaxTree, nodes: readonly number[]): string {
  let text = "";
  nodes.forEach((node, i) => {
    if (i > 0) text += runGap(tree, nodes[i - 1], node);
    text += tree.textOf(node);
  });
  return text;
}
