/**
 * Partial injective correspondence between the nodes of two trees.
 */

import type { SyntaxTree } from "../tree/index.js";
import { mergeErrors } from "../strings/errors.js";
import { invariantViolation } from "./errors.js";

export class Matching {
  private readonly forward = new Map<number, number>();
  private readonly backward = new Map<number, number>();

  constructor(
    readonly from: SyntaxTree,
    readonly to: SyntaxTree,
  ) {}

  get size(): number {
    return this.forward.size;
  }

  /**
   * Record a pair. Matching a node twice is a defect, not a user error.
   */
  add(fromNode: number, toNode: number): void {
    if (this.forward.has(fromNode)) {
      throw invariantViolation(mergeErrors.matchingInjectivity("ancestor", fromNode));
    }
    if (this.backward.has(toNode)) {
      throw invariantViolation(mergeErrors.matchingInjectivity("derived", toNode));
    }
    this.forward.set(fromNode, toNode);
    this.backward.set(toNode, fromNode);
  }

  /**
   * Match two isomorphic subtrees node by node. Positions where either node
   * is already taken are skipped.
   */
  addSubtree(fromNode: number, toNode: number): void {
    const size = this.from.node(fromNode).size;
    for (let offset = 0; offset < size; offset++) {
      if (this.forward.has(fromNode + offset) || this.backward.has(toNode + offset)) continue;
      this.add(fromNode + offset, toNode + offset);
    }
  }

  partnerOf(fromNode: number): number | undefined {
    return this.forward.get(fromNode);
  }

  sourceOf(toNode: number): number | undefined {
    return this.backward.get(toNode);
  }

  hasFrom(fromNode: number): boolean {
    return this.forward.has(fromNode);
  }

  hasTo(toNode: number): boolean {
    return this.backward.has(toNode);
  }

  pairs(): Array<[number, number]> {
    return [...this.forward.entries()].sort((a, b) => a[0] - b[0]);
  }
}

/**
 * Check kind compatibility and ancestry of every pair.
 *
 * Injectivity is enforced by `add`. For ancestry, each matched node is
 * compared with its nearest matched ancestor: the partner of the node must not
 * be an ancestor of the partner of that ancestor.
 *
 * @throws StructuralMergeError(INVARIANT_VIOLATION)
 */
export function validateMatching(matching: Matching): void {
  const { from, to } = matching;

  for (const [a, b] of matching.pairs()) {
    const kindA = from.kind(a);
    const kindB = to.kind(b);
    if (kindA !== kindB) {
      throw invariantViolation(mergeErrors.matchingKind(kindA, kindB));
    }

    let ancestor = from.parentOf(a);
    while (ancestor !== undefined && !matching.hasFrom(ancestor)) {
      ancestor = from.parentOf(ancestor);
    }
    if (ancestor === undefined) continue;

    const ancestorPartner = matching.partnerOf(ancestor);
    if (ancestorPartner !== undefined && (ancestorPartner === b || to.isAncestor(b, ancestorPartner))) {
      throw invariantViolation(mergeErrors.matchingAncestry(a));
    }
  }
}
