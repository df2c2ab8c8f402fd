/**
 * Helpers over the capability table.
 */

import type { SyntaxTree } from "../tree/index.js";
import type { CapabilityLookup } from "./types.js";

/**
 * Text of a node's identity key, if its kind declares one and the node has a
 * child of a key kind.
 */
export function identityKey(
  tree: SyntaxTree,
  node: number,
  lookup: CapabilityLookup,
): string | undefined {
  const rule = lookup.capabilities(tree.kind(node)).identity;
  if (!rule) return undefined;
  for (const child of tree.children(node)) {
    if (rule.childKinds.includes(tree.kind(child))) {
      return tree.textOf(child);
    }
  }
  return undefined;
}
