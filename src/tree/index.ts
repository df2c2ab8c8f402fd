/**
 * Syntax tree arena.
 */

export type { SyntaxNode } from "./syntax-tree.js";
export { SyntaxTree, SyntaxTreeBuilder, formatTree } from "./syntax-tree.js";
