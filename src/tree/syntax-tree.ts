/**
 * Arena-backed syntax trees.
 *
 * Every revision of a file owns exactly one SyntaxTree. Nodes are addressed by
 * their index in the arena, never by object reference, so matchings and edit
 * scripts can point into three independently owned trees without aliasing.
 *
 * Spans are offsets into the revision's source string. Composite nodes span
 * the hull of their children, except the root which spans the whole text. The
 * text between two sibling spans is whitespace only.
 */

import { createHash } from "node:crypto";

/**
 * A node in the arena
 */
export interface SyntaxNode {
  /** Index of the node in its tree */
  id: number;
  /** Grammar-specific kind tag */
  kind: string;
  /** Start offset (inclusive) */
  start: number;
  /** End offset (exclusive) */
  end: number;
  /** Parent index, -1 for the root */
  parent: number;
  /** Position among the parent's children */
  index: number;
  /** Child indices in document order (empty for leaves) */
  children: number[];
  /** Literal text, set on leaves only */
  text?: string;
  /** Structural hash over kind, leaf text and children hashes */
  hash: string;
  /** Number of nodes in the subtree, this node included */
  size: number;
  /** Distance from the root */
  depth: number;
}

/**
 * An immutable syntax tree for one revision.
 */
export class SyntaxTree {
  private readonly nodes: readonly SyntaxNode[];

  constructor(
    readonly source: string,
    nodes: SyntaxNode[],
  ) {
    if (nodes.length === 0) {
      throw new Error("A syntax tree needs at least a root node");
    }
    this.nodes = nodes;
  }

  /** Index of the root node (always 0: nodes are stored in preorder) */
  get root(): number {
    return 0;
  }

  get size(): number {
    return this.nodes.length;
  }

  node(id: number): SyntaxNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new RangeError(`No node ${id} in a tree of ${this.nodes.length} nodes`);
    }
    return node;
  }

  kind(id: number): string {
    return this.node(id).kind;
  }

  children(id: number): readonly number[] {
    return this.node(id).children;
  }

  isLeaf(id: number): boolean {
    return this.node(id).children.length === 0;
  }

  /** Source text covered by the node's span */
  textOf(id: number): string {
    const node = this.node(id);
    return this.source.slice(node.start, node.end);
  }

  /** Parent index, or undefined for the root */
  parentOf(id: number): number | undefined {
    const parent = this.node(id).parent;
    return parent < 0 ? undefined : parent;
  }

  /** Previous sibling, if any */
  previousSibling(id: number): number | undefined {
    const node = this.node(id);
    if (node.parent < 0 || node.index === 0) return undefined;
    return this.node(node.parent).children[node.index - 1];
  }

  /** Next sibling, if any */
  nextSibling(id: number): number | undefined {
    const node = this.node(id);
    if (node.parent < 0) return undefined;
    const siblings = this.node(node.parent).children;
    return node.index + 1 < siblings.length ? siblings[node.index + 1] : undefined;
  }

  /**
   * Whitespace between a node and the sibling that directly follows it.
   * Returns undefined when `next` is not the immediate next sibling.
   */
  gapBetween(previous: number, next: number): string | undefined {
    if (this.nextSibling(previous) !== next) return undefined;
    return this.source.slice(this.node(previous).end, this.node(next).start);
  }

  /** Whether `ancestor` is a proper ancestor of `id` */
  isAncestor(ancestor: number, id: number): boolean {
    const target = this.node(ancestor);
    let current = this.node(id);
    while (current.parent >= 0 && current.depth > target.depth) {
      current = this.node(current.parent);
      if (current.id === ancestor) return true;
    }
    return false;
  }

  /** All node indices in preorder (the arena order) */
  preorder(): number[] {
    return this.nodes.map((node) => node.id);
  }

  /** All node indices in postorder */
  postorder(): number[] {
    const result: number[] = [];
    const stack: Array<{ id: number; expanded: boolean }> = [
      { id: this.root, expanded: false },
    ];
    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame === undefined) break;
      if (frame.expanded) {
        result.push(frame.id);
        continue;
      }
      stack.push({ id: frame.id, expanded: true });
      const children = this.node(frame.id).children;
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ id: children[i], expanded: false });
      }
    }
    return result;
  }

  /**
   * Proper descendants of a node in preorder. Preorder storage means a
   * subtree occupies a contiguous index range.
   */
  descendants(id: number): number[] {
    const node = this.node(id);
    const result: number[] = [];
    for (let i = id + 1; i < id + node.size; i++) {
      result.push(i);
    }
    return result;
  }

  /** Whether `id` lies in the subtree rooted at `ancestor` (inclusive) */
  inSubtree(ancestor: number, id: number): boolean {
    return id >= ancestor && id < ancestor + this.node(ancestor).size;
  }

  /** Whether the two trees have the same structure and leaf texts */
  isomorphicTo(other: SyntaxTree): boolean {
    return this.node(this.root).hash === other.node(other.root).hash;
  }
}

/**
 * Draft node used while a tree is being built
 */
interface DraftNode {
  kind: string;
  start: number;
  end: number;
  text?: string;
  children: DraftNode[];
}

interface DraftFrame {
  kind: string;
  children: DraftNode[];
}

/**
 * Incremental builder used by grammar adapters.
 *
 * Adapters open composite nodes, append leaves with their offsets and close
 * the composites again. Composites that end up without any leaf are dropped.
 */
export class SyntaxTreeBuilder {
  private readonly stack: DraftFrame[];

  constructor(
    private readonly source: string,
    rootKind: string,
  ) {
    this.stack = [{ kind: rootKind, children: [] }];
  }

  open(kind: string): void {
    this.stack.push({ kind, children: [] });
  }

  leaf(kind: string, start: number, text: string): void {
    if (text.length === 0) return;
    this.current().children.push({
      kind,
      start,
      end: start + text.length,
      text,
      children: [],
    });
  }

  close(): void {
    if (this.stack.length <= 1) {
      throw new Error("Cannot close the root node");
    }
    const frame = this.stack.pop();
    if (frame === undefined || frame.children.length === 0) return;
    const first = frame.children[0];
    const last = frame.children[frame.children.length - 1];
    this.current().children.push({
      kind: frame.kind,
      start: first.start,
      end: last.end,
      children: frame.children,
    });
  }

  /** Depth of currently open composites, root excluded */
  get openDepth(): number {
    return this.stack.length - 1;
  }

  build(): SyntaxTree {
    if (this.stack.length !== 1) {
      throw new Error(`${this.stack.length - 1} node(s) left open`);
    }
    const root: DraftNode = {
      kind: this.stack[0].kind,
      start: 0,
      end: this.source.length,
      children: this.stack[0].children,
    };
    return new SyntaxTree(this.source, flatten(root));
  }

  private current(): DraftFrame {
    return this.stack[this.stack.length - 1];
  }
}

/**
 * Lay out the draft in preorder and compute hashes and sizes bottom-up.
 */
function flatten(root: DraftNode): SyntaxNode[] {
  const nodes: SyntaxNode[] = [];
  const stack: Array<{ draft: DraftNode; parent: number; index: number; depth: number }> = [
    { draft: root, parent: -1, index: 0, depth: 0 },
  ];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined) break;
    const { draft } = frame;
    const id = nodes.length;
    const node: SyntaxNode = {
      id,
      kind: draft.kind,
      start: draft.start,
      end: draft.end,
      parent: frame.parent,
      index: frame.index,
      children: [],
      hash: "",
      size: 1,
      depth: frame.depth,
    };
    if (draft.text !== undefined) node.text = draft.text;
    nodes.push(node);
    if (frame.parent >= 0) nodes[frame.parent].children.push(id);

    for (let i = draft.children.length - 1; i >= 0; i--) {
      stack.push({ draft: draft.children[i], parent: id, index: i, depth: frame.depth + 1 });
    }
  }

  // Children always have higher ids than their parent.
  for (let id = nodes.length - 1; id >= 0; id--) {
    const node = nodes[id];
    const hash = createHash("sha1").update(node.kind).update("\u0000");
    if (node.children.length === 0) {
      hash.update(node.text ?? "");
    } else {
      for (const child of node.children) {
        node.size += nodes[child].size;
        hash.update(nodes[child].hash).update("\u0001");
      }
    }
    node.hash = hash.digest("hex").slice(0, 20);
  }

  return nodes;
}

/**
 * Render a tree as an indented outline: kind, span and leaf text.
 */
export function formatTree(tree: SyntaxTree): string {
  const lines: string[] = [];
  const stack = [tree.root];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    const node = tree.node(id);
    const indent = "  ".repeat(node.depth);
    const text = node.text === undefined ? "" : ` ${JSON.stringify(node.text)}`;
    lines.push(`${indent}${node.kind} [${node.start}..${node.end}]${text}`);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return lines.join("\n") + "\n";
}
