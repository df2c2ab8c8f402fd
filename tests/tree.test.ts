/**
 * Tests for the arena syntax tree and its builder.
 */

import { describe, it, expect } from "vitest";
import { SyntaxTreeBuilder, formatTree } from "../src/tree/index.js";
import { buildTree, group } from "./helpers/trees.js";

describe("SyntaxTreeBuilder", () => {
  // list [pair [a b] c] over "a b c"
  const tree = buildTree("list", group("pair", "a", "b"), "c");

  it("should store nodes in preorder with spans and sizes", () => {
    expect(tree.size).toBe(5);
    expect(tree.preorder()).toEqual([0, 1, 2, 3, 4]);
    expect(tree.kind(0)).toBe("list");
    expect(tree.kind(1)).toBe("pair");
    expect(tree.node(0)).toMatchObject({ start: 0, end: 5, parent: -1, size: 5, depth: 0 });
    expect(tree.node(1)).toMatchObject({ start: 0, end: 3, parent: 0, index: 0, size: 3, depth: 1 });
    expect(tree.node(4)).toMatchObject({ start: 4, end: 5, parent: 0, index: 1, text: "c", depth: 1 });
    expect(tree.children(1)).toEqual([2, 3]);
  });

  it("should navigate parents and siblings", () => {
    expect(tree.parentOf(0)).toBeUndefined();
    expect(tree.parentOf(3)).toBe(1);
    expect(tree.previousSibling(4)).toBe(1);
    expect(tree.previousSibling(2)).toBeUndefined();
    expect(tree.nextSibling(1)).toBe(4);
    expect(tree.nextSibling(4)).toBeUndefined();
    expect(tree.nextSibling(0)).toBeUndefined();
  });

  it("should return the gap only between adjacent siblings", () => {
    expect(tree.gapBetween(1, 4)).toBe(" ");
    expect(tree.gapBetween(2, 3)).toBe(" ");
    expect(tree.gapBetween(2, 4)).toBeUndefined();
    expect(tree.gapBetween(4, 1)).toBeUndefined();
  });

  it("should answer ancestry and subtree queries", () => {
    expect(tree.isAncestor(0, 3)).toBe(true);
    expect(tree.isAncestor(1, 3)).toBe(true);
    expect(tree.isAncestor(1, 4)).toBe(false);
    expect(tree.isAncestor(3, 3)).toBe(false);
    expect(tree.descendants(1)).toEqual([2, 3]);
    expect(tree.inSubtree(1, 1)).toBe(true);
    expect(tree.inSubtree(1, 3)).toBe(true);
    expect(tree.inSubtree(1, 4)).toBe(false);
    expect(tree.postorder()).toEqual([2, 3, 1, 4, 0]);
  });

  it("should slice node text from the source", () => {
    expect(tree.textOf(1)).toBe("a b");
    expect(tree.textOf(0)).toBe("a b c");
    expect(tree.isLeaf(1)).toBe(false);
    expect(tree.isLeaf(2)).toBe(true);
  });

  it("should drop empty leaves and composites without leaves", () => {
    const builder = new SyntaxTreeBuilder("a", "root");
    builder.open("empty");
    builder.leaf("word", 0, "");
    builder.close();
    builder.leaf("word", 0, "a");
    const built = builder.build();

    expect(built.size).toBe(2);
    expect(built.kind(1)).toBe("word");
  });

  it("should let the root span the whole source", () => {
    const builder = new SyntaxTreeBuilder("  x\n", "root");
    builder.leaf("word", 2, "x");
    const built = builder.build();

    expect(built.node(0)).toMatchObject({ start: 0, end: 4 });
    expect(built.node(1)).toMatchObject({ start: 2, end: 3 });
  });

  it("should reject unbalanced open and close calls", () => {
    const builder = new SyntaxTreeBuilder("", "root");
    expect(() => builder.close()).toThrow("Cannot close the root node");

    builder.open("pair");
    expect(builder.openDepth).toBe(1);
    expect(() => builder.build()).toThrow("1 node(s) left open");
  });

  it("should throw a RangeError for unknown ids", () => {
    expect(() => tree.node(99)).toThrow(RangeError);
  });
});

describe("structural hashes", () => {
  it("should ignore whitespace between leaves", () => {
    const spaced = new SyntaxTreeBuilder("a    b", "list");
    spaced.open("pair");
    spaced.leaf("word", 0, "a");
    spaced.leaf("word", 5, "b");
    spaced.close();

    const compact = buildTree("list", group("pair", "a", "b"));
    expect(spaced.build().isomorphicTo(compact)).toBe(true);
  });

  it("should differ when a leaf text or a kind differs", () => {
    const original = buildTree("list", group("pair", "a", "b"));
    expect(original.isomorphicTo(buildTree("list", group("pair", "a", "c")))).toBe(false);
    expect(original.isomorphicTo(buildTree("list", group("item", "a", "b")))).toBe(false);
    expect(original.isomorphicTo(buildTree("list", "a", "b"))).toBe(false);
  });

  it("should give equal subtrees equal hashes at any position", () => {
    const tree = buildTree("list", group("pair", "a", "b"), "c", group("pair", "a", "b"));
    expect(tree.node(1).hash).toBe(tree.node(5).hash);
    expect(tree.node(1).hash).toHaveLength(20);
  });
});

describe("formatTree", () => {
  it("should print one indented line per node", () => {
    const tree = buildTree("list", group("pair", "a", "b"), "c");

    expect(formatTree(tree)).toBe(
      [
        "list [0..5]",
        "  pair [0..3]",
        '    word [0..1] "a"',
        '    word [2..3] "b"',
        '  word [4..5] "c"',
        "",
      ].join("\n"),
    );
  });
});
