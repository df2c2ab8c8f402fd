/**
 * Tests for the source renderer and its text helpers.
 */

import { describe, it, expect } from "vitest";
import { YamlGrammar } from "../src/grammar/index.js";
import {
  DEFAULT_MARKER_OPTIONS,
  chooseText,
  diffTrees,
  firstDifference,
  matchTrees,
  mergeScripts,
  renderMerge,
  renderSyntaxTree,
  type RevisionSet,
} from "../src/merge/index.js";
import { buildTree, group } from "./helpers/trees.js";

const grammar = new YamlGrammar();

function render(base: string, left: string, right: string) {
  const revisions: RevisionSet = { base: grammar.parse(base), left: grammar.parse(left), right: grammar.parse(right) };
  const leftScript = diffTrees("left", matchTrees(revisions.base, revisions.left, grammar), grammar);
  const rightScript = diffTrees("right", matchTrees(revisions.base, revisions.right, grammar), grammar);
  return renderMerge(mergeScripts(revisions.base, leftScript, rightScript, grammar), revisions, DEFAULT_MARKER_OPTIONS);
}

describe("renderMerge", () => {
  it("should copy an untouched document verbatim", () => {
    const text = "a:   1   # spaced\nlist: [ x,y ]\n";

    expect(render(text, text, text)).toEqual({ text, conflictCount: 0, conflictMass: 0 });
  });

  it("should leave the base section empty for two insertions at one place", () => {
    expect(render("- a\n", "- a\n- b\n", "- a\n- c\n").text).toBe(
      "- a\n<<<<<<< left\n- b\n||||||| base\n=======\n- c\n>>>>>>> right\n",
    );
  });
});

describe("chooseText", () => {
  it("should take the side that changed", () => {
    expect(chooseText({ base: "a", left: "a", right: "b" })).toBe("b");
    expect(chooseText({ base: "a", left: "b", right: "a" })).toBe("b");
  });

  it("should prefer left when both sides changed", () => {
    expect(chooseText({ base: "a", left: "b", right: "c" })).toBe("b");
  });

  it("should fall back to whichever candidate exists", () => {
    expect(chooseText({ right: "r", base: "b" })).toBe("r");
    expect(chooseText({ base: "b" })).toBe("b");
    expect(chooseText({})).toBeUndefined();
  });
});

describe("firstDifference", () => {
  it("should return -1 for equal texts", () => {
    expect(firstDifference("abc", "abc")).toBe(-1);
  });

  it("should return the offset of the first differing character", () => {
    expect(firstDifference("abc", "abd")).toBe(2);
    expect(firstDifference("ab", "abc")).toBe(2);
  });
});

describe("renderSyntaxTree", () => {
  it("should rebuild the source from leaves and gaps", () => {
    const tree = buildTree("root", "a", group("pair", "k", "1"));

    expect(renderSyntaxTree(tree)).toBe("a k 1");
  });
});
