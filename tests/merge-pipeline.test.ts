/**
 * Tests for the structured merge pipeline, from three texts to merged text.
 */

import { describe, it, expect } from "vitest";
import { GrammarRegistry, YamlGrammar, createDefaultRegistry } from "../src/grammar/index.js";
import {
  StructuralMergeError,
  diffTrees,
  matchTrees,
  mergeScripts,
  structuredMerge,
  type MergeOutcome,
  type StructuredMergeOptions,
} from "../src/merge/index.js";
import type { SyntaxTree } from "../src/tree/index.js";
import { buildTree, group, testLookup } from "./helpers/trees.js";

const options: StructuredMergeOptions = { registry: createDefaultRegistry() };

function merge(base: string, left: string, right: string, extra: Partial<StructuredMergeOptions> = {}): MergeOutcome {
  return structuredMerge({ base, left, right, grammar: "yaml" }, { ...options, ...extra });
}

function mergeJson(base: string, left: string, right: string): MergeOutcome {
  return structuredMerge({ base, left, right, grammar: "json" }, options);
}

function mergedText(base: string, left: string, right: string): string {
  const outcome = merge(base, left, right);
  if (outcome.status === "unavailable") throw new Error(outcome.message);
  return outcome.text;
}

function reasons(outcome: MergeOutcome): Record<string, string> {
  if (outcome.status === "unavailable" || outcome.result.status === "clean") return {};
  return Object.fromEntries([...outcome.result.conflicts].map(([key, region]) => [key, region.reason]));
}

describe("structuredMerge", () => {
  describe("clean merges", () => {
    it("should return the text unchanged when nothing changed", () => {
      const text = "# settings\na: 1\nlist:\n  - x\n  - y\n";
      const outcome = merge(text, text, text);

      expect(outcome.status).toBe("clean");
      expect(outcome.status !== "unavailable" && outcome.text).toBe(text);
    });

    it("should return the changed side when only one side changed", () => {
      const base = "a: 1\nb: 2\n";
      const changed = "a: 1\nb: 3\nc: 4\n";

      expect(mergedText(base, base, changed)).toBe(changed);
      expect(mergedText(base, changed, base)).toBe(changed);
    });

    it("should combine edits to different entries", () => {
      expect(mergedText("a: 1\nb: 2\n", "a: 10\nb: 2\n", "a: 1\nb: 20\n")).toBe("a: 10\nb: 20\n");
    });

    it("should accept the same edit made on both sides", () => {
      expect(mergedText("a: 1\n", "a: 2\n", "a: 2\n")).toBe("a: 2\n");
      expect(mergedText("- a\n", "- a\n- b\n", "- a\n- b\n")).toBe("- a\n- b\n");
    });

    it("should take a removal from a flow list", () => {
      const base = 'default: ["bar", "baz"]\n';
      const right = 'default: ["baz"]\n';

      expect(mergedText(base, base, right)).toBe(right);
    });

    it("should union insertions into an unordered list", () => {
      expect(
        mergedText(
          "name: lib\ndeps: [A, B]\n",
          "name: lib\ndeps: [A, B, C]\n",
          "name: lib\nloads: [rules]\ndeps: [A, B, D]\n",
        ),
      ).toBe("name: lib\nloads: [rules]\ndeps: [A, B, C, D]\n");
    });

    it("should combine independent moves in an ordered list", () => {
      expect(mergedText("- a\n- b\n- c\n", "- c\n- a\n- b\n", "- b\n- c\n- a\n")).toBe("- c\n- b\n- a\n");
    });

    it("should apply a deletion both sides made once", () => {
      expect(mergedText("a: 1\nb: 2\nc: 3\n", "a: 1\nc: 3\n", "a: 1\nc: 3\n")).toBe("a: 1\nc: 3\n");
      expect(mergedText("x: [1, 2, 3]\n", "x: [1, 3]\n", "x: [1, 3]\n")).toBe("x: [1, 3]\n");
    });

    it("should keep a mapping entry both sides added once", () => {
      expect(mergedText("a: 1\n", "a: 1\nb: 2\n", "a: 1\nb: 2\n")).toBe("a: 1\nb: 2\n");
    });

    it("should keep an element both sides added to a set once", () => {
      expect(mergedText("deps: [A]\n", "deps: [A, B, C]\n", "deps: [A, B]\n")).toBe("deps: [A, B, C]\n");
    });

    it("should remove a flow element with its comma", () => {
      expect(mergedText("x: [1, 2, 3]\n", "x: [1, 5, 3]\n", "x: [1, 2]\n")).toBe("x: [1, 5]\n");
    });

    it("should produce text that parses again", () => {
      const cases: Array<[string, string, string]> = [
        ["x: [1, 2, 3]\n", "x: [1, 5, 3]\n", "x: [1, 2]\n"],
        ["x: [1, 2, 3]\n", "x: [1, 3]\n", "x: [1, 3]\n"],
        ["deps: [A]\n", "deps: [A, B, C]\n", "deps: [A, B]\n"],
        ["name: lib\ndeps: [A, B]\n", "name: lib\ndeps: [A, B, C]\n", "name: lib\ndeps: [A, B, D]\n"],
        ['default: ["bar", "baz"]\n', 'default: ["bar", "baz"]\n', 'default: ["baz"]\n'],
      ];
      const grammar = new YamlGrammar();
      for (const [base, left, right] of cases) {
        const outcome = merge(base, left, right);
        expect(outcome.status).toBe("clean");
        if (outcome.status === "clean") expect(() => grammar.parse(outcome.text)).not.toThrow();
      }
    });

    it("should keep whitespace changes from one side next to edits from the other", () => {
      expect(mergedText("a: 1\nb: 2\n", "a: 1\n\nb: 2\n", "a: 1\nb: 3\n")).toBe("a: 1\n\nb: 3\n");
      expect(mergedText("a: 1\nb: 2\n", "a:   1\nb: 2\n", "a: 1\nb: 3\n")).toBe("a:   1\nb: 3\n");
    });
  });

  describe("conflicts", () => {
    it("should narrow an update conflict to the changed entry", () => {
      const outcome = merge("a: 1\nb: 2\n", "a: 1\nb: 3\n", "a: 1\nb: 4\n");

      expect(outcome.status).toBe("conflicted");
      if (outcome.status === "unavailable") return;
      expect(outcome.text).toBe("a: 1\n<<<<<<< left\nb: 3\n||||||| base\nb: 2\n=======\nb: 4\n>>>>>>> right\n");
      expect(outcome.conflictCount).toBe(1);
      expect(outcome.conflictMass).toBe(10);
      expect(reasons(outcome)).toEqual({ "node:10": "update_update" });
      if (outcome.result.status === "conflicted") {
        expect(outcome.result.conflicts.get("node:10")?.anchor).toEqual({ node: 10 });
      }
    });

    it("should place compact markers around the value only", () => {
      const outcome = merge("a: 1\nb: 2\n", "a: 1\nb: 3\n", "a: 1\nb: 4\n", { markers: { compact: true } });

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "a: 1\nb: \n<<<<<<< left\n3\n||||||| base\n2\n=======\n4\n>>>>>>> right\n\n",
      );
    });

    it("should use custom marker names", () => {
      const outcome = merge("a: 1\n", "a: 2\n", "a: 3\n", {
        markers: { diff3: false, names: { left: "ours", right: "theirs" } },
      });

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "<<<<<<< ours\na: 2\n=======\na: 3\n>>>>>>> theirs\n",
      );
    });

    it("should report different insertions at the same place", () => {
      const outcome = merge("- a\n", "- a\n- b\n", "- a\n- c\n");

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "- a\n<<<<<<< left\n- b\n||||||| base\n=======\n- c\n>>>>>>> right\n",
      );
      expect(reasons(outcome)).toEqual({ "seq:2:3": "insert_insert" });
      if (outcome.status !== "unavailable" && outcome.result.status === "conflicted") {
        expect(outcome.result.conflicts.get("seq:2:3")?.anchor).toEqual({ node: 2, position: 1 });
      }
    });

    it("should report both sides changing the same flow element at that element", () => {
      const outcome = merge("x: [1, 2, 3]\n", "x: [1, 5, 3]\n", "x: [1, 6, 3]\n");

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "<<<<<<< left\nx: [1, 5, 3]\n||||||| base\nx: [1, 2, 3]\n=======\nx: [1, 6, 3]\n>>>>>>> right\n",
      );
      expect(outcome.status !== "unavailable" && outcome.conflictMass).toBe(26);
      expect(reasons(outcome)).toEqual({ "node:12": "update_update" });
    });

    it("should report both sides changing the same JSON array element", () => {
      const outcome = mergeJson("[1, 2, 3]\n", "[1, 5, 3]\n", "[1, 6, 3]\n");

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "<<<<<<< left\n[1, 5, 3]\n||||||| base\n[1, 2, 3]\n=======\n[1, 6, 3]\n>>>>>>> right\n",
      );
      expect(reasons(outcome)).toEqual({ "node:8": "update_update" });
    });

    it("should report a changed flow element the other side removed", () => {
      const outcome = merge("x: [1, 2, 3]\n", "x: [1, 5, 3]\n", "x: [1, 3]\n");

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "<<<<<<< left\nx: [1, 5, 3]\n||||||| base\nx: [1, 2, 3]\n=======\nx: [1, 3]\n>>>>>>> right\n",
      );
      expect(reasons(outcome)).toEqual({ "node:10": "delete_modify" });
    });

    it("should report two different changes to one set element", () => {
      const outcome = merge("deps: [A, B]\n", "deps: [A, B2]\n", "deps: [A, B3]\n");

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "<<<<<<< left\ndeps: [A, B2]\n||||||| base\ndeps: [A, B]\n=======\ndeps: [A, B3]\n>>>>>>> right\n",
      );
      expect(reasons(outcome)).toEqual({ "node:12": "update_update" });
    });

    it("should report the same key added with different values", () => {
      const outcome = merge("a: 1\n", "a: 1\nb: 2\n", "a: 1\nb: 3\n");

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "a: 1\n<<<<<<< left\nb: 2\n||||||| base\n=======\nb: 3\n>>>>>>> right\n",
      );
      expect(reasons(outcome)).toEqual({ "seq:2:3": "insert_insert" });
    });

    it("should report the same JSON key added with different values", () => {
      const outcome = mergeJson('{"a": 1}\n', '{"a": 1, "b": 2}\n', '{"a": 1, "b": 3}\n');

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        '<<<<<<< left\n{"a": 1, "b": 2}\n||||||| base\n=======\n{"a": 1, "b": 3}\n>>>>>>> right\n',
      );
      expect(reasons(outcome)).toEqual({ "seq:2:4": "insert_insert" });
    });

    it("should report a deletion against a modification", () => {
      const outcome = merge("a: 1\nb: 2\n", "a: 1\n", "a: 1\nb: 3\n");

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "a: 1\n<<<<<<< left\n||||||| base\nb: 2\n=======\nb: 3\n>>>>>>> right\n",
      );
      expect(outcome.status !== "unavailable" && outcome.conflictMass).toBe(5);
      expect(reasons(outcome)).toEqual({ "node:7": "delete_modify" });
    });

    it("should put the whole list in conflict when both sides reorder it", () => {
      const outcome = merge("- a\n- b\n- c\n", "- c\n- a\n- b\n", "- a\n- c\n- b\n");

      expect(outcome.status !== "unavailable" && outcome.text).toBe(
        "<<<<<<< left\n- c\n- a\n- b\n||||||| base\n- a\n- b\n- c\n=======\n- a\n- c\n- b\n>>>>>>> right\n",
      );
      expect(reasons(outcome)).toEqual({ "order:2": "concurrent_reorder" });
    });
  });

  describe("unavailable merges", () => {
    it("should report the revision that fails to parse", () => {
      const outcome = merge("a: 1\n", "a: 1\n", "a: [1, 2\n");

      expect(outcome.status).toBe("unavailable");
      if (outcome.status !== "unavailable") return;
      expect(outcome.reason).toBe("PARSE_FAILURE");
      expect(outcome.revision).toBe("right");
      expect(outcome.message.startsWith("Could not parse the right revision: ")).toBe(true);
    });

    it("should report a clean result the grammar rejects", () => {
      class ShortYaml extends YamlGrammar {
        parse(text: string): SyntaxTree {
          if (text.split("\n").length > 3) throw new StructuralMergeError("too many lines", "PARSE_FAILURE");
          return super.parse(text);
        }
      }
      const registry = new GrammarRegistry().register(new ShortYaml());

      expect(merge("a: 1\n", "a: 1\nb: 2\n", "a: 1\nc: 3\n", { registry })).toEqual({
        status: "unavailable",
        reason: "INVALID_RESULT",
        revision: undefined,
        message: "The merged text does not parse: too many lines",
      });
    });

    it("should report an unknown grammar", () => {
      const outcome = structuredMerge({ base: "", left: "", right: "", grammar: "toml" }, options);

      expect(outcome).toEqual({
        status: "unavailable",
        reason: "UNKNOWN_GRAMMAR",
        revision: undefined,
        message: 'No grammar registered under "toml"',
      });
    });
  });

  it("should report each stage to the debug callback", () => {
    const lines: string[] = [];
    merge("a: 1\n", "a: 1\n", "a: 2\n", { debug: (line) => lines.push(line) });

    expect(lines).toHaveLength(5);
    expect(lines[0].startsWith("parsed with yaml: ")).toBe(true);
    expect(lines[3]).toMatch(/^merged with 0 conflicts in /);
  });
});

describe("mergeScripts", () => {
  function mergeTrees(...[base, left, right]: ReturnType<typeof buildTree>[]) {
    const leftScript = diffTrees("left", matchTrees(base, left, testLookup), testLookup);
    const rightScript = diffTrees("right", matchTrees(base, right, testLookup), testLookup);
    return mergeScripts(base, leftScript, rightScript, testLookup);
  }

  it("should report a node moved to two different parents", () => {
    // Base ids: 1 pbox, 3 qbox, 5 item
    const result = mergeTrees(
      buildTree("root", group("pbox", "a"), group("qbox", "b"), group("item", "m", "n")),
      buildTree("root", group("pbox", "a", group("item", "m", "n")), group("qbox", "b")),
      buildTree("root", group("pbox", "a"), group("qbox", "b", group("item", "m", "n"))),
    );

    expect(result.status).toBe("conflicted");
    if (result.status !== "conflicted") return;
    expect([...result.conflicts.keys()]).toEqual(["node:5"]);
    expect(result.conflicts.get("node:5")?.reason).toBe("move_move");
  });

  it("should refuse moves that would nest two nodes inside each other", () => {
    // Base ids: 1 pbox, 4 qbox
    const result = mergeTrees(
      buildTree("root", group("pbox", "a", "x"), group("qbox", "b", "y")),
      buildTree("root", group("pbox", "a", "x", group("qbox", "b", "y"))),
      buildTree("root", group("qbox", "b", "y", group("pbox", "a", "x"))),
    );

    expect(result.status).toBe("conflicted");
    if (result.status !== "conflicted") return;
    expect([...result.conflicts.keys()]).toEqual(["node:1"]);
    expect(result.conflicts.get("node:1")?.reason).toBe("cyclic_move");
  });
});
