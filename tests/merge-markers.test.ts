/**
 * Tests for conflict marker layout.
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_MARKER_OPTIONS, layoutSegments, type MarkerOptions, type Segment } from "../src/merge/index.js";

const conflict = (base: string, left: string, right: string, hasBase = true): Segment => ({
  type: "conflict",
  base,
  left,
  right,
  hasBase,
});
const text = (value: string): Segment => ({ type: "text", text: value });

describe("layoutSegments", () => {
  const oneConflict = [text("a: 1\nb: "), conflict("2", "3", "4"), text("\nc: 5\n")];

  it("should pass plain text through", () => {
    expect(layoutSegments([text("a: 1\n")], DEFAULT_MARKER_OPTIONS)).toEqual({
      text: "a: 1\n",
      conflictCount: 0,
      conflictMass: 0,
    });
  });

  it("should widen a conflict to whole lines", () => {
    const rendered = layoutSegments(oneConflict, DEFAULT_MARKER_OPTIONS);

    expect(rendered.text).toBe(
      "a: 1\n<<<<<<< left\nb: 3\n||||||| base\nb: 2\n=======\nb: 4\n>>>>>>> right\nc: 5\n",
    );
    expect(rendered.conflictCount).toBe(1);
    expect(rendered.conflictMass).toBe(10);
  });

  it("should leave the base section out without diff3", () => {
    const rendered = layoutSegments(oneConflict, { ...DEFAULT_MARKER_OPTIONS, diff3: false });

    expect(rendered.text).toBe("a: 1\n<<<<<<< left\nb: 3\n=======\nb: 4\n>>>>>>> right\nc: 5\n");
  });

  it("should keep compact conflicts narrow", () => {
    const rendered = layoutSegments(oneConflict, { ...DEFAULT_MARKER_OPTIONS, compact: true });

    expect(rendered.text).toBe(
      "a: 1\nb: \n<<<<<<< left\n3\n||||||| base\n2\n=======\n4\n>>>>>>> right\n\nc: 5\n",
    );
    expect(rendered.conflictMass).toBe(2);
  });

  it("should fuse conflicts that share a line", () => {
    const rendered = layoutSegments(
      [text("x: ["), conflict("1", "2", "3"), text(", "), conflict("4", "5", "6"), text("]\n")],
      DEFAULT_MARKER_OPTIONS,
    );

    expect(rendered).toEqual({
      text: "<<<<<<< left\nx: [2, 5]\n||||||| base\nx: [1, 4]\n=======\nx: [3, 6]\n>>>>>>> right\n",
      conflictCount: 1,
      conflictMass: 20,
    });
  });

  it("should fuse only adjacent conflicts in compact mode", () => {
    const rendered = layoutSegments(
      [conflict("1", "2", "3"), conflict("4", "5", "6"), text(", "), conflict("7", "8", "9")],
      { ...DEFAULT_MARKER_OPTIONS, compact: true, diff3: false },
    );

    expect(rendered.conflictCount).toBe(2);
    expect(rendered.text).toBe(
      "<<<<<<< left\n25\n=======\n36\n>>>>>>> right\n, \n<<<<<<< left\n8\n=======\n9\n>>>>>>> right\n",
    );
  });

  it("should leave a side without content empty", () => {
    const rendered = layoutSegments([text("a: 1\n"), conflict("b: 2", "", "b: 3"), text("\n")], DEFAULT_MARKER_OPTIONS);

    expect(rendered.text).toBe("a: 1\n<<<<<<< left\n||||||| base\nb: 2\n=======\nb: 3\n>>>>>>> right\n");
    expect(rendered.conflictMass).toBe(5);
  });

  it("should keep the widened line out of a base section the ancestor has no content for", () => {
    const rendered = layoutSegments([text("x: [1, "), conflict("", "2", "3", false), text("]\n")], DEFAULT_MARKER_OPTIONS);

    expect(rendered.text).toBe("<<<<<<< left\nx: [1, 2]\n||||||| base\n=======\nx: [1, 3]\n>>>>>>> right\n");
  });

  it("should keep the widened line when a fused conflict has base content", () => {
    const rendered = layoutSegments(
      [text("x: ["), conflict("", "0, ", "", false), text("1, "), conflict("2", "5", "6"), text("]\n")],
      DEFAULT_MARKER_OPTIONS,
    );

    expect(rendered.text).toBe(
      "<<<<<<< left\nx: [0, 1, 5]\n||||||| base\nx: [1, 2]\n=======\nx: [1, 6]\n>>>>>>> right\n",
    );
  });

  it("should use the configured marker size and names", () => {
    const options: MarkerOptions = {
      size: 9,
      diff3: true,
      compact: false,
      names: { base: "ancestor", left: "ours", right: "theirs" },
    };
    const rendered = layoutSegments([text("a\n"), conflict("", "b", "c", false)], options);

    expect(rendered.text).toBe(
      "a\n<<<<<<<<< ours\nb\n||||||||| ancestor\n=========\nc\n>>>>>>>>> theirs\n",
    );
    expect(rendered.conflictMass).toBe(2);
  });
});
