/**
 * Source renderer.
 *
 * Emits the merged tree as text. Elements that reproduce a revision exactly
 * are copied from that revision's source; everything else is assembled child
 * by child with whitespace taken from the revisions.
 */

import type { SyntaxTree } from "../tree/index.js";
import { mergeErrors } from "../strings/errors.js";
import type {
  ConflictContent,
  ConflictRegion,
  MarkerOptions,
  MergedChild,
  MergedElement,
  MergeResult,
  NodeRef,
  RenderedMerge,
  Revision,
  RevisionSet,
} from "./types.js";
import { invariantViolation } from "./errors.js";
import { layoutSegments, type Segment } from "./markers.js";
import { runText } from "./spans.js";

const PREFERENCE: readonly Revision[] = ["left", "right", "base"];

/** Whitespace the grammar layer leaves between leaves */
const GAP_CHARACTERS = /[^ \t\r\n]/g;

/**
 * Render a merge result, conflicts included
 */
export function renderMerge(
  result: MergeResult,
  revisions: RevisionSet,
  options: MarkerOptions,
): RenderedMerge {
  const conflicts = result.status === "conflicted" ? result.conflicts : new Map<string, ConflictRegion>();
  const segments = new SegmentRenderer(revisions, conflicts).render(result.tree.root);
  return layoutSegments(segments, options);
}

/**
 * Three-way choice between candidate texts: left wins unless it is unchanged
 * from base, in which case right wins
 */
export function chooseText(candidates: Partial<Record<Revision, string>>): string | undefined {
  const { base, left, right } = candidates;
  if (base !== undefined && left !== undefined && right !== undefined) {
    return left === base ? right : left;
  }
  return left ?? right ?? base;
}

type Work = { type: "text"; text: string } | { type: "child"; child: MergedChild };

class SegmentRenderer {
  private readonly segments: Segment[] = [];

  constructor(
    private readonly revisions: RevisionSet,
    private readonly conflicts: Map<string, ConflictRegion>,
  ) {}

  render(root: MergedElement): Segment[] {
    const stack: Work[] = [];
    const copied = this.verbatimRevision(root);
    if (copied !== undefined) {
      stack.push({ type: "text", text: this.spanOf(root, copied) });
    } else {
      const [lead, trail] = this.rootEdges(root);
      stack.push({ type: "text", text: trail });
      this.pushChildren(stack, root);
      stack.push({ type: "text", text: lead });
    }

    while (stack.length > 0) {
      const work = stack.pop();
      if (work === undefined) break;
      if (work.type === "text") {
        this.text(work.text);
        continue;
      }
      const { child } = work;
      if (child.type === "conflict") {
        this.conflict(child.key);
        continue;
      }
      const copied = this.verbatimRevision(child);
      if (copied !== undefined) {
        this.text(this.spanOf(child, copied));
      } else if (child.text !== undefined) {
        this.text(child.text);
      } else if (child.atomicFrom !== undefined) {
        this.text(this.spanOf(child, child.atomicFrom));
      } else {
        this.pushChildren(stack, child);
      }
    }
    return this.segments;
  }

  private text(text: string): void {
    if (text.length === 0) return;
    const last = this.segments[this.segments.length - 1];
    if (last?.type === "text") last.text += text;
    else this.segments.push({ type: "text", text });
  }

  private pushChildren(stack: Work[], element: MergedElement): void {
    const { children } = element;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ type: "child", child: children[i] });
      if (i > 0) stack.push({ type: "text", text: this.gap(element, children[i - 1], children[i]) });
    }
  }

  private spanOf(element: MergedElement, revision: Revision): string {
    const id = element.reps[revision];
    if (id === undefined) {
      throw invariantViolation(mergeErrors.missingNode(revision));
    }
    return this.revisions[revision].textOf(id);
  }

  /**
   * Revision to copy an element from. Only elements that reproduce every
   * revision they appear in are copied; otherwise, or when all three
   * revisions have the same structure but three different texts, the element
   * is assembled child by child so that whitespace changes from each side
   * survive.
   */
  private verbatimRevision(element: MergedElement): Revision | undefined {
    const { pristine } = element;
    const present = PREFERENCE.filter((revision) => element.reps[revision] !== undefined);
    if (pristine.length < present.length) return undefined;
    if (pristine.length < 3) return pristine[0];
    const left = this.spanOf(element, "left");
    const right = this.spanOf(element, "right");
    const base = this.spanOf(element, "base");
    if (left === base) return "right";
    if (right === base || left === right) return "left";
    return element.children.length > 0 ? undefined : "left";
  }

  /**
   * Text before the first and after the last child of the root
   */
  private rootEdges(root: MergedElement): [string, string] {
    const leads: Partial<Record<Revision, string>> = {};
    const trails: Partial<Record<Revision, string>> = {};
    for (const revision of PREFERENCE) {
      const id = root.reps[revision];
      if (id === undefined) continue;
      const tree = this.revisions[revision];
      const node = tree.node(id);
      if (node.children.length === 0) {
        leads[revision] = tree.source;
        trails[revision] = "";
        continue;
      }
      const first = tree.node(node.children[0]);
      const last = tree.node(node.children[node.children.length - 1]);
      leads[revision] = tree.source.slice(0, first.start);
      trails[revision] = tree.source.slice(last.end);
    }
    return [chooseText(leads) ?? "", chooseText(trails) ?? ""];
  }

  /**
   * Nodes a child starts or ends with, per revision
   */
  private edges(child: MergedChild, edge: "first" | "last"): NodeRef[] {
    if (child.type === "conflict") {
      return this.region(child.key).bounds[edge];
    }
    return PREFERENCE.flatMap((revision) => {
      const node = child.reps[revision];
      return node === undefined ? [] : [{ revision, node }];
    });
  }

  /**
   * Whitespace between two merged siblings
   */
  private gap(parent: MergedElement, previous: MergedChild, next: MergedChild): string {
    const ends = this.edges(previous, "last");
    const starts = this.edges(next, "first");

    const found: Partial<Record<Revision, string>> = {};
    for (const end of ends) {
      for (const start of starts) {
        if (end.revision !== start.revision || found[end.revision] !== undefined) continue;
        const gap = this.revisions[end.revision].gapBetween(end.node, start.node);
        if (gap !== undefined) found[end.revision] = gap;
      }
    }
    const chosen = chooseText(found);
    if (chosen !== undefined) return chosen;

    for (const start of starts) {
      const tree = this.revisions[start.revision];
      const before = tree.previousSibling(start.node);
      if (before !== undefined) return between(tree, before, start.node);
    }
    for (const end of ends) {
      const tree = this.revisions[end.revision];
      const after = tree.nextSibling(end.node);
      if (after !== undefined) return between(tree, end.node, after);
    }
    for (const revision of PREFERENCE) {
      const id = parent.reps[revision];
      if (id === undefined) continue;
      const tree = this.revisions[revision];
      const children = tree.children(id);
      if (children.length >= 2) return between(tree, children[0], children[1]);
    }
    return " ";
  }

  private region(key: string): ConflictRegion {
    const region = this.conflicts.get(key);
    if (!region) {
      throw invariantViolation(mergeErrors.missingConflict(key));
    }
    return region;
  }

  private conflict(key: string): void {
    const region = this.region(key);
    this.text(region.leading);
    this.segments.push({
      type: "conflict",
      base: this.content(region.base),
      left: this.content(region.left),
      right: this.content(region.right),
      hasBase: region.base !== undefined && region.base.nodes.length > 0,
    });
    this.text(region.trailing);
  }

  private content(content: ConflictContent | undefined): string {
    if (!content) return "";
    return runText(this.revisions[content.revision], content.nodes);
  }
}

function between(tree: SyntaxTree, previous: number, next: number): string {
  return tree.source.slice(tree.node(previous).end, tree.node(next).start);
}

/**
 * Render an unmodified tree from its leaves and the whitespace between them.
 * Returns the source text exactly when every gap is whitespace and the
 * leaves tile the text.
 */
export function renderSyntaxTree(tree: SyntaxTree): string {
  let text = "";
  let offset = 0;
  for (const id of tree.preorder()) {
    const node = tree.node(id);
    if (node.text === undefined) continue;
    if (node.start < offset) return text;
    text += tree.source.slice(offset, node.start).replace(GAP_CHARACTERS, "");
    text += node.text;
    offset = node.end;
  }
  text += tree.source.slice(offset).replace(GAP_CHARACTERS, "");
  return text;
}

/**
 * Offset of the first difference between two texts, -1 when equal
 */
export function firstDifference(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return i;
  }
  return a.length === b.length ? -1 : length;
}
