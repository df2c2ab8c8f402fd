/**
 * Three-way merger.
 *
 * Combines the left and right edit scripts against the ancestor. Strategy:
 * 1. Resolve every ancestor node: placed (and by whom), deleted, or conflict
 * 2. Downgrade moves that would close a cycle to conflicts
 * 3. Lift conflicts out of deleted parents
 * 4. Build the merged tree top-down, merging each child sequence
 * 5. Mark elements that reproduce one revision exactly
 */

import type { SyntaxTree } from "../tree/index.js";
import type { CapabilityLookup } from "../grammar/types.js";
import { identityKey } from "../grammar/capabilities.js";
import { mergeErrors } from "../strings/errors.js";
import type {
  ConflictContent,
  ConflictReason,
  ConflictRegion,
  EditScript,
  MergedElement,
  MergeResult,
  NodeRef,
  Revision,
  Side,
} from "./types.js";
import { invariantViolation } from "./errors.js";
import { childSlots } from "./differ.js";
import { mergeSequences, type SequenceEntry, type SideStep } from "./sequence.js";

/**
 * One side's edits, indexed by ancestor node
 */
interface SideView {
  side: Side;
  script: EditScript;
  tree: SyntaxTree;
  deleted: Set<number>;
  updated: Map<number, string>;
  moved: Map<number, NodeRef>;
}

/**
 * Where an ancestor node ends up
 */
type Resolution =
  | { type: "deleted" }
  | { type: "conflict"; key: string }
  | { type: "placed"; parent: NodeRef; by: Revision };

type BuildSource =
  | { type: "base"; node: number }
  | { type: "new"; side: Side; node: number; twin?: number };

type ChildPlan = BuildSource | { type: "conflict"; key: string };

const SIDES: readonly Side[] = ["left", "right"];

/** Revisions in the order a verbatim copy prefers them */
const PREFERENCE: readonly Revision[] = ["left", "right", "base"];

const DELETED: Resolution = { type: "deleted" };

/**
 * Merge two edit scripts against their common ancestor.
 */
export function mergeScripts(
  base: SyntaxTree,
  left: EditScript,
  right: EditScript,
  lookup: CapabilityLookup,
): MergeResult {
  return new ThreeWayMerger(base, left, right, lookup).run();
}

function indexScript(script: EditScript): SideView {
  const view: SideView = {
    side: script.side,
    script,
    tree: script.derived,
    deleted: new Set(),
    updated: new Map(),
    moved: new Map(),
  };
  for (const op of script.ops) {
    switch (op.type) {
      case "delete":
        view.deleted.add(op.node);
        break;
      case "update":
        view.updated.set(op.node, op.text);
        break;
      case "move":
        view.moved.set(op.node, op.parent);
        break;
      case "insert":
        break;
    }
  }
  return view;
}

function sameRef(a: NodeRef, b: NodeRef): boolean {
  return a.revision === b.revision && a.node === b.node;
}

class ThreeWayMerger {
  private readonly sides: Record<Side, SideView>;
  private readonly resolutions = new Map<number, Resolution>();
  private readonly regions = new Map<string, ConflictRegion>();
  private readonly used = new Set<string>();

  constructor(
    private readonly base: SyntaxTree,
    left: EditScript,
    right: EditScript,
    private readonly lookup: CapabilityLookup,
  ) {
    this.sides = { left: indexScript(left), right: indexScript(right) };
  }

  run(): MergeResult {
    this.resolveAll();
    const elements = this.build();
    this.markPristine(elements);

    const tree = { root: elements[0] };
    const conflicts = new Map(
      [...this.regions].filter(([key]) => this.used.has(key)),
    );
    return conflicts.size === 0
      ? { status: "clean", tree }
      : { status: "conflicted", tree, conflicts };
  }

  private tree(revision: Revision): SyntaxTree {
    return revision === "base" ? this.base : this.sides[revision].tree;
  }

  private partner(side: Side, node: number): number {
    const partner = this.sides[side].script.matching.partnerOf(node);
    if (partner === undefined) {
      throw invariantViolation(mergeErrors.matchingAncestry(node));
    }
    return partner;
  }

  // ---------------------------------------------------------------------
  // Resolution
  // ---------------------------------------------------------------------

  private resolveAll(): void {
    const { base } = this;
    for (const id of base.preorder()) {
      if (id !== base.root) this.resolutions.set(id, this.resolve(id));
    }

    for (const id of base.preorder()) {
      const resolution = this.resolutions.get(id);
      if (resolution?.type === "placed" && resolution.by !== "base" && this.createsCycle(id, resolution.parent)) {
        this.resolutions.set(id, this.conflict(id, "cyclic_move"));
      }
    }

    // A conflict, or an unmoved node, under a deleted parent would vanish
    for (const id of base.postorder()) {
      const parent = base.parentOf(id);
      if (parent === undefined) continue;
      const resolution = this.resolutions.get(id);
      const stays = resolution?.type === "conflict" || (resolution?.type === "placed" && resolution.by === "base");
      if (stays && this.resolutions.get(parent)?.type === "deleted") {
        this.resolutions.set(parent, this.conflict(parent, "delete_modify"));
      }
    }
  }

  private resolve(id: number): Resolution {
    const { left, right } = this.sides;

    const deletedLeft = left.deleted.has(id);
    const deletedRight = right.deleted.has(id);
    if (deletedLeft && deletedRight) return DELETED;
    if (deletedLeft || deletedRight) {
      const keeper = deletedLeft ? right : left;
      return keeper.script.modified.has(id) ? this.conflict(id, "delete_modify") : DELETED;
    }

    const textLeft = left.updated.get(id);
    const textRight = right.updated.get(id);
    if (textLeft !== undefined && textRight !== undefined && textLeft !== textRight) {
      return this.conflict(id, "update_update");
    }

    const parent = this.base.parentOf(id);
    if (parent === undefined) {
      throw invariantViolation(mergeErrors.matchingAncestry(id));
    }
    const movedLeft = left.moved.get(id);
    const movedRight = right.moved.get(id);
    if (movedLeft && movedRight) {
      if (!sameRef(movedLeft, movedRight)) return this.conflict(id, "move_move");
      if (this.isOrdered(movedLeft) && this.predecessor(left, id, movedLeft) !== this.predecessor(right, id, movedRight)) {
        const reordered = movedLeft.revision === "base" && movedLeft.node === parent;
        return this.conflict(id, reordered ? "concurrent_reorder" : "move_move");
      }
      return { type: "placed", parent: movedLeft, by: "left" };
    }
    if (movedLeft) return { type: "placed", parent: movedLeft, by: "left" };
    if (movedRight) return { type: "placed", parent: movedRight, by: "right" };
    return { type: "placed", parent: { revision: "base", node: parent }, by: "base" };
  }

  private isOrdered(ref: NodeRef): boolean {
    const kind = this.tree(ref.revision).kind(ref.node);
    return this.lookup.capabilities(kind).ordering === "ordered";
  }

  /**
   * What precedes a moved node in its new parent on one side
   */
  private predecessor(view: SideView, id: number, target: NodeRef): string {
    const slots =
      target.revision === "base"
        ? (view.script.layouts.get(target.node) ?? [])
        : childSlots(view.script.matching, target.node);
    const index = slots.findIndex((slot) => slot.type === "kept" && slot.node === id);
    const previous = index > 0 ? slots[index - 1] : undefined;
    if (previous === undefined) return "start";
    return previous.type === "kept" ? `kept:${previous.node}` : `new:${view.side}:${previous.node}`;
  }

  /**
   * Whether placing `id` under `target` puts it inside itself
   */
  private createsCycle(id: number, target: NodeRef): boolean {
    const limit = this.base.size + this.sides.left.tree.size + this.sides.right.tree.size;
    let current: NodeRef | undefined = target;
    for (let steps = 0; current !== undefined; steps++) {
      if (steps > limit) return true;
      const revision: Revision = current.revision;
      if (revision === "base") {
        if (current.node === id) return true;
        const resolution = this.resolutions.get(current.node);
        current = resolution?.type === "placed" ? resolution.parent : undefined;
        continue;
      }
      const view = this.sides[revision];
      const parent = view.tree.parentOf(current.node);
      if (parent === undefined) return false;
      const source = view.script.matching.sourceOf(parent);
      current = source === undefined ? { revision, node: parent } : { revision: "base", node: source };
    }
    return false;
  }

  /**
   * Register a conflict at an ancestor node
   */
  private conflict(id: number, reason: ConflictReason): Resolution {
    const key = `node:${id}`;
    const region: ConflictRegion = {
      key,
      reason,
      anchor: { node: id },
      base: { revision: "base", nodes: [id] },
      leading: "",
      trailing: "",
      bounds: { first: [], last: [] },
    };
    for (const side of SIDES) {
      const partner = this.sides[side].script.matching.partnerOf(id);
      if (partner !== undefined) region[side] = { revision: side, nodes: [partner] };
    }
    const refs = [region.left, region.right, region.base].flatMap((content) =>
      content ? [{ revision: content.revision, node: content.nodes[0] }] : [],
    );
    region.bounds = { first: refs, last: refs };
    this.regions.set(key, region);
    return { type: "conflict", key };
  }

  // ---------------------------------------------------------------------
  // Building
  // ---------------------------------------------------------------------

  /**
   * Build the merged tree; returns its elements in preorder
   */
  private build(): MergedElement[] {
    const rootSource: BuildSource = { type: "base", node: this.base.root };
    const root = this.shell(rootSource);
    const elements: MergedElement[] = [];
    const stack: Array<{ element: MergedElement; source: BuildSource }> = [
      { element: root, source: rootSource },
    ];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame === undefined) break;
      const { element, source } = frame;
      elements.push(element);
      if (element.text !== undefined || element.atomicFrom !== undefined) continue;

      const pending: Array<{ element: MergedElement; source: BuildSource }> = [];
      for (const plan of this.childPlans(source)) {
        if (plan.type === "conflict") {
          element.children.push({ type: "conflict", key: plan.key });
          this.used.add(plan.key);
          continue;
        }
        const child = this.shell(plan);
        element.children.push(child);
        pending.push({ element: child, source: plan });
      }
      stack.push(...pending.reverse());
    }
    return elements;
  }

  /**
   * Element for a source, children still empty
   */
  private shell(source: BuildSource): MergedElement {
    if (source.type === "base") {
      const id = source.node;
      const kind = this.base.kind(id);
      const element: MergedElement = { type: "element", kind, reps: { base: id }, children: [], pristine: [] };
      for (const side of SIDES) {
        const partner = this.sides[side].script.matching.partnerOf(id);
        if (partner !== undefined) element.reps[side] = partner;
      }
      const { left, right } = this.sides;
      if (this.lookup.capabilities(kind).atomic) {
        element.atomicFrom = left.updated.has(id) ? "left" : right.updated.has(id) ? "right" : "base";
      } else if (this.base.isLeaf(id)) {
        element.text = left.updated.get(id) ?? right.updated.get(id) ?? this.base.textOf(id);
      }
      return element;
    }

    const tree = this.sides[source.side].tree;
    const kind = tree.kind(source.node);
    const element: MergedElement = { type: "element", kind, reps: {}, children: [], pristine: [] };
    element.reps[source.side] = source.node;
    if (source.twin !== undefined) {
      element.reps[source.side === "left" ? "right" : "left"] = source.twin;
    }
    if (this.lookup.capabilities(kind).atomic) {
      element.atomicFrom = source.side;
    } else if (tree.isLeaf(source.node)) {
      element.text = tree.textOf(source.node);
    }
    return element;
  }

  private childPlans(source: BuildSource): ChildPlan[] {
    return source.type === "base" ? this.mergeChildren(source.node) : this.insertedChildren(source);
  }

  /**
   * Children of a node only one side has: its own new children plus the
   * ancestor nodes that side moved in
   */
  private insertedChildren(source: { side: Side; node: number; twin?: number }): ChildPlan[] {
    const view = this.sides[source.side];
    const plans: ChildPlan[] = [];
    for (const slot of childSlots(view.script.matching, source.node)) {
      if (slot.type === "new") {
        const twin = source.twin === undefined ? undefined : source.twin + (slot.node - source.node);
        plans.push({ type: "new", side: source.side, node: slot.node, twin });
        continue;
      }
      const resolution = this.resolutions.get(slot.node);
      if (
        resolution?.type === "placed" &&
        resolution.parent.revision === source.side &&
        resolution.parent.node === source.node
      ) {
        plans.push({ type: "base", node: slot.node });
      }
    }
    return plans;
  }

  /**
   * Children of an ancestor node, merged from both sides
   */
  private mergeChildren(parent: number): ChildPlan[] {
    const children = this.base.children(parent);
    const isChild = new Set(children);

    // Two different orders of the same list: the whole list is the conflict
    if (children.some((child) => this.reasonOf(child) === "concurrent_reorder")) {
      return [{ type: "conflict", key: this.reorderConflict(parent) }];
    }

    const steps = (view: SideView): SideStep[] => {
      const layout = view.script.layouts.get(parent);
      if (layout === undefined) {
        throw invariantViolation(mergeErrors.sequenceMismatch(parent));
      }
      const result: SideStep[] = [];
      for (const slot of layout) {
        if (slot.type === "new") {
          const hash = view.tree.node(slot.node).hash;
          const key = identityKey(view.tree, slot.node, this.lookup);
          result.push({ type: "run", entry: { type: "new", side: view.side, node: slot.node, hash, key } });
          continue;
        }
        if (isChild.has(slot.node) && !view.moved.has(slot.node)) {
          result.push({ type: "position", node: slot.node });
          continue;
        }
        const resolution = this.resolutions.get(slot.node);
        if (
          resolution?.type === "placed" &&
          resolution.by === view.side &&
          resolution.parent.revision === "base" &&
          resolution.parent.node === parent
        ) {
          result.push({ type: "run", entry: { type: "kept", node: slot.node } });
        }
      }
      return result;
    };

    const output = mergeSequences({
      base: children,
      stays: (node) => {
        const resolution = this.resolutions.get(node);
        return resolution?.type === "conflict" || (resolution?.type === "placed" && resolution.by === "base");
      },
      left: steps(this.sides.left),
      right: steps(this.sides.right),
      ordered: this.lookup.capabilities(this.base.kind(parent)).ordering === "ordered",
    });

    const plans: ChildPlan[] = [];
    for (const item of output) {
      switch (item.type) {
        case "kept": {
          const resolution = this.resolutions.get(item.node);
          plans.push(
            resolution?.type === "conflict"
              ? { type: "conflict", key: resolution.key }
              : { type: "base", node: item.node },
          );
          break;
        }
        case "new":
          plans.push({ type: "new", side: item.side, node: item.node, twin: item.twin });
          break;
        case "conflict":
          plans.push({
            type: "conflict",
            key: this.sequenceConflict(parent, item.predecessor, item.reason, item.left, item.right),
          });
          break;
      }
    }
    return plans;
  }

  /**
   * Reason of the conflict an ancestor node resolved to, if any
   */
  private reasonOf(node: number): ConflictReason | undefined {
    const resolution = this.resolutions.get(node);
    return resolution?.type === "conflict" ? this.regions.get(resolution.key)?.reason : undefined;
  }

  /**
   * Register a conflict over all children of a parent both sides reordered
   */
  private reorderConflict(parent: number): string {
    const key = `order:${parent}`;
    const content = (revision: Revision, node: number): ConflictContent => ({
      revision,
      nodes: [...this.tree(revision).children(node)],
    });
    const contents = [
      content("left", this.partner("left", parent)),
      content("right", this.partner("right", parent)),
      content("base", parent),
    ];
    const edge = (pick: (nodes: number[]) => number | undefined): NodeRef[] =>
      contents.flatMap(({ revision, nodes }) => {
        const node = pick(nodes);
        return node === undefined ? [] : [{ revision, node }];
      });

    this.regions.set(key, {
      key,
      reason: "concurrent_reorder",
      anchor: { node: parent },
      left: contents[0],
      right: contents[1],
      base: contents[2],
      leading: "",
      trailing: "",
      bounds: {
        first: edge((nodes) => nodes[0]),
        last: edge((nodes) => nodes[nodes.length - 1]),
      },
    });
    return key;
  }

  /**
   * Register a conflict between two runs inserted at the same place. Further
   * conflicts after the same predecessor get a numbered key.
   */
  private sequenceConflict(
    parent: number,
    predecessor: number,
    reason: ConflictReason,
    left: SequenceEntry[],
    right: SequenceEntry[],
  ): string {
    let key = `seq:${parent}:${predecessor}`;
    for (let n = 2; this.regions.has(key); n++) {
      key = `seq:${parent}:${predecessor}:${n}`;
    }
    const content = (side: Side, entries: SequenceEntry[]): ConflictContent => ({
      revision: side,
      nodes: entries.map((entry) => (entry.type === "new" ? entry.node : this.partner(side, entry.node))),
    });
    const leftContent = content("left", left);
    const rightContent = content("right", right);
    const edge = (pick: (nodes: number[]) => number): NodeRef[] => [
      { revision: "left", node: pick(leftContent.nodes) },
      { revision: "right", node: pick(rightContent.nodes) },
    ];

    this.regions.set(key, {
      key,
      reason,
      anchor: {
        node: parent,
        position: predecessor < 0 ? 0 : this.base.node(predecessor).index + 1,
      },
      left: leftContent,
      right: rightContent,
      leading: "",
      trailing: "",
      bounds: {
        first: edge((nodes) => nodes[0]),
        last: edge((nodes) => nodes[nodes.length - 1]),
      },
    });
    return key;
  }

  // ---------------------------------------------------------------------
  // Verbatim detection
  // ---------------------------------------------------------------------

  private markPristine(elements: MergedElement[]): void {
    for (let i = elements.length - 1; i >= 0; i--) {
      const element = elements[i];
      element.pristine = PREFERENCE.filter((revision) => this.reproduces(element, revision));
    }
  }

  private reproduces(element: MergedElement, revision: Revision): boolean {
    const id = element.reps[revision];
    if (id === undefined) return false;
    const tree = this.tree(revision);

    if (element.text !== undefined) {
      return tree.isLeaf(id) && tree.textOf(id) === element.text;
    }
    if (element.atomicFrom !== undefined) {
      const from = element.reps[element.atomicFrom];
      return from !== undefined && tree.textOf(id) === this.tree(element.atomicFrom).textOf(from);
    }

    const children = tree.children(id);
    return (
      children.length === element.children.length &&
      element.children.every(
        (child, i) =>
          child.type === "element" && child.reps[revision] === children[i] && child.pristine.includes(revision),
      )
    );
  }
}
