/**
 * Tree matcher.
 *
 * Aligns the ancestor tree with one derived tree. Strategy:
 * 1. Exact: composite subtrees with equal hashes, largest first
 * 2. Recovery: top-down from matched pairs, aligning their children
 *    (LCS on hashes, then scored pairing inside each gap)
 * 3. Bottom-up: unmatched composites follow the partners of their
 *    descendants, which captures moved subtrees
 * 4. Leftover leaves whose hash is unique on both sides
 */

import type { SyntaxTree } from "../tree/index.js";
import type { CapabilityLookup } from "../grammar/types.js";
import { identityKey } from "../grammar/capabilities.js";
import { longestCommonSubsequence } from "./lcs.js";
import { Matching } from "./matching.js";

/**
 * Options for the matcher
 */
export interface MatcherOptions {
  /** Minimum similarity score for approximate pairs (0 < t <= 1) */
  threshold?: number;
}

export const DEFAULT_MATCH_THRESHOLD = 0.5;

/** Bonus for two children of a matched pair sharing a gap */
const CONTEXT_BONUS = 0.5;

/** Bonus for equal identity keys */
const KEY_BONUS = 1;

interface Candidate {
  from: number;
  to: number;
  score: number;
  distance: number;
}

/**
 * Compute a matching between `from` (ancestor) and `to` (derived).
 */
export function matchTrees(
  from: SyntaxTree,
  to: SyntaxTree,
  lookup: CapabilityLookup,
  options: MatcherOptions = {},
): Matching {
  return new TreeMatcher(from, to, lookup, options.threshold ?? DEFAULT_MATCH_THRESHOLD).run();
}

class TreeMatcher {
  private readonly matching: Matching;
  private readonly recovered = new Set<number>();

  constructor(
    private readonly from: SyntaxTree,
    private readonly to: SyntaxTree,
    private readonly lookup: CapabilityLookup,
    private readonly threshold: number,
  ) {
    this.matching = new Matching(from, to);
  }

  run(): Matching {
    this.matchExact();

    const { from, to, matching } = this;
    if (!matching.hasFrom(from.root) && !matching.hasTo(to.root) && from.kind(from.root) === to.kind(to.root)) {
      matching.add(from.root, to.root);
    }
    const rootPartner = matching.partnerOf(from.root);
    if (rootPartner !== undefined) {
      this.recover([[from.root, rootPartner]]);
    }

    this.matchBottomUp();
    this.matchLeftoverLeaves();
    return matching;
  }

  /**
   * Phase 1: identical composite subtrees
   */
  private matchExact(): void {
    const { from, to, matching } = this;
    const byHash = new Map<string, number[]>();
    for (const id of to.preorder()) {
      if (to.isLeaf(id)) continue;
      const hash = to.node(id).hash;
      const bucket = byHash.get(hash);
      if (bucket) bucket.push(id);
      else byHash.set(hash, [id]);
    }

    const order = from
      .preorder()
      .filter((id) => !from.isLeaf(id))
      .sort((a, b) => from.node(b).size - from.node(a).size || a - b);

    for (const id of order) {
      if (matching.hasFrom(id)) continue;
      const candidates = (byHash.get(from.node(id).hash) ?? []).filter((c) => !matching.hasTo(c));
      if (candidates.length === 0) continue;
      matching.addSubtree(id, this.closest(id, candidates));
    }
  }

  /**
   * Candidate with the nearest relative document position
   */
  private closest(id: number, candidates: number[]): number {
    const position = id / this.from.size;
    let best = candidates[0];
    let bestDistance = Infinity;
    for (const candidate of candidates) {
      const distance = Math.abs(candidate / this.to.size - position);
      if (distance < bestDistance) {
        best = candidate;
        bestDistance = distance;
      }
    }
    return best;
  }

  /**
   * Phase 2: walk matched pairs top-down and align their children
   */
  private recover(start: Array<[number, number]>): void {
    const queue = [...start];
    for (let head = 0; head < queue.length; head++) {
      const [a, b] = queue[head];
      if (this.recovered.has(a)) continue;
      this.recovered.add(a);
      if (this.lookup.capabilities(this.from.kind(a)).atomic) continue;

      this.recoverChildren(a, b);
      for (const child of this.from.children(a)) {
        const partner = this.matching.partnerOf(child);
        if (partner !== undefined) queue.push([child, partner]);
      }
    }
  }

  private recoverChildren(a: number, b: number): void {
    const { from, to, matching } = this;
    const fromChildren = from.children(a);
    const toChildren = to.children(b);

    const aligned = longestCommonSubsequence(fromChildren, toChildren, (x, y) => {
      if (matching.partnerOf(x) === y) return true;
      return !matching.hasFrom(x) && !matching.hasTo(y) && from.node(x).hash === to.node(y).hash;
    });
    for (const [i, j] of aligned) {
      const x = fromChildren[i];
      const y = toChildren[j];
      if (matching.hasFrom(x) || matching.hasTo(y)) continue;
      if (this.wouldInvert(x, y)) continue;
      matching.addSubtree(x, y);
    }

    if (this.lookup.capabilities(from.kind(a)).ordering === "unordered") {
      this.pairWithin(fromChildren, toChildren, CONTEXT_BONUS, false);
      return;
    }

    let previousI = -1;
    let previousJ = -1;
    const bounds: Array<[number, number]> = [...aligned, [fromChildren.length, toChildren.length]];
    for (const [i, j] of bounds) {
      if (i - previousI > 1 && j - previousJ > 1) {
        this.pairWithin(
          fromChildren.slice(previousI + 1, i),
          toChildren.slice(previousJ + 1, j),
          CONTEXT_BONUS,
          true,
        );
      }
      previousI = i;
      previousJ = j;
    }
  }

  /**
   * Score and greedily pair unmatched nodes of two sibling runs
   */
  private pairWithin(
    xs: readonly number[],
    ys: readonly number[],
    bonus: number,
    noCrossing: boolean,
  ): void {
    const { from, to, matching } = this;
    const buckets = new Map<string, number[]>();
    for (const y of ys) {
      if (matching.hasTo(y)) continue;
      const key = this.bucketKey(to, y);
      const bucket = buckets.get(key);
      if (bucket) bucket.push(y);
      else buckets.set(key, [y]);
    }
    if (buckets.size === 0) return;

    const candidates: Candidate[] = [];
    for (const x of xs) {
      if (matching.hasFrom(x)) continue;
      for (const y of buckets.get(this.bucketKey(from, x)) ?? []) {
        const score = this.score(x, y, bonus);
        if (score === undefined || score < this.threshold) continue;
        candidates.push({
          from: x,
          to: y,
          score,
          distance: Math.abs(from.node(x).index - to.node(y).index),
        });
      }
    }
    candidates.sort(byScore);

    const accepted: Array<[number, number]> = [];
    for (const candidate of candidates) {
      if (matching.hasFrom(candidate.from) || matching.hasTo(candidate.to)) continue;
      if (noCrossing && accepted.some(([x, y]) => x < candidate.from !== y < candidate.to)) continue;
      if (this.wouldInvert(candidate.from, candidate.to)) continue;
      matching.add(candidate.from, candidate.to);
      accepted.push([candidate.from, candidate.to]);
    }
  }

  /**
   * Nodes may only pair within the same kind and identity key
   */
  private bucketKey(tree: SyntaxTree, id: number): string {
    const key = identityKey(tree, id, this.lookup);
    return key === undefined ? `${tree.kind(id)}\u0000-` : `${tree.kind(id)}\u0000+${key}`;
  }

  /**
   * Similarity of two nodes of the same kind, undefined when disqualified
   */
  private score(x: number, y: number, bonus: number): number | undefined {
    const { from, to } = this;
    if (from.kind(x) !== to.kind(y)) return undefined;
    const keyX = identityKey(from, x, this.lookup);
    const keyY = identityKey(to, y, this.lookup);
    if (keyX !== keyY) return undefined;
    const keyBonus = keyX === undefined ? 0 : KEY_BONUS;
    return this.similarity(x, y) + keyBonus + bonus;
  }

  /**
   * Dice coefficient of matched descendants. Leaves and atomic nodes have no
   * descendants to compare and count as fully similar.
   */
  private similarity(x: number, y: number): number {
    const { from, to, matching } = this;
    if (from.isLeaf(x) || to.isLeaf(y) || this.lookup.capabilities(from.kind(x)).atomic) {
      return from.isLeaf(x) === to.isLeaf(y) ? 1 : 0;
    }
    const sizeX = from.node(x).size;
    const sizeY = to.node(y).size;
    let common = 0;
    for (let d = x + 1; d < x + sizeX; d++) {
      const partner = matching.partnerOf(d);
      if (partner !== undefined && partner !== y && to.inSubtree(y, partner)) common++;
    }
    return (2 * common) / (sizeX - 1 + sizeY - 1);
  }

  /**
   * Whether pairing x with y would invert ancestry with an existing pair
   */
  private wouldInvert(x: number, y: number): boolean {
    const { from, to, matching } = this;
    let ancestor = from.parentOf(x);
    while (ancestor !== undefined && !matching.hasFrom(ancestor)) {
      ancestor = from.parentOf(ancestor);
    }
    if (ancestor !== undefined) {
      const partner = matching.partnerOf(ancestor);
      if (partner !== undefined && to.inSubtree(y, partner)) return true;
    }
    const size = from.node(x).size;
    for (let d = x + 1; d < x + size; d++) {
      const partner = matching.partnerOf(d);
      if (partner !== undefined && (partner === y || to.isAncestor(partner, y))) return true;
    }
    return false;
  }

  /**
   * Phase 3: composites whose descendants moved together
   */
  private matchBottomUp(): void {
    const { from, to, matching } = this;
    for (const x of from.postorder()) {
      if (matching.hasFrom(x) || from.isLeaf(x)) continue;

      const seen = new Set<number>();
      const size = from.node(x).size;
      for (let d = x + 1; d < x + size; d++) {
        const partner = matching.partnerOf(d);
        if (partner === undefined) continue;
        let ancestor = to.parentOf(partner);
        while (ancestor !== undefined && !seen.has(ancestor)) {
          seen.add(ancestor);
          ancestor = to.parentOf(ancestor);
        }
      }

      const candidates: Candidate[] = [];
      for (const y of [...seen].sort((a, b) => a - b)) {
        if (matching.hasTo(y)) continue;
        const score = this.score(x, y, 0);
        if (score === undefined || score < this.threshold) continue;
        candidates.push({
          from: x,
          to: y,
          score,
          distance: Math.abs(x / from.size - y / to.size),
        });
      }
      candidates.sort(byScore);

      const best = candidates.find((candidate) => !this.wouldInvert(candidate.from, candidate.to));
      if (best) {
        matching.add(best.from, best.to);
        this.recover([[best.from, best.to]]);
      }
    }
  }

  /**
   * Phase 4: leaves that are still unmatched but unique on both sides
   */
  private matchLeftoverLeaves(): void {
    const { from, to, matching } = this;
    const collect = (tree: SyntaxTree, taken: (id: number) => boolean): Map<string, number[]> => {
      const byHash = new Map<string, number[]>();
      for (const id of tree.preorder()) {
        if (!tree.isLeaf(id) || taken(id)) continue;
        const hash = tree.node(id).hash;
        const bucket = byHash.get(hash);
        if (bucket) bucket.push(id);
        else byHash.set(hash, [id]);
      }
      return byHash;
    };

    const fromLeaves = collect(from, (id) => matching.hasFrom(id));
    const toLeaves = collect(to, (id) => matching.hasTo(id));
    for (const [hash, xs] of fromLeaves) {
      const ys = toLeaves.get(hash);
      if (xs.length !== 1 || ys === undefined || ys.length !== 1) continue;
      if (this.wouldInvert(xs[0], ys[0])) continue;
      matching.add(xs[0], ys[0]);
    }
  }
}

function byScore(a: Candidate, b: Candidate): number {
  return b.score - a.score || a.distance - b.distance || a.from - b.from || a.to - b.to;
}
