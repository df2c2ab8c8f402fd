/**
 * Conflict marker layout.
 *
 * The renderer produces a flat list of text and conflict segments. This module
 * turns it into the final text. Unless compact mode is on, every conflict is
 * widened to whole lines: the partial line before it and the partial line
 * after it are copied into each side, and conflicts sharing a line are fused
 * into one block.
 */

import type { MarkerOptions, RenderedMerge } from "./types.js";

export type Segment =
  | { type: "text"; text: string }
  | {
      type: "conflict";
      base: string;
      left: string;
      right: string;
      /** False when the ancestor has nothing at this place, as for two insertions */
      hasBase: boolean;
    };

interface Block {
  base: string;
  left: string;
  right: string;
}

/**
 * Lay out rendered segments with conflict markers
 */
export function layoutSegments(segments: readonly Segment[], options: MarkerOptions): RenderedMerge {
  let text = "";
  let conflictCount = 0;
  let conflictMass = 0;

  const emit = (block: Block): void => {
    if (options.compact && text.length > 0 && !text.endsWith("\n")) text += "\n";
    text += formatBlock(block, options);
    conflictCount++;
    conflictMass += block.left.length + block.right.length;
  };

  let i = 0;
  while (i < segments.length) {
    const segment = segments[i];
    i++;
    if (segment.type === "text") {
      text += segment.text;
      continue;
    }

    const block: Block = { base: segment.base, left: segment.left, right: segment.right };
    let hasBase = segment.hasBase;
    const append = (extra: string): void => {
      block.base += extra;
      block.left += extra;
      block.right += extra;
    };

    if (options.compact) {
      // Only conflicts with nothing between them are fused
      while (i < segments.length) {
        const next = segments[i];
        if (next.type !== "conflict") break;
        block.base += next.base;
        block.left += next.left;
        block.right += next.right;
        hasBase = hasBase || next.hasBase;
        i++;
      }
      emit(block);
      continue;
    }

    const lineStart = text.lastIndexOf("\n") + 1;
    const prefix = text.slice(lineStart);
    text = text.slice(0, lineStart);
    block.base = prefix + block.base;
    block.left = prefix + block.left;
    block.right = prefix + block.right;

    let rest = "";
    while (i < segments.length) {
      const next = segments[i];
      i++;
      if (next.type === "conflict") {
        block.base += next.base;
        block.left += next.left;
        block.right += next.right;
        hasBase = hasBase || next.hasBase;
        continue;
      }
      const newline = next.text.indexOf("\n");
      if (newline < 0) {
        append(next.text);
        continue;
      }
      append(next.text.slice(0, newline + 1));
      rest = next.text.slice(newline + 1);
      break;
    }
    // The ancestor has no text of its own here
    if (!hasBase) block.base = "";
    if (prefix === "") {
      // A side with no content of its own on whole lines stays empty
      if (block.base === "\n") block.base = "";
      if (block.left === "\n") block.left = "";
      if (block.right === "\n") block.right = "";
    }
    emit(block);
    text += rest;
  }

  return { text, conflictCount, conflictMass };
}

function formatBlock(block: Block, options: MarkerOptions): string {
  const { size, names } = options;
  let out = `${"<".repeat(size)} ${names.left}\n${asLines(block.left)}`;
  if (options.diff3) {
    out += `${"|".repeat(size)} ${names.base}\n${asLines(block.base)}`;
  }
  out += `${"=".repeat(size)}\n${asLines(block.right)}${">".repeat(size)} ${names.right}\n`;
  return out;
}

function asLines(text: string): string {
  return text === "" || text.endsWith("\n") ? text : `${text}\n`;
}
