/**
 * Reading files that already carry conflict markers.
 *
 * A line-based merge leaves blocks of the form
 *
 *   <<<<<<< left
 *   ...
 *   ||||||| base
 *   ...
 *   =======
 *   ...
 *   >>>>>>> right
 *
 * Text outside the blocks belongs to all three revisions. Parsing the file
 * gives back the three revisions together with the conflict count and mass
 * of the file as it stands.
 */

import { markerErrors } from "../strings/errors.js";
import type { Revision } from "./types.js";

export interface ConflictFile {
  revisions: Record<Revision, string>;
  /** Labels found after the markers, if any */
  names: Partial<Record<Revision, string>>;
  conflictCount: number;
  /** Characters inside left and right sections */
  conflictMass: number;
  /** False when some block has no base section */
  diff3: boolean;
}

export type ConflictFileResult = { success: true; file: ConflictFile } | { success: false; error: string };

type State = "outside" | "left" | "base" | "right";

/** Lines with their line feed */
function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function runLength(line: string, char: string): number {
  let run = 0;
  while (run < line.length && line[run] === char) run++;
  return run;
}

/** Label after a marker run of exactly `size` characters, or undefined when the line is no such marker */
function markerLabel(line: string, char: string, size: number | undefined): string | undefined {
  const content = line.endsWith("\n") ? line.slice(0, -1) : line;
  const run = runLength(content, char);
  if (run < 7 || (size !== undefined && run !== size)) return undefined;
  const rest = content.slice(run);
  if (rest === "") return "";
  return rest.startsWith(" ") ? rest.slice(1) : undefined;
}

/**
 * Split a file with conflict markers into its three revisions. Markers of 7
 * characters or more are recognized; every marker of a block has the length
 * of its opening marker.
 */
export function parseConflictFile(text: string): ConflictFileResult {
  const revisions: Record<Revision, string> = { base: "", left: "", right: "" };
  const names: Partial<Record<Revision, string>> = {};
  let state: State = "outside";
  let size: number | undefined;
  let conflictCount = 0;
  let conflictMass = 0;
  let diff3 = true;
  let blockHasBase = false;
  let lineNumber = 0;

  const setName = (revision: Revision, label: string): void => {
    if (label !== "" && names[revision] === undefined) names[revision] = label;
  };

  for (const line of splitLines(text)) {
    lineNumber++;
    switch (state) {
      case "outside": {
        const label = markerLabel(line, "<", undefined);
        if (label === undefined) {
          revisions.base += line;
          revisions.left += line;
          revisions.right += line;
          break;
        }
        size = runLength(line, "<");
        setName("left", label);
        blockHasBase = false;
        state = "left";
        break;
      }
      case "left": {
        const baseLabel = markerLabel(line, "|", size);
        if (baseLabel !== undefined) {
          setName("base", baseLabel);
          blockHasBase = true;
          state = "base";
        } else if (markerLabel(line, "=", size) === "") {
          state = "right";
        } else if (markerLabel(line, "<", size) !== undefined || markerLabel(line, ">", size) !== undefined) {
          return { success: false, error: markerErrors.unexpectedMarker(lineNumber) };
        } else {
          revisions.left += line;
          conflictMass += line.length;
        }
        break;
      }
      case "base": {
        if (markerLabel(line, "=", size) === "") {
          state = "right";
        } else if (markerLabel(line, "<", size) !== undefined || markerLabel(line, ">", size) !== undefined) {
          return { success: false, error: markerErrors.unexpectedMarker(lineNumber) };
        } else {
          revisions.base += line;
        }
        break;
      }
      case "right": {
        const label = markerLabel(line, ">", size);
        if (label !== undefined) {
          setName("right", label);
          if (!blockHasBase) diff3 = false;
          conflictCount++;
          size = undefined;
          state = "outside";
        } else if (markerLabel(line, "<", size) !== undefined || markerLabel(line, "|", size) !== undefined) {
          return { success: false, error: markerErrors.unexpectedMarker(lineNumber) };
        } else {
          revisions.right += line;
          conflictMass += line.length;
        }
        break;
      }
    }
  }

  if (state !== "outside") {
    return { success: false, error: markerErrors.unterminated };
  }
  return { success: true, file: { revisions, names, conflictCount, conflictMass, diff3 } };
}
