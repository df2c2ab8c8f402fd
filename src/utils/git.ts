/**
 * Line-based fallback through `git merge-file`
 */

import { spawnSync } from "node:child_process";
import { fallbackErrors } from "../strings/errors.js";
import type { Revision } from "../merge/types.js";

export interface SpawnResult {
  status: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

/**
 * Runs a command to completion. Replaced in tests.
 */
export type Spawner = (command: string, args: readonly string[]) => SpawnResult;

export const defaultSpawner: Spawner = (command, args) =>
  spawnSync(command, args, { encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"] });

export interface MergeFileRequest {
  paths: Record<Revision, string>;
  names: Record<Revision, string>;
  /** Write the result over the left file instead of printing it */
  inPlace: boolean;
  diff3: boolean;
  markerSize: number;
}

export interface MergeFileResult {
  /** 0 when clean, the number of conflicts otherwise (capped by git at 127) */
  exitCode: number;
  /** Merged text, when not merged in place */
  text?: string;
}

export function mergeFileArgs(request: MergeFileRequest): string[] {
  const { paths, names } = request;
  const args = ["merge-file", "--diff-algorithm=histogram"];
  if (!request.inPlace) args.push("-p");
  if (request.diff3) args.push("--diff3");
  if (request.markerSize !== 7) args.push(`--marker-size=${request.markerSize}`);
  args.push("-L", names.left, "-L", names.base, "-L", names.right, paths.left, paths.base, paths.right);
  return args;
}

/**
 * Run `git merge-file` on the three revisions.
 *
 * @throws Error when git cannot be run or is killed
 */
export function gitMergeFile(request: MergeFileRequest, spawner: Spawner = defaultSpawner): MergeFileResult {
  const result = spawner("git", mergeFileArgs(request));
  if (result.error) {
    throw new Error(fallbackErrors.spawnFailed(result.error.message));
  }
  if (result.status === null) {
    throw new Error(fallbackErrors.killed(result.signal ?? "unknown signal"));
  }
  return request.inPlace ? { exitCode: result.status } : { exitCode: result.status, text: result.stdout };
}
