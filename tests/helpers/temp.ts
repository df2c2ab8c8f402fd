/**
 * Temp directory helpers for file-level tests
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { Revision } from "../../src/merge/index.js";

/**
 * Create an empty temp directory
 *
 * @param prefix - Optional prefix for the temp directory name
 */
export async function createTempDir(prefix = "weft-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write the three revisions of a file as base.<ext>, left.<ext>, right.<ext>
 *
 * @returns Paths of the written files
 */
export async function writeRevisions(
  dir: string,
  texts: Record<Revision, string>,
  extension = "yaml",
): Promise<Record<Revision, string>> {
  const paths = {
    base: path.join(dir, `base.${extension}`),
    left: path.join(dir, `left.${extension}`),
    right: path.join(dir, `right.${extension}`),
  };
  await Promise.all([
    fs.writeFile(paths.base, texts.base),
    fs.writeFile(paths.left, texts.left),
    fs.writeFile(paths.right, texts.right),
  ]);
  return paths;
}
