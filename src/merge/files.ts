/**
 * File-level merging.
 *
 * Reads the three revisions of a file concurrently, picks the grammar and
 * runs the pipeline on LF-normalized text.
 */

import * as fs from "node:fs/promises";
import { fileErrors, usageErrors } from "../strings/errors.js";
import { imitateLineEndings, normalizeLineEndings } from "../utils/text.js";
import { structuredMerge, type StructuredMergeOptions } from "./pipeline.js";
import { REVISIONS, type MergeOutcome, type Revision } from "./types.js";

export type ReadResult =
  | { success: true; texts: Record<Revision, string> }
  | { success: false; error: string; failedFile: Revision; missing: boolean };

/**
 * One file to merge
 */
export interface MergeJob {
  paths: Record<Revision, string>;
  /** Final file name, used to detect the grammar (defaults to the base path) */
  pathName?: string;
  /** Grammar id, skipping detection */
  grammar?: string;
}

export type FileMergeResult =
  | { status: "read_failed"; error: string; failedFile: Revision; missing: boolean }
  | { status: "no_grammar"; message: string }
  | { status: "merged"; grammar: string; outcome: MergeOutcome };

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read all three revisions. The first failure in base, left, right order is
 * reported.
 */
export async function readRevisions(paths: Record<Revision, string>): Promise<ReadResult> {
  const reads = await Promise.all(
    REVISIONS.map((revision) =>
      fs.readFile(paths[revision], "utf-8").then(
        (text) => ({ revision, text, err: undefined }),
        (err: unknown) => ({ revision, text: undefined, err }),
      ),
    ),
  );

  for (const read of reads) {
    if (read.text === undefined) {
      const missing = isMissing(read.err);
      const filePath = paths[read.revision];
      return {
        success: false,
        error: missing ? fileErrors.notFound(filePath) : fileErrors.readFailed(filePath),
        failedFile: read.revision,
        missing,
      };
    }
  }
  const [base, left, right] = reads.map((read) => read.text ?? "");
  return { success: true, texts: { base, left, right } };
}

/**
 * Merge one file. The output text takes CRLF line endings when the left
 * revision has them.
 */
export async function mergeFile(job: MergeJob, options: StructuredMergeOptions): Promise<FileMergeResult> {
  const read = await readRevisions(job.paths);
  if (!read.success) {
    return { status: "read_failed", error: read.error, failedFile: read.failedFile, missing: read.missing };
  }

  const pathName = job.pathName ?? job.paths.base;
  const grammar = job.grammar ?? options.registry.detect(pathName)?.id;
  if (grammar === undefined) {
    return { status: "no_grammar", message: usageErrors.noGrammarForPath(pathName) };
  }

  const base = normalizeLineEndings(read.texts.base);
  const left = normalizeLineEndings(read.texts.left);
  const right = normalizeLineEndings(read.texts.right);
  const outcome = structuredMerge({ base: base.text, left: left.text, right: right.text, grammar }, options);

  if (outcome.status === "unavailable") {
    return { status: "merged", grammar, outcome };
  }
  return { status: "merged", grammar, outcome: { ...outcome, text: imitateLineEndings(outcome.text, left.crlf) } };
}

/**
 * Merge several files one after another
 */
export async function mergeFiles(jobs: readonly MergeJob[], options: StructuredMergeOptions): Promise<FileMergeResult[]> {
  const results: FileMergeResult[] = [];
  for (const job of jobs) {
    results.push(await mergeFile(job, options));
  }
  return results;
}
