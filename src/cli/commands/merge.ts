/**
 * Merge command, also used as the git merge driver.
 *
 * git invokes merge drivers as `weft merge %O %A %B -s %S -x %X -y %Y -p %P
 * --git`: base, left (also the output path), right, the three labels and
 * the final file name.
 *
 * When the structured merge leaves conflicts, git merge-file runs as well and
 * the result with less text inside markers is kept.
 */

import * as fs from "node:fs/promises";
import type { Command } from "commander";
import { ConfigError, loadConfig, MarkerSizeSchema, type WeftConfig } from "../../config/index.js";
import { createDefaultRegistry } from "../../grammar/index.js";
import {
  mergeFile,
  parseConflictFile,
  pickBest,
  type MergeCandidate,
  type MergeJob,
  type MergeOutcome,
  type Revision,
} from "../../merge/index.js";
import { fallbackErrors, fileErrors, mergeLabels, usageErrors } from "../../strings/index.js";
import {
  defaultSpawner,
  gitMergeFile,
  normalizeLineEndings,
  type MergeFileResult,
  type Spawner,
} from "../../utils/index.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { debug, error, info, setVerboseMode, success, warn } from "../output.js";

export interface MergeCommandOptions {
  output?: string;
  git?: boolean;
  pathName?: string;
  language?: string;
  baseName?: string;
  leftName?: string;
  rightName?: string;
  compact?: boolean;
  diff3?: boolean;
  markerSize?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Process-facing dependencies, replaced in tests
 */
export interface MergeCommandContext {
  spawner?: Spawner;
  writeStdout?: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/** Labels git passes through unexpanded when it has nothing to put there */
const GIT_PLACEHOLDER = /^%[SXYP]$/;

function label(value: string | undefined, fallback: string): string {
  return value === undefined || value === "" || GIT_PLACEHOLDER.test(value) ? fallback : value;
}

function isDisabled(env: NodeJS.ProcessEnv): boolean {
  return env.WEFT_DISABLE === "1" || env.weft === "0";
}

interface ResolvedMerge {
  paths: Record<Revision, string>;
  names: Record<Revision, string>;
  markerSize: number;
  diff3: boolean;
  compact: boolean;
  config: WeftConfig;
}

/**
 * Run `weft merge` and return the exit code
 */
export async function runMergeCommand(
  paths: Record<Revision, string>,
  options: MergeCommandOptions,
  context: MergeCommandContext = {},
): Promise<ExitCode> {
  const env = context.env ?? process.env;
  const writeStdout = context.writeStdout ?? ((text: string) => void process.stdout.write(text));
  if (options.verbose) setVerboseMode(true);

  let config: WeftConfig;
  try {
    config = (await loadConfig({ path: options.config, cwd: context.cwd })).config;
  } catch (err) {
    if (err instanceof ConfigError) {
      error(err.message);
      return EXIT_CODES.ERROR;
    }
    throw err;
  }

  let markerSize = config.markers.size;
  if (options.markerSize !== undefined) {
    const parsed = MarkerSizeSchema.safeParse(Number(options.markerSize));
    if (!parsed.success) {
      error(usageErrors.markerSize(options.markerSize));
      return EXIT_CODES.ERROR;
    }
    markerSize = parsed.data;
  }

  const resolved: ResolvedMerge = {
    paths,
    names: {
      base: label(options.baseName, config.names.base),
      left: label(options.leftName, config.names.left),
      right: label(options.rightName, config.names.right),
    },
    markerSize,
    diff3: options.diff3 ?? config.markers.diff3,
    compact: options.compact ?? config.markers.compact,
    config,
  };

  if (isDisabled(env)) {
    info(mergeLabels.disabled);
    return fallback(resolved, options, writeStdout, context.spawner ?? defaultSpawner);
  }

  const registry = createDefaultRegistry({ unorderedKeys: config.yaml.unorderedKeys });
  const job: MergeJob = {
    paths,
    pathName: options.pathName === undefined || GIT_PLACEHOLDER.test(options.pathName) ? undefined : options.pathName,
    grammar: options.language,
  };

  const result = await mergeFile(job, {
    registry,
    markers: {
      size: resolved.markerSize,
      diff3: resolved.diff3,
      compact: resolved.compact,
      names: resolved.names,
    },
    matcher: { threshold: config.matching.threshold },
    debug,
  });

  switch (result.status) {
    case "read_failed":
      error(result.error);
      return result.missing ? EXIT_CODES.NOT_FOUND : EXIT_CODES.ERROR;

    case "no_grammar":
      info(mergeLabels.noGrammar(result.message));
      return fallback(resolved, options, writeStdout, context.spawner ?? defaultSpawner);

    case "merged":
      if (result.outcome.status === "unavailable") {
        warn(mergeLabels.unavailable(result.outcome.message));
        return fallback(resolved, options, writeStdout, context.spawner ?? defaultSpawner);
      }
      if (result.outcome.status === "conflicted") {
        const lineBased = lineBasedCandidate(resolved, context.spawner ?? defaultSpawner);
        const structured: MergeCandidate = {
          method: "structured",
          conflictCount: result.outcome.conflictCount,
          conflictMass: result.outcome.conflictMass,
        };
        if (lineBased !== undefined && pickBest([structured, lineBased]) === lineBased) {
          info(mergeLabels.lineBasedKept(lineBased.conflictMass, structured.conflictMass));
          return writeLineBased(lineBased, paths, options, writeStdout);
        }
      }
      return writeOutcome(result.outcome, result.grammar, paths, options, writeStdout);
  }
}

/**
 * Write `text` to `destination`, or to stdout when there is none. Reports
 * and returns false when the file cannot be written.
 */
async function deliver(
  text: string,
  destination: string | undefined,
  writeStdout: (text: string) => void,
): Promise<boolean> {
  if (destination === undefined) {
    writeStdout(text);
    return true;
  }
  try {
    await fs.writeFile(destination, text, "utf-8");
    return true;
  } catch (err) {
    error(fileErrors.writeFailed(destination), err instanceof Error ? err.message : err);
    return false;
  }
}

interface LineBasedMerge extends MergeCandidate {
  text: string;
}

/**
 * git merge-file's printed result with its conflict statistics, or undefined
 * when git gives none
 */
function lineBasedCandidate(resolved: ResolvedMerge, spawner: Spawner): LineBasedMerge | undefined {
  let result: MergeFileResult;
  try {
    result = gitMergeFile(
      {
        paths: resolved.paths,
        names: resolved.names,
        inPlace: false,
        diff3: resolved.diff3,
        markerSize: resolved.markerSize,
      },
      spawner,
    );
  } catch (err) {
    debug(`line-based merge skipped: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
  if (result.text === undefined || result.exitCode < 0 || result.exitCode >= 128) {
    debug(`line-based merge skipped: ${fallbackErrors.failed(result.exitCode)}`);
    return undefined;
  }

  const parsed = parseConflictFile(normalizeLineEndings(result.text).text);
  if (!parsed.success) {
    debug(`line-based merge skipped: ${parsed.error}`);
    return undefined;
  }
  return {
    method: "line-based",
    text: result.text,
    conflictCount: parsed.file.conflictCount,
    conflictMass: parsed.file.conflictMass,
  };
}

async function writeLineBased(
  merge: LineBasedMerge,
  paths: Record<Revision, string>,
  options: MergeCommandOptions,
  writeStdout: (text: string) => void,
): Promise<ExitCode> {
  const destination = options.output ?? (options.git ? paths.left : undefined);
  if (!(await deliver(merge.text, destination, writeStdout))) return EXIT_CODES.ERROR;

  if (merge.conflictCount === 0) {
    success(mergeLabels.fallbackClean);
    return EXIT_CODES.SUCCESS;
  }
  warn(mergeLabels.fallbackConflicted(merge.conflictCount));
  return EXIT_CODES.CONFLICT;
}

async function writeOutcome(
  outcome: Exclude<MergeOutcome, { status: "unavailable" }>,
  grammar: string,
  paths: Record<Revision, string>,
  options: MergeCommandOptions,
  writeStdout: (text: string) => void,
): Promise<ExitCode> {
  const destination = options.output ?? (options.git ? paths.left : undefined);
  if (!(await deliver(outcome.text, destination, writeStdout))) return EXIT_CODES.ERROR;

  const summary = { grammar, conflicts: outcome.conflictCount, mass: outcome.conflictMass };
  if (outcome.status === "clean") {
    success(mergeLabels.clean(grammar), summary);
    return EXIT_CODES.SUCCESS;
  }
  warn(mergeLabels.conflicted(outcome.conflictCount, outcome.conflictMass));
  return EXIT_CODES.CONFLICT;
}

/**
 * Line-based merge through git. A merge written in place with --git is left
 * where git put it; otherwise the printed result is routed like ours.
 */
async function fallback(
  resolved: ResolvedMerge,
  options: MergeCommandOptions,
  writeStdout: (text: string) => void,
  spawner: Spawner,
): Promise<ExitCode> {
  const inPlace = options.git === true && options.output === undefined;
  let result: MergeFileResult;
  try {
    result = gitMergeFile(
      {
        paths: resolved.paths,
        names: resolved.names,
        inPlace,
        diff3: resolved.diff3,
        markerSize: resolved.markerSize,
      },
      spawner,
    );
  } catch (err) {
    error(err instanceof Error ? err.message : String(err));
    return EXIT_CODES.ERROR;
  }

  if (result.text !== undefined && !(await deliver(result.text, options.output, writeStdout))) {
    return EXIT_CODES.ERROR;
  }

  if (result.exitCode === 0) {
    success(mergeLabels.fallbackClean);
    return EXIT_CODES.SUCCESS;
  }
  if (result.exitCode > 0 && result.exitCode < 128) {
    warn(mergeLabels.fallbackConflicted(result.exitCode));
    return EXIT_CODES.CONFLICT;
  }
  error(fallbackErrors.failed(result.exitCode));
  return EXIT_CODES.ERROR;
}

/**
 * Register the 'merge' command.
 */
export function registerMergeCommand(program: Command, context: MergeCommandContext = {}): void {
  program
    .command("merge <base> <left> <right>")
    .description("Merge three revisions of a file structurally")
    .option("-o, --output <file>", "Write the result to a file")
    .option("-g, --git", "Write the result over <left> (git merge driver mode)")
    .option("-p, --path-name <name>", "Final file name, used to detect the language")
    .option("-l, --language <id>", "Language id, skipping detection")
    .option("-s, --base-name <name>", "Label of the base revision in markers")
    .option("-x, --left-name <name>", "Label of the left revision in markers")
    .option("-y, --right-name <name>", "Label of the right revision in markers")
    .option("--compact", "Do not expand conflicts to whole lines")
    .option("--no-diff3", "Leave the base section out of conflicts")
    .option("--marker-size <n>", "Length of conflict markers (7 to 50)")
    .option("--config <file>", "Configuration file (default: ./.weft.yaml)")
    .option("--verbose", "Print debug output on stderr")
    .action(async (base: string, left: string, right: string, options: MergeCommandOptions, command: Command) => {
      // --no-diff3 defaults diff3 to true; only an explicit flag overrides the config
      const diff3 = command.getOptionValueSource("diff3") === "cli" ? options.diff3 : undefined;
      try {
        const code = await runMergeCommand({ base, left, right }, { ...options, diff3 }, context);
        process.exit(code);
      } catch (err) {
        error("Merge failed", err);
        process.exit(EXIT_CODES.ERROR);
      }
    });
}
