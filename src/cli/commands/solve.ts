/**
 * Solve command: merge again the conflicts a line-based merge left in a file.
 */

import * as fs from "node:fs/promises";
import type { Command } from "commander";
import { ConfigError, loadConfig, type WeftConfig } from "../../config/index.js";
import { createDefaultRegistry } from "../../grammar/index.js";
import { solveConflicts } from "../../merge/index.js";
import { fileErrors, mergeErrors, mergeLabels, usageErrors } from "../../strings/index.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { debug, error, info, setVerboseMode, success, warn } from "../output.js";

export interface SolveCommandOptions {
  output?: string;
  language?: string;
  compact?: boolean;
  config?: string;
  verbose?: boolean;
}

export interface SolveCommandContext {
  writeStdout?: (text: string) => void;
  cwd?: string;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Run `weft solve` and return the exit code. The file itself is never
 * changed; the result goes to --output or stdout.
 */
export async function runSolveCommand(
  filePath: string,
  options: SolveCommandOptions,
  context: SolveCommandContext = {},
): Promise<ExitCode> {
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

  const registry = createDefaultRegistry({ unorderedKeys: config.yaml.unorderedKeys });
  const grammar =
    options.language === undefined
      ? registry.detect(filePath)?.id
      : registry.has(options.language)
        ? options.language
        : undefined;
  if (grammar === undefined) {
    error(
      options.language === undefined
        ? usageErrors.noGrammarForPath(filePath)
        : mergeErrors.unknownGrammar(options.language),
    );
    return EXIT_CODES.UNSUPPORTED;
  }

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissing(err)) {
      error(fileErrors.notFound(filePath));
      return EXIT_CODES.NOT_FOUND;
    }
    error(fileErrors.readFailed(filePath), err instanceof Error ? err.message : err);
    return EXIT_CODES.ERROR;
  }

  const solved = solveConflicts(text, grammar, {
    registry,
    markers: {
      diff3: config.markers.diff3,
      compact: options.compact ?? config.markers.compact,
      size: config.markers.size,
      names: config.names,
    },
    matcher: { threshold: config.matching.threshold },
    debug,
  });

  if (solved.status === "unsolved") {
    warn(mergeLabels.unsolved(solved.message));
    return solved.reason === "markers" ? EXIT_CODES.ERROR : EXIT_CODES.CONFLICT;
  }

  if (options.output === undefined) {
    writeStdout(solved.text);
  } else {
    try {
      await fs.writeFile(options.output, solved.text, "utf-8");
    } catch (err) {
      error(fileErrors.writeFailed(options.output), err instanceof Error ? err.message : err);
      return EXIT_CODES.ERROR;
    }
  }

  if (solved.status === "no_conflicts") {
    info(mergeLabels.nothingToSolve);
    return EXIT_CODES.SUCCESS;
  }
  if (solved.conflictCount === 0) {
    success(mergeLabels.clean(grammar), { grammar, conflicts: 0, mass: 0 });
    return EXIT_CODES.SUCCESS;
  }
  warn(mergeLabels.conflicted(solved.conflictCount, solved.conflictMass));
  return EXIT_CODES.CONFLICT;
}

/**
 * Register the 'solve' command.
 */
export function registerSolveCommand(program: Command, context: SolveCommandContext = {}): void {
  program
    .command("solve <file>")
    .description("Merge structurally the conflicts left in a file by a line-based merge")
    .option("-o, --output <file>", "Write the result to a file")
    .option("-l, --language <id>", "Language id, skipping detection")
    .option("--compact", "Do not expand conflicts to whole lines")
    .option("--config <file>", "Configuration file (default: ./.weft.yaml)")
    .option("--verbose", "Print debug output on stderr")
    .action(async (file: string, options: SolveCommandOptions) => {
      try {
        process.exit(await runSolveCommand(file, options, context));
      } catch (err) {
        error("Solve failed", err);
        process.exit(EXIT_CODES.ERROR);
      }
    });
}
