/**
 * Developer helpers: print a syntax tree, compare two trees.
 */

import * as fs from "node:fs/promises";
import type { Command } from "commander";
import { createDefaultRegistry, type GrammarRegistry } from "../../grammar/index.js";
import { StructuralMergeError } from "../../merge/index.js";
import { fileErrors, inspectLabels, mergeErrors, usageErrors } from "../../strings/index.js";
import { formatTree, type SyntaxTree } from "../../tree/index.js";
import { normalizeLineEndings } from "../../utils/index.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { error, output, success, warn } from "../output.js";

type ParsedFile = { success: true; tree: SyntaxTree } | { success: false; code: ExitCode };

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function parseFile(filePath: string, registry: GrammarRegistry, language?: string): Promise<ParsedFile> {
  const grammar =
    language === undefined ? registry.detect(filePath) : registry.has(language) ? registry.get(language) : undefined;
  if (!grammar) {
    error(language === undefined ? usageErrors.noGrammarForPath(filePath) : mergeErrors.unknownGrammar(language));
    return { success: false, code: EXIT_CODES.UNSUPPORTED };
  }

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissing(err)) {
      error(fileErrors.notFound(filePath));
      return { success: false, code: EXIT_CODES.NOT_FOUND };
    }
    error(fileErrors.readFailed(filePath), err instanceof Error ? err.message : err);
    return { success: false, code: EXIT_CODES.ERROR };
  }

  try {
    return { success: true, tree: grammar.parse(normalizeLineEndings(text).text) };
  } catch (err) {
    if (err instanceof StructuralMergeError) {
      error(err.message);
      return { success: false, code: EXIT_CODES.ERROR };
    }
    throw err;
  }
}

/**
 * Print the syntax tree of a file and return the exit code
 */
export async function runParseCommand(
  filePath: string,
  options: { language?: string },
  registry: GrammarRegistry = createDefaultRegistry(),
): Promise<ExitCode> {
  const parsed = await parseFile(filePath, registry, options.language);
  if (!parsed.success) return parsed.code;
  const { tree } = parsed;
  output({ nodes: tree.size, hash: tree.node(tree.root).hash }, () => process.stdout.write(formatTree(tree)));
  return EXIT_CODES.SUCCESS;
}

/**
 * Compare the syntax trees of two files and return the exit code
 */
export async function runCompareCommand(
  first: string,
  second: string,
  options: { language?: string },
  registry: GrammarRegistry = createDefaultRegistry(),
): Promise<ExitCode> {
  const [a, b] = await Promise.all([
    parseFile(first, registry, options.language),
    parseFile(second, registry, options.language),
  ]);
  if (!a.success) return a.code;
  if (!b.success) return b.code;

  if (a.tree.isomorphicTo(b.tree)) {
    success(inspectLabels.isomorphic);
    return EXIT_CODES.SUCCESS;
  }
  warn(inspectLabels.different);
  return EXIT_CODES.CONFLICT;
}

async function exitWith(run: () => Promise<ExitCode>): Promise<void> {
  try {
    process.exit(await run());
  } catch (err) {
    error(err instanceof Error ? err.message : String(err));
    process.exit(EXIT_CODES.ERROR);
  }
}

/**
 * Register the 'parse' and 'compare' commands.
 */
export function registerInspectCommands(program: Command): void {
  program
    .command("parse <file>")
    .description("Print the syntax tree of a file")
    .option("-l, --language <id>", "Language id, skipping detection")
    .action((file: string, options: { language?: string }) => exitWith(() => runParseCommand(file, options)));

  program
    .command("compare <first> <second>")
    .description("Check whether two files have isomorphic syntax trees")
    .option("-l, --language <id>", "Language id, skipping detection")
    .action((first: string, second: string, options: { language?: string }) =>
      exitWith(() => runCompareCommand(first, second, options)),
    );
}
