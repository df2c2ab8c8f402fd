#!/usr/bin/env node

import { readFileSync, realpathSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import chalk from "chalk";
import { Command } from "commander";
import { z } from "zod";
import {
  registerInspectCommands,
  registerLanguagesCommand,
  registerMergeCommand,
  registerSolveCommand,
} from "./commands/index.js";
import { EXIT_CODE_METADATA, EXIT_CODES } from "./exit-codes.js";
import { setJsonMode, setVerboseMode } from "./output.js";

const PackageVersionSchema = z.object({ version: z.string() });

/**
 * Version of the nearest package.json above this module. The same lookup
 * works from src/ and from dist/src/.
 */
export function readPackageVersion(startDir: string = path.dirname(fileURLToPath(import.meta.url))): string {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, "package.json");
    let content: string | undefined;
    try {
      content = readFileSync(candidate, "utf-8");
    } catch {
      content = undefined;
    }
    if (content !== undefined) {
      const parsed = PackageVersionSchema.safeParse(JSON.parse(content));
      if (parsed.success) return parsed.data.version;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return "0.0.0";
    dir = parent;
  }
}

/**
 * Exit code table appended to the top-level help
 */
export function formatExitCodes(): string {
  const rows = EXIT_CODE_METADATA.map(
    (meta) => `  ${String(meta.code).padEnd(4)}${meta.name.padEnd(13)}${meta.description}`,
  );
  return ["", "Exit codes:", ...rows].join("\n");
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("weft")
    .description("Structural three-way merge driver")
    .version(readPackageVersion())
    .option("--json", "Output in JSON format")
    .hook("preAction", (thisCommand, actionCommand) => {
      // Flags may be given at top level or on the subcommand
      const opts = { ...thisCommand.opts(), ...actionCommand.opts() };
      if (opts.json === true) setJsonMode(true);
      if (opts.verbose === true) setVerboseMode(true);
    });

  program.addHelpText("after", formatExitCodes);

  registerMergeCommand(program);
  registerSolveCommand(program);
  registerLanguagesCommand(program);
  registerInspectCommands(program);

  program.on("command:*", (operands: string[]) => {
    console.error(chalk.red(`error: unknown command '${operands[0]}'`));
    console.error(chalk.gray(`Run 'weft --help' to see available commands`));
    process.exit(EXIT_CODES.ERROR);
  });

  return program;
}

// Parse and execute (only when run directly)
// Use realpathSync to resolve symlinks (e.g., when run via npm link)
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  await createProgram().parseAsync();
}
