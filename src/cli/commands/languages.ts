import chalk from "chalk";
import Table from "cli-table3";
import type { Command } from "commander";
import { createDefaultRegistry, criterionPattern, formatLanguages, type GrammarAdapter } from "../../grammar/index.js";
import { output } from "../output.js";

/**
 * Format languages table output: ID, Name, Patterns
 */
function formatLanguageTable(adapters: readonly GrammarAdapter[]): void {
  const table = new Table({
    head: [chalk.bold("ID"), chalk.bold("Name"), chalk.bold("Patterns")],
    style: {
      head: [],
      border: [],
    },
  });

  for (const adapter of adapters) {
    table.push([adapter.id, adapter.name, adapter.criteria.map(criterionPattern).join(", ")]);
  }

  console.log(table.toString());
}

/**
 * Register the 'languages' command.
 */
export function registerLanguagesCommand(program: Command): void {
  program
    .command("languages")
    .description("List the supported languages")
    .option("--gitattributes", "Print lines for a .gitattributes file")
    .action((options: { gitattributes?: boolean }) => {
      const registry = createDefaultRegistry();
      const adapters = registry.list();
      output(
        adapters.map((adapter) => ({ id: adapter.id, name: adapter.name, criteria: adapter.criteria })),
        () => {
          if (options.gitattributes) {
            for (const line of formatLanguages(registry, { gitattributes: true })) console.log(line);
          } else {
            formatLanguageTable(adapters);
          }
        },
      );
    });
}
