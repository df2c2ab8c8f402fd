// Re-export command registration functions

export { registerInspectCommands, runCompareCommand, runParseCommand } from "./inspect.js";
export { registerLanguagesCommand } from "./languages.js";
export { registerMergeCommand, runMergeCommand } from "./merge.js";
export type { MergeCommandContext, MergeCommandOptions } from "./merge.js";
export { registerSolveCommand, runSolveCommand } from "./solve.js";
export type { SolveCommandContext, SolveCommandOptions } from "./solve.js";
