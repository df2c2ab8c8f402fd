/**
 * Summaries and labels used throughout the CLI output
 */

/**
 * Merge command summaries (stderr)
 */
export const mergeLabels = {
  clean: (grammar: string) => `Merged cleanly (${grammar})`,
  conflicted: (count: number, mass: number) =>
    `Merged with ${count} conflict(s), ${mass} character(s) inside markers`,
  disabled: "Structured merge disabled by environment, using git merge-file",
  unavailable: (message: string) => `Structured merge unavailable, using git merge-file: ${message}`,
  noGrammar: (message: string) => `${message}, using git merge-file`,
  fallbackClean: "git merge-file merged cleanly",
  fallbackConflicted: (count: number) => `git merge-file left ${count} conflict(s)`,
  unsolved: (message: string) => `Conflicts left as they are: ${message}`,
  nothingToSolve: "The file has no conflicts",
  lineBasedKept: (mass: number, structuredMass: number) =>
    `Keeping the git merge-file result: ${mass} character(s) in conflicts against ${structuredMass}`,
} as const;

/**
 * Developer helper output
 */
export const inspectLabels = {
  isomorphic: "Trees are isomorphic",
  different: "Trees differ",
} as const;
