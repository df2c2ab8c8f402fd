/**
 * Centralized error messages
 *
 * Organizes messages by category so the engine, the config loader and the CLI
 * commands word the same failure the same way.
 */

/**
 * Structural merge failures (reported as an unavailable outcome)
 */
export const mergeErrors = {
  parseFailure: (revision: string, detail: string) =>
    `Could not parse the ${revision} revision: ${detail}`,
  roundTripMismatch: (revision: string, offset: number) =>
    `Re-rendering the ${revision} revision does not reproduce its text (first difference at offset ${offset})`,
  unknownGrammar: (id: string) => `No grammar registered under "${id}"`,
  invalidResult: (detail: string) => `The merged text does not parse: ${detail}`,
  duplicateGrammar: (id: string) => `A grammar is already registered under "${id}"`,
  matchingKind: (from: string, to: string) =>
    `Matched nodes have different kinds: ${from} and ${to}`,
  matchingInjectivity: (side: string, node: number) =>
    `Node ${node} of the ${side} tree is matched twice`,
  matchingAncestry: (node: number) =>
    `Matching inverts the ancestry of node ${node}`,
  sequenceMismatch: (parent: number) =>
    `Children of node ${parent} disagree on which ancestor nodes stay in place`,
  missingConflict: (key: string) => `Merged tree refers to unknown conflict "${key}"`,
  missingNode: (revision: string) => `Merged element has no ${revision} node`,
  incompleteTokens: (covered: number, length: number) =>
    `Tokens cover ${covered} of ${length} characters`,
} as const;

/**
 * Input file errors
 */
export const fileErrors = {
  notFound: (path: string) => `File not found: ${path}`,
  readFailed: (path: string) => `Failed to read ${path}`,
  writeFailed: (path: string) => `Failed to write ${path}`,
} as const;

/**
 * Configuration errors
 */
export const configErrors = {
  invalid: (path: string, issues: string) => `Invalid configuration in ${path}: ${issues}`,
  unreadable: (path: string) => `Could not read configuration file ${path}`,
  notYaml: (path: string, detail: string) => `Configuration file ${path} is not valid YAML: ${detail}`,
} as const;

/**
 * Usage/argument errors
 */
export const usageErrors = {
  markerSize: (value: string) => `--marker-size must be an integer between 7 and 50 (got ${value})`,
  noGrammarForPath: (path: string) => `No grammar claims ${path}`,
} as const;

/**
 * Files with conflict markers
 */
export const markerErrors = {
  unexpectedMarker: (line: number) => `Unexpected conflict marker on line ${line}`,
  unterminated: "The last conflict block is not closed",
  noBase: "Conflicts without a base section cannot be solved; merge with diff3 markers",
  noImprovement: "The structured merge does not leave less text in conflicts than the file has",
} as const;

/**
 * Fallback to git merge-file
 */
export const fallbackErrors = {
  spawnFailed: (detail: string) => `Could not run git merge-file: ${detail}`,
  killed: (signal: string) => `git merge-file was terminated by ${signal}`,
  failed: (code: number) => `git merge-file failed with exit code ${code}`,
} as const;
