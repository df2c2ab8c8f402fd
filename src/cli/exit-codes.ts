/**
 * Semantic exit codes for the weft CLI
 *
 * Centralized constants for all CLI exit codes. git reads any non-zero code
 * from a merge driver as "conflicts left in the file".
 */
export const EXIT_CODES = {
  /** Command completed successfully (clean merge) */
  SUCCESS: 0,

  /** Merge written with conflict markers; for compare, trees differ */
  CONFLICT: 1,

  /** Unexpected failure (file system error, spawn failure, etc.) */
  ERROR: 2,

  /** An input file does not exist */
  NOT_FOUND: 3,

  /** No grammar claims the file (solve, parse, compare) */
  UNSUPPORTED: 4,
} as const;

/**
 * Type for exit codes
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code metadata for documentation
 */
export const EXIT_CODE_METADATA = [
  {
    code: EXIT_CODES.SUCCESS,
    name: "SUCCESS",
    description: "Command completed successfully",
    commands: "All commands",
  },
  {
    code: EXIT_CODES.CONFLICT,
    name: "CONFLICT",
    description: "Merge written with conflict markers, or compared trees differ",
    commands: "merge, solve, compare",
  },
  {
    code: EXIT_CODES.ERROR,
    name: "ERROR",
    description: "Unexpected error (file system error, git could not be run, etc.)",
    commands: "All commands",
  },
  {
    code: EXIT_CODES.NOT_FOUND,
    name: "NOT_FOUND",
    description: "An input file does not exist",
    commands: "merge, solve, parse, compare",
  },
  {
    code: EXIT_CODES.UNSUPPORTED,
    name: "UNSUPPORTED",
    description: "No grammar claims the file",
    commands: "solve, parse, compare",
  },
] as const;
