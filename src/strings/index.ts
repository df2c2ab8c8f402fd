/**
 * Centralized strings and messages for user-facing text
 *
 * Single source of truth for the wording of errors and summaries across the
 * engine and the CLI.
 */

export * from "./errors.js";
export * from "./labels.js";
