/**
 * weft: structural three-way merge for YAML and JSON.
 *
 * Library entry. The CLI lives in ./cli.
 */

export * from "./tree/index.js";
export * from "./grammar/index.js";
export * from "./merge/index.js";
export * from "./config/index.js";
export * from "./utils/index.js";
