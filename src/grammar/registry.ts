/**
 * Grammar registry.
 *
 * An explicit object, created by the caller and passed to the pipeline. It is
 * only read while a merge runs.
 */

import * as path from "node:path";
import { StructuralMergeError } from "../merge/errors.js";
import { mergeErrors } from "../strings/errors.js";
import type { FileCriterion, GrammarAdapter } from "./types.js";
import { DEFAULT_UNORDERED_KEYS, YamlGrammar } from "./yaml.js";

export interface RegistryOptions {
  /** Keys whose sequence values are unordered in YAML and JSON */
  unorderedKeys?: readonly string[];
}

export class GrammarRegistry {
  private readonly adapters = new Map<string, GrammarAdapter>();

  register(adapter: GrammarAdapter): this {
    if (this.adapters.has(adapter.id)) {
      throw new Error(mergeErrors.duplicateGrammar(adapter.id));
    }
    this.adapters.set(adapter.id, adapter);
    return this;
  }

  /**
   * @throws StructuralMergeError(UNKNOWN_GRAMMAR)
   */
  get(id: string): GrammarAdapter {
    const adapter = this.adapters.get(id);
    if (!adapter) {
      throw new StructuralMergeError(mergeErrors.unknownGrammar(id), "UNKNOWN_GRAMMAR");
    }
    return adapter;
  }

  has(id: string): boolean {
    return this.adapters.has(id);
  }

  /**
   * Grammar claiming a file path, first registered wins
   */
  detect(filePath: string): GrammarAdapter | undefined {
    const name = path.basename(filePath);
    for (const adapter of this.adapters.values()) {
      if (adapter.criteria.some((criterion) => claims(criterion, name))) {
        return adapter;
      }
    }
    return undefined;
  }

  list(): GrammarAdapter[] {
    return Array.from(this.adapters.values());
  }
}

function claims(criterion: FileCriterion, name: string): boolean {
  if (criterion.type === "name") return name === criterion.name;
  return name.toLowerCase().endsWith(`.${criterion.extension.toLowerCase()}`);
}

/**
 * Registry with the built-in grammars
 */
export function createDefaultRegistry(options: RegistryOptions = {}): GrammarRegistry {
  const unorderedKeys = options.unorderedKeys ?? DEFAULT_UNORDERED_KEYS;
  return new GrammarRegistry()
    .register(new YamlGrammar({ unorderedKeys }))
    .register(
      new YamlGrammar({
        id: "json",
        name: "JSON",
        criteria: [
          { type: "extension", extension: "json" },
          { type: "name", name: ".prettierrc" },
          { type: "name", name: ".eslintrc" },
        ],
        unorderedKeys,
      }),
    );
}

/**
 * Glob-like pattern of a file criterion, as written in `.gitattributes`
 */
export function criterionPattern(criterion: FileCriterion): string {
  return criterion.type === "extension" ? `*.${criterion.extension}` : criterion.name;
}

/**
 * Language listing, one line per language or one line per pattern in
 * `.gitattributes` form
 */
export function formatLanguages(registry: GrammarRegistry, options: { gitattributes?: boolean } = {}): string[] {
  const adapters = registry.list();
  if (options.gitattributes) {
    return adapters.flatMap((adapter) =>
      adapter.criteria.map((criterion) => `${criterionPattern(criterion)} merge=weft`),
    );
  }
  return adapters.map((adapter) => `${adapter.name} (${adapter.criteria.map(criterionPattern).join(", ")})`);
}
