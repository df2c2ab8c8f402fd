/**
 * Tests for the grammar registry.
 */

import { describe, it, expect } from "vitest";
import { GrammarRegistry, YamlGrammar, createDefaultRegistry, formatLanguages } from "../src/grammar/index.js";
import { StructuralMergeError } from "../src/merge/index.js";

describe("GrammarRegistry", () => {
  const registry = createDefaultRegistry();

  it("should detect grammars by extension, case-insensitively", () => {
    expect(registry.detect("config/app.yaml")?.id).toBe("yaml");
    expect(registry.detect("config/App.YML")?.id).toBe("yaml");
    expect(registry.detect("package.json")?.id).toBe("json");
  });

  it("should detect grammars by exact file name", () => {
    expect(registry.detect("project/.prettierrc")?.id).toBe("json");
    expect(registry.detect(".eslintrc")?.id).toBe("json");
    expect(registry.detect(".Prettierrc")).toBeUndefined();
  });

  it("should return undefined for unclaimed files", () => {
    expect(registry.detect("notes.txt")).toBeUndefined();
    expect(registry.detect("yaml")).toBeUndefined();
  });

  it("should prefer the grammar registered first", () => {
    const first = new YamlGrammar({ id: "first", criteria: [{ type: "extension", extension: "conf" }] });
    const second = new YamlGrammar({ id: "second", criteria: [{ type: "extension", extension: "conf" }] });
    const custom = new GrammarRegistry().register(first).register(second);

    expect(custom.detect("app.conf")?.id).toBe("first");
  });

  it("should refuse a duplicate id", () => {
    const custom = new GrammarRegistry().register(new YamlGrammar());
    expect(() => custom.register(new YamlGrammar())).toThrow('A grammar is already registered under "yaml"');
  });

  it("should throw UNKNOWN_GRAMMAR for an unknown id", () => {
    expect(registry.has("toml")).toBe(false);
    expect(() => registry.get("toml")).toThrow(StructuralMergeError);
    expect(() => registry.get("toml")).toThrow('No grammar registered under "toml"');
  });
});

describe("formatLanguages", () => {
  const registry = createDefaultRegistry();

  it("should list each language with its patterns", () => {
    expect(formatLanguages(registry)).toEqual([
      "YAML (*.yaml, *.yml)",
      "JSON (*.json, .prettierrc, .eslintrc)",
    ]);
  });

  it("should print gitattributes lines", () => {
    expect(formatLanguages(registry, { gitattributes: true })).toEqual([
      "*.yaml merge=weft",
      "*.yml merge=weft",
      "*.json merge=weft",
      ".prettierrc merge=weft",
      ".eslintrc merge=weft",
    ]);
  });
});
