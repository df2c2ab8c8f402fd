/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CONFIG_FILE_NAME, ConfigError, defaultConfig, loadConfig, parseConfig } from "../src/config/index.js";
import { cleanupTempDir, createTempDir } from "./helpers/temp.js";

describe("defaultConfig", () => {
  it("should fill every section with defaults", () => {
    expect(defaultConfig()).toEqual({
      markers: { size: 7, diff3: true, compact: false },
      names: { base: "base", left: "left", right: "right" },
      matching: { threshold: 0.5 },
      yaml: { unorderedKeys: ["tags", "depends_on", "deps", "dependencies", "requires"] },
    });
  });
});

describe("parseConfig", () => {
  it("should merge partial sections with defaults", () => {
    const config = parseConfig({ markers: { compact: true }, names: { left: "ours" } }, "cfg.yaml");

    expect(config.markers).toEqual({ size: 7, diff3: true, compact: true });
    expect(config.names).toEqual({ base: "base", left: "ours", right: "right" });
  });

  it("should treat an empty document as defaults", () => {
    expect(parseConfig(null, "cfg.yaml")).toEqual(defaultConfig());
  });

  it("should name the offending field", () => {
    expect(() => parseConfig({ markers: { size: 3 } }, "cfg.yaml")).toThrow(
      "Invalid configuration in cfg.yaml: markers.size: Number must be greater than or equal to 7",
    );
  });

  it("should reject unknown keys", () => {
    expect(() => parseConfig({ marker: {} }, "cfg.yaml")).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it("should use defaults when the default file does not exist", async () => {
    const loaded = await loadConfig({ cwd: tempDir });

    expect(loaded.source).toBeUndefined();
    expect(loaded.config).toEqual(defaultConfig());
  });

  it("should read the file from the working directory", async () => {
    const file = path.join(tempDir, CONFIG_FILE_NAME);
    await fs.writeFile(file, "matching:\n  threshold: 0.7\nyaml:\n  unorderedKeys: [labels]\n");
    const loaded = await loadConfig({ cwd: tempDir });

    expect(loaded.source).toBe(file);
    expect(loaded.config.matching.threshold).toBe(0.7);
    expect(loaded.config.yaml.unorderedKeys).toEqual(["labels"]);
  });

  it("should fail when an explicit file does not exist", async () => {
    const file = path.join(tempDir, "missing.yaml");

    await expect(loadConfig({ path: file })).rejects.toThrow(`Could not read configuration file ${file}`);
  });

  it("should fail on a file that is not YAML", async () => {
    const file = path.join(tempDir, "broken.yaml");
    await fs.writeFile(file, "markers: [\n");

    await expect(loadConfig({ path: file })).rejects.toThrow(`Configuration file ${file} is not valid YAML: `);
  });
});
