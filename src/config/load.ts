/**
 * Configuration loading
 *
 * `.weft.yaml` is optional. When no path is given it is looked up in the
 * working directory; a missing default file yields the defaults, a missing
 * explicit file is an error.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import YAML from "yaml";
import type { z } from "zod";
import { configErrors } from "../strings/errors.js";
import { WeftConfigSchema, type WeftConfig } from "./schema.js";

export const CONFIG_FILE_NAME = ".weft.yaml";

export class ConfigError extends Error {
  constructor(
    message: string,
    public configPath: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface LoadedConfig {
  config: WeftConfig;
  /** File the config came from, undefined when defaults were used */
  source?: string;
}

export function defaultConfig(): WeftConfig {
  return WeftConfigSchema.parse({});
}

export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate already parsed YAML
 *
 * @throws ConfigError
 */
export function parseConfig(raw: unknown, configPath: string): WeftConfig {
  const parsed = WeftConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(configErrors.invalid(configPath, formatIssues(parsed.error.issues)), configPath);
  }
  return parsed.data;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Load the configuration file
 *
 * @throws ConfigError
 */
export async function loadConfig(options: { path?: string; cwd?: string } = {}): Promise<LoadedConfig> {
  const configPath = options.path ?? path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (options.path === undefined && isMissing(err)) {
      return { config: defaultConfig() };
    }
    throw new ConfigError(configErrors.unreadable(configPath), configPath);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(
      configErrors.notYaml(configPath, err instanceof Error ? err.message : String(err)),
      configPath,
    );
  }
  return { config: parseConfig(raw, configPath), source: configPath };
}
