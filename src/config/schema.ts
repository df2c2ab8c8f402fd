import { z } from "zod";
import { DEFAULT_UNORDERED_KEYS } from "../grammar/yaml.js";
import { DEFAULT_MATCH_THRESHOLD } from "../merge/matcher.js";

// Marker length accepted by git merge-file as well
export const MarkerSizeSchema = z.number().int().min(7).max(50);

export const MarkersConfigSchema = z
  .object({
    size: MarkerSizeSchema.default(7),
    diff3: z.boolean().default(true),
    compact: z.boolean().default(false),
  })
  .strict();

export const NamesConfigSchema = z
  .object({
    base: z.string().min(1).default("base"),
    left: z.string().min(1).default("left"),
    right: z.string().min(1).default("right"),
  })
  .strict();

export const MatchingConfigSchema = z
  .object({
    threshold: z.number().gt(0).max(1).default(DEFAULT_MATCH_THRESHOLD),
  })
  .strict();

export const YamlConfigSchema = z
  .object({
    unorderedKeys: z.array(z.string().min(1)).default([...DEFAULT_UNORDERED_KEYS]),
  })
  .strict();

/**
 * Contents of `.weft.yaml`
 */
export const WeftConfigSchema = z
  .object({
    markers: MarkersConfigSchema.default({}),
    names: NamesConfigSchema.default({}),
    matching: MatchingConfigSchema.default({}),
    yaml: YamlConfigSchema.default({}),
  })
  .strict();

export type WeftConfig = z.infer<typeof WeftConfigSchema>;
export type WeftConfigInput = z.input<typeof WeftConfigSchema>;
