export {
  MarkerSizeSchema,
  MarkersConfigSchema,
  MatchingConfigSchema,
  NamesConfigSchema,
  WeftConfigSchema,
  YamlConfigSchema,
  type WeftConfig,
  type WeftConfigInput,
} from "./schema.js";
export {
  CONFIG_FILE_NAME,
  ConfigError,
  defaultConfig,
  formatIssues,
  loadConfig,
  parseConfig,
  type LoadedConfig,
} from "./load.js";
