export type { CapabilityLookup, FileCriterion, GrammarAdapter, KindCapabilities } from "./types.js";
export { ATOMIC, ORDERED, UNORDERED } from "./types.js";
export { identityKey } from "./capabilities.js";
export { DEFAULT_UNORDERED_KEYS, YamlGrammar, type YamlGrammarOptions } from "./yaml.js";
export {
  GrammarRegistry,
  createDefaultRegistry,
  criterionPattern,
  formatLanguages,
  type RegistryOptions,
} from "./registry.js";
