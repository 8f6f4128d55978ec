/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, type PartialConfig } from "./defaults";
// Inline overrides
export {
  buildInlineConfig,
  extractInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
} from "./inline";
// Loader
export {
  CONFIG_FILE_NAMES,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  type ResolveConfigOptions,
  resolveConfig,
} from "./loader";
// Environment
export { configFromEnv, ENV_VARS } from "./resolver";
// Validator
export { ConfigError, validateConfig, validateEndpoint } from "./validator";
