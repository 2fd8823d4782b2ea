/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_AGE_DAYS, DEFAULT_CONFIG, DEFAULT_POOL_SIZE, deepMerge } from "./defaults";
export { ConfigError } from "./errors";
// Inline flags
export {
  buildInlineConfig,
  extractInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineFlagValues,
  mergeInlineConfig,
} from "./inline";
// Loader
export {
  CONFIG_FILE_NAMES,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  resolveConfig,
} from "./loader";
// Resolver
export { resolvePaths } from "./resolver";
// Validator
export { validateConfig } from "./validator";
