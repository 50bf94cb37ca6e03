// src/core/config/index.ts
// Configuration system exports

export {
  type LookupConfig,
  type UsageConfig,
  type KeyrepConfig,
  type PartialKeyrepConfig,
  type ConfigValidation,
  DEFAULT_LOOKUP_CONFIG,
  DEFAULT_USAGE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
