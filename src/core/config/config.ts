// src/core/config/config.ts
// Configuration for lookup defaults, the lookup ledger and usage messages

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type LookupConfig = {
  /** Reject unique abbreviations unless a call says otherwise */
  exactByDefault: boolean;
  /** Events kept in the lookup ledger */
  logLimit: number;
  /** Record events at all (counters are always kept) */
  logEnabled: boolean;
};

export type UsageConfig = {
  /** Never quote the first word of a usage message */
  literalFirstWord: boolean;
};

export type KeyrepConfig = {
  lookup: LookupConfig;
  usage: UsageConfig;
};

export type PartialKeyrepConfig = {
  lookup?: Partial<LookupConfig>;
  usage?: Partial<UsageConfig>;
};

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_LOOKUP_CONFIG: LookupConfig = {
  exactByDefault: false,
  logLimit: 1000,
  logEnabled: true,
};

export const DEFAULT_USAGE_CONFIG: UsageConfig = {
  literalFirstWord: false,
};

export const DEFAULT_CONFIG: KeyrepConfig = {
  lookup: DEFAULT_LOOKUP_CONFIG,
  usage: DEFAULT_USAGE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["keyrep.config.json"];

// =========================================================================
// Value Readers
// =========================================================================

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  const v = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return undefined;
}

function parseCount(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const n = parseInt(raw, 10);
  return Number.isNaN(n) ? undefined : n;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function pickBool(data: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const v = data[key];
    if (typeof v === "boolean") return v;
  }
  return undefined;
}

function pickNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const v = data[key];
    if (typeof v === "number") return v;
  }
  return undefined;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "KEYREP", env: NodeJS.ProcessEnv = process.env): KeyrepConfig {
  return {
    lookup: {
      exactByDefault: parseBool(env[`${prefix}_EXACT`]) ?? DEFAULT_LOOKUP_CONFIG.exactByDefault,
      logLimit: parseCount(env[`${prefix}_LOG_LIMIT`]) ?? DEFAULT_LOOKUP_CONFIG.logLimit,
      logEnabled: parseBool(env[`${prefix}_LOG_ENABLED`]) ?? DEFAULT_LOOKUP_CONFIG.logEnabled,
    },
    usage: {
      literalFirstWord:
        parseBool(env[`${prefix}_LITERAL_FIRST_WORD`]) ?? DEFAULT_USAGE_CONFIG.literalFirstWord,
    },
  };
}

/**
 * Load configuration from a JSON file. Keys missing from the file are left
 * unset so that merging keeps earlier values.
 */
export function configFromFile(filePath: string): PartialKeyrepConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Read a plain object (e.g. parsed JSON). Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): PartialKeyrepConfig {
  const lookupData = isRecord(data.lookup) ? data.lookup : {};
  const usageData = isRecord(data.usage) ? data.usage : {};

  const lookup: Partial<LookupConfig> = {};
  const exactByDefault = pickBool(lookupData, "exactByDefault", "exact_by_default");
  if (exactByDefault !== undefined) lookup.exactByDefault = exactByDefault;
  const logLimit = pickNumber(lookupData, "logLimit", "log_limit");
  if (logLimit !== undefined) lookup.logLimit = logLimit;
  const logEnabled = pickBool(lookupData, "logEnabled", "log_enabled");
  if (logEnabled !== undefined) lookup.logEnabled = logEnabled;

  const usage: Partial<UsageConfig> = {};
  const literalFirstWord = pickBool(usageData, "literalFirstWord", "literal_first_word");
  if (literalFirstWord !== undefined) usage.literalFirstWord = literalFirstWord;

  return { lookup, usage };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: KeyrepConfig, ...configs: PartialKeyrepConfig[]): KeyrepConfig {
  let result: KeyrepConfig = { lookup: { ...base.lookup }, usage: { ...base.usage } };

  for (const cfg of configs) {
    if (cfg.lookup) {
      result = { ...result, lookup: { ...result.lookup, ...cfg.lookup } };
    }
    if (cfg.usage) {
      result = { ...result, usage: { ...result.usage, ...cfg.usage } };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialKeyrepConfig;
  env?: NodeJS.ProcessEnv;
}): KeyrepConfig {
  let config = configFromEnv("KEYREP", options?.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const found = DEFAULT_CONFIG_FILES.find(p => fs.existsSync(p));
    if (found) {
      config = mergeConfigs(config, configFromFile(found));
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Validation
// =========================================================================

export function validateConfig(config: KeyrepConfig): ConfigValidation {
  const errors: string[] = [];

  if (!Number.isInteger(config.lookup.logLimit) || config.lookup.logLimit < 0) {
    errors.push(`lookup.logLimit must be a non-negative integer, got ${config.lookup.logLimit}`);
  }

  return { valid: errors.length === 0, errors };
}
