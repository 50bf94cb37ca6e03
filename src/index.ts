// src/index.ts
// keyrep - Public API
//
// Dual-representation values, cached keyword lookup and usage messages for
// command interpreters.

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES & TYPE DESCRIPTORS
// ═══════════════════════════════════════════════════════════════════════════════

export { Obj, TypeRegistry, defaultTypeRegistry, makeRep } from "./core/obj";
export type { ObjType, InternalRep } from "./core/obj";

// ═══════════════════════════════════════════════════════════════════════════════
// KEYWORD LOOKUP
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ENTRY_STRIDE,
  IndexRep,
  indexType,
  INDEX_TYPE_NAME,
  getIndexFromObj,
  getIndexFromObjStruct,
  cachedIndex,
  getKeywordAt,
  expandIndex,
  keywordsOf,
  configureLookupLog,
  applyLookupConfig,
  getRecentEvents,
  countEvents,
  getLookupStats,
  clearLookupLog,
} from "./core/lookup";
export type { KeywordTable, StructTable, LookupOptions, LookupEvent, LookupStats } from "./core/lookup";

// ═══════════════════════════════════════════════════════════════════════════════
// USAGE MESSAGES
// ═══════════════════════════════════════════════════════════════════════════════

export { formatWrongNumArgs, printWord } from "./core/usage";
export type { EnsembleRewrite, WrongArgsOptions } from "./core/usage";
export { quoteElement, needsQuoting, scanElement, convertElement } from "./core/list";
export type { ElementFlags } from "./core/list";
export { formatChoices, badValueMessage } from "./core/messages";

// ═══════════════════════════════════════════════════════════════════════════════
// INTERPRETER CONTEXT & CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export { Interp } from "./core/interp";
export {
  DEFAULT_CONFIG,
  loadConfig,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  validateConfig,
} from "./core/config";
export type { KeyrepConfig, PartialKeyrepConfig } from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";
