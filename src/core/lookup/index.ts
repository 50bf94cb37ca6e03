// src/core/lookup/index.ts
// Keyword lookup exports

export {
  type KeywordTable,
  type StructTable,
  type LookupOptions,
  type KeywordScan,
  type LookupEvent,
  type LookupStats,
  ENTRY_STRIDE,
  IndexRep,
} from "./types";

export { indexType, INDEX_TYPE_NAME } from "./indexType";
export { keywordsOf, getKeywordAt, expandIndex, scanKeywords, isValidStride } from "./table";
export { cachedIndex, getIndexFromObj, getIndexFromObjStruct } from "./lookup";
export {
  configureLookupLog,
  applyLookupConfig,
  logLookupEvent,
  getRecentEvents,
  countEvents,
  getLookupStats,
  clearLookupLog,
} from "./events";
