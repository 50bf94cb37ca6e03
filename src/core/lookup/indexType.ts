// src/core/lookup/indexType.ts
// The "index" value type: a keyword resolved against a specific table

import type { ObjType } from "../obj/types";
import { unsupportedConversion } from "../../outcome/constructors";
import { IndexRep } from "./types";
import { expandIndex } from "./table";

export const INDEX_TYPE_NAME = "index";

/**
 * Descriptor for values holding a cached keyword lookup. The table is part
 * of the cache key, so a value cannot be converted to this type from its
 * text alone; only the lookup functions install it.
 */
export const indexType: ObjType<IndexRep> = {
  name: INDEX_TYPE_NAME,

  owns(payload: unknown): payload is IndexRep {
    return payload instanceof IndexRep;
  },

  free(_payload: IndexRep): void {
    // Nothing to release: the table belongs to the caller.
  },

  dup(payload: IndexRep): IndexRep {
    return new IndexRep(payload.table, payload.stride, payload.index);
  },

  // Always the full keyword, never the abbreviation that was typed.
  updateString(payload: IndexRep): string {
    return expandIndex(payload);
  },

  setFromAny() {
    return unsupportedConversion(
      INDEX_TYPE_NAME,
      "can't convert value to index except via getIndexFromObj API"
    );
  },

  assign(target: IndexRep, source: IndexRep): void {
    target.table = source.table;
    target.stride = source.stride;
    target.index = source.index;
  },
};
