// src/core/lookup/lookup.ts
// Keyword lookup with abbreviation matching and per-value caching

import type { Obj } from "../obj/obj";
import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { ambiguous, done, noMatch } from "../../outcome/constructors";
import { badValueMessage } from "../messages";
import { indexType } from "./indexType";
import { keywordsOf, scanKeywords } from "./table";
import { logLookupEvent } from "./events";
import {
  ENTRY_STRIDE,
  IndexRep,
  type KeywordTable,
  type LookupOptions,
  type StructTable,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Cache
// ─────────────────────────────────────────────────────────────────

/**
 * Index cached on `obj` for exactly this (table, stride), if any.
 */
export function cachedIndex(obj: Obj, table: StructTable, stride: number): number | undefined {
  const rep = obj.getRep(indexType);
  return rep !== undefined && rep.matches(table, stride) ? rep.index : undefined;
}

// ─────────────────────────────────────────────────────────────────
// Lookup
// ─────────────────────────────────────────────────────────────────

/**
 * Look up the value of `obj` in a flat keyword table.
 *
 * Succeeds when the text equals an entry or is a unique abbreviation of
 * one (unless `options.exact`). The matched index is cached on `obj`, so
 * asking again with the same table costs no comparisons. `label` names the
 * kind of keyword in error text: `bad option "x": must be a or b`.
 */
export function getIndexFromObj(
  obj: Obj,
  table: KeywordTable,
  label: string,
  options: LookupOptions = {}
): Outcome<number> {
  return getIndexFromObjStruct(obj, table, ENTRY_STRIDE, label, options);
}

/**
 * Look up the value of `obj` in a table whose keywords are embedded every
 * `stride` slots.
 */
export function getIndexFromObjStruct(
  obj: Obj,
  table: StructTable,
  stride: number,
  label: string,
  options: LookupOptions = {}
): Outcome<number> {
  const hit = cachedIndex(obj, table, stride);
  if (hit !== undefined) {
    logLookupEvent({ tag: "hit", label, index: hit, timestamp: Date.now() });
    return done(hit, { cached: true, comparisons: 0 });
  }

  const keywords = keywordsOf(table, stride);
  if (isFail(keywords)) {
    return keywords;
  }

  const key = obj.getString();
  const scan = scanKeywords(key, keywords.value);
  const meta = { cached: false, comparisons: scan.comparisons };

  if (!scan.exact && (options.exact || scan.numAbbrev !== 1)) {
    const isAmbiguous = scan.numAbbrev > 1;
    logLookupEvent({
      tag: "fail",
      label,
      value: key,
      reason: isAmbiguous ? "ambiguous" : "no-match",
      comparisons: scan.comparisons,
      timestamp: Date.now(),
    });

    if (isAmbiguous) {
      const message = badValueMessage("ambiguous", label, key, keywords.value);
      const candidates = keywords.value.filter(k => k.startsWith(key));
      return ambiguous(label, key, message, candidates, meta);
    }
    return noMatch(label, key, badValueMessage("bad", label, key, keywords.value), meta);
  }

  obj.setRep(indexType, new IndexRep(table, stride, scan.index));
  logLookupEvent({
    tag: "scan",
    label,
    value: key,
    index: scan.index,
    comparisons: scan.comparisons,
    timestamp: Date.now(),
  });
  return done(scan.index, meta);
}
