// src/core/lookup/table.ts
// Reading keywords out of flat and record-embedded tables

import type { Outcome } from "../../outcome/outcome";
import { done, malformedTable } from "../../outcome/constructors";
import type { IndexRep, KeywordScan, StructTable } from "./types";

export function isValidStride(stride: number): boolean {
  return Number.isInteger(stride) && stride >= 1;
}

/**
 * Collect the keywords of a table in scan order, stopping at the sentinel.
 */
export function keywordsOf(table: StructTable, stride: number): Outcome<string[]> {
  if (!isValidStride(stride)) {
    return malformedTable(`stride must be a positive integer, got ${stride}`);
  }

  const keywords: string[] = [];
  for (let slot = 0; slot < table.length; slot += stride) {
    const entry = table[slot];
    if (entry === null) break;
    if (typeof entry !== "string") {
      return malformedTable(`entry ${keywords.length} at slot ${slot} is not a string`);
    }
    keywords.push(entry);
  }
  return done(keywords);
}

/**
 * Keyword of record `index`, or undefined past the end of the table.
 */
export function getKeywordAt(table: StructTable, stride: number, index: number): string | undefined {
  const entry = table[index * stride];
  return typeof entry === "string" ? entry : undefined;
}

/**
 * Full keyword a cached rep stands for.
 */
export function expandIndex(rep: IndexRep): string {
  const keyword = getKeywordAt(rep.table, rep.stride, rep.index);
  if (keyword === undefined) {
    throw new Error(`IndexRep points past its table: index ${rep.index}, stride ${rep.stride}`);
  }
  return keyword;
}

/**
 * Scan keywords for `key`.
 *
 * An exact match ends the scan and wins over any number of abbreviations.
 * Otherwise every entry is visited so that a second abbreviation is seen.
 * An empty key matches nothing.
 */
export function scanKeywords(key: string, keywords: readonly string[]): KeywordScan {
  let index = -1;
  let numAbbrev = 0;
  let comparisons = 0;

  if (key.length === 0) {
    return { index, exact: false, numAbbrev, comparisons };
  }

  for (const [i, keyword] of keywords.entries()) {
    comparisons++;
    if (keyword === key) {
      return { index: i, exact: true, numAbbrev, comparisons };
    }
    if (keyword.startsWith(key)) {
      numAbbrev++;
      index = i;
    }
  }
  return { index, exact: false, numAbbrev, comparisons };
}
