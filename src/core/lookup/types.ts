// src/core/lookup/types.ts
// Keyword tables, the cached index rep and lookup ledger events

// ─────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────

/**
 * KeywordTable: Flat list of keywords. Ends at the first `null` or at the
 * end of the array. Must not contain duplicates.
 */
export type KeywordTable = ReadonlyArray<string | null>;

/**
 * StructTable: Keywords embedded in fixed-size records. The keyword of
 * record `i` sits at slot `i * stride`; the other slots belong to the caller.
 *
 * @example
 * const subcommands = ["start", runStart, "stop", runStop, null];
 * getIndexFromObjStruct(obj, subcommands, 2, "subcommand");
 */
export type StructTable = ReadonlyArray<unknown>;

/** Distance between entries of a flat table, in slots. */
export const ENTRY_STRIDE = 1;

// ─────────────────────────────────────────────────────────────────
// Cached Rep
// ─────────────────────────────────────────────────────────────────

/**
 * IndexRep: Result of a successful lookup, cached on the value.
 * `table` is compared by reference, never by content.
 */
export class IndexRep {
  constructor(
    public table: StructTable,
    public stride: number,
    public index: number
  ) {}

  /** Whether this rep answers a lookup against (table, stride). */
  matches(table: StructTable, stride: number): boolean {
    return this.table === table && this.stride === stride;
  }
}

export type LookupOptions = {
  /** Accept exact matches only; unique abbreviations fail. */
  exact?: boolean;
};

/**
 * KeywordScan: What a full table scan found.
 */
export type KeywordScan = {
  /** Matched index, or the last abbreviation seen, or -1 */
  index: number;
  /** True when `index` is an exact match */
  exact: boolean;
  /** Abbreviation matches seen before the scan ended */
  numAbbrev: number;
  /** Entries compared against the key */
  comparisons: number;
};

// ─────────────────────────────────────────────────────────────────
// Ledger
// ─────────────────────────────────────────────────────────────────

/**
 * LookupEvent: Entries of the lookup ledger.
 */
export type LookupEvent =
  | { tag: "hit"; label: string; index: number; timestamp: number }
  | { tag: "scan"; label: string; value: string; index: number; comparisons: number; timestamp: number }
  | {
      tag: "fail";
      label: string;
      value: string;
      reason: "no-match" | "ambiguous";
      comparisons: number;
      timestamp: number;
    };

export type LookupStats = {
  hits: number;
  scans: number;
  comparisons: number;
  failures: number;
};
