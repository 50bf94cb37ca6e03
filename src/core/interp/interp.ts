// src/core/interp/interp.ts
// The slice of interpreter state that lookups and usage errors write into

import type { Obj } from "../obj/obj";
import type { Outcome } from "../../outcome/outcome";
import { isDone } from "../../outcome/outcome";
import type { KeyrepConfig } from "../config/config";
import { DEFAULT_CONFIG } from "../config/config";
import {
  getIndexFromObj,
  getIndexFromObjStruct,
} from "../lookup/lookup";
import type { KeywordTable, LookupOptions, StructTable } from "../lookup/types";
import { formatWrongNumArgs } from "../usage/wrongArgs";
import type { EnsembleRewrite } from "../usage/types";

/**
 * Interp: Result slot, usage flags and ensemble rewrite of an interpreter.
 *
 * Command implementations call `getIndex` and `wrongNumArgs` the way they
 * would call the underlying functions, but errors land in `result`.
 */
export class Interp {
  /** Text of the last result or error */
  result = "";
  /** Append usage errors to `result` as alternatives instead of replacing it */
  alternateWrongArgs = false;
  /** Rewrite applied by the ensemble currently dispatching, if any */
  ensembleRewrite: EnsembleRewrite | undefined = undefined;

  readonly config: KeyrepConfig;

  constructor(config: KeyrepConfig = DEFAULT_CONFIG) {
    this.config = config;
  }

  setResult(text: string): void {
    this.result = text;
  }

  resetResult(): void {
    this.result = "";
  }

  // ─────────────────────────────────────────────────────────────────
  // Keyword lookup
  // ─────────────────────────────────────────────────────────────────

  getIndex(obj: Obj, table: KeywordTable, label: string, options?: LookupOptions): number | undefined {
    return this.settle(getIndexFromObj(obj, table, label, this.lookupOptions(options)));
  }

  getIndexStruct(
    obj: Obj,
    table: StructTable,
    stride: number,
    label: string,
    options?: LookupOptions
  ): number | undefined {
    return this.settle(getIndexFromObjStruct(obj, table, stride, label, this.lookupOptions(options)));
  }

  private lookupOptions(options: LookupOptions | undefined): LookupOptions {
    return { exact: options?.exact ?? this.config.lookup.exactByDefault };
  }

  private settle(outcome: Outcome<number>): number | undefined {
    if (isDone(outcome)) {
      return outcome.value;
    }
    this.result = outcome.failure.message;
    return undefined;
  }

  // ─────────────────────────────────────────────────────────────────
  // Usage errors
  // ─────────────────────────────────────────────────────────────────

  /**
   * Leave a usage error for the first `objc` words of `objv` in `result`.
   * A negative `objc` prints no words.
   */
  wrongNumArgs(objc: number, objv: readonly Obj[], message?: string): void {
    this.result = formatWrongNumArgs(objv.slice(0, Math.max(0, objc)), {
      message,
      rewrite: this.ensembleRewrite,
      previous: this.alternateWrongArgs ? this.result : undefined,
      literalFirstWord: this.config.usage.literalFirstWord,
    });
  }

  /**
   * Run `fn` while an ensemble's rewrite is in effect.
   */
  withEnsembleRewrite<R>(rewrite: EnsembleRewrite, fn: () => R): R {
    const saved = this.ensembleRewrite;
    this.ensembleRewrite = rewrite;
    try {
      return fn();
    } finally {
      this.ensembleRewrite = saved;
    }
  }

  /**
   * Run `fn` with usage errors collected as alternatives of one message.
   */
  withAlternateWrongArgs<R>(fn: () => R): R {
    const saved = this.alternateWrongArgs;
    this.alternateWrongArgs = true;
    try {
      return fn();
    } finally {
      this.alternateWrongArgs = saved;
    }
  }
}
