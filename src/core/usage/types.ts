// src/core/usage/types.ts
// Inputs to the "wrong # args" formatter

import type { Obj } from "../obj/obj";

/**
 * EnsembleRewrite: Describes how an ensemble command rewrote its arguments
 * before dispatching to an implementation, so usage errors can be reported
 * in terms of what the user typed.
 *
 * The implementation received `numInsertedObjs` words in place of the
 * first `numRemovedObjs` words of `sourceObjs`.
 */
export type EnsembleRewrite = {
  sourceObjs: readonly Obj[];
  numRemovedObjs: number;
  numInsertedObjs: number;
};

export type WrongArgsOptions = {
  /** Text printed after the words, e.g. "?-nocase? string" */
  message?: string;
  /** Rewrite to undo before printing */
  rewrite?: EnsembleRewrite;
  /** Earlier usage text; the result lists this call shape as an alternative */
  previous?: string;
  /** Never quote the first printed word */
  literalFirstWord?: boolean;
};
