// src/core/usage/wrongArgs.ts
// "wrong # args" messages built from the words of a command invocation

import type { Obj } from "../obj/obj";
import { indexType } from "../lookup/indexType";
import { expandIndex } from "../lookup/table";
import { quoteElement } from "../list/element";
import { usageMessage } from "../messages";
import type { EnsembleRewrite, WrongArgsOptions } from "./types";

/**
 * Print one word. Values resolved by a keyword lookup print the full
 * keyword, so `str ind` is reported as `string index`.
 */
export function printWord(obj: Obj, mayQuote: boolean = true): string {
  const rep = obj.getRep(indexType);
  if (rep !== undefined) {
    return expandIndex(rep);
  }
  const text = obj.getString();
  return mayQuote ? quoteElement(text) : text;
}

/**
 * Words to print in place of `objv`, undoing an ensemble rewrite when every
 * inserted word is present in `objv`.
 */
export function rewriteWords(
  objv: readonly Obj[],
  rewrite: EnsembleRewrite | undefined
): readonly Obj[] {
  if (rewrite === undefined || objv.length < rewrite.numInsertedObjs) {
    return objv;
  }
  return [
    ...rewrite.sourceObjs.slice(0, rewrite.numRemovedObjs),
    ...objv.slice(rewrite.numInsertedObjs),
  ];
}

/**
 * Build `wrong # args: should be "cmd arg ... message"`.
 *
 * With `options.previous`, the usage is appended to it as another
 * acceptable form: `<previous> or "cmd arg ... message"`.
 */
export function formatWrongNumArgs(objv: readonly Obj[], options: WrongArgsOptions = {}): string {
  const words = rewriteWords(objv, options.rewrite).map((obj, i) =>
    printWord(obj, !(options.literalFirstWord && i === 0))
  );

  if (options.message) {
    words.push(options.message);
  }
  return usageMessage(words.join(" "), options.previous);
}
