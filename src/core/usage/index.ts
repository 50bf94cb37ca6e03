export { type EnsembleRewrite, type WrongArgsOptions } from "./types";
export { printWord, rewriteWords, formatWrongNumArgs } from "./wrongArgs";
