// src/core/messages.ts
// Error text shared by keyword lookup and usage messages

export const WRONG_ARGS_PREFIX = "wrong # args: should be ";

/**
 * Join choices the way error messages list them:
 * "a", "a or b", "a, b, or c".
 */
export function formatChoices(choices: readonly string[]): string {
  if (choices.length < 2) {
    return choices.join("");
  }
  if (choices.length === 2) {
    return `${choices[0]} or ${choices[1]}`;
  }
  const head = choices.slice(0, -1).join(", ");
  return `${head}, or ${choices[choices.length - 1]}`;
}

/**
 * `bad option "foo": must be a, b, or c`, or the `ambiguous` variant.
 */
export function badValueMessage(
  kind: "bad" | "ambiguous",
  label: string,
  value: string,
  choices: readonly string[]
): string {
  const head = `${kind} ${label} "${value}"`;
  if (choices.length === 0) {
    return `${head}: no valid options`;
  }
  return `${head}: must be ${formatChoices(choices)}`;
}

/**
 * Wrap a usage line in quotes, either as a fresh message or as one more
 * alternative appended to `previous`.
 */
export function usageMessage(usage: string, previous?: string): string {
  if (previous !== undefined) {
    return `${previous} or "${usage}"`;
  }
  return `${WRONG_ARGS_PREFIX}"${usage}"`;
}
