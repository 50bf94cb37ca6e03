// src/core/list/element.ts
// Quoting words so they read back as single list elements

/**
 * ElementFlags: How a word has to be quoted.
 */
export type ElementFlags = {
  /** Word contains something that must be hidden from a list parser */
  useBraces: boolean;
  /** Braces cannot hold the word; fall back to backslashes */
  dontUseBraces: boolean;
  /** The word's own braces do not balance */
  bracesUnmatched: boolean;
};

const BRACE_TRIGGERS = new Set(["[", "$", ";", " ", "\f", "\n", "\r", "\t", "\v"]);
const BACKSLASHED = new Set(["]", "[", "$", ";", " ", "\\", '"']);
const CONTROL_ESCAPES: Record<string, string> = {
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\v": "\\v",
};

/**
 * Work out how `text` has to be quoted.
 */
export function scanElement(text: string): ElementFlags {
  const flags: ElementFlags = { useBraces: false, dontUseBraces: false, bracesUnmatched: false };
  if (text.length === 0) {
    flags.useBraces = true;
    return flags;
  }

  if (text[0] === "{" || text[0] === '"') {
    flags.useBraces = true;
  }

  let nesting = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") {
      nesting++;
    } else if (ch === "}") {
      nesting--;
      if (nesting < 0) {
        flags.dontUseBraces = true;
        flags.bracesUnmatched = true;
      }
    } else if (ch === "\\") {
      if (i + 1 === text.length || text[i + 1] === "\n") {
        flags.dontUseBraces = true;
        flags.bracesUnmatched = true;
      } else {
        flags.useBraces = true;
        i++;
      }
    } else if (BRACE_TRIGGERS.has(ch)) {
      flags.useBraces = true;
    }
  }

  if (nesting !== 0) {
    flags.dontUseBraces = true;
    flags.bracesUnmatched = true;
  }
  return flags;
}

/**
 * Produce the quoted form of `text` according to `flags`.
 */
export function convertElement(text: string, flags: ElementFlags): string {
  if (text.length === 0) {
    return "{}";
  }
  if (flags.useBraces && !flags.dontUseBraces) {
    return `{${text}}`;
  }

  let out = "";
  let start = 0;
  let bracesUnmatched = flags.bracesUnmatched;
  if (text[0] === "{") {
    // A leading brace would open a braced word; it is always escaped.
    out = "\\{";
    start = 1;
    bracesUnmatched = true;
  }

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    const control = CONTROL_ESCAPES[ch];
    if (control !== undefined) {
      out += control;
    } else if (BACKSLASHED.has(ch) || (bracesUnmatched && (ch === "{" || ch === "}"))) {
      out += `\\${ch}`;
    } else {
      out += ch;
    }
  }
  return out;
}

export function needsQuoting(text: string): boolean {
  const flags = scanElement(text);
  return flags.useBraces || flags.dontUseBraces;
}

/**
 * Quote `text` if a list parser would otherwise split or reinterpret it.
 */
export function quoteElement(text: string): string {
  const flags = scanElement(text);
  if (!flags.useBraces && !flags.dontUseBraces) {
    return text;
  }
  return convertElement(text, flags);
}
