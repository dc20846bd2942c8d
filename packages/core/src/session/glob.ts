/**
 * Path glob matching for retry exclusions.
 *
 * Syntax:
 * - `*` any run of characters except `/`
 * - `?` one character except `/`
 * - `[abc]`, `[a-z]`, `[^a-z]` character classes
 * - `\c` the literal character c
 *
 * The whole path must match. Malformed patterns throw GlobPatternError.
 */

export class GlobPatternError extends Error {
  readonly pattern: string;

  constructor(pattern: string) {
    super("syntax error in pattern");
    this.name = "GlobPatternError";
    this.pattern = pattern;
  }
}

const REGEXP_SPECIAL = /[.*+?^${}()|[\]\\]/g;
const CLASS_SPECIAL = /[\\\]\[^-]/g;

type ClassChar = { char: string; next: number };

function readClassChar(chars: string[], index: number, pattern: string): ClassChar {
  const char = chars[index];
  if (char === undefined || char === "-" || char === "]") {
    throw new GlobPatternError(pattern);
  }
  if (char === "\\") {
    const escaped = chars[index + 1];
    if (escaped === undefined) {
      throw new GlobPatternError(pattern);
    }
    return { char: escaped, next: index + 2 };
  }
  return { char, next: index + 1 };
}

function codePoint(char: string): number {
  return char.codePointAt(0) ?? 0;
}

function compileClass(
  chars: string[],
  start: number,
  pattern: string
): { source: string; next: number } {
  let index = start;
  let negated = false;
  if (chars[index] === "^") {
    negated = true;
    index++;
  }

  const parts: string[] = [];
  let count = 0;
  for (;;) {
    if (chars[index] === "]" && count > 0) {
      index++;
      break;
    }
    const lo = readClassChar(chars, index, pattern);
    index = lo.next;
    let hi = lo.char;
    if (chars[index] === "-") {
      const upper = readClassChar(chars, index + 1, pattern);
      hi = upper.char;
      index = upper.next;
    }
    count++;
    // Empty ranges (lo > hi) match nothing
    if (codePoint(lo.char) <= codePoint(hi)) {
      const from = lo.char.replace(CLASS_SPECIAL, "\\$&");
      const to = hi.replace(CLASS_SPECIAL, "\\$&");
      parts.push(from === to ? from : `${from}-${to}`);
    }
  }

  const body = parts.join("");
  return { source: negated ? `[^${body}]` : `[${body}]`, next: index };
}

/**
 * Compile a glob pattern into an anchored RegExp.
 */
export function compileGlob(pattern: string): RegExp {
  const chars = Array.from(pattern);
  let source = "";
  let index = 0;
  while (index < chars.length) {
    const char = chars[index] ?? "";
    if (char === "*") {
      source += "[^/]*";
      index++;
    } else if (char === "?") {
      source += "[^/]";
      index++;
    } else if (char === "\\") {
      const escaped = chars[index + 1];
      if (escaped === undefined) {
        throw new GlobPatternError(pattern);
      }
      source += escaped.replace(REGEXP_SPECIAL, "\\$&");
      index += 2;
    } else if (char === "[") {
      const compiled = compileClass(chars, index + 1, pattern);
      source += compiled.source;
      index = compiled.next;
    } else {
      source += char.replace(REGEXP_SPECIAL, "\\$&");
      index++;
    }
  }
  return new RegExp(`^${source}$`, "u");
}

export function matchGlob(pattern: string, path: string): boolean {
  return compileGlob(pattern).test(path);
}
