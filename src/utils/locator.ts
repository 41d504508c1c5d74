import type { Span } from "../types";
import { escapeRegExp } from "./helpers";

export type Range = {
  start: number;
  end: number;
};

export type ConstructorSpans = {
  params: Span;
  body?: Span;
};

const CLOSERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };

/**
 * Returns a copy of `source` of identical length in which comments and the
 * contents of string, raw string and rune literals are blanked out. Offsets
 * into the mask are offsets into the source, and delimiters or names inside
 * literals can no longer be mistaken for code.
 */
export function maskSource(source: string): string {
  const out = source.split("");
  const blank = (from: number, to: number) => {
    for (let k = from; k < to; k++) {
      if (out[k] !== "\n") {
        out[k] = " ";
      }
    }
  };

  let i = 0;
  while (i < source.length) {
    const char = source[i];
    const next = source[i + 1];

    if (char === "/" && next === "/") {
      const newline = source.indexOf("\n", i);
      const stop = newline === -1 ? source.length : newline;
      blank(i, stop);
      i = stop;
    } else if (char === "/" && next === "*") {
      const close = source.indexOf("*/", i + 2);
      const stop = close === -1 ? source.length : close + 2;
      blank(i, stop);
      i = stop;
    } else if (char === "`") {
      const close = source.indexOf("`", i + 1);
      const stop = close === -1 ? source.length : close;
      blank(i + 1, stop);
      i = stop + 1;
    } else if (char === '"' || char === "'") {
      let j = i + 1;
      while (j < source.length && source[j] !== char && source[j] !== "\n") {
        j += source[j] === "\\" ? 2 : 1;
      }
      const stop = Math.min(j, source.length);
      blank(i + 1, stop);
      i = stop + 1;
    } else {
      i++;
    }
  }

  return out.join("");
}

/**
 * Index of the delimiter closing the one at `openIndex`, tracking nesting
 * of all three bracket classes. -1 when the text is unbalanced.
 */
export function findClosingDelimiter(masked: string, openIndex: number): number {
  const expected: string[] = [];

  for (let i = openIndex; i < masked.length; i++) {
    const char = masked[i];
    const closer = CLOSERS[char];

    if (closer) {
      expected.push(closer);
    } else if (char === ")" || char === "]" || char === "}") {
      if (expected.pop() !== char) {
        return -1;
      }
      if (expected.length === 0) {
        return i;
      }
    }
  }

  return -1;
}

/**
 * Index of the innermost unclosed delimiter before `index`, or -1 at top
 * level.
 */
export function findEnclosingDelimiter(masked: string, index: number): number {
  let depth = 0;

  for (let i = index - 1; i >= 0; i--) {
    const char = masked[i];
    if (char === ")" || char === "]" || char === "}") {
      depth++;
    } else if (CLOSERS[char]) {
      if (depth === 0) {
        return i;
      }
      depth--;
    }
  }

  return -1;
}

export function spanAt(masked: string, openIndex: number): Span | undefined {
  const close = findClosingDelimiter(masked, openIndex);
  if (close === -1) {
    return undefined;
  }
  return { open: openIndex, close, start: openIndex + 1, end: close };
}

/**
 * The parenthesised `import ( ... )` declaration.
 */
export function locateImportBlock(masked: string): Span | undefined {
  const match = /^import\s*\(/m.exec(masked);
  if (!match) {
    return undefined;
  }
  return spanAt(masked, match.index + match[0].length - 1);
}

/**
 * A single-line `import "path"` declaration, as the full line.
 */
export function locateSingleImport(masked: string): Range | undefined {
  const match = /^import[ \t]+(?:[A-Za-z_.][A-Za-z0-9_]*[ \t]+)?"[^\n]*/m.exec(masked);
  if (!match) {
    return undefined;
  }
  return { start: match.index, end: match.index + match[0].length };
}

/**
 * Body of `type Name struct { ... }`, also inside a grouped `type ( ... )`
 * declaration. A struct-typed field of the same name in another type does
 * not count.
 */
export function locateStructBody(masked: string, typeName: string): Span | undefined {
  const pattern = new RegExp(
    `(\\btype[ \\t]+|^[ \\t]*)${escapeRegExp(typeName)}\\s+struct\\s*\\{`,
    "gm"
  );

  for (const match of masked.matchAll(pattern)) {
    const index = match.index ?? 0;
    if (!match[1].startsWith("type") && !inTypeGroup(masked, index)) {
      continue;
    }
    return spanAt(masked, index + match[0].length - 1);
  }

  return undefined;
}

function inTypeGroup(masked: string, index: number): boolean {
  const open = findEnclosingDelimiter(masked, index);
  return open !== -1 && masked[open] === "(" && /\btype\s*$/.test(masked.slice(0, open));
}

/**
 * Parameter list (and body, when present) of a top-level function. With a
 * `returnType`, only a declaration whose result begins with that type
 * qualifies.
 */
export function locateConstructor(
  masked: string,
  functionName: string,
  returnType?: string
): ConstructorSpans | undefined {
  const pattern = new RegExp(
    `\\bfunc[ \\t]+${escapeRegExp(functionName)}\\s*(?:\\[[^\\]]*\\]\\s*)?\\(`,
    "g"
  );
  const resultMarker = returnType
    ? new RegExp(`^\\s*\\(?\\s*${escapeRegExp(returnType)}(?![\\w.])`)
    : undefined;

  for (const match of masked.matchAll(pattern)) {
    const params = spanAt(masked, (match.index ?? 0) + match[0].length - 1);
    if (!params) {
      continue;
    }
    if (resultMarker && !resultMarker.test(masked.slice(params.close + 1))) {
      continue;
    }

    const braceIndex = masked.indexOf("{", params.close + 1);
    const body = braceIndex === -1 ? undefined : spanAt(masked, braceIndex);
    return { params, body };
  }

  return undefined;
}

/**
 * Argument lists of every call to `callName`, skipping the function's own
 * declaration.
 */
export function locateCallArgs(masked: string, callName: string): Span[] {
  const pattern = new RegExp(`\\b${escapeRegExp(callName)}\\s*\\(`, "g");
  const declaration = /\bfunc\s+(?:\([^()]*\)\s*)?$/;
  const spans: Span[] = [];

  for (const match of masked.matchAll(pattern)) {
    const index = match.index ?? 0;
    if (declaration.test(masked.slice(Math.max(0, index - 200), index))) {
      continue;
    }
    const span = spanAt(masked, index + match[0].length - 1);
    if (span) {
      spans.push(span);
    }
  }

  return spans;
}

/**
 * Composite literals `typeName{...}` (including `&typeName{...}`) that
 * open within `within`.
 */
export function locateCompositeLiterals(
  masked: string,
  typeName: string,
  within: Range
): Span[] {
  const pattern = new RegExp(`(?<![\\w.])${escapeRegExp(typeName)}\\s*\\{`, "g");
  const region = masked.slice(0, within.end);
  const spans: Span[] = [];

  pattern.lastIndex = within.start;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(region)) !== null) {
    const span = spanAt(masked, match.index + match[0].length - 1);
    if (span && span.close <= within.end) {
      spans.push(span);
    }
  }

  return spans;
}

/**
 * Every occurrence of the marker comment directly followed by the fallback
 * statement. Whitespace inside the fallback is matched loosely.
 */
export function locatePlaceholders(
  source: string,
  marker: string,
  fallback: string
): Range[] {
  const loose = (text: string) =>
    text.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  const pattern = new RegExp(
    `${loose(marker)}[ \\t]*\\r?\\n\\s*${loose(fallback)}`,
    "g"
  );

  return Array.from(source.matchAll(pattern), (match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}
