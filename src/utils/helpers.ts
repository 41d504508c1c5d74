export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Expand `{name}` placeholders in a catalog template.
 */
export function fillTemplate(template: string, name: string): string {
  return template.replace(/\{name\}/g, name);
}

/**
 * Leading whitespace of the line that contains `offset`.
 */
export function indentAt(content: string, offset: number): string {
  const lineStart = content.lastIndexOf("\n", offset - 1) + 1;
  const match = /^[ \t]*/.exec(content.slice(lineStart));
  return match ? match[0] : "";
}

export function lastLineIndent(text: string): string {
  return indentAt(text, text.length);
}

export function identifiers(text: string): string[] {
  return text.match(/[A-Za-z_][A-Za-z0-9_]*/g) ?? [];
}

/**
 * Split `masked` on `separators` at delimiter depth zero. Offsets are
 * relative to `masked`; empty pieces are dropped.
 */
export function splitTopLevel(
  masked: string,
  separators: string
): Array<{ start: number; end: number }> {
  const pieces: Array<{ start: number; end: number }> = [];
  let depth = 0;
  let pieceStart = 0;

  const push = (end: number) => {
    if (masked.slice(pieceStart, end).trim() !== "") {
      pieces.push({ start: pieceStart, end });
    }
  };

  for (let i = 0; i < masked.length; i++) {
    const char = masked[i];
    if (char === "(" || char === "[" || char === "{") {
      depth++;
    } else if (char === ")" || char === "]" || char === "}") {
      depth--;
    } else if (depth === 0 && separators.includes(char)) {
      push(i);
      pieceStart = i + 1;
    }
  }
  push(masked.length);

  return pieces;
}

/**
 * Append `item` to a comma separated list body (the text between its
 * delimiters), keeping the list's layout.
 *
 * Single line: `a` → `a, item`, `a,` → `a, item`.
 * Multi line: a new line at the last element's indentation, ending in `,`.
 */
export function appendListItem(inner: string, item: string): string {
  const body = inner.trimEnd();
  const trailing = inner.slice(body.length);

  if (body.trim() === "") {
    return item;
  }

  if (trailing.includes("\n")) {
    const separator = body.endsWith(",") ? "" : ",";
    return `${body}${separator}\n${lastLineIndent(body)}${item},${trailing}`;
  }

  const separator = body.endsWith(",") ? " " : ", ";
  return `${body}${separator}${item}${trailing}`;
}

/**
 * Append a declaration line to a newline separated block body (struct
 * fields). A single-line body is opened up so the closing brace gets its own
 * line.
 */
export function appendBlockLine(
  inner: string,
  line: string,
  defaultIndent = "\t"
): string {
  const body = inner.trimEnd();
  const trailing = inner.slice(body.length);
  const multiLine = body.includes("\n") && trailing.includes("\n");
  const indent = multiLine ? lastLineIndent(body) : defaultIndent;

  return `${body}\n${indent}${line}${multiLine ? trailing : "\n"}`;
}
