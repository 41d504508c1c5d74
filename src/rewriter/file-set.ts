import type { FileSystemHost } from "ts-morph";
import * as path from "path";

/**
 * Expand glob patterns into the sorted, de-duplicated list of files they
 * match right now. Relative patterns are taken from `root`. No match is an
 * empty list, not an error.
 */
export function resolveFileSet(
  fileSystem: FileSystemHost,
  patterns: string | readonly string[],
  root: string
): string[] {
  const list = typeof patterns === "string" ? [patterns] : patterns;
  const absolute = list.map((pattern) =>
    path.isAbsolute(pattern) ? pattern : path.join(root, pattern)
  );

  return Array.from(new Set(fileSystem.globSync(absolute))).sort();
}
