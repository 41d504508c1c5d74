export class CodemodError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A codemod definition that failed to parse or validate.
 */
export class ConfigError extends CodemodError {
  constructor(
    public readonly source: string,
    public readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(
      `Invalid codemod definition ${source}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
      options
    );
  }
}

export type FileOperation = "read" | "write";

/**
 * Reading or writing a target file failed. Always fatal to the run.
 */
export class FileAccessError extends CodemodError {
  constructor(
    public readonly operation: FileOperation,
    public readonly path: string,
    cause: unknown
  ) {
    super(`Failed to ${operation} ${path}: ${describe(cause)}`, { cause });
  }
}

export function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
