import type { FileSystemHost } from "ts-morph";
import { FileAccessError } from "../errors";
import type { FileVerdict, TextTransform, TransformationResult } from "../types";

export type StagedFile = TransformationResult & {
  path: string;
};

export interface WriteOptions {
  dryRun?: boolean;
}

/**
 * Runs an ordered rule set over one file at a time. A file is read once and
 * written back at most once, and only when its content changed.
 */
export class FileRewriter {
  constructor(
    private readonly fileSystem: FileSystemHost,
    private readonly transforms: readonly TextTransform[]
  ) {}

  /**
   * Apply every rule in order; each one sees the output of the rules before it.
   */
  public transform(content: string): TransformationResult {
    const applied: string[] = [];
    let current = content;

    for (const transform of this.transforms) {
      const next = transform.transform(current);
      if (next !== current) {
        applied.push(transform.name);
        current = next;
      }
    }

    return { content: current, changed: current !== content, applied };
  }

  /**
   * Read and transform a file without writing it.
   */
  public stage(filePath: string): StagedFile {
    let original: string;
    try {
      original = this.fileSystem.readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new FileAccessError("read", filePath, error);
    }

    return { path: filePath, ...this.transform(original) };
  }

  /**
   * Write a staged file back if it changed.
   */
  public commit(staged: StagedFile, options: WriteOptions = {}): FileVerdict {
    if (staged.changed && !options.dryRun) {
      try {
        this.fileSystem.writeFileSync(staged.path, staged.content);
      } catch (error) {
        throw new FileAccessError("write", staged.path, error);
      }
    }

    return { path: staged.path, changed: staged.changed, applied: staged.applied };
  }

  public rewrite(filePath: string, options: WriteOptions = {}): FileVerdict {
    return this.commit(this.stage(filePath), options);
  }
}
