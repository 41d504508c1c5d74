import type { FileSystemHost } from "ts-morph";
import * as path from "path";
import { buildRules } from "../config";
import type { CodemodDefinition } from "../config";
import type { CodemodOptions, FileVerdict, RunSummary } from "../types";
import type { Logger } from "../utils/logger";
import { FileRewriter } from "./file-rewriter";
import { resolveFileSet } from "./file-set";

export interface RunOptions extends CodemodOptions {
  fileSystem: FileSystemHost;
  /** Directory relative include patterns resolve against */
  root: string;
  logger: Logger;
}

/**
 * Run a codemod over every file its include patterns match, one file at a
 * time. Read and write failures propagate; the total line is printed only
 * when every file was processed.
 *
 * With `atomic`, every file is read and transformed before the first write,
 * so a read failure leaves the whole tree untouched.
 */
export function runCodemod(
  definition: Readonly<CodemodDefinition>,
  options: RunOptions
): RunSummary {
  const { fileSystem, root, logger } = options;
  const rewriter = new FileRewriter(fileSystem, buildRules(definition));
  const writeOptions = { dryRun: options.dryRun };

  logger.debug(`🔍 Searching for files matching: ${[definition.include].flat().join(", ")}`);
  const paths = resolveFileSet(fileSystem, definition.include, root);
  logger.debug(`📝 Found ${paths.length} file(s) to process`);

  const report = (verdict: FileVerdict): FileVerdict => {
    const shown = path.relative(root, verdict.path) || verdict.path;
    if (verdict.changed) {
      logger.success(`${options.dryRun ? "Would update" : "Updated"} ${shown}`);
      logger.debug(`    ${verdict.applied.join(", ")}`);
    } else {
      logger.skip(`No changes needed: ${shown}`);
    }
    return verdict;
  };

  let verdicts: FileVerdict[];
  if (options.atomic) {
    const staged = paths.map((filePath) => rewriter.stage(filePath));
    verdicts = staged.map((file) => report(rewriter.commit(file, writeOptions)));
  } else {
    verdicts = paths.map((filePath) => report(rewriter.rewrite(filePath, writeOptions)));
  }

  const updated = verdicts.filter((verdict) => verdict.changed).length;
  logger.info(`\nTotal: ${updated} files ${options.dryRun ? "would be updated" : "updated"}`);

  return { verdicts, updated };
}
