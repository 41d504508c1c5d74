import { escapeRegExp } from "../utils/helpers";
import { locateImportBlock, locateSingleImport } from "../utils/locator";
import type { Range } from "../utils/locator";
import { SpanTransform } from "./span-transform";

export type ImportPosition = "after" | "before";

export interface ImportTransformOptions {
  /** Package path to import, unquoted (e.g. `log/slog`) */
  path: string;
  /** Existing import the new one is placed next to */
  anchor: string;
  position?: ImportPosition;
}

type ImportSpan = Range & { form: "block" | "single" };

/**
 * Injects an import next to an anchor import.
 *
 * Example (path `log/slog`, anchor `context`):
 * Before: import (\n\t"context"\n\t"fmt"\n)
 * After:  import (\n\t"context"\n\t"log/slog"\n\t"fmt"\n)
 *
 * A lone `import "context"` is turned into a parenthesised block.
 */
export class ImportTransform extends SpanTransform<ImportSpan> {
  public readonly kind = "import-block" as const;
  private readonly position: ImportPosition;
  private readonly anchorEntry: RegExp;

  constructor(private readonly options: ImportTransformOptions) {
    super(options.path);
    this.position = options.position ?? "after";
    this.anchorEntry = new RegExp(
      `^[ \\t]*(?:[A-Za-z_.][A-Za-z0-9_]*[ \\t]+)?"${escapeRegExp(options.anchor)}"`,
      "m"
    );
  }

  protected locate(content: string, masked: string): ImportSpan[] {
    const block = locateImportBlock(masked);
    if (block) {
      const inner = content.slice(block.start, block.end);
      return this.anchorEntry.test(inner) ? [{ ...block, form: "block" }] : [];
    }

    const single = locateSingleImport(masked);
    if (single) {
      const line = content.slice(single.start, single.end).replace(/^import/, "");
      return this.anchorEntry.test(line) ? [{ ...single, form: "single" }] : [];
    }

    return [];
  }

  protected isSatisfied(content: string, _masked: string, span: ImportSpan): boolean {
    const quoted = `"${this.options.path}"`;
    if (span.form === "single") {
      return new RegExp(
        `^import[ \\t]+(?:[A-Za-z_.][A-Za-z0-9_]*[ \\t]+)?${escapeRegExp(quoted)}`,
        "m"
      ).test(content);
    }
    return content.slice(span.start, span.end).includes(quoted);
  }

  protected rewrite(content: string, span: ImportSpan): string {
    const text = content.slice(span.start, span.end);

    if (span.form === "single") {
      const entry = text.replace(/^import[ \t]+/, "").trimEnd();
      return `import (\n${this.arrange(`\t${entry}`, "\t")}\n)`;
    }

    const lines = text.split("\n");
    const anchorIndex = lines.findIndex((line) => this.anchorEntry.test(line));
    const anchorLine = lines[anchorIndex];
    const indent = /^[ \t]*/.exec(anchorLine)?.[0] ?? "";
    lines.splice(anchorIndex, 1, this.arrange(anchorLine, indent));

    return lines.join("\n");
  }

  /**
   * The anchor line together with the new entry, in configured order.
   */
  private arrange(anchorLine: string, indent: string): string {
    const entry = `${indent}"${this.options.path}"`;
    return this.position === "after"
      ? `${anchorLine}\n${entry}`
      : `${entry}\n${anchorLine}`;
  }
}
