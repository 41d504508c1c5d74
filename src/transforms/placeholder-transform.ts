import { indentAt } from "../utils/helpers";
import { locatePlaceholders } from "../utils/locator";
import type { Range } from "../utils/locator";
import { SpanTransform } from "./span-transform";

export interface PlaceholderTransformOptions {
  /** Marker comment line, e.g. `// TODO: log original error server-side: err` */
  marker: string;
  /** Statement that follows the marker and is kept */
  fallback: string;
  /** Statement that takes the marker's place */
  statement: string;
}

/**
 * Replaces a marker comment with a concrete statement, keeping the fallback
 * statement that follows it.
 *
 * Before:
 *   // TODO: log original error server-side: err
 *   return nil, status.Error(codes.Internal, "internal error")
 * After:
 *   h.logger.Error("handler error", "error", err)
 *   return nil, status.Error(codes.Internal, "internal error")
 */
export class PlaceholderTransform extends SpanTransform<Range> {
  public readonly kind = "placeholder-statement" as const;

  constructor(private readonly options: PlaceholderTransformOptions) {
    super(options.marker);
  }

  protected locate(content: string): Range[] {
    return locatePlaceholders(content, this.options.marker, this.options.fallback);
  }

  // A located span still carries the marker, so it always needs the edit
  protected isSatisfied(): boolean {
    return false;
  }

  protected rewrite(content: string, span: Range): string {
    const text = content.slice(span.start, span.end);
    const fallback = text.slice(text.indexOf("\n") + 1).trimStart();
    return `${this.options.statement}\n${indentAt(content, span.start)}${fallback}`;
  }
}
