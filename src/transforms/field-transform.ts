import type { Span } from "../types";
import { appendBlockLine, identifiers, splitTopLevel } from "../utils/helpers";
import { locateStructBody } from "../utils/locator";
import { SpanTransform } from "./span-transform";

export interface FieldTransformOptions {
  struct: string;
  field: string;
  type: string;
}

/**
 * Adds a field to a struct declaration.
 *
 * Example (struct Foo, field `logger *slog.Logger`):
 * Before: type Foo struct {\n\tBar int\n}
 * After:  type Foo struct {\n\tBar int\n\tlogger *slog.Logger\n}
 */
export class FieldTransform extends SpanTransform<Span> {
  public readonly kind = "struct-body" as const;

  constructor(private readonly options: FieldTransformOptions) {
    super(options.struct);
  }

  protected locate(_content: string, masked: string): Span[] {
    const body = locateStructBody(masked, this.options.struct);
    return body ? [body] : [];
  }

  protected isSatisfied(_content: string, masked: string, span: Span): boolean {
    return this.declaredFields(masked.slice(span.start, span.end)).includes(
      this.options.field
    );
  }

  protected rewrite(content: string, span: Span): string {
    return appendBlockLine(
      content.slice(span.start, span.end),
      `${this.options.field} ${this.options.type}`
    );
  }

  /**
   * Field names declared in a struct body. `a, b int` declares both names;
   * an embedded `*pkg.Type` declares `Type`.
   */
  private declaredFields(body: string): string[] {
    const names: string[] = [];

    for (const piece of splitTopLevel(body, "\n;")) {
      const declaration = body.slice(piece.start, piece.end).trim();
      const list = /^([A-Za-z_]\w*(?:\s*,\s*[A-Za-z_]\w*)*)\s+\S/.exec(declaration);

      if (list) {
        names.push(...identifiers(list[1]));
      } else {
        const embedded = identifiers(declaration);
        if (embedded.length > 0) {
          names.push(embedded[embedded.length - 1]);
        }
      }
    }

    return names;
  }
}
