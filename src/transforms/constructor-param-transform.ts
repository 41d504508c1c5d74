import type { Span } from "../types";
import { appendListItem, identifiers, splitTopLevel } from "../utils/helpers";
import { locateCompositeLiterals, locateConstructor } from "../utils/locator";
import { SpanTransform } from "./span-transform";

export interface ConstructorParamTransformOptions {
  /** Constructor function name, e.g. `NewFoo` */
  constructorName: string;
  param: string;
  type: string;
  /** Result type that identifies the right declaration, e.g. `*Foo` */
  returnType?: string;
  /** Type whose composite literals in the body receive `param: param` */
  literal?: string;
}

type ConstructorSpan = Span & { role: "params" | "literal" };

/**
 * Adds a trailing parameter to a constructor and stores it in the struct
 * literal the constructor builds.
 *
 * Before: func NewFoo(x int) *Foo { return &Foo{x: x} }
 * After:  func NewFoo(x int, logger *Logger) *Foo { return &Foo{x: x, logger: logger} }
 */
export class ConstructorParamTransform extends SpanTransform<ConstructorSpan> {
  public readonly kind = "constructor-params" as const;

  constructor(private readonly options: ConstructorParamTransformOptions) {
    super(options.constructorName);
  }

  protected locate(content: string, masked: string): ConstructorSpan[] {
    const found = locateConstructor(
      masked,
      this.options.constructorName,
      this.options.returnType
    );
    if (!found) {
      return [];
    }

    const params: ConstructorSpan = { ...found.params, role: "params" };
    // The literal only gains `param: param` together with the parameter itself
    if (this.isSatisfied(content, masked, params)) {
      return [];
    }

    const spans: ConstructorSpan[] = [params];
    if (this.options.literal && found.body) {
      for (const literal of locateCompositeLiterals(masked, this.options.literal, found.body)) {
        spans.push({ ...literal, role: "literal" });
      }
    }
    return spans;
  }

  protected isSatisfied(_content: string, masked: string, span: ConstructorSpan): boolean {
    const inner = masked.slice(span.start, span.end);
    const pieces = splitTopLevel(inner, ",").map((piece) =>
      inner.slice(piece.start, piece.end).trim()
    );

    if (span.role === "literal") {
      const keyed = pieces.filter((piece) => /^[A-Za-z_]\w*\s*:/.test(piece));
      // Positional literals cannot take a keyed element
      if (pieces.length > keyed.length) {
        return true;
      }
      return keyed.some((piece) => piece.split(":")[0].trim() === this.options.param);
    }

    const wanted = this.options.param.toLowerCase();
    return pieces.some((piece) => {
      const name = identifiers(piece).at(0);
      if (name === undefined) {
        return false;
      }
      const type = piece.slice(piece.indexOf(name) + name.length).trim();
      return name.toLowerCase() === wanted || type === this.options.type;
    });
  }

  protected rewrite(content: string, span: ConstructorSpan): string {
    const inner = content.slice(span.start, span.end);
    const item =
      span.role === "params"
        ? `${this.options.param} ${this.options.type}`
        : `${this.options.param}: ${this.options.param}`;
    return appendListItem(inner, item);
  }
}
