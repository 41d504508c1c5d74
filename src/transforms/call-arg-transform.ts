import type { Span } from "../types";
import { appendListItem, identifiers } from "../utils/helpers";
import { locateCallArgs } from "../utils/locator";
import { SpanTransform } from "./span-transform";

export interface CallArgTransformOptions {
  call: string;
  argument: string;
  /**
   * Extra keywords; a call whose arguments mention any of them is treated
   * as already passing the argument.
   */
  related?: string[];
}

/**
 * Appends an argument to every call of a function.
 *
 * Before: h := NewFoo(1)
 * After:  h := NewFoo(1, logger)
 */
export class CallArgTransform extends SpanTransform<Span> {
  public readonly kind = "call-args" as const;
  private readonly keywords: string[];
  private readonly compactArgument: string;

  constructor(private readonly options: CallArgTransformOptions) {
    super(options.call);
    const plain = /^[A-Za-z_]\w*$/.test(options.argument) ? [options.argument] : [];
    this.keywords = [...plain, ...(options.related ?? [])].map((keyword) =>
      keyword.toLowerCase()
    );
    this.compactArgument = compact(options.argument);
  }

  protected locate(_content: string, masked: string): Span[] {
    return locateCallArgs(masked, this.options.call);
  }

  protected isSatisfied(content: string, masked: string, span: Span): boolean {
    if (compact(content.slice(span.start, span.end)).includes(this.compactArgument)) {
      return true;
    }
    return identifiers(masked.slice(span.start, span.end)).some((identifier) => {
      const lowered = identifier.toLowerCase();
      return this.keywords.some((keyword) => lowered.includes(keyword));
    });
  }

  protected rewrite(content: string, span: Span): string {
    return appendListItem(content.slice(span.start, span.end), this.options.argument);
  }
}

function compact(text: string): string {
  return text.replace(/\s+/g, "").toLowerCase();
}
