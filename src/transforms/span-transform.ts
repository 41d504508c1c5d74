import type { EditRule, TargetKind } from "../types";
import { maskSource } from "../utils/locator";
import type { Range } from "../utils/locator";

/**
 * Base for the structural edit rules. A rule locates its target spans,
 * leaves alone every span whose postcondition already holds, and rewrites
 * the rest. Spans are rewritten from the end of the file backwards so that
 * earlier offsets stay valid. A span that overlaps one already rewritten
 * (a call nested in another call's arguments) is skipped.
 */
export abstract class SpanTransform<T extends Range> implements EditRule {
  public abstract readonly kind: TargetKind;

  constructor(public readonly target: string) {}

  public get name(): string {
    return `${this.kind}:${this.target}`;
  }

  public transform(content: string): string {
    const masked = maskSource(content);
    const pending = this.locate(content, masked)
      .filter((span) => !this.isSatisfied(content, masked, span))
      .sort((a, b) => b.start - a.start);

    let result = content;
    let lastStart = Number.POSITIVE_INFINITY;

    for (const span of pending) {
      if (span.end > lastStart) {
        continue;
      }
      result =
        result.slice(0, span.start) +
        this.rewrite(content, span) +
        result.slice(span.end);
      lastStart = span.start;
    }

    return result;
  }

  /**
   * Every instance of the construct in the file. `masked` is the content
   * with comments and literals blanked out.
   */
  protected abstract locate(content: string, masked: string): T[];

  /**
   * Postcondition: true when the span needs no edit.
   */
  protected abstract isSatisfied(content: string, masked: string, span: T): boolean;

  /**
   * Replacement for the text between `span.start` and `span.end`.
   */
  protected abstract rewrite(content: string, span: T): string;
}
