import type { TextTransform } from "../types";
import { escapeRegExp } from "../utils/helpers";

export interface HealthcheckTransformOptions {
  /** Probe command in the healthcheck `test` list */
  probe: string;
  /** Endpoint the probe hits */
  path: string;
  /** `interval` value the key is inserted after */
  interval: string;
  key: string;
  value: string;
}

export const DEFAULT_HEALTHCHECK: HealthcheckTransformOptions = {
  probe: "wget",
  path: "healthz",
  interval: "10s",
  key: "start_period",
  value: "30s",
};

/**
 * Adds a key to compose healthchecks that probe a service endpoint.
 *
 * Before:
 *   test: ["CMD", "wget", "-qO-", "http://localhost:8080/healthz"]
 *   interval: 10s
 * After:
 *   test: ["CMD", "wget", "-qO-", "http://localhost:8080/healthz"]
 *   interval: 10s
 *   start_period: 30s
 *
 * A healthcheck that already sets the key is left alone.
 */
export class HealthcheckTransform implements TextTransform {
  private readonly testLine: RegExp;
  private readonly intervalLine: RegExp;
  private readonly keyLine: RegExp;

  constructor(private readonly options: HealthcheckTransformOptions = DEFAULT_HEALTHCHECK) {
    this.testLine = new RegExp(
      `^\\s*test:\\s*\\[\\s*"CMD(?:-SHELL)?"\\s*,\\s*"${escapeRegExp(options.probe)}"[^\\]]*${escapeRegExp(options.path)}"\\s*\\]`
    );
    this.intervalLine = new RegExp(`^\\s*interval:\\s*${escapeRegExp(options.interval)}\\s*$`);
    this.keyLine = new RegExp(`^\\s*${escapeRegExp(options.key)}\\s*:`);
  }

  public get name(): string {
    return `healthcheck:${this.options.key}`;
  }

  public transform(content: string): string {
    const lines = content.split("\n");
    const insertAfter = new Set<number>();

    lines.forEach((line, index) => {
      const next = index + 1;
      if (
        this.testLine.test(line) &&
        next < lines.length &&
        this.intervalLine.test(lines[next]) &&
        !this.blockLines(lines, index).some((entry) => this.keyLine.test(entry))
      ) {
        insertAfter.add(next);
      }
    });

    if (insertAfter.size === 0) {
      return content;
    }

    return lines
      .flatMap((line, index) =>
        insertAfter.has(index)
          ? [line, `${indentOf(line)}${this.options.key}: ${this.options.value}`]
          : [line]
      )
      .join("\n");
  }

  /**
   * Sibling lines of the healthcheck entry at `index`: the contiguous,
   * non-blank lines indented at least as deep.
   */
  private blockLines(lines: string[], index: number): string[] {
    const depth = indentOf(lines[index]).length;
    const belongs = (line: string) =>
      line.trim() !== "" && indentOf(line).length >= depth;

    let first = index;
    while (first > 0 && belongs(lines[first - 1])) {
      first--;
    }
    let last = index;
    while (last < lines.length - 1 && belongs(lines[last + 1])) {
      last++;
    }

    return lines.slice(first, last + 1);
  }
}

function indentOf(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? "";
}
