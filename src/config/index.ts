import { readdirSync, readFileSync } from "fs";
import * as path from "path";
import { ConfigError, describe, FileAccessError } from "../errors";
import { CallArgTransform } from "../transforms/call-arg-transform";
import { ConstructorParamTransform } from "../transforms/constructor-param-transform";
import { FieldTransform } from "../transforms/field-transform";
import { ImportTransform } from "../transforms/import-transform";
import { PlaceholderTransform } from "../transforms/placeholder-transform";
import type { EditRule } from "../types";
import { fillTemplate } from "../utils/helpers";
import { CodemodDefinitionSchema } from "./schema";
import type { CodemodDefinition, RuleDefinition } from "./schema";

export type { CodemodDefinition, RuleDefinition } from "./schema";

/** Codemod definitions shipped with the tool */
export const PRESET_DIR = path.resolve(__dirname, "../../codemods");

/**
 * Validate a raw definition. The result is frozen: a catalog never changes
 * during a run.
 */
export function parseCodemod(raw: unknown, source: string): Readonly<CodemodDefinition> {
  const result = CodemodDefinitionSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }

  Object.freeze(result.data.targets);
  Object.freeze(result.data.rules);
  return Object.freeze(result.data);
}

/**
 * A preset name (`handler-logging`) or a path to a JSON definition.
 */
export function resolveCodemodPath(reference: string): string {
  if (reference.endsWith(".json") || reference.includes(path.sep)) {
    return path.resolve(reference);
  }
  return path.join(PRESET_DIR, `${reference}.json`);
}

export function loadCodemod(reference: string): Readonly<CodemodDefinition> {
  const file = resolveCodemodPath(reference);

  let text: string;
  try {
    text = readFileSync(file, "utf-8");
  } catch (error) {
    throw new FileAccessError("read", file, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(file, [`not valid JSON: ${describe(error)}`], { cause: error });
  }

  return parseCodemod(raw, file);
}

export function listPresets(): string[] {
  return readdirSync(PRESET_DIR)
    .filter((file) => file.endsWith(".json"))
    .map((file) => path.basename(file, ".json"))
    .sort();
}

/**
 * Expand a definition into its ordered rule set: rules in definition order,
 * templated rules once per catalog entry.
 */
export function buildRules(definition: Readonly<CodemodDefinition>): readonly EditRule[] {
  return Object.freeze(
    definition.rules.flatMap((rule) => expandRule(rule, definition.targets))
  );
}

function expandRule(rule: RuleDefinition, targets: readonly string[]): EditRule[] {
  switch (rule.kind) {
    case "import":
      return [
        new ImportTransform({ path: rule.path, anchor: rule.anchor, position: rule.position }),
      ];
    case "placeholder":
      return [
        new PlaceholderTransform({
          marker: rule.marker,
          fallback: rule.fallback,
          statement: rule.statement,
        }),
      ];
    case "field":
      return perTarget([rule.struct], targets, (name) =>
        new FieldTransform({
          struct: fillTemplate(rule.struct, name),
          field: rule.field,
          type: rule.type,
        })
      );
    case "constructor-param":
      return perTarget([rule.function, rule.returnType, rule.literal], targets, (name) =>
        new ConstructorParamTransform({
          constructorName: fillTemplate(rule.function, name),
          returnType: rule.returnType === null ? undefined : fillTemplate(rule.returnType, name),
          literal: rule.literal === null ? undefined : fillTemplate(rule.literal, name),
          param: rule.param,
          type: rule.type,
        })
      );
    case "call-arg":
      return perTarget([rule.call], targets, (name) =>
        new CallArgTransform({
          call: fillTemplate(rule.call, name),
          argument: rule.argument,
          related: rule.related,
        })
      );
  }
}

function perTarget(
  templates: Array<string | null>,
  targets: readonly string[],
  build: (name: string) => EditRule
): EditRule[] {
  const templated = templates.some((template) => template?.includes("{name}"));
  return templated ? targets.map(build) : [build("")];
}
