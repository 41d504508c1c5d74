import { z } from "zod";

const identifier = z.string().regex(/^[A-Za-z_]\w*$/, "must be an identifier");
const template = z.string().min(1);

export const ImportRuleSchema = z.object({
  kind: z.literal("import"),
  path: z.string().min(1),
  anchor: z.string().min(1),
  position: z.enum(["after", "before"]).default("after"),
});

export const PlaceholderRuleSchema = z.object({
  kind: z.literal("placeholder"),
  marker: z.string().min(1),
  fallback: z.string().min(1),
  statement: z.string().min(1),
});

export const FieldRuleSchema = z.object({
  kind: z.literal("field"),
  struct: template.default("{name}"),
  field: identifier,
  type: z.string().min(1),
});

export const ConstructorParamRuleSchema = z.object({
  kind: z.literal("constructor-param"),
  function: template.default("New{name}"),
  /** `null` accepts any result type */
  returnType: template.nullable().default("*{name}"),
  /** `null` leaves composite literals alone */
  literal: template.nullable().default("{name}"),
  param: identifier,
  type: z.string().min(1),
});

export const CallArgRuleSchema = z.object({
  kind: z.literal("call-arg"),
  call: template.default("New{name}"),
  argument: z.string().min(1),
  related: z.array(z.string().min(1)).default([]),
});

export const RuleSchema = z.discriminatedUnion("kind", [
  ImportRuleSchema,
  PlaceholderRuleSchema,
  FieldRuleSchema,
  ConstructorParamRuleSchema,
  CallArgRuleSchema,
]);

export const CodemodDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  /** Glob(s) of the files to rewrite, relative to the run root */
  include: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  /** Target catalog; `{name}` in rule templates expands to each entry */
  targets: z.array(identifier).default([]),
  rules: z.array(RuleSchema).min(1),
});

export type RuleDefinition = z.infer<typeof RuleSchema>;
export type CodemodDefinition = z.infer<typeof CodemodDefinitionSchema>;
