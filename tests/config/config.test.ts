import { describe, it, expect } from "vitest";
import * as path from "path";
import {
  buildRules,
  listPresets,
  loadCodemod,
  parseCodemod,
  PRESET_DIR,
  resolveCodemodPath,
} from "../../src/config";
import { ConfigError, FileAccessError } from "../../src/errors";

describe("parseCodemod", () => {
  it("should fill rule defaults", () => {
    const definition = parseCodemod(
      {
        name: "x",
        include: "*.go",
        targets: ["Foo"],
        rules: [
          { kind: "field", field: "logger", type: "*slog.Logger" },
          { kind: "call-arg", argument: "logger" },
        ],
      },
      "inline"
    );

    expect(definition.description).toBe("");
    expect(definition.rules).toEqual([
      { kind: "field", struct: "{name}", field: "logger", type: "*slog.Logger" },
      { kind: "call-arg", call: "New{name}", argument: "logger", related: [] },
    ]);
  });

  it("should freeze the catalog", () => {
    const definition = parseCodemod(
      { name: "x", include: "*.go", targets: ["Foo"], rules: [{ kind: "call-arg", argument: "l" }] },
      "inline"
    );

    expect(Object.isFrozen(definition)).toBe(true);
    expect(Object.isFrozen(definition.targets)).toBe(true);
    expect(Object.isFrozen(definition.rules)).toBe(true);
  });

  it("should list every issue with its location", () => {
    const parse = () =>
      parseCodemod(
        {
          name: "x",
          include: "*.go",
          rules: [{ kind: "field", field: "bad name", type: "int" }],
        },
        "broken.json"
      );

    expect(parse).toThrow(ConfigError);
    try {
      parse();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.source).toBe("broken.json");
        expect(error.issues).toEqual(["rules.0.field: must be an identifier"]);
      }
    }
  });

  it("should reject unknown rule kinds", () => {
    expect(() =>
      parseCodemod({ name: "x", include: "*.go", rules: [{ kind: "rename" }] }, "inline")
    ).toThrow(ConfigError);
  });
});

describe("buildRules", () => {
  it("should expand templated rules once per target, in definition order", () => {
    const definition = parseCodemod(
      {
        name: "x",
        include: "*.go",
        targets: ["Foo", "Bar"],
        rules: [
          { kind: "import", path: "log/slog", anchor: "context" },
          { kind: "field", field: "logger", type: "*slog.Logger" },
          { kind: "constructor-param", param: "logger", type: "*slog.Logger" },
        ],
      },
      "inline"
    );

    expect(buildRules(definition).map((rule) => rule.name)).toEqual([
      "import-block:log/slog",
      "struct-body:Foo",
      "struct-body:Bar",
      "constructor-params:NewFoo",
      "constructor-params:NewBar",
    ]);
  });

  it("should build a single rule from a literal name", () => {
    const definition = parseCodemod(
      {
        name: "x",
        include: "*.go",
        rules: [{ kind: "field", struct: "Server", field: "logger", type: "*slog.Logger" }],
      },
      "inline"
    );

    expect(buildRules(definition).map((rule) => rule.name)).toEqual(["struct-body:Server"]);
  });

  it("should build rules that apply the expanded names", () => {
    const definition = parseCodemod(
      {
        name: "x",
        include: "*.go",
        targets: ["Foo"],
        rules: [{ kind: "constructor-param", param: "logger", type: "*slog.Logger" }],
      },
      "inline"
    );
    const [rule] = buildRules(definition);

    expect(rule.transform("func NewFoo(x int) *Foo { return &Foo{x: x} }")).toBe(
      "func NewFoo(x int, logger *slog.Logger) *Foo { return &Foo{x: x, logger: logger} }"
    );
  });
});

describe("presets", () => {
  it("should ship the three logging codemods", () => {
    expect(listPresets()).toEqual(["handler-logging", "main-logging", "test-logging"]);
  });

  it("should load a preset by name", () => {
    const definition = loadCodemod("handler-logging");

    expect(definition.include).toBe("services/*/internal/presentation/grpc/handler.go");
    expect(definition.targets).toHaveLength(10);
    expect(definition.rules.map((rule) => rule.kind)).toEqual([
      "import",
      "placeholder",
      "field",
      "constructor-param",
    ]);
  });

  it("should resolve names into the preset directory and paths as given", () => {
    expect(resolveCodemodPath("main-logging")).toBe(path.join(PRESET_DIR, "main-logging.json"));
    expect(resolveCodemodPath("/tmp/custom.json")).toBe("/tmp/custom.json");
  });

  it("should fail on a missing definition file", () => {
    expect(() => loadCodemod("/nonexistent/codemod.json")).toThrow(FileAccessError);
  });
});
