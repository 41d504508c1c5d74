import { describe, it, expect } from "vitest";
import { ConstructorParamTransform } from "../../src/transforms/constructor-param-transform";

describe("ConstructorParamTransform", () => {
  const transform = new ConstructorParamTransform({
    constructorName: "NewFoo",
    returnType: "*Foo",
    literal: "Foo",
    param: "logger",
    type: "*Logger",
  });

  it("should add the parameter and the field assignment", () => {
    const result = transform.transform("func NewFoo(x int) *Foo { return &Foo{x: x} }\n");

    expect(result).toBe(
      "func NewFoo(x int, logger *Logger) *Foo { return &Foo{x: x, logger: logger} }\n"
    );
  });

  it("should follow the trailing-comma layout of multi-line lists", () => {
    const input = [
      "func NewFoo(",
      "\tsvc Service,",
      "\trepo Repo,",
      ") *Foo {",
      "\treturn &Foo{",
      "\t\tsvc:  svc,",
      "\t\trepo: repo,",
      "\t}",
      "}",
      "",
    ].join("\n");

    expect(transform.transform(input)).toBe(
      [
        "func NewFoo(",
        "\tsvc Service,",
        "\trepo Repo,",
        "\tlogger *Logger,",
        ") *Foo {",
        "\treturn &Foo{",
        "\t\tsvc:  svc,",
        "\t\trepo: repo,",
        "\t\tlogger: logger,",
        "\t}",
        "}",
        "",
      ].join("\n")
    );
  });

  it("should be idempotent", () => {
    const once = transform.transform("func NewFoo(x int) *Foo { return &Foo{x: x} }\n");
    expect(transform.transform(once)).toBe(once);
  });

  it("should treat a parameter of the same type as already present", () => {
    const input = "func NewFoo(x int, log *Logger) *Foo { return &Foo{x: x, logger: log} }\n";
    expect(transform.transform(input)).toBe(input);
  });

  it("should leave the literal alone when the parameter already exists", () => {
    const input = "func NewFoo(x int, logger *Logger) *Foo { return &Foo{x: x} }\n";
    expect(transform.transform(input)).toBe(input);
  });

  it("should not assign a parameter that exists under another name", () => {
    const input = "func NewFoo(x int, l *Logger) *Foo { return &Foo{x: x} }\n";
    expect(transform.transform(input)).toBe(input);
  });

  it("should leave positional literals alone", () => {
    const input = "func NewFoo(x int) *Foo { return &Foo{x} }\n";

    expect(transform.transform(input)).toBe(
      "func NewFoo(x int, logger *Logger) *Foo { return &Foo{x} }\n"
    );
  });

  it("should skip a function with a different result type", () => {
    const input = "func NewFoo(x int) *Bar { return &Bar{x: x} }\n";
    expect(transform.transform(input)).toBe(input);
  });

  it("should not touch call sites", () => {
    const input = "h := NewFoo(1)\n";
    expect(transform.transform(input)).toBe(input);
  });
});
