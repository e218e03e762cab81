/**
 * Test suite for type expression parsing
 */

import { describe, it, expect } from "@jest/globals";
import { describeNode } from "../lib/describe";
import { UnsupportedSpecificationError } from "../lib/errors";
import { KEYWORD_HINTS, parseTypeExpression } from "../lib/expression";
import { Forms, subscript } from "../lib/forms";
import { captureError, reduceHint } from "./fixtures/hints.fixtures";

function describeExpression(text: string, scope?: Record<string, unknown>): string {
  const { arena, root } = reduceHint(text, scope);
  return describeNode(arena, root);
}

describe("parseTypeExpression", () => {
  it("should lower keywords to their hints", () => {
    expect(parseTypeExpression("number")).toBe(Number);
    expect(parseTypeExpression("unknown")).toBe(Forms.Unknown);
    expect(parseTypeExpression("void")).toBeUndefined();
    expect(KEYWORD_HINTS.get("null")).toBeNull();
  });

  it("should leave other names for later resolution", () => {
    expect(parseTypeExpression("Tree[]")).toEqual(subscript(Array, ["Tree"]));
  });

  it("should memoize by trimmed text", () => {
    expect(parseTypeExpression(" string[] ")).toBe(parseTypeExpression("string[]"));
  });

  it("should lower containers", () => {
    expect(describeExpression("readonly string[]")).toBe("Array<string>");
    expect(describeExpression("Set<Map<string, number>>")).toBe("Set<Map<string, number>>");
    expect(describeExpression("ReadonlyArray<boolean>")).toBe("Array<boolean>");
    expect(describeExpression("Record<string, bigint>")).toBe("Record<string, bigint>");
    expect(describeExpression("{ [key: string]: number }")).toBe("Record<string, number>");
    expect(describeExpression("[string, number]")).toBe("[string, number]");
    expect(describeExpression("[id: number, label: string]")).toBe("[number, string]");
  });

  it("should lower object types to shapes", () => {
    expect(describeExpression('{ id: number; "first name"?: string }')).toBe(
      '{ id: number; "first name": string | undefined }'
    );
    expect(describeExpression("{}")).toBe("{}");
  });

  it("should lower literal types and merge them", () => {
    expect(describeExpression('"a" | "b" | 1')).toBe('"a" | "b" | 1');
    expect(describeExpression("-1 | 10n | true | null")).toBe("-1 | 10n | true | null");
  });

  it("should read numeric separators and other radixes in literal types", () => {
    expect(describeExpression('1_000 | "a"')).toBe('1000 | "a"');
    expect(describeExpression("-1_000n | 0x10 | 1.5e3")).toBe("-1000n | 16 | 1500");
    expect(parseTypeExpression("1_000")).toEqual(subscript(Forms.Literal, [1000]));
  });

  it("should lower function types to callables", () => {
    expect(describeExpression("(x: number) => string")).toBe("function");
  });

  it("should resolve names inside expressions through the scope", () => {
    expect(describeExpression("(Item | null)[]", { Item: Number })).toBe("Array<number | null>");
  });

  it("should reject unsupported syntax", () => {
    expect(() => parseTypeExpression("Array<number, string>")).toThrow(
      'Unsupported specification "Array<number, string>" at hint: Array takes 1 type argument(s), got 2'
    );
    expect(() => parseTypeExpression("Promise<number>")).toThrow("generic type Promise is not supported");
    expect(() => parseTypeExpression("[number?]")).toThrow("optional and rest tuple elements are not supported");
    expect(() => parseTypeExpression("[...number[]]")).toThrow("optional and rest tuple elements are not supported");
    expect(() => parseTypeExpression("keyof Tree")).toThrow('unsupported type syntax "keyof Tree"');
    expect(() => parseTypeExpression("ns.Tree")).toThrow("qualified name ns.Tree must be defined in scope");
    expect(() => parseTypeExpression("{ size(): number }")).toThrow("object types may only declare properties");
  });

  it("should reject text that does not parse", () => {
    const error = captureError(() => parseTypeExpression("number[", "hint.args[0]"));
    expect(error).toBeInstanceOf(UnsupportedSpecificationError);
    expect(error).toMatchObject({ hintPath: "hint.args[0]", code: "unsupported" });
    expect(String(error)).toContain("invalid type expression");
  });
});
