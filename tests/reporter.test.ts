/**
 * Test suite for violation reporting
 */

import { describe, it, expect } from "@jest/globals";
import { explainNode, formatPath } from "../lib/reporter";
import {
  arrayOf,
  Integer,
  literal,
  mapOf,
  nullable,
  recordOf,
  ref,
  setOf,
  shapeOf,
  tupleOf,
  unionOf,
  annotated,
} from "../src/hints";
import { Dog, reduceHint } from "./fixtures/hints.fixtures";

function explain(hint: unknown, value: unknown, scope?: Record<string, unknown>) {
  const { arena, root } = reduceHint(hint, scope);
  return explainNode(arena, root, value);
}

describe("formatPath", () => {
  it("should render every segment kind", () => {
    expect(formatPath([])).toBe("value");
    expect(
      formatPath([
        { kind: "key", key: "items" },
        { kind: "index", index: 2 },
        { kind: "key", key: "first name" },
      ])
    ).toBe('value.items[2]["first name"]');
    expect(formatPath([{ kind: "mapValue", key: "id" }, { kind: "mapKey", position: 1 }])).toBe('value.get("id").keys()[1]');
    expect(formatPath([{ kind: "mapValue", key: 7 }])).toBe("value.get(7)");
    expect(formatPath([{ kind: "mapValue", key: { id: 1 } }])).toBe("value.get(object)");
    expect(formatPath([{ kind: "setElement", position: 0 }])).toBe("value.values()[0]");
    expect(formatPath([{ kind: "recordKey", key: "k" }])).toBe('value{key "k"}');
  });
});

describe("explainNode", () => {
  it("should report ok for conforming values", () => {
    expect(explain(arrayOf(Number), [1, 2, 3])).toEqual({ ok: true });
  });

  it("should report the first failing array index", () => {
    expect(explain(arrayOf(Number), [1, "x", 3])).toEqual({
      ok: false,
      path: [{ kind: "index", index: 1 }],
      pathText: "value[1]",
      expected: "number",
      actual: 'string "x"',
      message: 'value[1] violates number: got string "x"',
    });
  });

  it("should report literals and unions at the root", () => {
    const literalFailure = explain(literal(1, 2, 3), 4);
    expect(literalFailure).toMatchObject({ expected: "1 | 2 | 3", actual: "number 4", message: "value violates 1 | 2 | 3: got number 4" });

    const unionFailure = explain(unionOf(Integer, String), 3.5);
    expect(unionFailure).toMatchObject({ pathText: "value", expected: "integer | string", actual: "number 3.5" });
  });

  it("should descend into the only union alternative whose shallow test passes", () => {
    const failure = explain(unionOf(Number, arrayOf(String)), ["a", 2]);
    expect(failure).toMatchObject({ pathText: "value[1]", expected: "string", actual: "number 2" });
  });

  it("should report container mismatches at the container", () => {
    expect(explain(arrayOf(Number), "abc")).toMatchObject({ pathText: "value", expected: "Array<number>", actual: 'string "abc"' });
    expect(explain(tupleOf(Number, String), [1])).toMatchObject({ expected: "[number, string]", actual: "array of length 1" });
  });

  it("should name shape keys, map entries, set elements and record keys", () => {
    expect(explain(shapeOf({ user: shapeOf({ "first name": String }) }), { user: { "first name": 1 } })).toMatchObject({
      pathText: 'value.user["first name"]',
    });
    expect(explain(mapOf(String, Number), new Map<unknown, unknown>([["a", 1], ["b", "x"]]))).toMatchObject({
      pathText: 'value.get("b")',
    });
    expect(explain(mapOf(String, Number), new Map<unknown, unknown>([["a", 1], [2, 2]]))).toMatchObject({
      pathText: "value.keys()[1]",
      actual: "number 2",
    });
    expect(explain(setOf(Number), new Set([1, 2, "three"]))).toMatchObject({ pathText: "value.values()[2]" });
    expect(explain(recordOf(literal("a", "b"), Number), { a: 1, c: 2 })).toMatchObject({
      pathText: 'value{key "c"}',
      expected: '"a" | "b"',
    });
    expect(explain(recordOf(String, Number), { a: 1, b: null })).toMatchObject({ pathText: "value.b", actual: "null" });
  });

  it("should report a property whose read throws at that key", () => {
    const unreadable = {
      get a(): number {
        throw new Error("boom");
      },
    };
    expect(explain(shapeOf({ a: Number }), unreadable)).toEqual({
      ok: false,
      path: [{ kind: "key", key: "a" }],
      pathText: "value.a",
      expected: "number",
      actual: "unreadable property (boom)",
      message: "value.a violates number: got unreadable property (boom)",
    });
    expect(explain(recordOf(String, Number), unreadable)).toMatchObject({
      pathText: "value.a",
      actual: "unreadable property (boom)",
    });
  });

  it("should describe predicates and classes", () => {
    expect(explain(annotated(Number, "x > 0"), -1)).toMatchObject({ expected: "is(x > 0)", actual: "number -1" });
    expect(explain(Dog, new Date(0))).toMatchObject({ expected: "Dog", actual: "instance of Date" });
  });

  it("should describe recursive hints by name and stop on cyclic values", () => {
    const scope = { Node: shapeOf({ value: Number, next: nullable("Node") }) };
    const failure = explain(ref("Node"), { value: 1, next: { value: "2", next: null } }, scope);
    expect(failure).toMatchObject({ pathText: "value.next.value", expected: "number", actual: 'string "2"' });

    const rootFailure = explain(ref("Node"), 5, scope);
    expect(rootFailure).toMatchObject({ expected: "{ value: number; next: Node | null }" });

    type Cyclic = { value: unknown; next: Cyclic | null };
    const cyclic: Cyclic = { value: 1, next: null };
    cyclic.next = cyclic;
    expect(explain(ref("Node"), cyclic, scope)).toEqual({ ok: true });
  });
});
