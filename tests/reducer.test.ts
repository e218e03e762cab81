/**
 * Test suite for tree reduction and forward resolution
 */

import { describe, it, expect } from "@jest/globals";
import { describeNode } from "../lib/describe";
import { UnresolvedForwardReferenceError } from "../lib/errors";
import { Forms } from "../lib/forms";
import { Scope } from "../lib/forward";
import {
  annotated,
  arrayOf,
  lazy,
  literal,
  mapOf,
  ref,
  shapeOf,
  unionOf,
} from "../src/hints";
import { captureError, createSilentLogger, reduceHint } from "./fixtures/hints.fixtures";

function describeReduced(hint: unknown, scope?: Scope | Record<string, unknown>): string {
  const { arena, root } = reduceHint(hint, scope);
  return describeNode(arena, root);
}

describe("reduceTree", () => {
  describe("unions", () => {
    it("should flatten nested unions one level", () => {
      const { arena, root } = reduceHint(unionOf(Number, unionOf(String, Boolean)));
      const node = arena.get(root);
      expect(node.kind).toBe("union");
      if (node.kind === "union") {
        expect(node.alternatives).toHaveLength(3);
      }
      expect(describeNode(arena, root)).toBe("number | string | boolean");
    });

    it("should drop never alternatives and collapse singletons", () => {
      const { arena, root } = reduceHint(unionOf(Number, Forms.Never));
      expect(arena.get(root)).toEqual({ kind: "atomic", target: { type: "primitive", tag: "number" } });
    });

    it("should reduce a union of only never to never", () => {
      const { arena, root } = reduceHint(unionOf(Forms.Never));
      expect(arena.get(root)).toEqual({ kind: "atomic", target: { type: "primitive", tag: "never" } });
    });

    it("should merge literal alternatives in first-seen order", () => {
      expect(describeReduced(unionOf(literal(1, 2), literal(2, 3), String))).toBe("1 | 2 | 3 | string");
    });

    it("should absorb everything into an ignorable alternative", () => {
      const { arena, root } = reduceHint(unionOf(Number, arrayOf(String), Forms.Any));
      expect(arena.get(root)).toEqual({ kind: "ignorable" });
    });

    it("should deduplicate structurally equal alternatives", () => {
      const { arena, root } = reduceHint(unionOf(arrayOf(Number), arrayOf(Number)));
      expect(arena.get(root)).toMatchObject({ kind: "container", container: "array" });
    });
  });

  describe("conjunctions", () => {
    it("should drop ignorable members and collapse singletons", () => {
      const { arena, root } = reduceHint(annotated(Forms.Any, "x > 0"));
      expect(arena.get(root)).toMatchObject({ kind: "predicate", label: "x > 0" });
    });

    it("should become never when a member is never", () => {
      const { arena, root } = reduceHint(annotated(Forms.Never, "x > 0"));
      expect(arena.get(root)).toEqual({ kind: "atomic", target: { type: "primitive", tag: "never" } });
    });
  });

  describe("containers and literals", () => {
    it("should mark containers of ignorable children as shallow", () => {
      const shallow = reduceHint(arrayOf(Forms.Any));
      expect(shallow.arena.get(shallow.root)).toMatchObject({ container: "array", deep: false });

      const deep = reduceHint(mapOf(String, Forms.Unknown));
      expect(deep.arena.get(deep.root)).toMatchObject({ container: "map", deep: true });
    });

    it("should deduplicate literal values by SameValueZero", () => {
      const { arena, root } = reduceHint(literal(1, 1, NaN, NaN, 0, -0));
      expect(arena.get(root)).toEqual({ kind: "literal", values: [1, NaN, 0] });
    });
  });

  describe("forward references", () => {
    it("should resolve recursive names to back-edges", () => {
      const tree = shapeOf({ value: Number, children: arrayOf("Tree") });
      expect(describeReduced("Tree", { Tree: tree })).toBe("{ value: number; children: Array<Tree> }");
    });

    it("should log each resolution at debug level", () => {
      const logger = createSilentLogger();
      reduceHint(arrayOf(ref("Item")), new Scope({ Item: Number }), logger);
      const entries = logger.getEntriesAtLevel("debug");
      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe("Resolved forward reference Item");
      expect(entries[0].data).toEqual({ source: "scope", hintPath: "hint.args[0]" });
    });

    it("should resolve keywords, globals and type expressions", () => {
      expect(describeReduced("number")).toBe("number");
      expect(describeReduced("Date")).toBe("Date");
      expect(describeReduced("Array<number> | null")).toBe("Array<number> | null");
    });

    it("should resolve thunks", () => {
      expect(describeReduced(lazy(() => arrayOf(String), "strings"))).toBe("Array<string>");
    });

    it("should reject names that only refer to themselves", () => {
      const error = captureError(() => reduceHint("A", { A: "A" }));
      expect(error).toBeInstanceOf(UnresolvedForwardReferenceError);
      expect(error).toMatchObject({
        code: "unresolved",
        reference: "A",
        message: 'Unresolved forward reference "A" at hint: refers only to itself',
      });
    });

    it("should reject chains of aliases that loop", () => {
      const error = captureError(() => reduceHint("A", { A: "B", B: "A" }));
      expect(error).toMatchObject({ reference: "B", message: 'Unresolved forward reference "B" at hint: refers only to itself' });
    });

    it("should reject missing names with their position", () => {
      const error = captureError(() => reduceHint(arrayOf("Missing")));
      expect(error).toBeInstanceOf(UnresolvedForwardReferenceError);
      expect(error).toMatchObject({
        hintPath: "hint.args[0]",
        message: 'Unresolved forward reference "Missing" at hint.args[0]: not defined in scope',
      });
    });

    it("should wrap errors thrown by thunks", () => {
      const failure = new Error("not ready");
      const error = captureError(() =>
        reduceHint(
          lazy(() => {
            throw failure;
          }, "broken")
        )
      );
      expect(error).toMatchObject({
        reference: "broken",
        message: 'Unresolved forward reference "broken" at hint: thunk threw while resolving',
        cause: failure,
      });
    });
  });
});
