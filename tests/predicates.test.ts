/**
 * Test suite for validator compilation
 */

import { describe, it, expect } from "@jest/globals";
import {
  compileSingleLinePredicate,
  compileValidator,
  extractPredicatePattern,
  guardPredicate,
  validatorLabel,
} from "../lib/predicates";
import { InvalidValidatorError, SpecificationError } from "../lib/errors";
import { captureError } from "./fixtures/hints.fixtures";

describe("Predicate Functions", () => {
  describe("compileSingleLinePredicate", () => {
    it("should compile x > N pattern", () => {
      const pred = compileSingleLinePredicate("x > 100");
      expect(pred).toBeDefined();
      expect(pred!(50)).toBe(false);
      expect(pred!(100)).toBe(false);
      expect(pred!(101)).toBe(true);
    });

    it("should compile x < N pattern", () => {
      const pred = compileSingleLinePredicate("x < 50");
      expect(pred!(49)).toBe(true);
      expect(pred!(50)).toBe(false);
    });

    it("should compile x >= N pattern", () => {
      const pred = compileSingleLinePredicate("x >= 0");
      expect(pred!(-1)).toBe(false);
      expect(pred!(0)).toBe(true);
      expect(pred!(1)).toBe(true);
    });

    it("should compile x <= N pattern", () => {
      const pred = compileSingleLinePredicate("x <= 1000");
      expect(pred!(1000)).toBe(true);
      expect(pred!(1001)).toBe(false);
    });

    it("should reject non-numbers in comparisons", () => {
      const pred = compileSingleLinePredicate("x > 0");
      expect(pred!("5")).toBe(false);
      expect(pred!(null)).toBe(false);
    });

    it("should compile x % N === M pattern", () => {
      const pred = compileSingleLinePredicate("x % 2 === 0");
      expect(pred!(4)).toBe(true);
      expect(pred!(3)).toBe(false);
    });

    it("should compile typeof x === 'string' pattern", () => {
      const pred = compileSingleLinePredicate('typeof x === "string"');
      expect(pred!("hello")).toBe(true);
      expect(pred!(42)).toBe(false);
    });

    it("should compile Array.isArray(x) pattern", () => {
      const pred = compileSingleLinePredicate("Array.isArray(x)");
      expect(pred!([1, 2, 3])).toBe(true);
      expect(pred!({})).toBe(false);
    });

    it("should compile x === 'literal' pattern", () => {
      const pred = compileSingleLinePredicate('x === "value"');
      expect(pred!("value")).toBe(true);
      expect(pred!("other")).toBe(false);
    });

    it("should handle whitespace, negative and decimal numbers", () => {
      expect(compileSingleLinePredicate("  x  >  100  ")!(101)).toBe(true);
      expect(compileSingleLinePredicate("x > -100")!(-100)).toBe(false);
      expect(compileSingleLinePredicate("x > 3.14")!(3.15)).toBe(true);
    });

    it("should return undefined for unsupported patterns", () => {
      expect(compileSingleLinePredicate("x && y > 10")).toBeUndefined();
      expect(compileSingleLinePredicate("Math.floor(x) > 5")).toBeUndefined();
    });
  });

  describe("extractPredicatePattern", () => {
    it("should name the matched pattern", () => {
      expect(extractPredicatePattern("x > 1")).toBe("greaterThan");
      expect(extractPredicatePattern("x >= 1")).toBe("greaterThanOrEqual");
      expect(extractPredicatePattern("x % 3 === 1")).toBe("modulo");
      expect(extractPredicatePattern("value.length > 2")).toBeUndefined();
    });
  });

  describe("compileValidator", () => {
    it("should prefer single-line patterns", () => {
      const validator = compileValidator("x > 0");
      expect(validator(1)).toBe(true);
      expect(validator(0)).toBe(false);
    });

    it("should compile general expressions over value", () => {
      const validator = compileValidator("typeof value === 'string' && value.length === 3");
      expect(validator("abc")).toBe(true);
      expect(validator("abcd")).toBe(false);
    });

    it("should reject values when the expression throws", () => {
      const validator = compileValidator("value.length > 0");
      expect(validator(null)).toBe(false);
      expect(validator([1])).toBe(true);
    });

    it("should throw InvalidValidatorError for syntax errors", () => {
      const error = captureError(() => compileValidator("value >", "hint.args[1]"));
      expect(error).toBeInstanceOf(InvalidValidatorError);
      expect(error).toBeInstanceOf(SpecificationError);
      expect(error).toMatchObject({
        code: "validator",
        hintPath: "hint.args[1]",
        message: 'Invalid validator expression "value >" at hint.args[1]',
      });
    });
  });

  describe("validatorLabel", () => {
    it("should use the trimmed expression or the function name", () => {
      function isPositive(value: unknown): boolean {
        return typeof value === "number" && value > 0;
      }
      expect(validatorLabel("  x > 0 ")).toBe("x > 0");
      expect(validatorLabel(isPositive)).toBe("isPositive");
    });
  });

  describe("guardPredicate", () => {
    it("should turn a throw into a rejection", () => {
      const guarded = guardPredicate(() => {
        throw new Error("boom");
      });
      expect(guarded(1)).toBe(false);
    });
  });
});
