/**
 * Validator compilation for `annotated` hints
 * Handles single-line predicate expressions over `x` and general expressions over `value`
 */

import { InvalidValidatorError } from "./errors";
import type { Validator } from "./types";

type PredicatePattern = {
  name: string;
  pattern: RegExp;
  build: (match: RegExpMatchArray) => Validator;
};

const NUMBER = "(-?\\d+(?:\\.\\d+)?)";

function comparison(name: string, operator: string, compare: (value: number, threshold: number) => boolean): PredicatePattern {
  return {
    name,
    pattern: new RegExp(`^x\\s*${operator}\\s*${NUMBER}$`),
    build: (match) => {
      const threshold = parseFloat(match[1]);
      return (value) => typeof value === "number" && compare(value, threshold);
    },
  };
}

/**
 * Supported single-line patterns, tried in order:
 * - x > n, x < n, x >= n, x <= n
 * - x % n === m
 * - typeof x === "string"|"number"|...
 * - Array.isArray(x)
 * - x === "literal"
 */
const SINGLE_LINE_PATTERNS: readonly PredicatePattern[] = [
  comparison("greaterThanOrEqual", ">=", (value, threshold) => value >= threshold),
  comparison("lessThanOrEqual", "<=", (value, threshold) => value <= threshold),
  comparison("greaterThan", ">", (value, threshold) => value > threshold),
  comparison("lessThan", "<", (value, threshold) => value < threshold),
  {
    name: "modulo",
    pattern: /^x\s*%\s*(\d+)\s*===\s*(\d+)$/,
    build: (match) => {
      const divisor = parseInt(match[1], 10);
      const remainder = parseInt(match[2], 10);
      return (value) => typeof value === "number" && value % divisor === remainder;
    },
  },
  {
    name: "typeCheck",
    pattern: /^typeof\s+x\s*===\s*"(string|number|boolean|bigint|object|undefined|symbol|function)"$/,
    build: (match) => {
      const typeName = match[1];
      return (value) => typeof value === typeName;
    },
  },
  {
    name: "arrayCheck",
    pattern: /^Array\.isArray\(x\)$/,
    build: () => (value) => Array.isArray(value),
  },
  {
    name: "stringLiteral",
    pattern: /^x\s*===\s*"([^"]*)"$/,
    build: (match) => {
      const literal = match[1];
      return (value) => value === literal;
    },
  },
];

function matchPattern(expression: string): { entry: PredicatePattern; match: RegExpMatchArray } | undefined {
  const trimmed = expression.trim();
  for (const entry of SINGLE_LINE_PATTERNS) {
    const match = trimmed.match(entry.pattern);
    if (match) {
      return { entry, match };
    }
  }
  return undefined;
}

/**
 * Compile a single-line predicate expression, or undefined when it matches no known pattern
 */
export function compileSingleLinePredicate(expression: string): Validator | undefined {
  const found = matchPattern(expression);
  return found ? found.entry.build(found.match) : undefined;
}

/**
 * Name of the single-line pattern an expression uses, e.g. `greaterThan`
 */
export function extractPredicatePattern(expression: string): string | undefined {
  return matchPattern(expression)?.entry.name;
}

/**
 * Compile a validator expression. Single-line patterns are matched first;
 * anything else is compiled as a JavaScript expression over `value`.
 * A validator that throws while running rejects the value.
 */
export function compileValidator(source: string, hintPath: string = "validator"): Validator {
  const singleLine = compileSingleLinePredicate(source);
  if (singleLine) {
    return singleLine;
  }

  let fn: Function;
  try {
    // eslint-disable-next-line no-new-func
    fn = new Function("value", `"use strict"; return (${source});`);
  } catch (error) {
    throw new InvalidValidatorError(source, hintPath, error);
  }

  return (value: unknown) => {
    try {
      return Boolean(fn(value));
    } catch {
      return false;
    }
  };
}

/**
 * Label used when describing a validator
 */
export function validatorLabel(validator: Validator | string): string {
  if (typeof validator === "string") {
    return validator.trim();
  }
  return validator.name || "anonymous";
}

/**
 * Wrap a caller-supplied predicate so a throw counts as a rejection
 */
export function guardPredicate(test: Validator): Validator {
  return (value: unknown) => {
    try {
      return Boolean(test(value));
    } catch {
      return false;
    }
  };
}
