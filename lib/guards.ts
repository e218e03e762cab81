/**
 * Value tests shared by the synthesizer and the violation reporter
 */

import type { AtomicTarget, ContainerNode, LiteralValue, Validator } from "./types";
import { isPlainObject } from "./utils";

export function atomicTest(target: AtomicTarget): Validator {
  if (target.type === "class") {
    const { ctor } = target;
    return (value) => value instanceof ctor;
  }
  switch (target.tag) {
    case "integer":
      return (value) => Number.isInteger(value);
    case "object":
      return (value) => typeof value === "object" && value !== null;
    case "null":
      return (value) => value === null;
    case "undefined":
      return (value) => value === undefined;
    case "never":
      return () => false;
    default: {
      const tag = target.tag;
      return (value) => typeof value === tag;
    }
  }
}

/**
 * Membership by SameValueZero, so `NaN` matches `NaN` and `0` matches `-0`
 */
export function literalTest(values: readonly LiteralValue[]): Validator {
  if (values.length === 1) {
    const [only] = values;
    return Number.isNaN(only) ? (value) => Number.isNaN(value) : (value) => value === only;
  }
  const members = new Set<unknown>(values);
  return (value) => members.has(value);
}

export function isArrayValue(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

export function isSetValue(value: unknown): value is ReadonlySet<unknown> {
  return value instanceof Set;
}

export function isMapValue(value: unknown): value is ReadonlyMap<unknown, unknown> {
  return value instanceof Map;
}

/**
 * Records and shapes accept non-null objects other than arrays, Maps and Sets
 */
export function isObjectValue(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value) && !(value instanceof Map) && !(value instanceof Set);
}

/**
 * The shallow stage of a container check: its base type, and its length for tuples
 */
export function shallowTest(node: ContainerNode): Validator {
  switch (node.container) {
    case "array":
      return isArrayValue;
    case "tuple": {
      const length = node.children.length;
      return (value) => isArrayValue(value) && value.length === length;
    }
    case "set":
      return isSetValue;
    case "map":
      return isMapValue;
    case "record":
    case "shape":
      return isObjectValue;
  }
}
