/**
 * Hint signs and the static tables the classifier dispatches on
 */

import { Forms } from "./forms";
import type { PrimitiveTag } from "./types";

export type LeafSign = "Ignorable" | "Primitive" | "Class" | "Predicate" | "Forward";

export type SubscriptedSign =
  | "Array"
  | "Set"
  | "Map"
  | "Record"
  | "Tuple"
  | "Shape"
  | "Union"
  | "Optional"
  | "Nullable"
  | "Literal"
  | "Annotated"
  | "ClassOf"
  | "Callable";

export type HintSign = LeafSign | SubscriptedSign;

/**
 * Origin identity -> sign. Every origin a subscripted hint may carry is listed
 * here; anything else is unsupported.
 */
export const ORIGIN_SIGNS: ReadonlyMap<unknown, SubscriptedSign> = new Map<unknown, SubscriptedSign>([
  [Array, "Array"],
  [Set, "Set"],
  [Map, "Map"],
  [Forms.Record, "Record"],
  [Forms.Tuple, "Tuple"],
  [Forms.Shape, "Shape"],
  [Forms.Union, "Union"],
  [Forms.Optional, "Optional"],
  [Forms.Nullable, "Nullable"],
  [Forms.Literal, "Literal"],
  [Forms.Annotated, "Annotated"],
  [Forms.ClassOf, "ClassOf"],
  [Forms.Callable, "Callable"],
]);

export type ArgumentArity = { min: number; max: number };

const UNBOUNDED = Number.POSITIVE_INFINITY;

export const SIGN_ARITY: Readonly<Record<SubscriptedSign, ArgumentArity>> = {
  Array: { min: 1, max: 1 },
  Set: { min: 1, max: 1 },
  Map: { min: 2, max: 2 },
  Record: { min: 2, max: 2 },
  Tuple: { min: 0, max: UNBOUNDED },
  Shape: { min: 0, max: UNBOUNDED },
  Union: { min: 1, max: UNBOUNDED },
  Optional: { min: 1, max: 1 },
  Nullable: { min: 1, max: 1 },
  Literal: { min: 1, max: UNBOUNDED },
  Annotated: { min: 2, max: UNBOUNDED },
  ClassOf: { min: 1, max: 1 },
  Callable: { min: 0, max: 0 },
};

/**
 * Bare sentinels. `Any` and `Unknown` are ignorable; the rest are atomic.
 */
export const SENTINEL_TAGS: ReadonlyMap<unknown, PrimitiveTag | "ignorable"> = new Map<unknown, PrimitiveTag | "ignorable">([
  [Forms.Any, "ignorable"],
  [Forms.Unknown, "ignorable"],
  [Forms.Never, "never"],
  [Forms.Integer, "integer"],
]);

/**
 * Builtin constructors whose instances are primitives, tested with `typeof`
 */
export const PRIMITIVE_CONSTRUCTORS: ReadonlyMap<unknown, PrimitiveTag> = new Map<unknown, PrimitiveTag>([
  [Number, "number"],
  [String, "string"],
  [Boolean, "boolean"],
  [BigInt, "bigint"],
  [Symbol, "symbol"],
  [Function, "function"],
  [Object, "object"],
]);

export function argumentArityText(arity: ArgumentArity): string {
  if (arity.min === arity.max) {
    return `exactly ${arity.min}`;
  }
  if (arity.max === UNBOUNDED) {
    return `at least ${arity.min}`;
  }
  return `${arity.min} to ${arity.max}`;
}
