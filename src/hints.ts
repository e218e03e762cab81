/**
 * Hint constructors
 *
 * Each returns a frozen subscripted hint. Build a hint once and reuse it:
 * compiled checkers are cached by hint identity.
 */

import { DeferredName, Forms, LazyHint, subscript, type Hint, type SubscriptedHint } from "../lib/forms";
import type { Constructor, LiteralValue, Validator } from "../lib/types";

/** Accepts every value */
export const Any = Forms.Any;
/** Accepts every value */
export const Unknown = Forms.Unknown;
/** Accepts no value */
export const Never = Forms.Never;
/** Integral numbers */
export const Integer = Forms.Integer;

export function arrayOf(item: Hint): SubscriptedHint {
  return subscript(Array, [item]);
}

export function setOf(item: Hint): SubscriptedHint {
  return subscript(Set, [item]);
}

export function mapOf(key: Hint, value: Hint): SubscriptedHint {
  return subscript(Map, [key, value]);
}

/**
 * Plain objects whose own enumerable keys match `key` and values match `value`.
 * Keys are always checked as strings.
 */
export function recordOf(key: Hint, value: Hint): SubscriptedHint {
  return subscript(Forms.Record, [key, value]);
}

/**
 * Arrays of exactly `items.length` elements, position by position
 */
export function tupleOf(...items: Hint[]): SubscriptedHint {
  return subscript(Forms.Tuple, items);
}

/**
 * Objects with the given properties. Missing properties are checked as
 * `undefined`, so wrap them in {@link optional} to allow leaving them out.
 */
export function shapeOf(fields: Readonly<Record<string, Hint>>): SubscriptedHint {
  const keys = Object.keys(fields);
  return subscript(
    Forms.Shape,
    keys.map((key) => fields[key]),
    keys
  );
}

export function unionOf(first: Hint, ...rest: Hint[]): SubscriptedHint {
  return subscript(Forms.Union, [first, ...rest]);
}

export function optional(hint: Hint): SubscriptedHint {
  return subscript(Forms.Optional, [hint]);
}

export function nullable(hint: Hint): SubscriptedHint {
  return subscript(Forms.Nullable, [hint]);
}

export function literal(first: LiteralValue, ...rest: LiteralValue[]): SubscriptedHint {
  return subscript(Forms.Literal, [first, ...rest]);
}

/**
 * `base` narrowed by validators. A validator is a predicate function or an
 * expression such as `"x > 0"` or `"value.length === 3"`.
 */
export function annotated(base: Hint, first: Validator | string, ...rest: (Validator | string)[]): SubscriptedHint {
  return subscript(Forms.Annotated, [base, first, ...rest]);
}

/**
 * The constructor itself or any subclass of it
 */
export function classOf(ctor: Constructor): SubscriptedHint {
  return subscript(Forms.ClassOf, [ctor]);
}

export function callable(): SubscriptedHint {
  return subscript(Forms.Callable, []);
}

/**
 * A name resolved in the compile scope when the hint is compiled
 */
export function ref(name: string): DeferredName {
  return new DeferredName(name);
}

/**
 * A hint produced on demand, for hints that contain themselves
 */
export function lazy(thunk: () => Hint, label: string = thunk.name || "lazy"): LazyHint {
  return new LazyHint(thunk, label);
}
