/**
 * Raw hint building blocks: sentinels, special forms and subscripted hints
 */

import type { Constructor, Validator } from "./types";

/**
 * A named marker with no runtime behavior of its own. Used bare as a sentinel
 * (`Any`, `Never`) or as the origin of a subscripted hint (`Union`, `Tuple`).
 */
export class SpecialForm {
  constructor(readonly name: string) {
    Object.freeze(this);
  }

  toString(): string {
    return this.name;
  }
}

export const Forms = {
  Any: new SpecialForm("Any"),
  Unknown: new SpecialForm("Unknown"),
  Never: new SpecialForm("Never"),
  Integer: new SpecialForm("Integer"),
  Record: new SpecialForm("Record"),
  Tuple: new SpecialForm("Tuple"),
  Shape: new SpecialForm("Shape"),
  Union: new SpecialForm("Union"),
  Optional: new SpecialForm("Optional"),
  Nullable: new SpecialForm("Nullable"),
  Literal: new SpecialForm("Literal"),
  Annotated: new SpecialForm("Annotated"),
  ClassOf: new SpecialForm("ClassOf"),
  Callable: new SpecialForm("Callable"),
} as const;

/**
 * An origin plus its argument hints, e.g. `Array` + `[Number]`
 */
export class SubscriptedHint {
  readonly args: readonly unknown[];
  readonly keys?: readonly string[];

  constructor(readonly origin: unknown, args: readonly unknown[], keys?: readonly string[]) {
    this.args = Object.freeze([...args]);
    if (keys) {
      this.keys = Object.freeze([...keys]);
    }
    Object.freeze(this);
  }
}

/**
 * A name to look up in the compile scope once it is needed
 */
export class DeferredName {
  constructor(readonly name: string) {
    Object.freeze(this);
  }
}

/**
 * A hint produced on demand, for hints that refer to themselves
 */
export class LazyHint {
  constructor(readonly thunk: () => unknown, readonly label: string) {
    Object.freeze(this);
  }
}

/**
 * Builtin constructors that tag primitives; `Symbol` and `BigInt` cannot be `new`ed
 */
export type PrimitiveConstructor =
  | NumberConstructor
  | StringConstructor
  | BooleanConstructor
  | BigIntConstructor
  | SymbolConstructor
  | FunctionConstructor
  | ObjectConstructor;

export type Hint =
  | Constructor
  | PrimitiveConstructor
  | SpecialForm
  | SubscriptedHint
  | DeferredName
  | LazyHint
  | Validator
  | string
  | null
  | undefined;

export function subscript(origin: unknown, args: readonly unknown[], keys?: readonly string[]): SubscriptedHint {
  return new SubscriptedHint(origin, args, keys);
}
