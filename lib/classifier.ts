/**
 * Sign classification: raw hints -> signs -> arena nodes
 *
 * Rules, first match wins (their triggers are disjoint):
 * 1. builtin sentinels and primitive constructors
 * 2. subscripted `{ origin, args }` shapes, by origin identity
 * 3. class constructors
 * 4. other functions (predicates)
 * 5. strings, `ref` and `lazy` (forward references)
 */

import type { SpecArena } from "./arena";
import { UnsupportedSpecificationError } from "./errors";
import { DeferredName, LazyHint, SpecialForm } from "./forms";
import { compileValidator, guardPredicate, validatorLabel } from "./predicates";
import {
  argumentArityText,
  ORIGIN_SIGNS,
  PRIMITIVE_CONSTRUCTORS,
  SENTINEL_TAGS,
  SIGN_ARITY,
  type SubscriptedSign,
} from "./signs";
import type {
  Constructor,
  ForwardReference,
  LiteralValue,
  NodeHandle,
  PrimitiveTag,
  SpecNode,
  Validator,
} from "./types";
import { isLiteralValue } from "./utils";

export type Classification =
  | { sign: "Ignorable" }
  | { sign: "Primitive"; tag: PrimitiveTag }
  | { sign: "Class"; ctor: Constructor }
  | { sign: "Predicate"; test: Validator; label: string }
  | { sign: "Forward"; reference: ForwardReference }
  | { sign: SubscriptedSign; origin: unknown; args: readonly unknown[]; keys?: readonly string[] };

/**
 * True for class constructors: `class` syntax, native constructors, or
 * functions whose prototype carries methods. Arrow functions and plain
 * `function` predicates are not classes.
 */
export function isClassLike(value: unknown): value is Constructor {
  if (typeof value !== "function") {
    return false;
  }
  const prototype: unknown = value.prototype;
  if (typeof prototype !== "object" || prototype === null) {
    return false;
  }
  const source = Function.prototype.toString.call(value);
  if (/^class[\s{]/.test(source) || /\{\s*\[native code\]\s*\}\s*$/.test(source)) {
    return true;
  }
  return Object.getOwnPropertyNames(prototype).some((name) => name !== "constructor");
}

type SubscriptedShape = { origin: unknown; args: readonly unknown[]; keys?: readonly string[] };

function asSubscripted(raw: object): SubscriptedShape | undefined {
  if (!("origin" in raw) || !("args" in raw) || !Array.isArray(raw.args)) {
    return undefined;
  }
  const shape: SubscriptedShape = { origin: raw.origin, args: raw.args };
  if ("keys" in raw && raw.keys !== undefined) {
    const keys: unknown = raw.keys;
    if (!Array.isArray(keys) || !keys.every((key): key is string => typeof key === "string")) {
      return undefined;
    }
    shape.keys = keys;
  }
  return shape;
}

/**
 * Classify one level of a raw hint
 */
export function classifyHint(raw: unknown, hintPath: string = "hint"): Classification {
  // Rule 1: sentinels
  if (raw === null) return { sign: "Primitive", tag: "null" };
  if (raw === undefined) return { sign: "Primitive", tag: "undefined" };
  const sentinel = SENTINEL_TAGS.get(raw);
  if (sentinel === "ignorable") return { sign: "Ignorable" };
  if (sentinel !== undefined) return { sign: "Primitive", tag: sentinel };
  const primitive = PRIMITIVE_CONSTRUCTORS.get(raw);
  if (primitive !== undefined) return { sign: "Primitive", tag: primitive };

  // Rule 2: origin + args
  if (typeof raw === "object") {
    const subscripted = asSubscripted(raw);
    if (subscripted) {
      return classifySubscripted(raw, subscripted, hintPath);
    }
  }

  // Rule 3 and 4: classes, then predicates
  if (isClassLike(raw)) return { sign: "Class", ctor: raw };
  if (typeof raw === "function") {
    const predicate = raw;
    const test = guardPredicate((value) => Boolean(predicate(value)));
    return { sign: "Predicate", test, label: predicate.name || "anonymous" };
  }

  // Rule 5: forward references
  if (typeof raw === "string") {
    if (raw.trim().length === 0) {
      throw new UnsupportedSpecificationError(raw, hintPath, "forward reference names must not be empty");
    }
    return { sign: "Forward", reference: { type: "name", name: raw.trim() } };
  }
  if (raw instanceof DeferredName) {
    return { sign: "Forward", reference: { type: "name", name: raw.name } };
  }
  if (raw instanceof LazyHint) {
    return { sign: "Forward", reference: { type: "thunk", thunk: raw.thunk, label: raw.label } };
  }

  if (raw instanceof SpecialForm) {
    throw new UnsupportedSpecificationError(raw, hintPath, `${raw.name} must be given arguments`);
  }
  throw new UnsupportedSpecificationError(raw, hintPath, "matches no known hint shape");
}

function classifySubscripted(raw: unknown, shape: SubscriptedShape, hintPath: string): Classification {
  const sign = ORIGIN_SIGNS.get(shape.origin);
  if (sign === undefined) {
    throw new UnsupportedSpecificationError(raw, hintPath, "origin is not a supported generic");
  }

  const arity = SIGN_ARITY[sign];
  if (shape.args.length < arity.min || shape.args.length > arity.max) {
    throw new UnsupportedSpecificationError(
      raw,
      hintPath,
      `${sign} takes ${argumentArityText(arity)} argument(s), got ${shape.args.length}`
    );
  }

  if (sign === "Shape" && (shape.keys === undefined || shape.keys.length !== shape.args.length)) {
    throw new UnsupportedSpecificationError(raw, hintPath, "Shape needs one key per argument");
  }

  return { sign, origin: shape.origin, args: shape.args, keys: shape.keys };
}

/**
 * Classify a raw hint and everything below it into `arena`, leaving forward
 * references unresolved. `memo` maps raw hint identity to its handle so
 * shared sub-hints become shared nodes.
 */
export function classifyTree(
  arena: SpecArena,
  raw: unknown,
  memo: Map<unknown, NodeHandle>,
  hintPath: string = "hint"
): NodeHandle {
  const known = memo.get(raw);
  if (known !== undefined) {
    return known;
  }

  const classification = classifyHint(raw, hintPath);
  const handle = arena.reserve();
  memo.set(raw, handle);
  arena.set(handle, new TreeClassifier(arena, memo).lower(raw, classification, hintPath));
  return handle;
}

class TreeClassifier {
  constructor(
    private readonly arena: SpecArena,
    private readonly memo: Map<unknown, NodeHandle>
  ) {}

  lower(raw: unknown, classification: Classification, hintPath: string): SpecNode {
    switch (classification.sign) {
      case "Ignorable":
        return { kind: "ignorable" };
      case "Primitive":
        return { kind: "atomic", target: { type: "primitive", tag: classification.tag } };
      case "Class":
        return { kind: "atomic", target: { type: "class", ctor: classification.ctor } };
      case "Predicate":
        return { kind: "predicate", test: classification.test, label: classification.label };
      case "Forward":
        return { kind: "forward", reference: classification.reference };
      default:
        return this.lowerSubscripted(raw, classification, hintPath);
    }
  }

  private child(raw: unknown, hintPath: string): NodeHandle {
    return classifyTree(this.arena, raw, this.memo, hintPath);
  }

  private children(args: readonly unknown[], hintPath: string): NodeHandle[] {
    return args.map((arg, index) => this.child(arg, `${hintPath}.args[${index}]`));
  }

  private lowerSubscripted(
    raw: unknown,
    classification: Extract<Classification, { args: readonly unknown[] }>,
    hintPath: string
  ): SpecNode {
    const { args, sign } = classification;
    switch (classification.sign) {
      case "Array":
        return { kind: "container", container: "array", base: Array, arity: "variable", children: this.children(args, hintPath), deep: true };
      case "Set":
        return { kind: "container", container: "set", base: Set, arity: "variable", children: this.children(args, hintPath), deep: true };
      case "Map":
        return { kind: "container", container: "map", base: Map, arity: "variable", children: this.children(args, hintPath), deep: true };
      case "Record":
        return { kind: "container", container: "record", base: Object, arity: "variable", children: this.children(args, hintPath), deep: true };
      case "Tuple":
        return { kind: "container", container: "tuple", base: Array, arity: "fixed", children: this.children(args, hintPath), deep: true };
      case "Shape": {
        const keys = classification.keys ?? [];
        const children = args.map((arg, index) => this.child(arg, `${hintPath}.${keys[index]}`));
        return { kind: "container", container: "shape", base: Object, arity: "fixed", children, keys, deep: true };
      }
      case "Union":
        return { kind: "union", alternatives: this.children(args, hintPath) };
      case "Optional":
        return { kind: "union", alternatives: [...this.children(args, hintPath), this.primitive("undefined")] };
      case "Nullable":
        return { kind: "union", alternatives: [...this.children(args, hintPath), this.primitive("null")] };
      case "Literal":
        return { kind: "literal", values: this.literalValues(raw, args, hintPath) };
      case "Annotated":
        return this.lowerAnnotated(args, hintPath);
      case "ClassOf":
        return this.lowerClassOf(raw, args[0], hintPath);
      case "Callable":
        return { kind: "atomic", target: { type: "primitive", tag: "function" } };
      default:
        throw new UnsupportedSpecificationError(raw, hintPath, `no lowering for ${sign}`);
    }
  }

  private primitive(tag: PrimitiveTag): NodeHandle {
    return this.arena.add({ kind: "atomic", target: { type: "primitive", tag } });
  }

  private literalValues(raw: unknown, args: readonly unknown[], hintPath: string): LiteralValue[] {
    return args.map((value, index) => {
      if (!isLiteralValue(value)) {
        throw new UnsupportedSpecificationError(raw, `${hintPath}.args[${index}]`, "literal values must be primitives");
      }
      return value;
    });
  }

  private lowerAnnotated(args: readonly unknown[], hintPath: string): SpecNode {
    const [base, ...validators] = args;
    const members = [this.child(base, `${hintPath}.args[0]`)];
    validators.forEach((validator, offset) => {
      const validatorPath = `${hintPath}.args[${offset + 1}]`;
      if (typeof validator === "string") {
        members.push(this.arena.add({ kind: "predicate", test: compileValidator(validator, validatorPath), label: validatorLabel(validator) }));
      } else if (typeof validator === "function" && !isClassLike(validator)) {
        const predicate = validator;
        const test = guardPredicate((value) => Boolean(predicate(value)));
        members.push(this.arena.add({ kind: "predicate", test, label: predicate.name || "anonymous" }));
      } else {
        throw new UnsupportedSpecificationError(validator, validatorPath, "validators must be predicate functions or expressions");
      }
    });
    return { kind: "conjunction", members };
  }

  private lowerClassOf(raw: unknown, target: unknown, hintPath: string): SpecNode {
    if (!isClassLike(target)) {
      throw new UnsupportedSpecificationError(raw, `${hintPath}.args[0]`, "ClassOf takes a class");
    }
    const ctor = target;
    const test: Validator = (value) =>
      typeof value === "function" && (value === ctor || value.prototype instanceof ctor);
    return { kind: "predicate", test, label: `typeof ${ctor.name || "anonymous class"}` };
  }
}
