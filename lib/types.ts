/**
 * Shared type definitions for the spotcheck engine
 */

import type { LogLevel } from "./logger";

/**
 * Anything usable on the right-hand side of `instanceof`
 */
export type Constructor = abstract new (...args: never[]) => unknown;

export type Validator = (value: unknown) => boolean;

export type Checker = (value: unknown) => boolean;

export type PrimitiveTag =
  | "number"
  | "integer"
  | "string"
  | "boolean"
  | "bigint"
  | "symbol"
  | "function"
  | "object"
  | "null"
  | "undefined"
  | "never";

export type LiteralValue = string | number | boolean | bigint | symbol | null | undefined;

/**
 * Index of a node inside a {@link SpecArena}. Back-edges are plain handle equality.
 */
export type NodeHandle = number;

export type AtomicTarget =
  | { type: "primitive"; tag: PrimitiveTag }
  | { type: "class"; ctor: Constructor };

export type ContainerKind = "array" | "set" | "map" | "record" | "tuple" | "shape";

export type Arity = "fixed" | "variable";

export type ForwardReference =
  | { type: "name"; name: string }
  | { type: "thunk"; thunk: () => unknown; label: string };

export type IgnorableNode = { kind: "ignorable" };

export type AtomicNode = { kind: "atomic"; target: AtomicTarget };

export type UnionNode = { kind: "union"; alternatives: readonly NodeHandle[] };

export type ConjunctionNode = { kind: "conjunction"; members: readonly NodeHandle[] };

export type ContainerNode = {
  kind: "container";
  container: ContainerKind;
  base: Constructor;
  arity: Arity;
  children: readonly NodeHandle[];
  /** Property names of a `shape`, parallel to `children` */
  keys?: readonly string[];
  /** False once every child is known to accept anything */
  deep: boolean;
};

export type LiteralNode = { kind: "literal"; values: readonly LiteralValue[] };

export type PredicateNode = { kind: "predicate"; test: Validator; label: string };

export type ForwardNode = { kind: "forward"; reference: ForwardReference };

export type SpecNode =
  | IgnorableNode
  | AtomicNode
  | UnionNode
  | ConjunctionNode
  | ContainerNode
  | LiteralNode
  | PredicateNode
  | ForwardNode;

export type NodeKind = SpecNode["kind"];

/**
 * How much of each container a compiled checker inspects per call
 * - off: nothing is checked
 * - sample: one pseudo-randomly chosen element per container
 * - exhaustive: every element
 */
export type Strategy = "off" | "sample" | "exhaustive";

export interface RandomSource {
  /** Uniform integer in `[0, length)`; `length` is always positive */
  nextIndex(length: number): number;
}

export type PathSegment =
  | { kind: "index"; index: number }
  | { kind: "key"; key: string }
  | { kind: "recordKey"; key: string }
  | { kind: "mapKey"; position: number }
  | { kind: "mapValue"; key: unknown }
  | { kind: "setElement"; position: number };

export type Violation = {
  ok: false;
  path: PathSegment[];
  pathText: string;
  expected: string;
  actual: string;
  message: string;
};

export type Diagnostic = { ok: true } | Violation;

export type SpotcheckConfig = {
  strategy?: Strategy;
  maxRecursionDepth?: number;
  logLevel?: LogLevel;
  envSearchPaths?: string[];
};
