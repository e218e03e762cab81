/**
 * Compile scopes and forward reference resolution
 */

import { isClassLike } from "./classifier";
import { UnresolvedForwardReferenceError } from "./errors";
import { KEYWORD_HINTS, parseTypeExpression } from "./expression";
import type { ForwardReference } from "./types";
import { isIdentifier } from "./utils";

export type ScopeLookup = { found: true; hint: unknown } | { found: false };

/**
 * Named hints visible to forward references. Scopes chain to a parent; a
 * name defined in a child shadows the parent's.
 */
export class Scope {
  private readonly entries = new Map<string, unknown>();
  private sealed = false;

  constructor(entries?: Readonly<Record<string, unknown>>, readonly parent?: Scope) {
    if (entries) {
      for (const [name, hint] of Object.entries(entries)) {
        this.entries.set(name, hint);
      }
    }
  }

  define(name: string, hint: unknown): this {
    if (this.sealed) {
      throw new Error(`Cannot define ${JSON.stringify(name)} in a sealed scope`);
    }
    this.entries.set(name, hint);
    return this;
  }

  lookup(name: string): ScopeLookup {
    if (this.entries.has(name)) {
      return { found: true, hint: this.entries.get(name) };
    }
    return this.parent ? this.parent.lookup(name) : { found: false };
  }

  has(name: string): boolean {
    return this.lookup(name).found;
  }

  /**
   * Every visible name, nearest scope first
   */
  names(): string[] {
    const own = [...this.entries.keys()];
    const inherited = this.parent ? this.parent.names().filter((name) => !this.entries.has(name)) : [];
    return [...own, ...inherited];
  }

  child(entries?: Readonly<Record<string, unknown>>): Scope {
    return new Scope(entries, this);
  }

  seal(): this {
    this.sealed = true;
    return this;
  }
}

export type ScopeLike = Scope | Readonly<Record<string, unknown>>;

export const EMPTY_SCOPE = new Scope().seal();

const recordScopes = new WeakMap<object, Scope>();

/**
 * Normalize a scope option. A plain record maps to the same `Scope` every
 * time it is passed.
 */
export function toScope(scope?: ScopeLike): Scope {
  if (scope === undefined) {
    return EMPTY_SCOPE;
  }
  if (scope instanceof Scope) {
    return scope;
  }
  const known = recordScopes.get(scope);
  if (known) {
    return known;
  }
  const created = new Scope(scope).seal();
  recordScopes.set(scope, created);
  return created;
}

export type ResolutionSource = "scope" | "keyword" | "global" | "expression" | "thunk";

export type Resolution = { hint: unknown; source: ResolutionSource; label: string };

export function referenceLabel(reference: ForwardReference): string {
  return reference.type === "name" ? reference.name : reference.label;
}

/**
 * Resolve one forward reference to the raw hint it stands for.
 *
 * Names are looked up in the scope, then as keyword types, then as class
 * constructors on `globalThis`. Anything that is not a bare identifier is
 * parsed as a type expression.
 */
export function resolveForwardReference(reference: ForwardReference, scope: Scope, hintPath: string): Resolution {
  if (reference.type === "thunk") {
    try {
      return { hint: reference.thunk(), source: "thunk", label: reference.label };
    } catch (error) {
      throw new UnresolvedForwardReferenceError(reference.label, hintPath, "thunk threw while resolving", error);
    }
  }

  const { name } = reference;
  const scoped = scope.lookup(name);
  if (scoped.found) {
    return { hint: scoped.hint, source: "scope", label: name };
  }

  if (KEYWORD_HINTS.has(name)) {
    return { hint: KEYWORD_HINTS.get(name), source: "keyword", label: name };
  }

  if (isIdentifier(name)) {
    const global: unknown = Reflect.get(globalThis, name);
    if (isClassLike(global)) {
      return { hint: global, source: "global", label: name };
    }
    throw new UnresolvedForwardReferenceError(name, hintPath, "not defined in scope");
  }

  return { hint: parseTypeExpression(name, hintPath), source: "expression", label: name };
}
