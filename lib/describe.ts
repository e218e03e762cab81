/**
 * Human-readable renderings of raw hints, reduced nodes and checked values
 */

import { DeferredName, LazyHint, SpecialForm, SubscriptedHint } from "./forms";
import type { SpecArena } from "./arena";
import type { AtomicTarget, NodeHandle, SpecNode } from "./types";
import { formatLiteral, formatPropertyKey, truncate } from "./utils";

const MAX_STRING_PREVIEW = 40;

/**
 * Describe a raw hint as the caller wrote it, for specification errors
 */
export function describeHint(hint: unknown, depth = 0): string {
  if (depth > 4) return "...";
  if (hint instanceof SpecialForm) return hint.name;
  if (hint instanceof DeferredName) return `ref(${JSON.stringify(hint.name)})`;
  if (hint instanceof LazyHint) return `lazy(${hint.label})`;
  if (hint instanceof SubscriptedHint) {
    const origin = describeHint(hint.origin, depth + 1);
    const args = hint.args.map((arg, index) => {
      const text = describeHint(arg, depth + 1);
      return hint.keys ? `${formatPropertyKey(hint.keys[index])}: ${text}` : text;
    });
    return `${origin}[${args.join(", ")}]`;
  }
  if (typeof hint === "function") return hint.name || "anonymous function";
  if (typeof hint === "string") return JSON.stringify(hint);
  return describeValue(hint);
}

/**
 * Describe a value for violation messages, e.g. `string "x"` or `array of length 3`
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  switch (typeof value) {
    case "undefined":
      return "undefined";
    case "string":
      return `string ${truncate(JSON.stringify(value), MAX_STRING_PREVIEW)}`;
    case "number":
    case "boolean":
    case "bigint":
    case "symbol":
      return `${typeof value} ${formatLiteral(value)}`;
    case "function":
      return value.name ? `function ${value.name}` : "anonymous function";
    default:
      break;
  }
  if (Array.isArray(value)) return `array of length ${value.length}`;
  if (value instanceof Map) return `Map of size ${value.size}`;
  if (value instanceof Set) return `Set of size ${value.size}`;
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype === null || prototype === Object.prototype) return "object";
  const name = constructorName(prototype);
  return name ? `instance of ${name}` : "object";
}

function constructorName(prototype: unknown): string | undefined {
  if (typeof prototype !== "object" || prototype === null) return undefined;
  const ctor: unknown = Reflect.get(prototype, "constructor");
  return typeof ctor === "function" && ctor.name ? ctor.name : undefined;
}

export function describeAtomic(target: AtomicTarget): string {
  if (target.type === "primitive") {
    return target.tag;
  }
  return target.ctor.name || "anonymous class";
}

/**
 * Describe a reduced node. Back-edges print as the name they were reached
 * through, or `<recursive>` when they have none.
 */
export function describeNode(arena: SpecArena, handle: NodeHandle): string {
  return new NodeDescriber(arena).describe(handle);
}

class NodeDescriber {
  private readonly active = new Set<NodeHandle>();

  constructor(private readonly arena: SpecArena) {}

  describe(handle: NodeHandle): string {
    const resolved = this.arena.resolve(handle);
    if (this.active.has(resolved)) {
      return this.arena.nameOf(resolved) ?? "<recursive>";
    }
    this.active.add(resolved);
    try {
      return this.render(this.arena.get(resolved));
    } finally {
      this.active.delete(resolved);
    }
  }

  private render(node: SpecNode): string {
    switch (node.kind) {
      case "ignorable":
        return "unknown";
      case "atomic":
        return describeAtomic(node.target);
      case "literal":
        return node.values.map(formatLiteral).join(" | ");
      case "predicate":
        return `is(${node.label})`;
      case "forward":
        return node.reference.type === "name" ? node.reference.name : `lazy(${node.reference.label})`;
      case "union":
        return node.alternatives.map((h) => this.describe(h)).join(" | ");
      case "conjunction":
        return node.members.map((h) => this.parenthesizeUnion(h)).join(" & ");
      case "container":
        return this.renderContainer(node);
    }
  }

  private parenthesizeUnion(handle: NodeHandle): string {
    const text = this.describe(handle);
    const node = this.arena.get(handle);
    const isUnionLike = node.kind === "union" || (node.kind === "literal" && node.values.length > 1);
    return isUnionLike ? `(${text})` : text;
  }

  private renderContainer(node: Extract<SpecNode, { kind: "container" }>): string {
    const children = node.children.map((h) => this.describe(h));
    switch (node.container) {
      case "array":
        return `Array<${children[0]}>`;
      case "set":
        return `Set<${children[0]}>`;
      case "map":
        return `Map<${children[0]}, ${children[1]}>`;
      case "record":
        return `Record<${children[0]}, ${children[1]}>`;
      case "tuple":
        return `[${children.join(", ")}]`;
      case "shape": {
        const keys = node.keys ?? [];
        if (keys.length === 0) return "{}";
        const fields = keys.map((key, index) => `${formatPropertyKey(key)}: ${children[index]}`);
        return `{ ${fields.join("; ")} }`;
      }
    }
  }
}
