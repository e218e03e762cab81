/**
 * Violation reporting: an exhaustive re-walk that finds the first failing
 * position, independent of what the sampling checker saw
 */

import type { SpecArena } from "./arena";
import { describeNode, describeValue } from "./describe";
import { atomicTest, isArrayValue, isMapValue, isObjectValue, isSetValue, literalTest, shallowTest } from "./guards";
import type { ContainerNode, Diagnostic, NodeHandle, PathSegment, Violation } from "./types";
import { formatLiteral, isIdentifier, isLiteralValue } from "./utils";

export const ROOT_PATH = "value";

/**
 * Render path segments, e.g. `value.items[2].get("id")`
 */
export function formatPath(path: readonly PathSegment[]): string {
  let text = ROOT_PATH;
  for (const segment of path) {
    switch (segment.kind) {
      case "index":
        text += `[${segment.index}]`;
        break;
      case "key":
        text += isIdentifier(segment.key) ? `.${segment.key}` : `[${JSON.stringify(segment.key)}]`;
        break;
      case "recordKey":
        text += `{key ${JSON.stringify(segment.key)}}`;
        break;
      case "mapKey":
        text += `.keys()[${segment.position}]`;
        break;
      case "mapValue":
        text += `.get(${isLiteralValue(segment.key) ? formatLiteral(segment.key) : describeValue(segment.key)})`;
        break;
      case "setElement":
        text += `.values()[${segment.position}]`;
        break;
    }
  }
  return text;
}

export function formatViolation(pathText: string, expected: string, actual: string): string {
  return `${pathText} violates ${expected}: got ${actual}`;
}

/**
 * Explain why `value` fails the node at `root`, or `{ ok: true }` when it
 * does not fail
 */
export function explainNode(arena: SpecArena, root: NodeHandle, value: unknown): Diagnostic {
  return new ViolationWalker(arena).walk(root, value, []) ?? { ok: true };
}

type PropertyRead = { ok: true; value: unknown } | { ok: false; error: unknown };

function readProperty(record: Record<string, unknown>, key: string): PropertyRead {
  try {
    return { ok: true, value: record[key] };
  } catch (error) {
    return { ok: false, error };
  }
}

class ViolationWalker {
  /** (handle, value) pairs on the current walk, for cyclic values */
  private readonly active = new Map<NodeHandle, Set<unknown>>();

  constructor(private readonly arena: SpecArena) {}

  walk(handle: NodeHandle, value: unknown, path: PathSegment[]): Violation | undefined {
    const resolved = this.arena.resolve(handle);
    const seen = this.active.get(resolved) ?? new Set<unknown>();
    if (seen.has(value)) {
      return undefined;
    }
    seen.add(value);
    this.active.set(resolved, seen);
    try {
      return this.walkNode(resolved, value, path);
    } finally {
      seen.delete(value);
    }
  }

  private violation(handle: NodeHandle, value: unknown, path: PathSegment[]): Violation {
    const pathText = formatPath(path);
    const expected = describeNode(this.arena, handle);
    const actual = describeValue(value);
    return { ok: false, path: [...path], pathText, expected, actual, message: formatViolation(pathText, expected, actual) };
  }

  private unreadable(handle: NodeHandle, path: PathSegment[], error: unknown): Violation {
    const pathText = formatPath(path);
    const expected = describeNode(this.arena, handle);
    const actual = `unreadable property (${error instanceof Error ? error.message : String(error)})`;
    return { ok: false, path: [...path], pathText, expected, actual, message: formatViolation(pathText, expected, actual) };
  }

  private walkNode(handle: NodeHandle, value: unknown, path: PathSegment[]): Violation | undefined {
    const node = this.arena.get(handle);
    switch (node.kind) {
      case "ignorable":
        return undefined;
      case "atomic":
        return atomicTest(node.target)(value) ? undefined : this.violation(handle, value, path);
      case "literal":
        return literalTest(node.values)(value) ? undefined : this.violation(handle, value, path);
      case "predicate":
        return node.test(value) ? undefined : this.violation(handle, value, path);
      case "forward":
        return this.violation(handle, value, path);
      case "conjunction":
        for (const member of node.members) {
          const failure = this.walk(member, value, path);
          if (failure) return failure;
        }
        return undefined;
      case "union":
        return this.walkUnion(handle, node.alternatives, value, path);
      case "container":
        return this.walkContainer(handle, node, value, path);
    }
  }

  private walkUnion(handle: NodeHandle, alternatives: readonly NodeHandle[], value: unknown, path: PathSegment[]): Violation | undefined {
    const failures: Violation[] = [];
    for (const alternative of alternatives) {
      const failure = this.walk(alternative, value, path);
      if (!failure) return undefined;
      failures.push(failure);
    }

    const plausible = alternatives
      .map((alternative, index) => ({ alternative, failure: failures[index] }))
      .filter(({ alternative }) => this.shallowAccepts(alternative, value, new Set()));
    if (plausible.length === 1) {
      return plausible[0].failure;
    }
    return this.violation(handle, value, path);
  }

  /**
   * Whether `value` gets past the outermost test of a node: the base type for
   * containers, the full test for leaves
   */
  private shallowAccepts(handle: NodeHandle, value: unknown, visiting: Set<NodeHandle>): boolean {
    const resolved = this.arena.resolve(handle);
    if (visiting.has(resolved)) {
      return false;
    }
    visiting.add(resolved);
    try {
      return this.shallowNode(resolved, value, visiting);
    } finally {
      visiting.delete(resolved);
    }
  }

  private shallowNode(handle: NodeHandle, value: unknown, visiting: Set<NodeHandle>): boolean {
    const node = this.arena.get(handle);
    switch (node.kind) {
      case "ignorable":
        return true;
      case "atomic":
        return atomicTest(node.target)(value);
      case "literal":
        return literalTest(node.values)(value);
      case "predicate":
        return node.test(value);
      case "forward":
        return false;
      case "container":
        return shallowTest(node)(value);
      case "union":
        return node.alternatives.some((alternative) => this.shallowAccepts(alternative, value, visiting));
      case "conjunction":
        return node.members.every((member) => this.shallowAccepts(member, value, visiting));
    }
  }

  private walkContainer(handle: NodeHandle, node: ContainerNode, value: unknown, path: PathSegment[]): Violation | undefined {
    if (!shallowTest(node)(value)) {
      return this.violation(handle, value, path);
    }
    if (!node.deep) {
      return undefined;
    }

    const [first, second] = node.children;
    switch (node.container) {
      case "array":
        if (!isArrayValue(value)) return undefined;
        for (let index = 0; index < value.length; index++) {
          const failure = this.walk(first, value[index], [...path, { kind: "index", index }]);
          if (failure) return failure;
        }
        return undefined;
      case "tuple":
        if (!isArrayValue(value)) return undefined;
        for (let index = 0; index < node.children.length; index++) {
          const failure = this.walk(node.children[index], value[index], [...path, { kind: "index", index }]);
          if (failure) return failure;
        }
        return undefined;
      case "shape": {
        if (!isObjectValue(value)) return undefined;
        const keys = node.keys ?? [];
        for (let index = 0; index < keys.length; index++) {
          const key = keys[index];
          const keyPath: PathSegment[] = [...path, { kind: "key", key }];
          const read = readProperty(value, key);
          const failure = read.ok
            ? this.walk(node.children[index], read.value, keyPath)
            : this.unreadable(node.children[index], keyPath, read.error);
          if (failure) return failure;
        }
        return undefined;
      }
      case "set": {
        if (!isSetValue(value)) return undefined;
        let position = 0;
        for (const element of value) {
          const failure = this.walk(first, element, [...path, { kind: "setElement", position }]);
          if (failure) return failure;
          position += 1;
        }
        return undefined;
      }
      case "map": {
        if (!isMapValue(value)) return undefined;
        let position = 0;
        for (const [key, entry] of value) {
          const keyFailure = this.walk(first, key, [...path, { kind: "mapKey", position }]);
          if (keyFailure) return keyFailure;
          const valueFailure = this.walk(second, entry, [...path, { kind: "mapValue", key }]);
          if (valueFailure) return valueFailure;
          position += 1;
        }
        return undefined;
      }
      case "record": {
        if (!isObjectValue(value)) return undefined;
        for (const key of Object.keys(value)) {
          const keyFailure = this.walk(first, key, [...path, { kind: "recordKey", key }]);
          if (keyFailure) return keyFailure;
          const keyPath: PathSegment[] = [...path, { kind: "key", key }];
          const read = readProperty(value, key);
          const valueFailure = read.ok ? this.walk(second, read.value, keyPath) : this.unreadable(second, keyPath, read.error);
          if (valueFailure) return valueFailure;
        }
        return undefined;
      }
    }
  }
}
