/**
 * Closure synthesis: a reduced arena becomes one `(value) => boolean`
 *
 * Containers are checked in two stages. The shallow stage tests the base type
 * (and tuple length); the deep stage checks one pseudo-randomly chosen element
 * under the `sample` strategy, or every element under `exhaustive`.
 */

import type { SpecArena } from "./arena";
import { atomicTest, isArrayValue, isMapValue, isObjectValue, isSetValue, literalTest, shallowTest } from "./guards";
import { guardPredicate } from "./predicates";
import type { Checker, ContainerNode, NodeHandle, RandomSource, SpecNode, Strategy } from "./types";

export interface SynthesizeOptions {
  strategy: Strategy;
  random: RandomSource;
  maxRecursionDepth: number;
}

export const DEFAULT_MAX_RECURSION_DEPTH = 64;

export const ALWAYS_TRUE: Checker = () => true;

/**
 * Union alternatives are tried cheapest first
 */
export const UNION_COST: Readonly<Record<SpecNode["kind"], number>> = {
  ignorable: 0,
  atomic: 0,
  literal: 0,
  container: 1,
  union: 1,
  forward: 1,
  conjunction: 2,
  predicate: 3,
};

type CheckerCell = { check: Checker };

export function synthesize(arena: SpecArena, root: NodeHandle, options: SynthesizeOptions): Checker {
  if (options.strategy === "off" || arena.get(root).kind === "ignorable") {
    return ALWAYS_TRUE;
  }
  return new ClosureSynthesizer(arena, options).build(root);
}

class ClosureSynthesizer {
  private readonly built = new Map<NodeHandle, Checker>();
  private readonly building = new Map<NodeHandle, CheckerCell>();
  private readonly depth = { current: 0 };

  constructor(
    private readonly arena: SpecArena,
    private readonly options: SynthesizeOptions
  ) {}

  build(handle: NodeHandle): Checker {
    const resolved = this.arena.resolve(handle);
    const done = this.built.get(resolved);
    if (done) {
      return done;
    }
    const cell = this.building.get(resolved);
    if (cell) {
      return this.backEdge(cell);
    }

    const pending: CheckerCell = { check: ALWAYS_TRUE };
    this.building.set(resolved, pending);
    const check = this.synthesizeNode(this.arena.get(resolved));
    pending.check = check;
    this.building.delete(resolved);
    this.built.set(resolved, check);
    return check;
  }

  /**
   * Indirection for a node still being built. Nesting is counted so cyclic
   * values stop at `maxRecursionDepth` and are accepted there.
   */
  private backEdge(cell: CheckerCell): Checker {
    const { depth } = this;
    const limit = this.options.maxRecursionDepth;
    return (value) => {
      if (depth.current >= limit) {
        return true;
      }
      depth.current += 1;
      try {
        return cell.check(value);
      } finally {
        depth.current -= 1;
      }
    };
  }

  private cost(handle: NodeHandle): number {
    const resolved = this.arena.resolve(handle);
    if (this.building.has(resolved)) {
      return 1;
    }
    return UNION_COST[this.arena.get(resolved).kind];
  }

  private synthesizeNode(node: SpecNode): Checker {
    switch (node.kind) {
      case "ignorable":
        return ALWAYS_TRUE;
      case "atomic":
        return atomicTest(node.target);
      case "literal":
        return literalTest(node.values);
      case "predicate":
        return node.test;
      case "union":
        return this.synthesizeUnion(node.alternatives);
      case "conjunction":
        return this.synthesizeConjunction(node.members);
      case "container":
        return node.deep ? this.synthesizeContainer(node) : shallowTest(node);
      case "forward":
        throw new Error("Forward references must be resolved before synthesis");
    }
  }

  private synthesizeUnion(alternatives: readonly NodeHandle[]): Checker {
    const ordered = alternatives
      .map((handle, index) => ({ handle, index, cost: this.cost(handle) }))
      .sort((a, b) => a.cost - b.cost || a.index - b.index);
    const checks = ordered.map(({ handle }) => this.build(handle));
    if (checks.length === 2) {
      const [first, second] = checks;
      return (value) => first(value) || second(value);
    }
    return (value) => {
      for (const check of checks) {
        if (check(value)) return true;
      }
      return false;
    };
  }

  private synthesizeConjunction(members: readonly NodeHandle[]): Checker {
    const checks = members.map((handle) => this.build(handle));
    return (value) => {
      for (const check of checks) {
        if (!check(value)) return false;
      }
      return true;
    };
  }

  /**
   * A value whose property reads or iteration throw is rejected
   */
  private synthesizeContainer(node: ContainerNode): Checker {
    const children = node.children.map((handle) => this.build(handle));
    return guardPredicate(
      this.options.strategy === "exhaustive"
        ? exhaustiveContainer(node, children)
        : sampledContainer(node, children, this.options.random)
    );
  }
}

function sampledContainer(node: ContainerNode, children: Checker[], random: RandomSource): Checker {
  switch (node.container) {
    case "array": {
      const [item] = children;
      return (value) => {
        if (!isArrayValue(value)) return false;
        if (value.length === 0) return true;
        return item(value[random.nextIndex(value.length)]);
      };
    }
    case "tuple": {
      const length = children.length;
      return (value) => {
        if (!isArrayValue(value) || value.length !== length) return false;
        if (length === 0) return true;
        const position = random.nextIndex(length);
        return children[position](value[position]);
      };
    }
    case "shape": {
      const keys = node.keys ?? [];
      return (value) => {
        if (!isObjectValue(value)) return false;
        if (keys.length === 0) return true;
        const position = random.nextIndex(keys.length);
        return children[position](value[keys[position]]);
      };
    }
    case "set": {
      const [item] = children;
      return (value) => {
        if (!isSetValue(value)) return false;
        const first = value.values().next();
        return first.done === true || item(first.value);
      };
    }
    case "map": {
      const [key, item] = children;
      return (value) => {
        if (!isMapValue(value)) return false;
        const first = value.entries().next();
        return first.done === true || (key(first.value[0]) && item(first.value[1]));
      };
    }
    case "record": {
      const [key, item] = children;
      return (value) => {
        if (!isObjectValue(value)) return false;
        const names = recordKeys(value);
        if (names.length === 0) return true;
        const name = names[random.nextIndex(names.length)];
        return key(name) && item(value[name]);
      };
    }
  }
}

/** Own enumerable keys per record, read on the first sampled check only */
const recordKeySnapshots = new WeakMap<object, readonly string[]>();

/**
 * Keys of `record` as of the first time it was sampled. Later additions and
 * deletions are not seen.
 */
function recordKeys(record: Record<string, unknown>): readonly string[] {
  let names = recordKeySnapshots.get(record);
  if (!names) {
    names = Object.keys(record);
    recordKeySnapshots.set(record, names);
  }
  return names;
}

function exhaustiveContainer(node: ContainerNode, children: Checker[]): Checker {
  switch (node.container) {
    case "array": {
      const [item] = children;
      return (value) => isArrayValue(value) && value.every((element) => item(element));
    }
    case "tuple": {
      const length = children.length;
      return (value) =>
        isArrayValue(value) && value.length === length && children.every((check, position) => check(value[position]));
    }
    case "shape": {
      const keys = node.keys ?? [];
      return (value) => isObjectValue(value) && keys.every((name, position) => children[position](value[name]));
    }
    case "set": {
      const [item] = children;
      return (value) => {
        if (!isSetValue(value)) return false;
        for (const element of value) {
          if (!item(element)) return false;
        }
        return true;
      };
    }
    case "map": {
      const [key, item] = children;
      return (value) => {
        if (!isMapValue(value)) return false;
        for (const [entryKey, entryValue] of value) {
          if (!key(entryKey) || !item(entryValue)) return false;
        }
        return true;
      };
    }
    case "record": {
      const [key, item] = children;
      return (value) => isObjectValue(value) && Object.keys(value).every((name) => key(name) && item(value[name]));
    }
  }
}
