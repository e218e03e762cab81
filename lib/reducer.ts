/**
 * Reduction of a classified tree to its canonical, cycle-safe form
 *
 * Two passes over the nodes reachable from the root:
 * 1. forward references are resolved and redirected to what they name
 * 2. unions, conjunctions, containers and literals are canonicalized bottom-up
 *
 * Back-edges are left in place; every walk here tracks visited handles.
 */

import { assertContainerArity, type SpecArena } from "./arena";
import { classifyTree } from "./classifier";
import { UnresolvedForwardReferenceError } from "./errors";
import { referenceLabel, resolveForwardReference, type Scope } from "./forward";
import type { Logger } from "./logger";
import type {
  Constructor,
  ContainerNode,
  ForwardNode,
  LiteralValue,
  NodeHandle,
  SpecNode,
} from "./types";
import { dedupePreservingOrder } from "./utils";

export interface ReduceOptions {
  scope: Scope;
  /** Raw hint identity -> handle, shared with the classifier */
  memo: Map<unknown, NodeHandle>;
  logger?: Logger;
}

type ReductionState = "active" | "done";

const NEVER_NODE: SpecNode = { kind: "atomic", target: { type: "primitive", tag: "never" } };

function isNever(node: SpecNode): boolean {
  return node.kind === "atomic" && node.target.type === "primitive" && node.target.tag === "never";
}

/**
 * Resolve and canonicalize everything reachable from `root`. Returns the
 * root's handle after redirects.
 */
export function reduceTree(arena: SpecArena, root: NodeHandle, options: ReduceOptions): NodeHandle {
  const reducer = new TreeReducer(arena, options);
  reducer.resolveForwards(root);
  reducer.reduce(root);
  return arena.resolve(root);
}

class TreeReducer {
  private readonly paths = new Map<NodeHandle, string>();
  private readonly states = new Map<NodeHandle, ReductionState>();
  private readonly classIds = new Map<Constructor, number>();

  constructor(
    private readonly arena: SpecArena,
    private readonly options: ReduceOptions
  ) {}

  resolveForwards(root: NodeHandle): void {
    const pending: { handle: NodeHandle; path: string }[] = [{ handle: root, path: "hint" }];
    const visited = new Set<NodeHandle>();

    while (pending.length > 0) {
      const next = pending.pop();
      if (!next) break;
      const handle = this.arena.resolve(next.handle);
      if (visited.has(handle)) continue;

      const node = this.arena.get(handle);
      if (node.kind === "forward") {
        this.resolveForward(handle, node, next.path);
        pending.push({ handle, path: next.path });
        continue;
      }

      visited.add(handle);
      if (!this.paths.has(handle)) {
        this.paths.set(handle, next.path);
      }
      for (const child of childEntries(node, next.path)) {
        pending.push(child);
      }
    }
  }

  private resolveForward(handle: NodeHandle, node: ForwardNode, hintPath: string): void {
    const { scope, memo, logger } = this.options;
    const label = referenceLabel(node.reference);
    const resolution = resolveForwardReference(node.reference, scope, hintPath);
    const target = classifyTree(this.arena, resolution.hint, memo, hintPath);

    if (!this.arena.redirect(handle, target)) {
      throw new UnresolvedForwardReferenceError(label, hintPath, "refers only to itself");
    }
    if (node.reference.type === "name") {
      this.arena.name(target, label);
    }
    logger?.debug(`Resolved forward reference ${label}`, { source: resolution.source, hintPath });
  }

  reduce(handle: NodeHandle): NodeHandle {
    const resolved = this.arena.resolve(handle);
    if (this.states.has(resolved)) {
      return resolved;
    }
    this.states.set(resolved, "active");

    const node = this.arena.get(resolved);
    switch (node.kind) {
      case "union":
        this.reduceUnion(resolved, node.alternatives);
        break;
      case "conjunction":
        this.reduceConjunction(resolved, node.members);
        break;
      case "container":
        this.reduceContainer(resolved, node);
        break;
      case "literal":
        this.arena.set(resolved, { kind: "literal", values: dedupePreservingOrder(node.values) });
        break;
      case "forward":
        throw new UnresolvedForwardReferenceError(referenceLabel(node.reference), this.pathOf(resolved), "left unresolved");
      default:
        break;
    }

    this.states.set(resolved, "done");
    const final = this.arena.resolve(resolved);
    if (!this.states.has(final)) {
      this.states.set(final, "done");
    }
    return final;
  }

  private reduceUnion(handle: NodeHandle, alternatives: readonly NodeHandle[]): void {
    const flattened: NodeHandle[] = [];
    for (const alternative of alternatives) {
      const reduced = this.reduce(alternative);
      const node = this.arena.get(reduced);
      if (node.kind === "union" && reduced !== handle && this.states.get(reduced) === "done") {
        flattened.push(...node.alternatives.map((h) => this.arena.resolve(h)));
      } else {
        flattened.push(reduced);
      }
    }

    const kept: NodeHandle[] = [];
    const literalValues: LiteralValue[] = [];
    let literalSlot = -1;
    for (const alternative of flattened) {
      if (alternative === handle) continue;
      const node = this.arena.get(alternative);
      if (node.kind === "ignorable") {
        this.arena.set(handle, { kind: "ignorable" });
        return;
      }
      if (isNever(node)) continue;
      if (node.kind === "literal") {
        if (literalSlot < 0) {
          literalSlot = kept.length;
          kept.push(alternative);
        }
        literalValues.push(...node.values);
        continue;
      }
      kept.push(alternative);
    }

    if (literalSlot >= 0) {
      const first = kept[literalSlot];
      const values = dedupePreservingOrder(literalValues);
      const existing = this.arena.get(first);
      const unchanged = existing.kind === "literal" && existing.values.length === values.length;
      kept[literalSlot] = unchanged ? first : this.arena.add({ kind: "literal", values });
      this.states.set(kept[literalSlot], "done");
    }

    const unique = this.dedupeByFingerprint(kept);
    this.collapse(handle, unique, () => NEVER_NODE, (members) => ({ kind: "union", alternatives: members }));
  }

  private reduceConjunction(handle: NodeHandle, members: readonly NodeHandle[]): void {
    const flattened: NodeHandle[] = [];
    for (const member of members) {
      const reduced = this.reduce(member);
      const node = this.arena.get(reduced);
      if (node.kind === "conjunction" && reduced !== handle && this.states.get(reduced) === "done") {
        flattened.push(...node.members.map((h) => this.arena.resolve(h)));
      } else {
        flattened.push(reduced);
      }
    }

    const kept: NodeHandle[] = [];
    for (const member of flattened) {
      if (member === handle) continue;
      const node = this.arena.get(member);
      if (isNever(node)) {
        this.arena.set(handle, NEVER_NODE);
        return;
      }
      if (node.kind !== "ignorable") {
        kept.push(member);
      }
    }

    const unique = this.dedupeByFingerprint(kept);
    this.collapse(handle, unique, () => ({ kind: "ignorable" }), (parts) => ({ kind: "conjunction", members: parts }));
  }

  /**
   * Replace `handle` by its only remaining member, an empty fallback, or the
   * rebuilt node
   */
  private collapse(
    handle: NodeHandle,
    members: NodeHandle[],
    empty: () => SpecNode,
    rebuild: (members: NodeHandle[]) => SpecNode
  ): void {
    if (members.length === 0) {
      this.arena.set(handle, empty());
      return;
    }
    if (members.length === 1 && this.arena.redirect(handle, members[0])) {
      return;
    }
    this.arena.set(handle, rebuild(members));
  }

  private reduceContainer(handle: NodeHandle, node: ContainerNode): void {
    const children = node.children.map((child) => this.reduce(child));
    const deep = children.some((child) => this.arena.get(child).kind !== "ignorable");
    const reduced: ContainerNode = { ...node, children, deep };
    assertContainerArity(reduced, this.pathOf(handle));
    this.arena.set(handle, reduced);
  }

  private dedupeByFingerprint(handles: NodeHandle[]): NodeHandle[] {
    const seen = new Set<string>();
    return handles.filter((handle) => {
      const fingerprint = this.fingerprint(handle, new Set());
      if (seen.has(fingerprint)) return false;
      seen.add(fingerprint);
      return true;
    });
  }

  /**
   * Structural identity of a node. Predicates and back-edges fall back to
   * handle identity.
   */
  private fingerprint(handle: NodeHandle, visiting: Set<NodeHandle>): string {
    const resolved = this.arena.resolve(handle);
    if (visiting.has(resolved) || this.states.get(resolved) === "active") {
      return `#${resolved}`;
    }
    const node = this.arena.get(resolved);
    switch (node.kind) {
      case "ignorable":
        return "*";
      case "atomic":
        return node.target.type === "primitive" ? node.target.tag : `class:${this.classId(node.target.ctor)}`;
      case "container": {
        visiting.add(resolved);
        const children = node.children.map((child) => this.fingerprint(child, visiting));
        visiting.delete(resolved);
        const keys = node.keys ? `${JSON.stringify(node.keys)}:` : "";
        return `${node.container}(${keys}${children.join(",")})`;
      }
      default:
        return `#${resolved}`;
    }
  }

  private classId(ctor: Constructor): number {
    let id = this.classIds.get(ctor);
    if (id === undefined) {
      id = this.classIds.size;
      this.classIds.set(ctor, id);
    }
    return id;
  }

  private pathOf(handle: NodeHandle): string {
    return this.paths.get(handle) ?? "hint";
  }
}

function childEntries(node: SpecNode, path: string): { handle: NodeHandle; path: string }[] {
  switch (node.kind) {
    case "union":
      return node.alternatives.map((handle, index) => ({ handle, path: `${path}.args[${index}]` }));
    case "conjunction":
      return node.members.map((handle, index) => ({ handle, path: `${path}.args[${index}]` }));
    case "container":
      return node.children.map((handle, index) => ({
        handle,
        path: node.keys ? `${path}.${node.keys[index]}` : `${path}.args[${index}]`,
      }));
    default:
      return [];
  }
}
