/**
 * Arena of specification nodes addressed by handle
 *
 * Nodes refer to children by handle, so cyclic hints are plain handle
 * equality. Forward resolution and union collapse never rewrite parents;
 * they redirect the old handle to its replacement instead.
 */

import { MalformedContainerArityError } from "./errors";
import type { ContainerKind, ContainerNode, NodeHandle, SpecNode } from "./types";

/**
 * Child count of each variable-length container kind
 */
export const VARIABLE_CHILD_COUNTS: Readonly<Record<ContainerKind, number | undefined>> = {
  array: 1,
  set: 1,
  map: 2,
  record: 2,
  tuple: undefined,
  shape: undefined,
};

export class SpecArena {
  private readonly nodes: (SpecNode | undefined)[] = [];
  private readonly redirects = new Map<NodeHandle, NodeHandle>();
  private readonly names = new Map<NodeHandle, string>();
  private frozen = false;

  /**
   * Allocate a handle whose node is filled in later with {@link set}
   */
  reserve(): NodeHandle {
    this.assertMutable();
    this.nodes.push(undefined);
    return this.nodes.length - 1;
  }

  add(node: SpecNode): NodeHandle {
    const handle = this.reserve();
    this.nodes[handle] = node;
    return handle;
  }

  set(handle: NodeHandle, node: SpecNode): void {
    this.assertMutable();
    this.nodes[this.resolve(handle)] = node;
  }

  /**
   * Node at `handle` after following redirects
   */
  get(handle: NodeHandle): SpecNode {
    const node = this.nodes[this.resolve(handle)];
    if (node === undefined) {
      throw new Error(`Specification node ${handle} was reserved but never populated`);
    }
    return node;
  }

  resolve(handle: NodeHandle): NodeHandle {
    let current = handle;
    let next = this.redirects.get(current);
    while (next !== undefined) {
      current = next;
      next = this.redirects.get(current);
    }
    return current;
  }

  /**
   * Make every reference to `from` mean `to`. Returns false when that would
   * close a loop of redirects.
   */
  redirect(from: NodeHandle, to: NodeHandle): boolean {
    this.assertMutable();
    const source = this.resolve(from);
    const target = this.resolve(to);
    if (source === target) {
      return false;
    }
    this.redirects.set(source, target);
    const name = this.names.get(source);
    if (name !== undefined && !this.names.has(target)) {
      this.names.set(target, name);
    }
    return true;
  }

  /**
   * Record the name a node was reached through, for describing back-edges
   */
  name(handle: NodeHandle, name: string): void {
    const resolved = this.resolve(handle);
    if (!this.names.has(resolved)) {
      this.names.set(resolved, name);
    }
  }

  nameOf(handle: NodeHandle): string | undefined {
    return this.names.get(this.resolve(handle));
  }

  get size(): number {
    return this.nodes.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new Error("Specification arena is frozen");
    }
  }
}

/**
 * Throws {@link MalformedContainerArityError} when a container's child count
 * disagrees with its arity tag
 */
export function assertContainerArity(node: ContainerNode, hintPath: string): void {
  if (node.arity === "variable") {
    const expected = VARIABLE_CHILD_COUNTS[node.container];
    if (expected === undefined || node.children.length !== expected) {
      throw new MalformedContainerArityError(node.container, expected ?? 0, node.children.length, hintPath);
    }
    return;
  }

  if (node.container === "shape") {
    const keyCount = node.keys?.length ?? 0;
    if (keyCount !== node.children.length) {
      throw new MalformedContainerArityError(node.container, keyCount, node.children.length, hintPath);
    }
    return;
  }

  if (node.container !== "tuple") {
    throw new MalformedContainerArityError(node.container, VARIABLE_CHILD_COUNTS[node.container] ?? 0, node.children.length, hintPath);
  }
}
