/**
 * Test fixtures shared by the engine tests
 */

import { CompilationCache, type CompilationCacheOptions } from "../../lib/cache";
import { SpecArena } from "../../lib/arena";
import { classifyTree } from "../../lib/classifier";
import { toScope, type ScopeLike } from "../../lib/forward";
import { Logger } from "../../lib/logger";
import { reduceTree } from "../../lib/reducer";
import { SequenceRandomSource } from "../../lib/sampler";
import type { NodeHandle } from "../../lib/types";

export class Animal {
  speak(): string {
    return "...";
  }
}

export class Dog extends Animal {
  speak(): string {
    return "woof";
  }
}

export class Cat extends Animal {}

/**
 * Run `fn` and return what it threw, or undefined
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export function createSilentLogger(): Logger {
  return new Logger("debug", false);
}

/**
 * A cache with a silent logger and, unless given, a random source that always picks 0
 */
export function createTestCache(overrides: CompilationCacheOptions = {}): CompilationCache {
  return new CompilationCache({
    logger: createSilentLogger(),
    random: new SequenceRandomSource([0]),
    ...overrides,
  });
}

/**
 * Classify and reduce a hint into a fresh arena
 */
export function reduceHint(hint: unknown, scope?: ScopeLike, logger?: Logger): { arena: SpecArena; root: NodeHandle } {
  const arena = new SpecArena();
  const memo = new Map<unknown, NodeHandle>();
  const classified = classifyTree(arena, hint, memo);
  const root = reduceTree(arena, classified, { scope: toScope(scope), memo, logger });
  return { arena, root };
}
