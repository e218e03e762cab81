/**
 * Compilation cache: one compiled checker per (strategy, scope, hint)
 *
 * Entries are created once and never evicted. Compilation is synchronous, so
 * the lookup-then-store sequence in `compile` cannot interleave with another
 * caller and every key is compiled at most once.
 */

import { SpecArena } from "./arena";
import { classifyTree } from "./classifier";
import { describeHint, describeNode } from "./describe";
import { toScope, type ScopeLike } from "./forward";
import { globalLogger, type Logger } from "./logger";
import { reduceTree } from "./reducer";
import { explainNode } from "./reporter";
import { mathRandomSource } from "./sampler";
import { DEFAULT_MAX_RECURSION_DEPTH, synthesize } from "./synthesizer";
import type { Checker, Diagnostic, NodeHandle, RandomSource, Strategy } from "./types";

export const DEFAULT_STRATEGY: Strategy = "sample";

export interface CompileOptions {
  strategy?: Strategy;
  scope?: ScopeLike;
}

export interface CompilationCacheOptions {
  strategy?: Strategy;
  maxRecursionDepth?: number;
  random?: RandomSource;
  logger?: Logger;
}

export interface CompiledChecker {
  readonly hint: unknown;
  /** Stable key, unique within the cache that compiled it */
  readonly key: string;
  readonly strategy: Strategy;
  readonly arena: SpecArena;
  readonly root: NodeHandle;
  readonly check: Checker;
  explain(value: unknown): Diagnostic;
  describe(): string;
}

export interface CacheStats {
  entries: number;
  compilations: number;
  hits: number;
}

type ScopeEntries = Map<unknown, Map<unknown, CompiledChecker>>;

export class CompilationCache {
  private readonly entries = new Map<Strategy, ScopeEntries>();
  private readonly defaultStrategy: Strategy;
  private readonly maxRecursionDepth: number;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private compilations = 0;
  private hits = 0;
  private entryCount = 0;

  constructor(options: CompilationCacheOptions = {}) {
    this.defaultStrategy = options.strategy ?? DEFAULT_STRATEGY;
    this.maxRecursionDepth = options.maxRecursionDepth ?? DEFAULT_MAX_RECURSION_DEPTH;
    this.random = options.random ?? mathRandomSource;
    this.logger = options.logger ?? globalLogger;
  }

  /**
   * Return the checker for `hint`, compiling it on first use. Specification
   * errors are thrown from here and nothing is stored for the failing key.
   */
  compile(hint: unknown, options: CompileOptions = {}): CompiledChecker {
    const strategy = options.strategy ?? this.defaultStrategy;
    const scopeKey = options.scope ?? null;
    const forHint = this.bucket(strategy, scopeKey);

    const cached = forHint.get(hint);
    if (cached) {
      this.hits++;
      return cached;
    }

    const compiled = this.build(hint, strategy, options.scope);
    forHint.set(hint, compiled);
    this.entryCount++;
    return compiled;
  }

  /**
   * Compile (or reuse) the checker and explain `value` against it
   */
  explain(hint: unknown, value: unknown, options: CompileOptions = {}): Diagnostic {
    return this.compile(hint, options).explain(value);
  }

  stats(): CacheStats {
    return { entries: this.entryCount, compilations: this.compilations, hits: this.hits };
  }

  get size(): number {
    return this.entryCount;
  }

  getStrategy(): Strategy {
    return this.defaultStrategy;
  }

  logStats(): void {
    this.logger.info("Compilation cache statistics", { ...this.stats() });
  }

  private bucket(strategy: Strategy, scopeKey: unknown): Map<unknown, CompiledChecker> {
    let byScope = this.entries.get(strategy);
    if (!byScope) {
      byScope = new Map();
      this.entries.set(strategy, byScope);
    }
    let byHint = byScope.get(scopeKey);
    if (!byHint) {
      byHint = new Map();
      byScope.set(scopeKey, byHint);
    }
    return byHint;
  }

  private build(hint: unknown, strategy: Strategy, scope: ScopeLike | undefined): CompiledChecker {
    const hintText = describeHint(hint);
    const timer = `compile:${this.compilations}`;
    this.logger.pushContext({ hint: hintText, phase: "compile", component: "CompilationCache", strategy });
    this.logger.startTimer(timer);
    try {
      const arena = new SpecArena();
      const memo = new Map<unknown, NodeHandle>();
      const classified = classifyTree(arena, hint, memo);
      const root = reduceTree(arena, classified, { scope: toScope(scope), memo, logger: this.logger });
      arena.freeze();

      const check = synthesize(arena, root, {
        strategy,
        random: this.random,
        maxRecursionDepth: this.maxRecursionDepth,
      });

      const sequence = this.compilations++;
      const compiled: CompiledChecker = Object.freeze({
        hint,
        key: `${strategy}#${sequence}`,
        strategy,
        arena,
        root,
        check,
        explain: (value: unknown) => explainNode(arena, root, value),
        describe: () => describeNode(arena, root),
      });

      this.logger.endTimer(timer, "Compiled specification", { key: compiled.key, nodes: arena.size });
      return compiled;
    } finally {
      this.logger.popContext(["hint", "phase", "component", "strategy"]);
    }
  }
}

export function compile(cache: CompilationCache, hint: unknown, options?: CompileOptions): CompiledChecker {
  return cache.compile(hint, options);
}

export function explainViolation(cache: CompilationCache, hint: unknown, value: unknown, options?: CompileOptions): Diagnostic {
  return cache.explain(hint, value, options);
}

/**
 * Process-wide cache used by `conforms` and `assertConforms`
 */
export let globalCompilationCache = new CompilationCache();

export function initializeCompilationCache(options: CompilationCacheOptions = {}): CompilationCache {
  globalCompilationCache = new CompilationCache(options);
  return globalCompilationCache;
}
