import { globalCompilationCache, type CompilationCache, type CompileOptions } from "../lib/cache";
import { describeValue } from "../lib/describe";
import { ViolationError } from "../lib/errors";
import type { Hint } from "../lib/forms";
import { formatViolation, ROOT_PATH } from "../lib/reporter";
import type { Violation } from "../lib/types";

export interface ConformOptions extends CompileOptions {
  /** Defaults to the process-wide cache */
  cache?: CompilationCache;
}

/**
 * Check `value` against `hint` with the cached checker
 */
export function conforms(value: unknown, hint: Hint, options: ConformOptions = {}): boolean {
  const { cache = globalCompilationCache, ...compileOptions } = options;
  return cache.compile(hint, compileOptions).check(value);
}

/**
 * Like {@link conforms}, but throws a {@link ViolationError} explaining the
 * first failing position when the checker rejects `value`
 */
export function assertConforms(value: unknown, hint: Hint, options: ConformOptions = {}): void {
  const { cache = globalCompilationCache, ...compileOptions } = options;
  const checker = cache.compile(hint, compileOptions);
  if (checker.check(value)) {
    return;
  }

  const diagnostic = checker.explain(value);
  if (!diagnostic.ok) {
    throw new ViolationError(diagnostic);
  }

  // The checker and the exhaustive walk disagree, e.g. an impure predicate
  const expected = checker.describe();
  const actual = describeValue(value);
  const violation: Violation = {
    ok: false,
    path: [],
    pathText: ROOT_PATH,
    expected,
    actual,
    message: formatViolation(ROOT_PATH, expected, actual),
  };
  throw new ViolationError(violation);
}
