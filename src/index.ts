/**
 * ts-spotcheck: Main entry point
 * Exports the hint constructors, the facade and the compilation engine
 */

export {
  Any,
  Unknown,
  Never,
  Integer,
  arrayOf,
  setOf,
  mapOf,
  recordOf,
  tupleOf,
  shapeOf,
  unionOf,
  optional,
  nullable,
  literal,
  annotated,
  classOf,
  callable,
  ref,
  lazy,
} from "./hints";

export { conforms, assertConforms, type ConformOptions } from "./conform";

export {
  CompilationCache,
  compile,
  explainViolation,
  globalCompilationCache,
  initializeCompilationCache,
  type CacheStats,
  type CompilationCacheOptions,
  type CompiledChecker,
  type CompileOptions,
} from "../lib/cache";

export { Scope, EMPTY_SCOPE, type ScopeLike } from "../lib/forward";
export { ConfigManager } from "../lib/config";
export { Logger, globalLogger, type LogLevel } from "../lib/logger";
export { SequenceRandomSource, seededRandomSource, mathRandomSource } from "../lib/sampler";
export {
  SpecificationError,
  UnsupportedSpecificationError,
  UnresolvedForwardReferenceError,
  MalformedContainerArityError,
  InvalidValidatorError,
  ViolationError,
} from "../lib/errors";
export type { Hint } from "../lib/forms";
export type { Diagnostic, Violation, PathSegment, RandomSource, Strategy } from "../lib/types";
