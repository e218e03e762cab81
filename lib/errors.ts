/**
 * Error classes raised while compiling hints, plus the facade's violation error
 */

import { describeHint } from "./describe";
import type { Violation } from "./types";

export type SpecificationErrorCode = "unsupported" | "unresolved" | "arity" | "validator";

/**
 * Base class for every problem with a hint itself. Thrown synchronously from
 * `compile`; never raised while checking values.
 */
export class SpecificationError extends Error {
  /** Machine-readable category. */
  public readonly code: SpecificationErrorCode;
  /** Where the offending sub-hint sits inside the compiled hint, e.g. `hint.args[1]`. */
  public readonly hintPath: string;

  constructor(code: SpecificationErrorCode, message: string, hintPath: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SpecificationError";
    this.code = code;
    this.hintPath = hintPath;
  }
}

/**
 * A raw hint whose shape matches no classification rule
 */
export class UnsupportedSpecificationError extends SpecificationError {
  public readonly hint: unknown;

  constructor(hint: unknown, hintPath: string, reason: string) {
    super("unsupported", `Unsupported specification ${describeHint(hint)} at ${hintPath}: ${reason}`, hintPath);
    this.name = "UnsupportedSpecificationError";
    this.hint = hint;
  }
}

/**
 * A forward reference with nothing to resolve to
 */
export class UnresolvedForwardReferenceError extends SpecificationError {
  public readonly reference: string;

  constructor(reference: string, hintPath: string, reason: string, cause?: unknown) {
    super("unresolved", `Unresolved forward reference ${JSON.stringify(reference)} at ${hintPath}: ${reason}`, hintPath, cause);
    this.name = "UnresolvedForwardReferenceError";
    this.reference = reference;
  }
}

/**
 * A container node whose child count disagrees with its arity. Indicates an
 * engine bug; the engine never catches it.
 */
export class MalformedContainerArityError extends SpecificationError {
  public readonly container: string;
  public readonly expected: number;
  public readonly actual: number;

  constructor(container: string, expected: number, actual: number, hintPath: string) {
    super("arity", `Malformed ${container} container at ${hintPath}: expected ${expected} children, found ${actual}`, hintPath);
    this.name = "MalformedContainerArityError";
    this.container = container;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A validator expression that does not compile
 */
export class InvalidValidatorError extends SpecificationError {
  public readonly source: string;

  constructor(source: string, hintPath: string, cause?: unknown) {
    super("validator", `Invalid validator expression ${JSON.stringify(source)} at ${hintPath}`, hintPath, cause);
    this.name = "InvalidValidatorError";
    this.source = source;
  }
}

/**
 * Raised by `assertConforms` when a value is rejected
 */
export class ViolationError extends Error {
  public readonly diagnostic: Violation;

  constructor(diagnostic: Violation) {
    super(diagnostic.message);
    this.name = "ViolationError";
    this.diagnostic = diagnostic;
  }
}
