/**
 * Utility functions used across the spotcheck engine
 */

import type { LiteralValue } from "./types";

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Check if value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * True when `text` can follow a `.` in a property access
 */
export function isIdentifier(text: string): boolean {
  return IDENTIFIER_PATTERN.test(text);
}

export function isLiteralValue(value: unknown): value is LiteralValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "bigint":
    case "symbol":
    case "undefined":
      return true;
    default:
      return value === null;
  }
}

/**
 * Deduplicate by SameValueZero while preserving first-seen order
 */
export function dedupePreservingOrder<T>(values: readonly T[]): T[] {
  const seen = new Set<T>();
  return values.filter((v) => {
    if (seen.has(v)) return false;
    seen.add(v);
    return true;
  });
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Render a literal the way it would be written in source
 */
export function formatLiteral(value: LiteralValue): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value}n`;
    case "symbol":
      return value.toString();
    default:
      return String(value);
  }
}

export function formatPropertyKey(key: string): string {
  return isIdentifier(key) ? key : JSON.stringify(key);
}
