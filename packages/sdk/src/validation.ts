/**
 * Validation utilities for store operations
 */

import { InvalidInputError } from "./errors.js";

/**
 * True for plain object mappings (not arrays, class instances, or null)
 */
export function isMapping(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Ensure an argument is a mapping
 * @param value - Value to check
 * @param label - Argument name for error messages ("record", "query", "patch")
 * @throws {InvalidInputError} If value is not a plain object
 */
export function assertMapping(
  value: unknown,
  label: string
): asserts value is Record<string, unknown> {
  if (!isMapping(value)) {
    const actual = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
    throw new InvalidInputError(label, `expected a mapping of field names to values, got ${actual}`);
  }
}

/**
 * Validate a username for the user directory
 * @throws {InvalidInputError} If empty or containing whitespace
 */
export function validateUsername(username: string): void {
  if (!username || !/^[A-Za-z0-9_.@-]+$/.test(username)) {
    throw new InvalidInputError(
      "username",
      `"${username}" may only contain letters, numbers, underscore, dash, dot and @`
    );
  }
}
