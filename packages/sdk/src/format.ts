/**
 * Deterministic JSON formatting for data files and CLI output
 */

import { KNOWN_FIELDS } from "./types.js";
import type { AnimalRecord } from "./types.js";

export type KeyOrder = "alpha" | readonly string[];

function keySorter(order: KeyOrder): (a: string, b: string) => number {
  return (a, b) => {
    if (order === "alpha") {
      return a.localeCompare(b);
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    if (aIndex !== -1) return -1;
    if (bIndex !== -1) return 1;
    return a.localeCompare(b);
  };
}

/**
 * Stable JSON stringification with guaranteed key ordering
 * @param value - Value to stringify
 * @param indent - Spaces of indentation (default: 2)
 * @param order - "alpha" or an explicit key order; unlisted keys follow alphabetically
 * @returns Formatted JSON with a trailing newline
 * @throws {TypeError} On circular references
 */
export function stableStringify(
  value: unknown,
  indent = 2,
  order: KeyOrder = KNOWN_FIELDS
): string {
  const seen = new WeakSet<object>();
  const sorter = keySorter(order);

  const normalize = (current: unknown): unknown => {
    if (current === null || typeof current !== "object") {
      return current;
    }
    if (seen.has(current)) {
      throw new TypeError("Circular reference detected in object");
    }
    seen.add(current);
    try {
      if (Array.isArray(current)) {
        return current.map(normalize);
      }
      const out: Record<string, unknown> = {};
      for (const [key, inner] of Object.entries(current).sort(([a], [b]) => sorter(a, b))) {
        out[key] = normalize(inner);
      }
      return out;
    } finally {
      seen.delete(current);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Column order for tabular output: conventional fields first, then the rest alphabetically
 */
export function recordColumns(records: readonly AnimalRecord[]): string[] {
  const present = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      present.add(key);
    }
  }
  return [...present].sort(keySorter(KNOWN_FIELDS));
}
