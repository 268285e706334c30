/**
 * Query matching engine
 *
 * Queries are compiled once into tagged clauses and then evaluated per record.
 * Evaluation never throws: missing fields and failed coercions are non-matches.
 */

import type { AnimalRecord, Clause, FieldPredicate, RecordQuery } from "./types.js";
import { assertMapping, isMapping } from "./validation.js";

// Decimal text with optional sign and exponent; no hex, octal or binary prefixes
const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Normalize a value for string equality
 */
export function toText(value: unknown): string {
  if (value !== null && typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Lenient numeric coercion used for record values in range clauses
 * @returns The number, or 0 when the value is not numeric
 */
export function coerceNumber(value: unknown): number {
  return parseNumeric(value) ?? 0;
}

/**
 * Strict numeric parsing, shared by record values and range bounds
 * @returns The number, or undefined when the value is not a finite number or decimal numeric string
 */
export function parseNumeric(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && NUMERIC_TEXT.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function parseOperator(operator: string, operand: unknown): Clause {
  switch (operator) {
    case "$in":
      return { kind: "in", values: Array.isArray(operand) ? operand : null };
    case "$gte":
      return { kind: "gte", bound: parseNumeric(operand) ?? null };
    case "$lte":
      return { kind: "lte", bound: parseNumeric(operand) ?? null };
    default:
      // Unrecognized operators degrade to string equality against the operand
      return { kind: "raw", operator, value: operand };
  }
}

function parseClauses(condition: unknown): Clause[] {
  if (isMapping(condition)) {
    return Object.entries(condition).map(([op, operand]) => parseOperator(op, operand));
  }
  return [{ kind: "equals", value: condition }];
}

/**
 * A query parsed into per-field clauses
 *
 * @example
 * ```typescript
 * const query = compileQuery({ animal_type: "Dog", age_upon_outcome_in_weeks: { $lte: 52 } });
 * records.filter((r) => query.test(r));
 * ```
 */
export class CompiledQuery {
  readonly predicates: readonly FieldPredicate[];
  /** The mapping this query was compiled from */
  readonly source: RecordQuery;

  constructor(source: RecordQuery) {
    this.source = source;
    this.predicates = Object.entries(source).map(([field, condition]) => ({
      field,
      clauses: parseClauses(condition),
    }));
  }

  /** True when the query has no field clauses and matches every record */
  get isEmpty(): boolean {
    return this.predicates.length === 0;
  }

  /**
   * Test one record against every field predicate
   */
  test(record: AnimalRecord): boolean {
    for (const { field, clauses } of this.predicates) {
      if (!Object.hasOwn(record, field)) {
        return false;
      }
      const value = record[field];
      if (!clauses.every((clause) => matchClause(value, clause))) {
        return false;
      }
    }
    return true;
  }
}

function matchClause(value: unknown, clause: Clause): boolean {
  switch (clause.kind) {
    case "equals":
    case "raw":
      return toText(value) === toText(clause.value);
    case "in":
      return clause.values !== null && clause.values.includes(value);
    case "gte":
      return clause.bound !== null && coerceNumber(value) >= clause.bound;
    case "lte":
      return clause.bound !== null && coerceNumber(value) <= clause.bound;
  }
}

/**
 * Compile a query mapping
 * @param input - Query mapping (usually parsed from JSON)
 * @param label - Argument name for error messages
 * @throws {InvalidInputError} If input is not a mapping
 */
export function compileQuery(input: unknown, label = "query"): CompiledQuery {
  if (input instanceof CompiledQuery) {
    return input;
  }
  assertMapping(input, label);
  return new CompiledQuery(input);
}

/**
 * Test if a record matches a query
 * @param record - Record to test
 * @param query - Query mapping or compiled query
 * @returns true if every field clause holds
 */
export function matches(record: AnimalRecord, query: RecordQuery | CompiledQuery): boolean {
  return compileQuery(query).test(record);
}

/**
 * Select the records matching a query, preserving order
 */
export function filterRecords(
  records: readonly AnimalRecord[],
  query: RecordQuery | CompiledQuery
): AnimalRecord[] {
  const compiled = compileQuery(query);
  return compiled.isEmpty ? [...records] : records.filter((r) => compiled.test(r));
}
