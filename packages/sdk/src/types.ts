/**
 * Core types for shelter records
 */

import type { CompiledQuery } from "./query.js";

/**
 * One animal's intake/outcome event.
 *
 * Records are schema-less beyond the conventional fields listed in {@link KnownField}.
 * Numeric fields may arrive string-encoded (e.g. `"52"`) and are coerced where a number
 * is required.
 */
export type AnimalRecord = Record<string, unknown>;

/**
 * Conventional record fields, in the column order used for files and reports
 */
export const KNOWN_FIELDS = [
  "animal_id",
  "name",
  "animal_type",
  "breed",
  "color",
  "sex_upon_outcome",
  "age_upon_outcome",
  "age_upon_outcome_in_weeks",
  "date_of_birth",
  "datetime",
  "outcome_type",
  "outcome_subtype",
  "location_lat",
  "location_long",
] as const;

export type KnownField = (typeof KNOWN_FIELDS)[number];

/**
 * Query: field name to literal value or operator mapping.
 * Clauses are combined with AND; there is no `$or`/`$not`/nesting.
 *
 * @example
 * ```typescript
 * const query: RecordQuery = {
 *   animal_type: "Dog",
 *   breed: { $in: ["Newfoundland", "Bloodhound"] },
 *   age_upon_outcome_in_weeks: { $gte: 26, $lte: 156 },
 * };
 * ```
 */
export type RecordQuery = Readonly<Record<string, unknown>>;

/**
 * Fields to merge into matching records on update
 */
export type RecordPatch = Readonly<Record<string, unknown>>;

/**
 * A single parsed field condition
 */
export type Clause =
  | { readonly kind: "equals"; readonly value: unknown }
  | { readonly kind: "in"; readonly values: readonly unknown[] | null }
  | { readonly kind: "gte"; readonly bound: number | null }
  | { readonly kind: "lte"; readonly bound: number | null }
  | { readonly kind: "raw"; readonly operator: string; readonly value: unknown };

/**
 * All clauses that apply to one field
 */
export interface FieldPredicate {
  readonly field: string;
  readonly clauses: readonly Clause[];
}

/**
 * Backing store contract. The engine never depends on a store's wire protocol;
 * a connector only has to evaluate compiled queries against its own collection.
 */
export interface StoreConnector {
  /** Whether the backing store can currently serve requests */
  isAvailable(): boolean;
  /** All matching records in insertion order (copies) */
  findAll(query: CompiledQuery): AnimalRecord[];
  /** Append a record; true when the store acknowledged it */
  insertOne(record: AnimalRecord): boolean;
  /** Merge patch into the first match; number of records changed */
  updateOne(query: CompiledQuery, patch: RecordPatch): number;
  /** Merge patch into every match; number of records changed */
  updateMany(query: CompiledQuery, patch: RecordPatch): number;
  /** Remove the first match; number removed */
  deleteOne(query: CompiledQuery): number;
  /** Remove every match; number removed */
  deleteMany(query: CompiledQuery): number;
  /** Persist pending changes, for connectors that buffer writes */
  flush?(): Promise<void>;
}

/**
 * Explicit availability of the backing store, fixed when the store is opened
 */
export type StoreHandle =
  | { readonly status: "connected"; readonly connector: StoreConnector }
  | { readonly status: "unavailable"; readonly reason: string };

/**
 * Names of the analytics aggregations
 */
export type AggregationKind =
  | "breed_performance"
  | "rescue_type_analytics"
  | "monthly_adoption_trends"
  | "demographics";

/**
 * Outcome rates for one breed
 */
export interface BreedPerformance {
  breed: string;
  totalAnimals: number;
  adoptionCount: number;
  returnToOwnerCount: number;
  transferCount: number;
  /** Percentage of animals adopted */
  adoptionRate: number;
  /** Percentage of animals adopted, returned or transferred */
  successRate: number;
}

export type RescueType = "water" | "wilderness" | "disaster";

export interface RescueBreedBreakdown {
  breed: string;
  count: number;
  /** Mean age of eligible animals with a known age, or null */
  avgAgeWeeks: number | null;
}

export interface RescueTypeSummary {
  total: number;
  breakdown: RescueBreedBreakdown[];
}

export type RescueTypeAnalytics = Record<RescueType, RescueTypeSummary>;

export interface MonthlyAdoptionTrend {
  year: number;
  /** Calendar month, 1-12 */
  month: number;
  adoptionCount: number;
  dogAdoptions: number;
  catAdoptions: number;
}

export interface DemographicSummary {
  animalType: string;
  totalCount: number;
  avgAgeWeeks: number | null;
}

/**
 * Who performed an operation, for the audit trail
 */
export interface OperationContext {
  actor?: string;
}

export interface UpdateOptions extends OperationContext {
  /** Update every match instead of only the first (default: false) */
  multiple?: boolean;
}

export interface DeleteOptions extends OperationContext {
  /** Delete every match instead of only the first (default: false) */
  multiple?: boolean;
}
