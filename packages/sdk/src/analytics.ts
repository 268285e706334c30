/**
 * Aggregation engine
 *
 * Each aggregation snapshots the store with a pre-filter, groups, derives rates
 * and averages, sorts, and caps. Rates and averages are returned unrounded.
 * A store in demo mode answers with the fallback payload; a computation that
 * throws, bad arguments included, is logged, counted and masked by the same
 * payload.
 */

import { ComputationFailureError, errorMessage } from "./errors.js";
import type { FallbackProvider } from "./fallback.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { CompiledQuery, parseNumeric, toText } from "./query.js";
import { RESCUE_PROFILES, isRescueEligible } from "./rescue.js";
import type { RescueProfile } from "./rescue.js";
import { attempt } from "./result.js";
import type { RecordStore } from "./store.js";
import type {
  AggregationKind,
  AnimalRecord,
  BreedPerformance,
  DemographicSummary,
  MonthlyAdoptionTrend,
  RescueBreedBreakdown,
  RescueTypeAnalytics,
  RescueTypeSummary,
} from "./types.js";

export const UNKNOWN_GROUP = "Unknown";
export const BREED_MIN_ANIMALS = 5;
export const BREED_RESULT_CAP = 15;
export const DEFAULT_TREND_MONTHS = 12;

const BREED_OUTCOMES = ["Adoption", "Return to Owner", "Transfer"];

const BREED_QUERY = new CompiledQuery({
  animal_type: "Dog",
  outcome_type: { $in: BREED_OUTCOMES },
});
const RESCUE_QUERY = new CompiledQuery({ animal_type: "Dog" });
const ADOPTION_QUERY = new CompiledQuery({ outcome_type: "Adoption" });
const ALL_QUERY = new CompiledQuery({});

function percentage(part: number, total: number): number {
  return (100 * part) / total;
}

/**
 * Label for grouping: missing, null and empty values group as "Unknown"
 */
export function groupKey(value: unknown): string {
  if (value === undefined || value === null || value === "") {
    return UNKNOWN_GROUP;
  }
  return typeof value === "string" ? value : toText(value);
}

class Mean {
  #sum = 0;
  #count = 0;

  add(value: unknown): void {
    const n = parseNumeric(value);
    if (n !== undefined) {
      this.#sum += n;
      this.#count++;
    }
  }

  get value(): number | null {
    return this.#count === 0 ? null : this.#sum / this.#count;
  }
}

function bucketFor<T>(groups: Map<string, T>, key: string, init: () => T): T {
  let found = groups.get(key);
  if (found === undefined) {
    found = init();
    groups.set(key, found);
  }
  return found;
}

interface BreedBucket {
  total: number;
  adoption: number;
  returnToOwner: number;
  transfer: number;
}

/**
 * Outcome rates per dog breed
 *
 * Restricted to dogs with an Adoption, Return to Owner or Transfer outcome.
 * Breeds with fewer than five animals are dropped; the rest are sorted by
 * success rate, then total, both descending, and capped at fifteen.
 */
export function computeBreedPerformance(records: readonly AnimalRecord[]): BreedPerformance[] {
  const buckets = new Map<string, BreedBucket>();

  for (const record of records) {
    if (!BREED_QUERY.test(record)) continue;
    const bucket = bucketFor(buckets, groupKey(record.breed), () => ({
      total: 0,
      adoption: 0,
      returnToOwner: 0,
      transfer: 0,
    }));
    bucket.total++;
    switch (record.outcome_type) {
      case "Adoption":
        bucket.adoption++;
        break;
      case "Return to Owner":
        bucket.returnToOwner++;
        break;
      case "Transfer":
        bucket.transfer++;
        break;
    }
  }

  const rows = [...buckets]
    .filter(([, bucket]) => bucket.total >= BREED_MIN_ANIMALS)
    .map(([breed, b]) => ({
      breed,
      bucket: b,
      success: (b.adoption + b.returnToOwner + b.transfer) / b.total,
    }));

  rows.sort((a, b) => b.success - a.success || b.bucket.total - a.bucket.total);

  return rows.slice(0, BREED_RESULT_CAP).map(({ breed, bucket }) => ({
    breed,
    totalAnimals: bucket.total,
    adoptionCount: bucket.adoption,
    returnToOwnerCount: bucket.returnToOwner,
    transferCount: bucket.transfer,
    adoptionRate: percentage(bucket.adoption, bucket.total),
    successRate: percentage(bucket.adoption + bucket.returnToOwner + bucket.transfer, bucket.total),
  }));
}

export interface RescueAnalyticsOptions {
  /** Enforce each class's age window (default: true) */
  applyAgeWindow?: boolean;
}

/**
 * Eligible dogs per rescue class, with a per-breed breakdown in allow-list order
 */
export function computeRescueTypeAnalytics(
  records: readonly AnimalRecord[],
  options: RescueAnalyticsOptions = {}
): RescueTypeAnalytics {
  const applyAgeWindow = options.applyAgeWindow ?? true;

  const summarize = (profile: RescueProfile): RescueTypeSummary => {
    const eligible = records.filter((r) => isRescueEligible(r, profile, applyAgeWindow));
    const breakdown: RescueBreedBreakdown[] = [];
    for (const breed of profile.breeds) {
      const ofBreed = eligible.filter((r) => r.breed === breed);
      if (ofBreed.length === 0) continue;
      const age = new Mean();
      for (const record of ofBreed) {
        age.add(record.age_upon_outcome_in_weeks);
      }
      breakdown.push({ breed, count: ofBreed.length, avgAgeWeeks: age.value });
    }
    return { total: eligible.length, breakdown };
  };

  return {
    water: summarize(RESCUE_PROFILES.water),
    wilderness: summarize(RESCUE_PROFILES.wilderness),
    disaster: summarize(RESCUE_PROFILES.disaster),
  };
}

const WALL_CLOCK = /^(\d{4})-(\d{2})-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?/;

/**
 * Year and calendar month of an outcome timestamp
 *
 * ISO-like text is read from its wall clock without time zone conversion;
 * other strings and epoch milliseconds go through the Date parser in UTC.
 * @returns undefined when the value is absent or does not parse as a date
 */
export function yearMonth(value: unknown): { year: number; month: number } | undefined {
  if (typeof value === "string") {
    const match = WALL_CLOCK.exec(value.trim());
    if (match) {
      const year = Number(match[1]);
      const month = Number(match[2]);
      return month >= 1 && month <= 12 ? { year, month } : undefined;
    }
    return fromDate(new Date(value));
  }
  if (typeof value === "number") {
    return fromDate(new Date(value));
  }
  if (value instanceof Date) {
    return fromDate(value);
  }
  return undefined;
}

function fromDate(date: Date): { year: number; month: number } | undefined {
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

/**
 * Adoptions per calendar month, newest first, capped at `months` entries
 * @throws {ComputationFailureError} If months is not a positive integer
 */
export function computeMonthlyAdoptionTrends(
  records: readonly AnimalRecord[],
  months = DEFAULT_TREND_MONTHS
): MonthlyAdoptionTrend[] {
  if (!Number.isInteger(months) || months < 1) {
    throw new ComputationFailureError("monthly_adoption_trends", {
      cause: new RangeError(`months must be a positive integer, got ${months}`),
    });
  }

  const buckets = new Map<string, MonthlyAdoptionTrend>();
  for (const record of records) {
    if (!ADOPTION_QUERY.test(record)) continue;
    const when = yearMonth(record.datetime);
    if (!when) continue;

    const bucket = bucketFor(buckets, `${when.year}-${when.month}`, () => ({
      ...when,
      adoptionCount: 0,
      dogAdoptions: 0,
      catAdoptions: 0,
    }));
    bucket.adoptionCount++;
    if (record.animal_type === "Dog") bucket.dogAdoptions++;
    if (record.animal_type === "Cat") bucket.catAdoptions++;
  }

  return [...buckets.values()]
    .sort((a, b) => b.year - a.year || b.month - a.month)
    .slice(0, months);
}

/**
 * Count and mean age per animal type, largest group first
 */
export function computeDemographics(records: readonly AnimalRecord[]): DemographicSummary[] {
  const groups = new Map<string, { count: number; age: Mean }>();
  for (const record of records) {
    const group = bucketFor(groups, groupKey(record.animal_type), () => ({ count: 0, age: new Mean() }));
    group.count++;
    group.age.add(record.age_upon_outcome_in_weeks);
  }

  return [...groups]
    .map(([animalType, group]) => ({
      animalType,
      totalCount: group.count,
      avgAgeWeeks: group.age.value,
    }))
    .sort((a, b) => b.totalCount - a.totalCount);
}

export interface AnalyticsEngineOptions {
  /** Substitute payloads (default: the store's fallback provider) */
  fallback?: FallbackProvider;
}

/**
 * Runs aggregations against a record store with fallback substitution
 *
 * @example
 * ```typescript
 * const analytics = new AnalyticsEngine(store);
 * const top = analytics.breedPerformance()[0];
 * const trends = analytics.monthlyAdoptionTrends(6);
 * ```
 */
export class AnalyticsEngine {
  readonly #store: RecordStore;
  readonly #fallback: FallbackProvider;

  constructor(store: RecordStore, options: AnalyticsEngineOptions = {}) {
    this.#store = store;
    this.#fallback = options.fallback ?? store.fallback;
  }

  breedPerformance(): BreedPerformance[] {
    return this.#run(
      "breed_performance",
      () => computeBreedPerformance(this.#store.snapshot(BREED_QUERY)),
      () => this.#fallback.breedPerformance()
    );
  }

  rescueTypeAnalytics(options: RescueAnalyticsOptions = {}): RescueTypeAnalytics {
    return this.#run(
      "rescue_type_analytics",
      () => computeRescueTypeAnalytics(this.#store.snapshot(RESCUE_QUERY), options),
      () => this.#fallback.rescueTypeAnalytics()
    );
  }

  /**
   * A months value that is not a positive integer fails the computation and
   * yields the fallback payload
   */
  monthlyAdoptionTrends(months = DEFAULT_TREND_MONTHS): MonthlyAdoptionTrend[] {
    return this.#run(
      "monthly_adoption_trends",
      () => computeMonthlyAdoptionTrends(this.#store.snapshot(ADOPTION_QUERY), months),
      () => this.#fallback.adoptionTrends()
    );
  }

  demographics(): DemographicSummary[] {
    return this.#run(
      "demographics",
      () => computeDemographics(this.#store.snapshot(ALL_QUERY)),
      () => this.#fallback.demographics()
    );
  }

  #run<T>(kind: AggregationKind, compute: () => T, substitute: () => T): T {
    const start = performance.now();

    if (!this.#store.isAvailable()) {
      const payload = substitute();
      metrics.recordRun(kind, performance.now() - start, "fallback");
      logger.debug("analytics.fallback", { aggregation: kind, message: "store unavailable" });
      return payload;
    }

    const result = attempt(compute, (cause) =>
      cause instanceof ComputationFailureError ? cause : new ComputationFailureError(kind, { cause })
    );
    if (result.ok) {
      metrics.recordRun(kind, performance.now() - start, "computed");
      return result.value;
    }

    logger.error("analytics.computation_failed", {
      aggregation: kind,
      message: result.error.message,
      details: { code: result.error.code, cause: errorMessage(result.error.cause) },
    });
    const payload = substitute();
    metrics.recordRun(kind, performance.now() - start, "failure");
    return payload;
  }
}
