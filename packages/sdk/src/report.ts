/**
 * Report models built from already-queried records
 *
 * Rendering to a concrete format (CSV, JSON, text) is left to a {@link ReportRenderer}.
 */

import { groupKey } from "./analytics.js";
import { RESCUE_PROFILES, RESCUE_TYPES, isRescueEligible } from "./rescue.js";
import type { AnimalRecord, RescueType } from "./types.js";

export const TOP_BREED_COUNT = 5;
export const SAMPLE_TABLE_MAX_RECORDS = 50;

/** Columns shown in a report's sample table, when present in the data */
export const SAMPLE_COLUMNS = [
  "animal_id",
  "name",
  "animal_type",
  "breed",
  "age_upon_outcome",
  "sex_upon_outcome",
  "outcome_type",
] as const;

/**
 * Turns a value into output text
 */
export interface ReportRenderer<T> {
  /** Short format name, e.g. "csv" */
  readonly format: string;
  render(value: T): string;
}

export interface ExportStats {
  totalRecords: number;
  animalTypes: Record<string, number>;
  outcomeTypes: Record<string, number>;
  /** Most common breeds, most frequent first */
  topBreeds: Array<{ breed: string; count: number }>;
}

function tally(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Counts by animal type and outcome type plus the five most common breeds
 */
export function computeExportStats(records: readonly AnimalRecord[]): ExportStats {
  const animalTypes = new Map<string, number>();
  const outcomeTypes = new Map<string, number>();
  const breeds = new Map<string, number>();

  for (const record of records) {
    tally(animalTypes, groupKey(record.animal_type));
    tally(outcomeTypes, groupKey(record.outcome_type));
    tally(breeds, groupKey(record.breed));
  }

  const topBreeds = [...breeds]
    .sort(([, a], [, b]) => b - a)
    .slice(0, TOP_BREED_COUNT)
    .map(([breed, count]) => ({ breed, count }));

  return {
    totalRecords: records.length,
    animalTypes: Object.fromEntries(animalTypes),
    outcomeTypes: Object.fromEntries(outcomeTypes),
    topBreeds,
  };
}

export type RescueCounts = Record<RescueType, number> & { total: number };

/**
 * Dogs eligible for each rescue class, age window applied
 */
export function countRescueEligible(records: readonly AnimalRecord[]): RescueCounts {
  const count = (type: RescueType): number =>
    records.filter((r) => isRescueEligible(r, RESCUE_PROFILES[type])).length;

  const water = count("water");
  const wilderness = count("wilderness");
  const disaster = count("disaster");
  return { water, wilderness, disaster, total: water + wilderness + disaster };
}

export interface RescueReport {
  title: string;
  reportType: string;
  /** ISO-8601 */
  generatedAt: string;
  /** Where the records came from, e.g. a data file path or "demo" */
  source: string;
  totalRecords: number;
  rescueDistribution: {
    rows: Array<{ type: RescueType; label: string; count: number }>;
    total: number;
  };
  /** Absent when there are no records */
  summary: {
    totalAnimals: number;
    dogs: number;
    cats: number;
    adoptions: number;
    rescueEligible: number;
  } | null;
  /** Key columns for each record; only for small record sets */
  sample: { columns: string[]; rows: string[][] } | null;
}

export interface RescueReportOptions {
  source: string;
  generatedAt?: Date;
}

function cellText(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

/**
 * Rescue team briefing: rescue class distribution, summary counts and a sample table
 */
export function buildRescueReport(
  records: readonly AnimalRecord[],
  options: RescueReportOptions
): RescueReport {
  const counts = countRescueEligible(records);

  const summary =
    records.length === 0
      ? null
      : {
          totalAnimals: records.length,
          dogs: records.filter((r) => r.animal_type === "Dog").length,
          cats: records.filter((r) => r.animal_type === "Cat").length,
          adoptions: records.filter((r) => r.outcome_type === "Adoption").length,
          rescueEligible: counts.total,
        };

  const columns: string[] = SAMPLE_COLUMNS.filter((column) =>
    records.some((record) => Object.hasOwn(record, column))
  );
  const sample =
    columns.length > 0 && records.length <= SAMPLE_TABLE_MAX_RECORDS
      ? { columns, rows: records.map((record) => columns.map((column) => cellText(record[column]))) }
      : null;

  return {
    title: "Animal Rescue Team Briefing Report",
    reportType: "Rescue Operations Briefing",
    generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    source: options.source,
    totalRecords: records.length,
    rescueDistribution: {
      rows: RESCUE_TYPES.map((type) => ({
        type,
        label: RESCUE_PROFILES[type].label,
        count: counts[type],
      })),
      total: counts.total,
    },
    summary,
    sample,
  };
}
