/**
 * Output rendering helpers
 */

import {
  recordColumns,
  stableStringify,
  type AnimalRecord,
  type ExportStats,
  type ReportRenderer,
  type RescueReport,
} from "@shelter-records/sdk";
import { writeStdout } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  writeStdout(json + "\n");
}

/**
 * Round every fractional number in a JSON value to one decimal place
 */
export function roundFractions(value: unknown): unknown {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : Math.round(value * 10) / 10;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => roundFractions(item));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, roundFractions(item)]));
  }
  return value;
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => writeStdout(line + "\n"));
}

/**
 * Apply ANSI color only if output stream is a TTY and NO_COLOR is unset
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false) || process.env.NO_COLOR) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

function cellText(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

/**
 * Quote a CSV field when it holds a delimiter, quote or line break
 */
export function csvField(value: unknown): string {
  const text = cellText(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Records as CSV: one header row, columns in conventional field order
 */
export class CsvRenderer implements ReportRenderer<readonly AnimalRecord[]> {
  readonly format = "csv";

  render(records: readonly AnimalRecord[]): string {
    const columns = recordColumns(records);
    if (columns.length === 0) {
      return "";
    }
    const lines = [columns.map(csvField).join(",")];
    for (const record of records) {
      lines.push(columns.map((column) => csvField(record[column])).join(","));
    }
    return lines.join("\n") + "\n";
  }
}

/**
 * Records as a stable, pretty-printed JSON array
 */
export class JsonRenderer implements ReportRenderer<readonly AnimalRecord[]> {
  readonly format = "json";

  render(records: readonly AnimalRecord[]): string {
    return stableStringify(records);
  }
}

export const EXPORT_FORMATS = ["csv", "json"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function exportRenderer(format: ExportFormat): ReportRenderer<readonly AnimalRecord[]> {
  return format === "csv" ? new CsvRenderer() : new JsonRenderer();
}

function table(columns: readonly string[], rows: readonly string[][]): string[] {
  const widths = columns.map((column, i) =>
    rows.reduce((max, row) => Math.max(max, (row[i] ?? "").length), column.length)
  );
  const line = (cells: readonly string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(" | ").trimEnd();

  return [line(columns), widths.map((w) => "-".repeat(w)).join("-+-"), ...rows.map(line)];
}

/**
 * Rescue briefing as plain text
 */
export class TextReportRenderer implements ReportRenderer<RescueReport> {
  readonly format = "text";

  render(report: RescueReport): string {
    const lines = [
      report.title,
      "=".repeat(report.title.length),
      `Report type: ${report.reportType}`,
      `Generated: ${report.generatedAt}`,
      `Source: ${report.source}`,
      `Total records: ${report.totalRecords}`,
      "",
      "Rescue Distribution",
    ];

    for (const row of report.rescueDistribution.rows) {
      lines.push(`  ${row.label}: ${row.count}`);
    }
    lines.push(`  Total: ${report.rescueDistribution.total}`);

    if (report.summary) {
      const { summary } = report;
      lines.push(
        "",
        "Summary",
        `  Total animals: ${summary.totalAnimals}`,
        `  Dogs: ${summary.dogs}`,
        `  Cats: ${summary.cats}`,
        `  Adoptions: ${summary.adoptions}`,
        `  Rescue eligible: ${summary.rescueEligible}`
      );
    } else {
      lines.push("", "No records available.");
    }

    if (report.sample) {
      lines.push("", "Records", ...table(report.sample.columns, report.sample.rows));
    }

    return lines.join("\n") + "\n";
  }
}

/**
 * Store statistics as indented text lines
 */
export function statsLines(stats: ExportStats): string[] {
  const lines = [`Records: ${stats.totalRecords}`];
  const section = (title: string, counts: Record<string, number>): void => {
    const entries = Object.entries(counts);
    if (entries.length === 0) return;
    lines.push(`${title}:`);
    for (const [key, count] of entries.sort(([, a], [, b]) => b - a)) {
      lines.push(`  ${key}: ${count}`);
    }
  };

  section("By animal type", stats.animalTypes);
  section("By outcome", stats.outcomeTypes);

  if (stats.topBreeds.length > 0) {
    lines.push("Top breeds:");
    for (const { breed, count } of stats.topBreeds) {
      lines.push(`  ${breed}: ${count}`);
    }
  }
  return lines;
}
