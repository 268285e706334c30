/**
 * Unit tests for output renderers
 */

import { describe, it, expect } from "vitest";
import type { RescueReport } from "@shelter-records/sdk";
import {
  CsvRenderer,
  JsonRenderer,
  TextReportRenderer,
  csvField,
  exportRenderer,
  roundFractions,
  statsLines,
} from "../src/lib/render.js";

describe("renderers", () => {
  describe("roundFractions", () => {
    it("should round nested fractional numbers to one decimal", () => {
      expect(
        roundFractions([
          { breed: "Beagle", adoptionRate: 100 / 6, successRate: 100 },
          { breed: "Boxer", adoptionRate: 500 / 7, avgAgeWeeks: null },
        ])
      ).toEqual([
        { breed: "Beagle", adoptionRate: 16.7, successRate: 100 },
        { breed: "Boxer", adoptionRate: 71.4, avgAgeWeeks: null },
      ]);
    });

    it("should leave integers and strings as they are", () => {
      expect(roundFractions({ total: 3, label: "2.55" })).toEqual({ total: 3, label: "2.55" });
    });
  });

  describe("csvField", () => {
    it("should quote fields holding delimiters, quotes or line breaks", () => {
      expect(csvField("plain")).toBe("plain");
      expect(csvField("Rex, Jr.")).toBe('"Rex, Jr."');
      expect(csvField('Lab "mix"')).toBe('"Lab ""mix"""');
      expect(csvField("two\nlines")).toBe('"two\nlines"');
    });

    it("should render missing values as empty and objects as JSON", () => {
      expect(csvField(undefined)).toBe("");
      expect(csvField(null)).toBe("");
      expect(csvField(52)).toBe("52");
      expect(csvField({ a: 1 })).toBe('"{""a"":1}"');
    });
  });

  describe("CsvRenderer", () => {
    it("should put conventional columns first and fill gaps", () => {
      const csv = new CsvRenderer().render([
        { notes: "x", breed: 'Lab "mix"', name: "Rex, Jr.", animal_id: "A1" },
        { animal_id: "A2", age_upon_outcome_in_weeks: 52 },
      ]);

      expect(csv).toBe(
        [
          "animal_id,name,breed,age_upon_outcome_in_weeks,notes",
          'A1,"Rex, Jr.","Lab ""mix""",,x',
          "A2,,,52,",
        ].join("\n") + "\n"
      );
    });

    it("should render nothing for no records", () => {
      expect(new CsvRenderer().render([])).toBe("");
    });
  });

  describe("JsonRenderer", () => {
    it("should order keys by conventional field order", () => {
      const json = new JsonRenderer().render([{ name: "Rex", animal_id: "A1" }]);
      expect(json).toBe('[\n  {\n    "animal_id": "A1",\n    "name": "Rex"\n  }\n]\n');
    });
  });

  describe("exportRenderer", () => {
    it("should pick the renderer by format", () => {
      expect(exportRenderer("csv").format).toBe("csv");
      expect(exportRenderer("json").format).toBe("json");
    });
  });

  describe("TextReportRenderer", () => {
    const report: RescueReport = {
      title: "Animal Rescue Team Briefing Report",
      reportType: "Rescue Operations Briefing",
      generatedAt: "2024-05-01T00:00:00.000Z",
      source: "animals.json",
      totalRecords: 2,
      rescueDistribution: {
        rows: [
          { type: "water", label: "Water Rescue", count: 1 },
          { type: "wilderness", label: "Mountain/Wilderness Rescue", count: 0 },
          { type: "disaster", label: "Disaster/Individual Tracking", count: 0 },
        ],
        total: 1,
      },
      summary: { totalAnimals: 2, dogs: 1, cats: 1, adoptions: 1, rescueEligible: 1 },
      sample: {
        columns: ["animal_id", "name"],
        rows: [
          ["A1", "Rex"],
          ["A2", "Whiskers"],
        ],
      },
    };

    it("should render every section", () => {
      const lines = new TextReportRenderer().render(report).split("\n");

      expect(lines).toEqual([
        "Animal Rescue Team Briefing Report",
        "=".repeat(34),
        "Report type: Rescue Operations Briefing",
        "Generated: 2024-05-01T00:00:00.000Z",
        "Source: animals.json",
        "Total records: 2",
        "",
        "Rescue Distribution",
        "  Water Rescue: 1",
        "  Mountain/Wilderness Rescue: 0",
        "  Disaster/Individual Tracking: 0",
        "  Total: 1",
        "",
        "Summary",
        "  Total animals: 2",
        "  Dogs: 1",
        "  Cats: 1",
        "  Adoptions: 1",
        "  Rescue eligible: 1",
        "",
        "Records",
        "animal_id | name",
        "-".repeat(10) + "+" + "-".repeat(9),
        "A1" + " ".repeat(7) + " | Rex",
        "A2" + " ".repeat(7) + " | Whiskers",
        "",
      ]);
    });

    it("should note an empty record set", () => {
      const text = new TextReportRenderer().render({
        ...report,
        totalRecords: 0,
        rescueDistribution: { rows: [], total: 0 },
        summary: null,
        sample: null,
      });

      expect(text.endsWith("  Total: 0\n\nNo records available.\n")).toBe(true);
    });
  });

  describe("statsLines", () => {
    it("should list counts most frequent first", () => {
      expect(
        statsLines({
          totalRecords: 3,
          animalTypes: { Cat: 1, Dog: 2 },
          outcomeTypes: { Adoption: 3 },
          topBreeds: [
            { breed: "Beagle", count: 2 },
            { breed: "Siamese", count: 1 },
          ],
        })
      ).toEqual([
        "Records: 3",
        "By animal type:",
        "  Dog: 2",
        "  Cat: 1",
        "By outcome:",
        "  Adoption: 3",
        "Top breeds:",
        "  Beagle: 2",
        "  Siamese: 1",
      ]);
    });

    it("should omit empty sections", () => {
      expect(
        statsLines({ totalRecords: 0, animalTypes: {}, outcomeTypes: {}, topBreeds: [] })
      ).toEqual(["Records: 0"]);
    });
  });
});
