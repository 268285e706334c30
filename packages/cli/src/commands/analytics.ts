/**
 * Analytics commands for CLI
 */

import { Argument, type Command } from "commander";
import { DEFAULT_TREND_MONTHS, type AggregationKind } from "@shelter-records/sdk";
import type { GlobalOptions } from "../lib/env.js";
import { parsePositiveInt } from "../lib/arg.js";
import { printJson, roundFractions } from "../lib/render.js";
import { withCliStore, type CliStore } from "../lib/store.js";
import { emitAggregationMetrics, withTiming } from "../lib/telemetry.js";

export const AGGREGATIONS = ["breeds", "rescue", "trends", "demographics"] as const;
export type AggregationName = (typeof AGGREGATIONS)[number];

interface AnalyticsOptions {
  months?: number;
  /** false with --no-age-window */
  ageWindow: boolean;
  raw?: boolean;
}

const KINDS: Record<AggregationName, AggregationKind> = {
  breeds: "breed_performance",
  rescue: "rescue_type_analytics",
  trends: "monthly_adoption_trends",
  demographics: "demographics",
};

function compute(store: CliStore, name: AggregationName, options: AnalyticsOptions): unknown {
  switch (name) {
    case "breeds":
      return store.analytics.breedPerformance();
    case "rescue":
      return store.analytics.rescueTypeAnalytics({ applyAgeWindow: options.ageWindow });
    case "trends":
      return store.analytics.monthlyAdoptionTrends(options.months ?? DEFAULT_TREND_MONTHS);
    case "demographics":
      return store.analytics.demographics();
  }
}

/**
 * Register `analytics <aggregation>` on the program
 */
export function registerAnalyticsCommand(program: Command): Command {
  return program
    .command("analytics")
    .description("Run an aggregation over the records")
    .addArgument(new Argument("<aggregation>", "Aggregation to run").choices(AGGREGATIONS))
    .option("--months <n>", "Months of adoption trends", (val) => parsePositiveInt(val, "--months"))
    .option("--no-age-window", "Ignore rescue age windows")
    .option("--raw", "Output compact JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ shelter analytics breeds
  $ shelter analytics rescue --no-age-window
  $ shelter analytics trends --months 6
  $ shelter --data-file ./animals.json analytics demographics`
    )
    .action(async (name: AggregationName, options: AnalyticsOptions) => {
      await withTiming(`cli.analytics.${name}`, async () => {
        await withCliStore(program.opts<GlobalOptions>(), (store) => {
          printJson(roundFractions(compute(store, name, options)), { raw: options.raw });
          emitAggregationMetrics(KINDS[name]);
        });
      });
    });
}
