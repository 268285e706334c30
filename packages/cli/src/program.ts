/**
 * Shelter CLI program definition
 */

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { createInterface } from "node:readline/promises";
import { atomicWrite, isMapping, logger } from "@shelter-records/sdk";
import { isVerbose, type GlobalOptions } from "./lib/env.js";
import { parseJson, parsePositiveInt } from "./lib/arg.js";
import { isStdinTTY, readJsonInput, writeStderr, writeStdout } from "./lib/io.js";
import {
  EXPORT_FORMATS,
  TextReportRenderer,
  colorize,
  exportRenderer,
  printJson,
  printLines,
  statsLines,
  type ExportFormat,
} from "./lib/render.js";
import { withCliStore } from "./lib/store.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { setVerbose, withTiming } from "./lib/telemetry.js";
import { registerAnalyticsCommand } from "./commands/analytics.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  let packageJson: unknown;
  try {
    packageJson = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  } catch {
    return "0.0.0";
  }
  return isMapping(packageJson) && typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";
}

interface QueryInputOptions {
  query?: string;
  file?: string;
}

interface FindOptions extends QueryInputOptions {
  limit?: number;
  raw?: boolean;
}

interface CreateOptions {
  data?: string;
  file?: string;
}

interface UpdateOptions {
  query: string;
  set?: string;
  file?: string;
  multiple?: boolean;
}

interface DeleteOptions {
  query: string;
  multiple?: boolean;
  force?: boolean;
}

interface StatsOptions {
  query?: string;
  json?: boolean;
}

interface ExportOptions {
  query?: string;
  format: ExportFormat;
  output?: string;
}

interface ReportOptions {
  query?: string;
  format: "text" | "json";
  output?: string;
}

/**
 * Parse an optional --query, treating its absence as "all records"
 */
function optionalQuery(query: string | undefined): unknown {
  return query === undefined ? {} : parseJson(query, "--query");
}

async function confirm(prompt: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  try {
    const answer = (await rl.question(prompt)).trim().toLowerCase();
    return answer === "y";
  } finally {
    rl.close();
  }
}

async function writeOutput(content: string, output: string | undefined): Promise<void> {
  if (output === undefined) {
    writeStdout(content);
    return;
  }
  await atomicWrite(output, content);
}

/**
 * Build the `shelter` command tree
 */
export function createProgram(): Command {
  const program = new Command();
  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  // Configure error output with color
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("shelter")
    .description("Shelter records - query, update and analyze animal-shelter outcome records")
    .version(readVersion())
    .option("--data-file <path>", "Records data file (JSON array)")
    .option("--audit-log <path>", "Append mutations to a JSON-lines audit log")
    .option("--user <name>", "Actor recorded in the audit log")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      const verbose = Boolean(globals().verbose) || isVerbose();
      setVerbose(verbose);
      logger.setEnabled(verbose);
    });

  // Find command
  program
    .command("find")
    .description("Find records matching a query (all records when none is given)")
    .option("--query <json>", "Inline JSON query")
    .option("--file <path>", "Read query from JSON file")
    .option("--limit <n>", "Maximum results", (val) => parsePositiveInt(val, "--limit"))
    .option("--raw", "Output compact JSON")
    .action(async (options: FindOptions) => {
      await withTiming("cli.find", async () => {
        const query = await readJsonInput({
          inline: options.query,
          inlineFlag: "--query",
          file: options.file,
          fallback: {},
        });

        await withCliStore(globals(), (store) => {
          let records = store.find(query);
          if (options.limit !== undefined) {
            records = records.slice(0, options.limit);
          }
          printJson(records, { raw: options.raw });
        });
      });
    });

  // Create command
  program
    .command("create")
    .description("Add a record")
    .option("--data <json>", "Inline JSON record")
    .option("--file <path>", "Read record from JSON file")
    .action(async (options: CreateOptions) => {
      await withTiming("cli.create", async () => {
        const record = await readJsonInput({
          inline: options.data,
          inlineFlag: "--data",
          file: options.file,
        });

        await withCliStore(
          globals(),
          (store) => {
            store.create(record);
            if (!globals().quiet) {
              const id = isMapping(record) && record.animal_id !== undefined ? ` ${String(record.animal_id)}` : "";
              writeStdout(`Created record${id}\n`);
            }
          },
          { createIfMissing: true }
        );
      });
    });

  // Update command
  program
    .command("update")
    .description("Merge fields into the first matching record, or every match with --multiple")
    .requiredOption("--query <json>", "JSON query selecting records")
    .option("--set <json>", "Inline JSON fields to merge")
    .option("--file <path>", "Read fields to merge from JSON file")
    .option("--multiple", "Update every matching record")
    .action(async (options: UpdateOptions) => {
      await withTiming("cli.update", async () => {
        const query = parseJson(options.query, "--query");
        const patch = await readJsonInput({
          inline: options.set,
          inlineFlag: "--set",
          file: options.file,
        });

        await withCliStore(globals(), (store) => {
          const modified = store.update(query, patch, Boolean(options.multiple));
          if (!globals().quiet) {
            writeStdout(`Updated ${modified} record(s)\n`);
          }
        });
      });
    });

  // Delete command
  program
    .command("delete")
    .description("Remove the first matching record, or every match with --multiple")
    .requiredOption("--query <json>", "JSON query selecting records")
    .option("--multiple", "Delete every matching record")
    .option("--force", "Delete without confirmation")
    .action(async (options: DeleteOptions) => {
      await withTiming("cli.delete", async () => {
        const query = parseJson(options.query, "--query");

        // Require confirmation unless --force
        if (!options.force) {
          if (!isStdinTTY()) {
            throw new InvalidArgumentError("Use --force to confirm deletion in non-interactive mode");
          }
          const scope = options.multiple ? "all records" : "the first record";
          if (!(await confirm(`Delete ${scope} matching ${options.query}? (y/N) `))) {
            throw new CliError("Aborted by user", { exitCode: 1 });
          }
        }

        await withCliStore(globals(), (store) => {
          const removed = store.delete(query, Boolean(options.multiple));
          if (!globals().quiet) {
            writeStdout(`Deleted ${removed} record(s)\n`);
          }
        });
      });
    });

  registerAnalyticsCommand(program);

  // Stats command
  program
    .command("stats")
    .description("Count records by animal type and outcome, with the most common breeds")
    .option("--query <json>", "Restrict to records matching a JSON query")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: StatsOptions) => {
      await withTiming("cli.stats", async () => {
        const query = optionalQuery(options.query);

        await withCliStore(globals(), (store) => {
          const stats = store.stats(query);
          if (options.json) {
            printJson({ mode: store.mode, ...stats }, { raw: true });
          } else {
            printLines([`Mode: ${store.mode}`, ...statsLines(stats)]);
          }
        });
      });
    });

  // Export command
  program
    .command("export")
    .description("Export matching records as CSV or JSON")
    .addOption(
      new Option("--format <format>", "Output format").choices(EXPORT_FORMATS).default("json")
    )
    .option("--query <json>", "Restrict to records matching a JSON query")
    .option("--output <path>", "Write to a file instead of stdout")
    .action(async (options: ExportOptions) => {
      await withTiming("cli.export", async () => {
        const query = optionalQuery(options.query);

        await withCliStore(globals(), async (store) => {
          const records = store.snapshot(query);
          await writeOutput(exportRenderer(options.format).render(records), options.output);
          if (options.output !== undefined && !globals().quiet) {
            writeStderr(`Exported ${records.length} record(s) to ${options.output}\n`);
          }
        });
      });
    });

  // Report command
  program
    .command("report")
    .description("Build the rescue team briefing report")
    .addOption(
      new Option("--format <format>", "Output format").choices(["text", "json"]).default("text")
    )
    .option("--query <json>", "Restrict to records matching a JSON query")
    .option("--output <path>", "Write to a file instead of stdout")
    .action(async (options: ReportOptions) => {
      await withTiming("cli.report", async () => {
        const query = optionalQuery(options.query);

        await withCliStore(globals(), async (store) => {
          const report = store.report(query);
          const content =
            options.format === "json"
              ? JSON.stringify(report, null, 2) + "\n"
              : new TextReportRenderer().render(report);
          await writeOutput(content, options.output);
        });
      });
    });

  return program;
}

/**
 * Parse argv and run the matching command
 * @returns Process exit code
 */
export async function run(argv: readonly string[] = process.argv): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    writeStderr(colorize(`Error: ${formatCliError(err, opts.verbose)}\n`, "red", process.stderr));
    return mapSdkErrorToExitCode(err);
  }
}
