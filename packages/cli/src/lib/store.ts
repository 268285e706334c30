/**
 * Store adapter for CLI
 * Provides a thin wrapper over the SDK record store and analytics engine
 */

import {
  AnalyticsEngine,
  buildRescueReport,
  computeExportStats,
  openShelterStore,
  type AnimalRecord,
  type ExportStats,
  type RecordStore,
  type RescueReport,
  type StoreMode,
} from "@shelter-records/sdk";
import { resolveActor, resolveAuditLog, resolveDataFile, type GlobalOptions } from "./env.js";
import { CliError } from "./errors.js";
import { writeStderr } from "./io.js";
import { colorize } from "./render.js";

export interface CliStoreOptions {
  dataFile: string;
  auditLog?: string;
  actor?: string;
  /** Start an empty data file when it does not exist yet (mutating commands) */
  createIfMissing?: boolean;
}

/**
 * CLI Store interface
 * Matches the SDK store but simplified for CLI use cases
 */
export interface CliStore {
  readonly mode: StoreMode;
  /** Why the store fell back to demo data, if it did */
  readonly unavailableReason: string | undefined;
  readonly analytics: AnalyticsEngine;

  find(query: unknown): AnimalRecord[];
  /** @throws {CliError} In demo mode */
  create(record: unknown): void;
  /** @returns Number of records changed */
  update(query: unknown, patch: unknown, multiple: boolean): number;
  /** @returns Number of records removed */
  delete(query: unknown, multiple: boolean): number;
  /** Unaudited read for export, stats and reports */
  snapshot(query: unknown): AnimalRecord[];
  stats(query: unknown): ExportStats;
  report(query: unknown): RescueReport;
  /** Flush the data file and pending audit entries */
  close(): Promise<void>;
}

/**
 * Open a CLI store backed by the SDK
 */
export async function openCliStore(options: CliStoreOptions): Promise<CliStore> {
  const store: RecordStore = await openShelterStore({
    dataFile: options.dataFile,
    createIfMissing: options.createIfMissing,
    auditLog: options.auditLog,
    defaultActor: options.actor,
  });
  const analytics = new AnalyticsEngine(store);

  const requireLive = (operation: string): void => {
    if (!store.isAvailable()) {
      throw new CliError(
        `Cannot ${operation} in demo mode: ${store.unavailableReason ?? "store unavailable"}`
      );
    }
  };

  return {
    get mode() {
      return store.mode;
    },

    get unavailableReason() {
      return store.unavailableReason;
    },

    analytics,

    find(query) {
      return store.read(query);
    },

    create(record) {
      // Validate the payload first so malformed input reads the same in demo mode
      if (!store.create(record)) {
        requireLive("create records");
        throw new CliError("Record was not stored");
      }
    },

    update(query, patch, multiple) {
      const modified = store.update(query, patch, { multiple });
      if (modified === 0) {
        requireLive("update records");
      }
      return modified;
    },

    delete(query, multiple) {
      const removed = store.delete(query, { multiple });
      if (removed === 0) {
        requireLive("delete records");
      }
      return removed;
    },

    snapshot(query) {
      return store.snapshot(query);
    },

    stats(query) {
      return computeExportStats(store.snapshot(query));
    },

    report(query) {
      const source = store.isAvailable() ? options.dataFile : "demo";
      return buildRescueReport(store.snapshot(query), { source });
    },

    async close() {
      await store.close();
    },
  };
}

/**
 * Open a store from global options, run `fn`, and always close the store.
 * A demo-mode notice goes to stderr unless --quiet is set.
 */
export async function withCliStore<T>(
  globals: GlobalOptions,
  fn: (store: CliStore) => Promise<T> | T,
  options: { createIfMissing?: boolean } = {}
): Promise<T> {
  const store = await openCliStore({
    dataFile: resolveDataFile(globals.dataFile),
    auditLog: resolveAuditLog(globals.auditLog),
    actor: resolveActor(globals.user),
    createIfMissing: options.createIfMissing,
  });

  if (store.mode === "demo" && !globals.quiet) {
    writeStderr(
      colorize(
        `Demo mode (${store.unavailableReason ?? "store unavailable"}); showing sample data\n`,
        "yellow",
        process.stderr
      )
    );
  }

  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
