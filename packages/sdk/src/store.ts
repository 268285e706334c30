/**
 * Record store: CRUD over an explicit store handle with demo-mode substitution
 */

import { MutationLog, JsonLinesAuditSink } from "./audit.js";
import type { AuditSink } from "./audit.js";
import { MemoryConnector } from "./connectors/memory.js";
import { JsonFileConnector } from "./connectors/file.js";
import { DataFileError } from "./errors.js";
import { DemoFallbackProvider } from "./fallback.js";
import type { FallbackProvider } from "./fallback.js";
import { logger } from "./observability/logs.js";
import { compileQuery, filterRecords } from "./query.js";
import type {
  AnimalRecord,
  DeleteOptions,
  OperationContext,
  StoreConnector,
  StoreHandle,
  UpdateOptions,
} from "./types.js";
import { assertMapping } from "./validation.js";

/** Actor recorded in the audit trail when an operation names none */
export const SYSTEM_ACTOR = "system";

export type StoreMode = "live" | "demo";

/**
 * Handle for a reachable backing store
 */
export function connected(connector: StoreConnector): StoreHandle {
  return { status: "connected", connector };
}

/**
 * Handle for a backing store that could not be reached
 */
export function unavailable(reason: string): StoreHandle {
  return { status: "unavailable", reason };
}

export interface RecordStoreOptions {
  handle: StoreHandle;
  /** Substitute reads in demo mode (default: the built-in demo dataset) */
  fallback?: FallbackProvider;
  /** Audit trail (default: discards entries) */
  audit?: MutationLog;
  /** Actor used when an operation's context names none (default: "system") */
  defaultActor?: string;
}

/**
 * CRUD over a backing connector
 *
 * Arguments are validated before availability is checked, so malformed input is
 * rejected the same way in live and demo mode. In demo mode reads are served from
 * the fallback provider and mutations are no-ops.
 *
 * @example
 * ```typescript
 * const store = new RecordStore({ handle: connected(new MemoryConnector()) });
 * store.create({ animal_id: "A100", animal_type: "Dog", breed: "Beagle" });
 * store.update({ animal_id: "A100" }, { outcome_type: "Adoption" });
 * ```
 */
export class RecordStore {
  readonly #handle: StoreHandle;
  readonly #fallback: FallbackProvider;
  readonly #audit: MutationLog;
  readonly #defaultActor: string;

  constructor(options: RecordStoreOptions) {
    this.#handle = options.handle;
    this.#fallback = options.fallback ?? new DemoFallbackProvider();
    this.#audit = options.audit ?? new MutationLog();
    this.#defaultActor = options.defaultActor ?? SYSTEM_ACTOR;
  }

  /** The provider answering reads and aggregations in demo mode */
  get fallback(): FallbackProvider {
    return this.#fallback;
  }

  get mode(): StoreMode {
    return this.isAvailable() ? "live" : "demo";
  }

  /** Why the store is in demo mode, if it is */
  get unavailableReason(): string | undefined {
    if (this.#handle.status === "unavailable") {
      return this.#handle.reason;
    }
    return this.#handle.connector.isAvailable() ? undefined : "connector reports unavailable";
  }

  isAvailable(): boolean {
    return this.#live() !== undefined;
  }

  /**
   * Append a record
   * @returns true when the connector stored it; false in demo mode
   * @throws {InvalidInputError} If record is not a mapping
   */
  create(record: unknown, ctx: OperationContext = {}): boolean {
    assertMapping(record, "record");
    const connector = this.#live();
    if (!connector) {
      logger.debug("store.create_skipped", { message: "demo mode" });
      return false;
    }

    const inserted = connector.insertOne(record);
    if (inserted) {
      const id = record.animal_id === undefined ? "without animal_id" : String(record.animal_id);
      this.#audit.record(this.#actor(ctx), "CREATE_RECORD", `Created animal record ${id}`);
    }
    return inserted;
  }

  /**
   * Records matching a query, in insertion order
   * @throws {InvalidInputError} If query is not a mapping
   */
  read(query: unknown, ctx: OperationContext = {}): AnimalRecord[] {
    const compiled = compileQuery(query);
    const connector = this.#live();
    if (!connector) {
      return filterRecords(this.#fallback.records(), compiled);
    }

    this.#audit.record(this.#actor(ctx), "READ_RECORDS", `Query: ${JSON.stringify(compiled.source)}`);
    return connector.findAll(compiled);
  }

  /**
   * Unaudited read used for aggregation and reporting
   * @throws {InvalidInputError} If query is not a mapping
   */
  snapshot(query: unknown = {}): AnimalRecord[] {
    const compiled = compileQuery(query);
    const connector = this.#live();
    if (!connector) {
      return filterRecords(this.#fallback.records(), compiled);
    }
    return connector.findAll(compiled);
  }

  /**
   * Merge patch fields into matching records
   * @returns Number of records changed; 0 in demo mode
   * @throws {InvalidInputError} If query or patch is not a mapping
   */
  update(query: unknown, patch: unknown, options: UpdateOptions = {}): number {
    const compiled = compileQuery(query);
    assertMapping(patch, "patch");
    const connector = this.#live();
    if (!connector) {
      return 0;
    }

    const actor = this.#actor(options);
    if (options.multiple) {
      const modified = connector.updateMany(compiled, patch);
      if (modified > 0) {
        this.#audit.record(actor, "UPDATE_RECORDS", `Updated ${modified} records`);
      }
      return modified;
    }

    const modified = connector.updateOne(compiled, patch);
    if (modified > 0) {
      this.#audit.record(actor, "UPDATE_RECORD", `Updated record matching ${JSON.stringify(compiled.source)}`);
    }
    return modified;
  }

  /**
   * Remove matching records
   * @returns Number of records removed; 0 in demo mode
   * @throws {InvalidInputError} If query is not a mapping
   */
  delete(query: unknown, options: DeleteOptions = {}): number {
    const compiled = compileQuery(query);
    const connector = this.#live();
    if (!connector) {
      return 0;
    }

    const actor = this.#actor(options);
    if (options.multiple) {
      const removed = connector.deleteMany(compiled);
      if (removed > 0) {
        this.#audit.record(actor, "DELETE_RECORDS", `Deleted ${removed} records`);
      }
      return removed;
    }

    const removed = connector.deleteOne(compiled);
    if (removed > 0) {
      this.#audit.record(actor, "DELETE_RECORD", `Deleted record matching ${JSON.stringify(compiled.source)}`);
    }
    return removed;
  }

  /**
   * Persist buffered changes and wait for pending audit appends
   * @throws {DataFileError} If a file-backed connector cannot write
   */
  async close(): Promise<void> {
    const handle = this.#handle;
    if (handle.status === "connected" && handle.connector.flush) {
      await handle.connector.flush();
    }
    await this.#audit.settle();
  }

  #live(): StoreConnector | undefined {
    if (this.#handle.status !== "connected") {
      return undefined;
    }
    return this.#handle.connector.isAvailable() ? this.#handle.connector : undefined;
  }

  #actor(ctx: OperationContext): string {
    return ctx.actor ?? this.#defaultActor;
  }
}

export interface OpenStoreOptions {
  /** Path to a JSON array data file */
  dataFile?: string;
  /** Create the data file on first flush when it does not exist (default: false) */
  createIfMissing?: boolean;
  /** Seed an in-memory store instead of reading a file */
  records?: Iterable<AnimalRecord>;
  /** Use a caller-supplied connector; takes precedence over records and dataFile */
  connector?: StoreConnector;
  /** Path of a JSON-lines audit log */
  auditLog?: string;
  /** Audit sink; takes precedence over auditLog */
  auditSink?: AuditSink;
  fallback?: FallbackProvider;
  defaultActor?: string;
}

/**
 * Resolve a store handle from options. A data file that is missing or invalid
 * yields an unavailable handle rather than an error.
 */
export async function resolveHandle(options: OpenStoreOptions): Promise<StoreHandle> {
  if (options.connector) {
    return connected(options.connector);
  }
  if (options.records) {
    return connected(new MemoryConnector(options.records));
  }
  if (!options.dataFile) {
    return unavailable("no data source configured");
  }

  try {
    const connector = await JsonFileConnector.load(options.dataFile, {
      createIfMissing: options.createIfMissing,
    });
    return connected(connector);
  } catch (err) {
    if (err instanceof DataFileError) {
      logger.warn("store.demo_mode", { message: err.message, details: { code: err.code } });
      return unavailable(err.message);
    }
    throw err;
  }
}

/**
 * Open a record store from a data file, seed records or connector
 *
 * @example
 * ```typescript
 * const store = await openShelterStore({ dataFile: "./data/animals.json", auditLog: "./data/audit.jsonl" });
 * const dogs = store.read({ animal_type: "Dog" }, { actor: "analyst1" });
 * await store.close();
 * ```
 */
export async function openShelterStore(options: OpenStoreOptions = {}): Promise<RecordStore> {
  const handle = await resolveHandle(options);
  const sink = options.auditSink ?? (options.auditLog ? new JsonLinesAuditSink(options.auditLog) : undefined);

  return new RecordStore({
    handle,
    fallback: options.fallback,
    audit: new MutationLog(sink),
    defaultActor: options.defaultActor,
  });
}
