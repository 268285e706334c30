/**
 * Flat-file connector: a JSON array of records held in memory and written back atomically
 */

import { z } from "zod";
import { DataFileError } from "../errors.js";
import { atomicWrite, readTextFile } from "../io.js";
import { stableStringify } from "../format.js";
import { logger } from "../observability/logs.js";
import { CompiledQuery } from "../query.js";
import type { AnimalRecord, RecordPatch, StoreConnector } from "../types.js";
import { MemoryConnector } from "./memory.js";

const recordSchema = z.record(z.string(), z.unknown());
const dataFileSchema = z.array(recordSchema);

const ALL = new CompiledQuery({});

/**
 * Parse data file text into records
 * @throws {DataFileError} If the text is not JSON or not an array of objects
 */
export function parseDataFile(filePath: string, text: string): AnimalRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DataFileError(filePath, "not valid JSON", { cause: err });
  }

  const parsed = dataFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join(".")}]` : "";
    throw new DataFileError(filePath, `expected an array of records${where}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export interface JsonFileConnectorOptions {
  /** Create an empty collection when the file does not exist (default: false) */
  createIfMissing?: boolean;
}

/**
 * Connector over a local JSON file
 *
 * Mutations land in memory and mark the connector dirty; {@link flush} persists them.
 */
export class JsonFileConnector implements StoreConnector {
  readonly filePath: string;
  #inner: MemoryConnector;
  #dirty = false;

  private constructor(filePath: string, records: AnimalRecord[]) {
    this.filePath = filePath;
    this.#inner = new MemoryConnector(records);
  }

  /**
   * Load a data file
   * @throws {DataFileError} If the file is missing (unless createIfMissing), unreadable or invalid
   */
  static async load(filePath: string, options: JsonFileConnectorOptions = {}): Promise<JsonFileConnector> {
    const text = await readTextFile(filePath);
    if (text === undefined) {
      if (!options.createIfMissing) {
        throw new DataFileError(filePath, "file not found");
      }
      logger.info("store.file_created", { message: filePath });
      const connector = new JsonFileConnector(filePath, []);
      connector.#dirty = true;
      return connector;
    }

    const records = parseDataFile(filePath, text);
    logger.debug("store.file_loaded", { message: filePath, details: { records: records.length } });
    return new JsonFileConnector(filePath, records);
  }

  /** True when there are mutations not yet flushed */
  get dirty(): boolean {
    return this.#dirty;
  }

  isAvailable(): boolean {
    return true;
  }

  findAll(query: CompiledQuery): AnimalRecord[] {
    return this.#inner.findAll(query);
  }

  insertOne(record: AnimalRecord): boolean {
    const inserted = this.#inner.insertOne(record);
    this.#dirty ||= inserted;
    return inserted;
  }

  updateOne(query: CompiledQuery, patch: RecordPatch): number {
    return this.#track(this.#inner.updateOne(query, patch));
  }

  updateMany(query: CompiledQuery, patch: RecordPatch): number {
    return this.#track(this.#inner.updateMany(query, patch));
  }

  deleteOne(query: CompiledQuery): number {
    return this.#track(this.#inner.deleteOne(query));
  }

  deleteMany(query: CompiledQuery): number {
    return this.#track(this.#inner.deleteMany(query));
  }

  /**
   * Write the collection back to disk if it changed since load or the last flush
   * @throws {DataFileError} If the write fails
   */
  async flush(): Promise<void> {
    if (!this.#dirty) {
      return;
    }
    const records = this.#inner.findAll(ALL);
    await atomicWrite(this.filePath, stableStringify(records));
    this.#dirty = false;
    logger.debug("store.file_flushed", { message: this.filePath, details: { records: records.length } });
  }

  #track(count: number): number {
    this.#dirty ||= count > 0;
    return count;
  }
}
