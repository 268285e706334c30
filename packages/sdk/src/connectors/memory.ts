/**
 * In-memory connector: an ordered record collection evaluated with the query engine
 */

import type { AnimalRecord, RecordPatch, StoreConnector } from "../types.js";
import type { CompiledQuery } from "../query.js";

/**
 * Ordered in-memory record collection
 *
 * Records and patch values are deep-copied on the way in and on the way out,
 * so callers never hold a reference into the collection.
 */
export class MemoryConnector implements StoreConnector {
  #records: AnimalRecord[];

  constructor(records: Iterable<AnimalRecord> = []) {
    this.#records = Array.from(records, (record) => structuredClone(record));
  }

  /** Number of records held */
  get size(): number {
    return this.#records.length;
  }

  isAvailable(): boolean {
    return true;
  }

  findAll(query: CompiledQuery): AnimalRecord[] {
    const matched = query.isEmpty ? this.#records : this.#records.filter((r) => query.test(r));
    return matched.map((record) => structuredClone(record));
  }

  insertOne(record: AnimalRecord): boolean {
    this.#records.push(structuredClone(record));
    return true;
  }

  updateOne(query: CompiledQuery, patch: RecordPatch): number {
    return this.#update(query, patch, false);
  }

  updateMany(query: CompiledQuery, patch: RecordPatch): number {
    return this.#update(query, patch, true);
  }

  deleteOne(query: CompiledQuery): number {
    return this.#delete(query, false);
  }

  deleteMany(query: CompiledQuery): number {
    return this.#delete(query, true);
  }

  /**
   * Merge patch fields into matching records in order.
   * A match whose fields already hold the patch values is not counted.
   */
  #update(query: CompiledQuery, patch: RecordPatch, multiple: boolean): number {
    let modified = 0;
    for (const record of this.#records) {
      if (!query.test(record)) {
        continue;
      }
      if (applyPatch(record, patch)) {
        modified++;
      }
      if (!multiple) {
        break;
      }
    }
    return modified;
  }

  /**
   * Partition into kept/removed and swap the kept partition in
   */
  #delete(query: CompiledQuery, multiple: boolean): number {
    const kept: AnimalRecord[] = [];
    let removed = 0;
    for (const record of this.#records) {
      if ((multiple || removed === 0) && query.test(record)) {
        removed++;
        continue;
      }
      kept.push(record);
    }
    this.#records = kept;
    return removed;
  }
}

/**
 * Overwrite record fields with patch fields
 * @returns true if any field changed
 */
function applyPatch(record: AnimalRecord, patch: RecordPatch): boolean {
  let changed = false;
  for (const [field, value] of Object.entries(patch)) {
    if (!Object.hasOwn(record, field) || !Object.is(record[field], value)) {
      record[field] = structuredClone(value);
      changed = true;
    }
  }
  return changed;
}
