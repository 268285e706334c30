/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openShelterStore, stableStringify } from "@shelter-records/sdk";
import type { AnimalRecord, OpenStoreOptions, RecordStore } from "@shelter-records/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "shelter-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "shelter-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write records as a data file
 * @returns Absolute path of the file
 */
export async function writeDataFile(
  dir: string,
  records: readonly AnimalRecord[],
  name = "animals.json"
): Promise<string> {
  const filePath = join(dir, name);
  await writeFile(filePath, stableStringify(records), "utf8");
  return filePath;
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a temp data file holding `records`
 * @param fn - Receives the data file path and its directory
 */
export async function withTempDataFile<T>(
  records: readonly AnimalRecord[],
  fn: (dataFile: string, dir: string) => Promise<T>
): Promise<T> {
  return withTempDir(async (dir) => fn(await writeDataFile(dir, records), dir));
}

/**
 * Execute a function with a file-backed store, closing it and cleaning up after
 * @param records - Initial contents of the data file
 * @param fn - Function to execute with store
 * @param options - Optional store options (dataFile will be overridden)
 * @returns Result of fn
 */
export async function withTempStore<T>(
  records: readonly AnimalRecord[],
  fn: (store: RecordStore, dataFile: string) => Promise<T>,
  options?: Omit<OpenStoreOptions, "dataFile">
): Promise<T> {
  const dir = await createTempDir();
  let store: RecordStore;
  let dataFile: string;
  try {
    dataFile = await writeDataFile(dir, records);
    store = await openShelterStore({ ...options, dataFile });
  } catch (err) {
    await removeDir(dir);
    throw err;
  }

  let fnError: unknown;
  try {
    return await fn(store, dataFile);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      await store.close();
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(dir);
    } catch (err) {
      cleanupError ??= err;
    }
    if (fnError === undefined && cleanupError !== undefined) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}
