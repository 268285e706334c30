/**
 * File I/O for the flat data file and the audit log
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files reside in the same directory as the target (same filesystem for rename)
 * - Temp files are removed on failure paths
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { DataFileError, errorCode } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Ensure a directory exists, creating parents as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DataFileError(dirPath, "cannot create directory", { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync
 * @param filePath - Target file path
 * @param content - UTF-8 content
 * @throws {DataFileError} If any step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS/EINVAL: datasync unsupported on this mount
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    try {
      const dirHandle = await fs.open(dir, "r");
      try {
        await dirHandle.sync();
      } finally {
        await dirHandle.close();
      }
    } catch (err) {
      const code = errorCode(err);
      if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
        logger.debug("io.dir_fsync_failed", { message: dir, details: { code } });
      }
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { message: tmp, details: { code: errorCode(closeErr) } });
      });
    }
    await fs.unlink(tmp).catch(() => undefined);

    throw new DataFileError(filePath, "write failed", { cause: err });
  }
}

/**
 * Read a UTF-8 text file
 * @returns File contents, or undefined when the file does not exist
 * @throws {DataFileError} For any other read failure
 */
export async function readTextFile(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return undefined;
    }
    throw new DataFileError(filePath, "read failed", { cause: err });
  }
}

/**
 * Append one line to a file, creating it and its directory on first use
 * @throws {DataFileError} If the append fails
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
  await ensureDirectory(dirname(filePath));
  try {
    await fs.appendFile(filePath, `${line}\n`, "utf-8");
  } catch (err) {
    throw new DataFileError(filePath, "append failed", { cause: err });
  }
}
