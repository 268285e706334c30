/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { errorCode, errorMessage } from "@shelter-records/sdk";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new CliError(`File not found: ${filePath}`, { cause: err });
    }
    throw new CliError(`Cannot read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseJson(content, `file ${filePath}`);
}

/**
 * Where a JSON argument may come from; at most one of `inline` and `file`
 */
export interface JsonInputSources {
  inline?: string;
  /** Flag name of the inline source, for messages (e.g. "--query") */
  inlineFlag: string;
  file?: string;
  /** Used when neither source is given and stdin is interactive */
  fallback?: unknown;
}

/**
 * Resolve a JSON argument from an inline option, a file, or piped stdin
 */
export async function readJsonInput(sources: JsonInputSources): Promise<unknown> {
  const { inline, inlineFlag, file, fallback } = sources;

  if (inline !== undefined && file !== undefined) {
    throw new InvalidArgumentError(
      `Cannot use both --file and ${inlineFlag}; choose one or use stdin`
    );
  }

  if (file !== undefined) {
    return readJsonFromFile(file);
  }
  if (inline !== undefined) {
    return parseJson(inline, inlineFlag);
  }

  if (isStdinTTY()) {
    if (fallback !== undefined) {
      return fallback;
    }
    throw new InvalidArgumentError(
      `No input provided. Use ${inlineFlag}, --file, or pipe JSON to stdin`
    );
  }

  let stdin: string;
  try {
    stdin = await readStdin();
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : "Failed to read from stdin");
  }
  if (!stdin.trim()) {
    if (fallback !== undefined) {
      return fallback;
    }
    throw new InvalidArgumentError("stdin is empty");
  }
  return parseJson(stdin, "stdin");
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
