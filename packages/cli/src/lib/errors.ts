/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { ShelterStoreError, errorMessage } from "@shelter-records/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success, help or version output
 * - 1: usage/validation/IO/unknown error
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  // Commander reports help/version as errors with exit code 0 under exitOverride
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  // InvalidInputError, DataFileError and the rest of the SDK hierarchy
  if (error instanceof ShelterStoreError) {
    return 1;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error instanceof ShelterStoreError) {
      message = `[${error.code}] ${message}`;
    }

    if (verbose && error.cause !== undefined) {
      message += `\n  Cause: ${errorMessage(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
