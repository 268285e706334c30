/**
 * Error types for shelter record operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Only InvalidInputError and DataFileError reach callers; computation and audit
 *   failures are caught where they occur and masked
 */

import type { AggregationKind } from "./types.js";

/**
 * Base class for all shelter store errors
 */
export abstract class ShelterStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a query, patch, record or argument is not well formed
 */
export class InvalidInputError extends ShelterStoreError {
  readonly code = "INVALID_INPUT";

  constructor(
    public readonly argument: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid ${argument}: ${reason}`, options);
  }
}

/**
 * Raised inside the analytics engine when an aggregation cannot be computed
 */
export class ComputationFailureError extends ShelterStoreError {
  readonly code = "COMPUTATION_FAILURE";

  constructor(
    public readonly aggregation: AggregationKind,
    options?: ErrorOptions
  ) {
    super(`Aggregation "${aggregation}" failed`, options);
  }
}

/**
 * Raised inside the mutation log when an entry cannot be appended
 */
export class AuditFailureError extends ShelterStoreError {
  readonly code = "AUDIT_FAILURE";

  constructor(action: string, options?: ErrorOptions) {
    super(`Failed to append audit entry for ${action}`, options);
  }
}

/**
 * Thrown when the flat data file cannot be read, validated or written
 */
export class DataFileError extends ShelterStoreError {
  readonly code = "DATA_FILE_ERROR";

  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Data file ${filePath}: ${reason}`, options);
  }
}

/**
 * Read the `code` of a Node.js system error, if there is one
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
