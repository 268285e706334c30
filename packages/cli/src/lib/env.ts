/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_DATA_FILE = "./data/animals.json";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the records data file
 * Priority: CLI option > SHELTER_DATA_FILE env var > default "./data/animals.json"
 */
export function resolveDataFile(cliData?: string): string {
  const file = cliData ?? process.env.SHELTER_DATA_FILE ?? DEFAULT_DATA_FILE;
  return path.resolve(expandTilde(file));
}

/**
 * Resolve the JSON-lines audit log, if one is configured
 * Priority: CLI option > SHELTER_AUDIT_LOG env var > none
 */
export function resolveAuditLog(cliAuditLog?: string): string | undefined {
  const file = cliAuditLog ?? process.env.SHELTER_AUDIT_LOG;
  return file ? path.resolve(expandTilde(file)) : undefined;
}

/**
 * Resolve the actor recorded in the audit trail
 * Priority: CLI option > SHELTER_USER env var > none (the store's system actor)
 */
export function resolveActor(cliUser?: string): string | undefined {
  const user = cliUser ?? process.env.SHELTER_USER;
  return user?.trim() ? user.trim() : undefined;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.SHELTER_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}

/**
 * Options accepted before any command
 */
export type GlobalOptions = {
  dataFile?: string;
  auditLog?: string;
  user?: string;
  verbose?: boolean;
  quiet?: boolean;
};
