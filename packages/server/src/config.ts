/**
 * Server configuration from environment variables
 */

import * as path from "node:path";
import { z } from "zod";

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true"));

const EnvSchema = z.object({
  SHELTER_DATA_FILE: z.string().min(1).default("./data/animals.json"),
  SHELTER_AUDIT_LOG: z.string().min(1).optional(),
  SHELTER_TOKEN_SECRET: z.string().min(1, "SHELTER_TOKEN_SECRET must be set"),
  SHELTER_ADMIN_PASSWORD: z.string().min(1).optional(),
  SHELTER_MCP_READONLY: flag(false),
  SHELTER_TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export interface ServerConfig {
  dataFile: string;
  auditLog?: string;
  tokenSecret: string;
  /** Seeds an "admin" account when set */
  adminPassword?: string;
  readOnly: boolean;
  toolTimeoutMs: number;
}

/**
 * Read and validate configuration
 * @throws {z.ZodError} If a variable is missing or malformed
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.parse(env);
  return {
    dataFile: path.resolve(parsed.SHELTER_DATA_FILE),
    auditLog: parsed.SHELTER_AUDIT_LOG ? path.resolve(parsed.SHELTER_AUDIT_LOG) : undefined,
    tokenSecret: parsed.SHELTER_TOKEN_SECRET,
    adminPassword: parsed.SHELTER_ADMIN_PASSWORD,
    readOnly: parsed.SHELTER_MCP_READONLY,
    toolTimeoutMs: parsed.SHELTER_TOOL_TIMEOUT_MS,
  };
}
