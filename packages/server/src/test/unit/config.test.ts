/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import { resolve } from "node:path";
import { loadServerConfig } from "../../config.js";

describe("loadServerConfig", () => {
  it("should apply defaults", () => {
    const config = loadServerConfig({ SHELTER_TOKEN_SECRET: "test-secret" });

    expect(config).toEqual({
      dataFile: resolve("./data/animals.json"),
      auditLog: undefined,
      tokenSecret: "test-secret",
      adminPassword: undefined,
      readOnly: false,
      toolTimeoutMs: 5000,
    });
  });

  it("should read every variable", () => {
    const config = loadServerConfig({
      SHELTER_TOKEN_SECRET: "test-secret",
      SHELTER_DATA_FILE: "/tmp/shelter/animals.json",
      SHELTER_AUDIT_LOG: "/tmp/shelter/audit.jsonl",
      SHELTER_ADMIN_PASSWORD: "test-password",
      SHELTER_MCP_READONLY: "true",
      SHELTER_TOOL_TIMEOUT_MS: "250",
    });

    expect(config).toEqual({
      dataFile: "/tmp/shelter/animals.json",
      auditLog: "/tmp/shelter/audit.jsonl",
      tokenSecret: "test-secret",
      adminPassword: "test-password",
      readOnly: true,
      toolTimeoutMs: 250,
    });
  });

  it("should require a token secret", () => {
    expect(() => loadServerConfig({})).toThrow(/SHELTER_TOKEN_SECRET/);
  });

  it("should reject a malformed read-only flag", () => {
    expect(() =>
      loadServerConfig({ SHELTER_TOKEN_SECRET: "test-secret", SHELTER_MCP_READONLY: "yes" })
    ).toThrow();
  });
});
