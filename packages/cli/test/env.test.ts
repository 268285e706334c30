/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import {
  DEFAULT_DATA_FILE,
  expandTilde,
  isVerbose,
  resolveActor,
  resolveAuditLog,
  resolveDataFile,
} from "../src/lib/env.js";

const VARS = ["SHELTER_DATA_FILE", "SHELTER_AUDIT_LOG", "SHELTER_USER", "SHELTER_CLI_DEBUG"];

describe("environment resolution", () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = Object.fromEntries(VARS.map((name) => [name, process.env[name]]));
    for (const name of VARS) {
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const [name, value] of Object.entries(saved)) {
      if (value !== undefined) {
        process.env[name] = value;
      } else {
        delete process.env[name];
      }
    }
  });

  describe("resolveDataFile", () => {
    it("should use CLI option when provided", () => {
      process.env.SHELTER_DATA_FILE = "/env/animals.json";
      expect(resolveDataFile("/cli/animals.json")).toBe(path.resolve("/cli/animals.json"));
    });

    it("should fall back to SHELTER_DATA_FILE", () => {
      process.env.SHELTER_DATA_FILE = "/env/animals.json";
      expect(resolveDataFile()).toBe(path.resolve("/env/animals.json"));
    });

    it("should default to ./data/animals.json", () => {
      expect(resolveDataFile()).toBe(path.resolve(DEFAULT_DATA_FILE));
    });

    it("should expand a leading tilde", () => {
      expect(resolveDataFile("~/shelter/animals.json")).toBe(
        path.join(homedir(), "shelter/animals.json")
      );
    });
  });

  describe("resolveAuditLog", () => {
    it("should be undefined when not configured", () => {
      expect(resolveAuditLog()).toBeUndefined();
    });

    it("should prefer the CLI option over SHELTER_AUDIT_LOG", () => {
      process.env.SHELTER_AUDIT_LOG = "/env/audit.jsonl";
      expect(resolveAuditLog("/cli/audit.jsonl")).toBe(path.resolve("/cli/audit.jsonl"));
      expect(resolveAuditLog()).toBe(path.resolve("/env/audit.jsonl"));
    });
  });

  describe("resolveActor", () => {
    it("should prefer the CLI option over SHELTER_USER", () => {
      process.env.SHELTER_USER = "env-user";
      expect(resolveActor("analyst1")).toBe("analyst1");
      expect(resolveActor()).toBe("env-user");
    });

    it("should ignore blank names", () => {
      expect(resolveActor("   ")).toBeUndefined();
      expect(resolveActor()).toBeUndefined();
    });
  });

  describe("expandTilde", () => {
    it("should leave other paths and ~user references untouched", () => {
      expect(expandTilde("./data")).toBe("./data");
      expect(expandTilde("~other/data")).toBe("~other/data");
      expect(expandTilde("~")).toBe(homedir());
    });
  });

  describe("isVerbose", () => {
    it("should only be true for SHELTER_CLI_DEBUG=1", () => {
      expect(isVerbose()).toBe(false);
      process.env.SHELTER_CLI_DEBUG = "true";
      expect(isVerbose()).toBe(false);
      process.env.SHELTER_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
