import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { JsonLinesAuditSink, MemoryAuditSink, MutationLog } from "./audit.js";
import { logger } from "./observability/logs.js";

const fixedNow = () => new Date("2024-05-01T12:00:00.000Z");

describe("MutationLog", () => {
  afterEach(() => {
    logger.setSink();
  });

  it("should append frozen entries with a timestamp", () => {
    const sink = new MemoryAuditSink();
    const log = new MutationLog(sink, fixedNow);

    log.record("admin", "USER_CREATED", "Created user staff1 with role viewer");

    expect(sink.entries).toEqual([
      {
        actor: "admin",
        action: "USER_CREATED",
        detail: "Created user staff1 with role viewer",
        timestamp: "2024-05-01T12:00:00.000Z",
      },
    ]);
    expect(Object.isFrozen(sink.entries[0])).toBe(true);
  });

  it("should log and ignore a sink that throws", () => {
    const lines: string[] = [];
    logger.setSink((_level, line) => lines.push(line));
    const log = new MutationLog({
      append: () => {
        throw new Error("disk full");
      },
    });

    expect(() => log.record("staff1", "CREATE_RECORD", "Created animal record A1")).not.toThrow();
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[WARN] [audit.append_failed] Failed to append audit entry for CREATE_RECORD");
    expect(lines[0]).toContain('"code":"AUDIT_FAILURE"');
  });

  it("should log and ignore a sink that rejects", async () => {
    const warn = vi.fn();
    logger.setSink((level, line) => {
      if (level === "warn") warn(line);
    });
    const log = new MutationLog({ append: () => Promise.reject(new Error("disk full")) });

    log.record("staff1", "DELETE_RECORDS", "Deleted 2 records");
    await log.settle();

    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("JsonLinesAuditSink", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "shelter-audit-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should write one JSON object per line in call order", async () => {
    const filePath = join(testDir, "nested", "audit.jsonl");
    const log = new MutationLog(new JsonLinesAuditSink(filePath), fixedNow);

    log.record("a", "LOGIN_SUCCESS", "User logged in successfully");
    log.record("b", "LOGIN_FAILED", "Failed login attempt");
    await log.settle();

    expect(await readFile(filePath, "utf-8")).toBe(
      '{"actor":"a","action":"LOGIN_SUCCESS","detail":"User logged in successfully","timestamp":"2024-05-01T12:00:00.000Z"}\n' +
        '{"actor":"b","action":"LOGIN_FAILED","detail":"Failed login attempt","timestamp":"2024-05-01T12:00:00.000Z"}\n'
    );
  });
});
