/**
 * Unit tests for MCP error mapping
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { DataFileError, InvalidInputError } from "@shelter-records/sdk";
import { mapErrorToMcp } from "../../mcp.js";
import { ToolTimeoutError } from "../../tools.js";
import { AccessDeniedError } from "../../service/shelter.js";

describe("mapErrorToMcp", () => {
  it("should map zod errors to invalid params with issue paths", () => {
    const result = z.object({ limit: z.number() }).safeParse({ limit: "ten" });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(mapErrorToMcp(result.error)).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Validation error: limit: Expected number, received string",
    });
  });

  it("should map invalid input to invalid params", () => {
    expect(mapErrorToMcp(new InvalidInputError("query", "must be a mapping"))).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Invalid query: must be a mapping",
    });
  });

  it("should map access denial to invalid request", () => {
    expect(mapErrorToMcp(new AccessDeniedError("token_expired", "Token expired"))).toEqual({
      code: ErrorCode.InvalidRequest,
      message: "Access denied: Token expired",
    });
  });

  it("should map timeouts to request timeout", () => {
    expect(mapErrorToMcp(new ToolTimeoutError("demographics", 50))).toEqual({
      code: ErrorCode.RequestTimeout,
      message: "Tool execution timeout after 50ms",
    });
  });

  it("should map data file failures to internal errors", () => {
    expect(mapErrorToMcp(new DataFileError("/tmp/animals.json", "not a JSON array")).code).toBe(
      ErrorCode.InternalError
    );
  });

  it("should label permission errors", () => {
    const err = Object.assign(new Error("open /data/animals.json"), { code: "EACCES" });
    expect(mapErrorToMcp(err)).toEqual({
      code: ErrorCode.InternalError,
      message: "Permission denied: open /data/animals.json",
    });
  });

  it("should stringify non-errors", () => {
    expect(mapErrorToMcp("boom")).toEqual({ code: ErrorCode.InternalError, message: "boom" });
  });
});
